export type {
  ServerEndpoint,
  SSHConnectionOptions,
  CommandResult,
  RemoteSession,
  SessionFactory,
} from './remote-ssh';
export type {
  DatabaseCredentials,
  SourceDatabaseCredentials,
  MigrationParameters,
  ServerEndpoints,
} from './migration';
export type { MigrationPrompter } from './prompter';
