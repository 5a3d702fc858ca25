import type { DatabaseCredentials, MigrationParameters, ServerEndpoints } from './migration';
import type { ServerEndpoint } from './remote-ssh';

/**
 * Source of every operator-supplied value. The CLI answers through inquirer
 * (or from environment defaults with --yes); tests script the answers.
 */
export interface MigrationPrompter {
  serverEndpoints(): Promise<ServerEndpoints<ServerEndpoint>>;
  confirm(message: string, defaultValue: boolean): Promise<boolean>;
  migrationParameters(): Promise<MigrationParameters>;
  destinationDatabase(): Promise<DatabaseCredentials>;
  destinationInstallPath(sourcePath: string): Promise<string>;
  webServerUser(): Promise<string>;
}
