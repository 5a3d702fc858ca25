import type {
  DatabaseCredentials,
  MigrationParameters,
  MigrationPrompter,
  ServerEndpoint,
  ServerEndpoints,
} from '../../src/interfaces';

export const SOURCE_ENDPOINT: ServerEndpoint = {
  label: 'source',
  host: 'old.example',
  port: 22,
  username: 'deploy',
  password: 'test-secret',
};

export const DESTINATION_ENDPOINT: ServerEndpoint = {
  label: 'destination',
  host: 'new.example',
  port: 2222,
  username: 'deploy',
  password: 'test-secret',
};

export const DESTINATION_DATABASE: DatabaseCredentials = {
  name: 'new_db',
  user: 'new_user',
  password: 'test-secret',
  host: 'localhost',
};

export const PARAMETERS: MigrationParameters = {
  oldUrl: 'http://old.example',
  newUrl: 'https://new.example',
  sourceWpPath: '/var/www/html',
};

/**
 * Answers every prompt with fixed values and records which prompts ran.
 */
export class ScriptedPrompter implements MigrationPrompter {
  readonly asked: string[] = [];
  confirmAnswer = true;
  destinationPath: string | null = null;
  webUser = 'www-data';
  onMigrationParameters: (() => Promise<unknown>) | null = null;

  async serverEndpoints(): Promise<ServerEndpoints<ServerEndpoint>> {
    this.asked.push('serverEndpoints');
    return { source: SOURCE_ENDPOINT, destination: DESTINATION_ENDPOINT };
  }

  async confirm(message: string): Promise<boolean> {
    this.asked.push(`confirm: ${message}`);
    return this.confirmAnswer;
  }

  async migrationParameters(): Promise<MigrationParameters> {
    this.asked.push('migrationParameters');
    if (this.onMigrationParameters) {
      await this.onMigrationParameters();
    }
    return PARAMETERS;
  }

  async destinationDatabase(): Promise<DatabaseCredentials> {
    this.asked.push('destinationDatabase');
    return DESTINATION_DATABASE;
  }

  async destinationInstallPath(sourcePath: string): Promise<string> {
    this.asked.push('destinationInstallPath');
    return this.destinationPath ?? sourcePath;
  }

  async webServerUser(): Promise<string> {
    this.asked.push('webServerUser');
    return this.webUser;
  }
}
