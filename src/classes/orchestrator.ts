import type {
  MigrationPrompter,
  RemoteSession,
  SessionFactory,
} from '../interfaces';
import type { MigrationLogger } from '../lib/logger';
import { errorMessage } from '../lib/result';
import { DatabaseMigrator } from './database-migrator';
import { FilesystemMigrator } from './filesystem-migrator';
import { PostMigrationConfigurator } from './post-migration-configurator';
import { PreflightValidator } from './preflight-validator';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;

export interface OrchestratorOptions {
  prompter: MigrationPrompter;
  logger: MigrationLogger;
  openSession: SessionFactory;
  createBackup?: boolean;
  enableDebug?: boolean;
  relayPath?: string;
  mysqlRootPassword?: string;
  now?: () => Date;
}

/**
 * Runs validation, database, filesystem and post-migration stages in order.
 * Every way out goes through cleanup(), which closes both sessions.
 */
export class MigrationOrchestrator {
  private options: OrchestratorOptions;
  private logger: MigrationLogger;
  private source: RemoteSession | null = null;
  private destination: RemoteSession | null = null;
  private interrupted = false;

  constructor(options: OrchestratorOptions) {
    this.options = options;
    this.logger = options.logger;
  }

  async run(): Promise<number> {
    try {
      return await this.migrate();
    } catch (error) {
      this.logger.error(`Unexpected error: ${errorMessage(error)}`);
      if (error instanceof Error && error.stack) {
        this.logger.error(error.stack);
      }
      return EXIT_FAILURE;
    } finally {
      await this.cleanup();
    }
  }

  /**
   * Called once on SIGINT.
   */
  async interrupt(): Promise<number> {
    this.interrupted = true;
    this.logger.error('Operation cancelled by user (Ctrl+C)');
    await this.cleanup();
    return EXIT_FAILURE;
  }

  async cleanup(): Promise<void> {
    const sessions = [this.source, this.destination];
    this.source = null;
    this.destination = null;

    for (const session of sessions) {
      if (!session) {
        continue;
      }
      try {
        await session.close();
      } catch (error) {
        this.logger.warn(`Could not close ${session.label} session: ${errorMessage(error)}`);
      }
    }
  }

  private async migrate(): Promise<number> {
    const { prompter, openSession } = this.options;

    const endpoints = await prompter.serverEndpoints();
    if (!(await prompter.confirm('Proceed with these settings?', true))) {
      this.logger.info('Configuration cancelled by user');
      return EXIT_SUCCESS;
    }

    const validator = new PreflightValidator({ openSession, logger: this.logger });
    const report = await validator.validate(endpoints);
    if (!report.passed) {
      this.logger.error('Validation failed. The migration cannot continue.');
      return EXIT_FAILURE;
    }
    this.logger.stage('validation');

    this.logger.info('Opening SSH sessions for the migration...');
    const source = await openSession(endpoints.source);
    this.source = source;
    const destination = await openSession(endpoints.destination);
    this.destination = destination;
    this.logger.success('SSH sessions established');

    const parameters = await prompter.migrationParameters();
    if (this.interrupted) {
      return EXIT_FAILURE;
    }

    const database = await new DatabaseMigrator(source, destination, {
      logger: this.logger,
      prompter,
      relayPath: this.options.relayPath,
      mysqlRootPassword: this.options.mysqlRootPassword,
      now: this.options.now,
    }).migrate(parameters);
    if (!database.ok) {
      this.logger.error('Database migration failed. Aborting.');
      return EXIT_FAILURE;
    }
    this.logger.stage('database');
    if (this.interrupted) {
      return EXIT_FAILURE;
    }

    const filesystem = await new FilesystemMigrator(source, destination, {
      logger: this.logger,
      prompter,
      createBackup: this.options.createBackup,
      relayPath: this.options.relayPath,
      now: this.options.now,
    }).migrate(parameters.sourceWpPath);
    if (!filesystem.ok) {
      this.logger.error('Filesystem migration failed. Aborting.');
      return EXIT_FAILURE;
    }
    this.logger.stage('filesystem');
    if (this.interrupted) {
      return EXIT_FAILURE;
    }

    const post = await new PostMigrationConfigurator(
      destination,
      this.logger
    ).configure({
      installPath: filesystem.value.destinationPath,
      credentials: database.value,
      enableDebug: this.options.enableDebug ?? false,
    });
    if (!post.ok) {
      this.logger.error('Post-migration tasks failed.');
      this.logger.error(
        'The database and files were migrated, but wp-config.php may need to be fixed manually.'
      );
      return EXIT_FAILURE;
    }
    this.logger.stage('post-migration');

    this.logger.section('WordPress migration completed successfully!');
    this.logger.info(`Your site should be reachable at: ${parameters.newUrl}`);
    if (filesystem.value.backupPath) {
      this.logger.info(`Previous destination files backed up to: ${filesystem.value.backupPath}`);
    }
    if (this.logger.filePath) {
      this.logger.info(`Migration log saved to: ${this.logger.filePath}`);
    }
    return EXIT_SUCCESS;
  }
}
