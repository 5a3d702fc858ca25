import path from 'path';
import type {
  DatabaseCredentials,
  MigrationParameters,
  MigrationPrompter,
  RemoteSession,
  SourceDatabaseCredentials,
} from '../interfaces';
import type { MigrationLogger } from '../lib/logger';
import {
  createDatabaseSql,
  mysqlClient,
  mysqlImport,
  mysqlRoot,
  mysqldump,
  sqlString,
  updateSiteUrlSql,
} from '../lib/mysql';
import { errorMessage, fail, ok, okWith, type StepResult } from '../lib/result';
import { ShellCommand } from '../lib/shell-command';
import { fileTimestamp } from '../lib/timestamp';
import { readDatabaseCredentials } from './installation';
import { DEFAULT_RELAY_PATH, relayFile } from './relay';
import { runSteps, type MigrationStep } from './stage-runner';

/**
 * Directory holding the dump on both servers.
 */
export const DUMP_DIRECTORY = '/tmp/wp_migration_backup';

export interface DatabaseMigratorOptions {
  logger: MigrationLogger;
  prompter: Pick<MigrationPrompter, 'destinationDatabase'>;
  relayPath?: string;
  mysqlRootPassword?: string;
  now?: () => Date;
}

interface DatabaseMigrationContext {
  parameters: MigrationParameters;
  sourceCredentials?: SourceDatabaseCredentials;
  dumpFile?: string;
  destinationCredentials?: DatabaseCredentials;
}

function output(result: { stdout: string; stderr: string }): string {
  return [result.stdout, result.stderr].filter(Boolean).join(' ');
}

export class DatabaseMigrator {
  private source: RemoteSession;
  private destination: RemoteSession;
  private logger: MigrationLogger;
  private prompter: Pick<MigrationPrompter, 'destinationDatabase'>;
  private relayPath: string;
  private mysqlRootPassword?: string;
  private now: () => Date;

  constructor(
    source: RemoteSession,
    destination: RemoteSession,
    options: DatabaseMigratorOptions
  ) {
    this.source = source;
    this.destination = destination;
    this.logger = options.logger;
    this.prompter = options.prompter;
    this.relayPath = options.relayPath ?? DEFAULT_RELAY_PATH;
    this.mysqlRootPassword = options.mysqlRootPassword;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Dump, transfer and import the database, then point it at the new URL.
   * Resolves with the destination credentials for the post-migration stage.
   */
  async migrate(
    parameters: MigrationParameters
  ): Promise<StepResult<DatabaseCredentials>> {
    this.logger.section('Starting database migration');
    this.logger.info(`Old URL: ${parameters.oldUrl}`);
    this.logger.info(`New URL: ${parameters.newUrl}`);

    const context: DatabaseMigrationContext = { parameters };
    const result = await runSteps('database', this.steps(), context, this.logger);
    if (!result.ok) {
      return result;
    }
    if (!context.destinationCredentials) {
      return fail('Destination database credentials were not collected');
    }
    return okWith('Database migration completed', context.destinationCredentials);
  }

  private steps(): MigrationStep<DatabaseMigrationContext>[] {
    return [
      {
        name: 'Extract source database credentials',
        policy: 'critical',
        run: async (context) => {
          const result = await readDatabaseCredentials(
            this.source,
            context.parameters.sourceWpPath
          );
          if (result.ok) {
            context.sourceCredentials = result.value;
          }
          return result;
        },
      },
      {
        name: 'Export source database',
        policy: 'critical',
        run: async (context) => {
          if (!context.sourceCredentials) {
            return fail('Source database credentials are missing');
          }
          const result = await this.exportDatabase(context.sourceCredentials);
          if (result.ok) {
            context.dumpFile = result.value;
          }
          return result;
        },
      },
      {
        name: 'Transfer database dump',
        policy: 'critical',
        run: async (context) => {
          if (!context.dumpFile) {
            return fail('No database dump to transfer');
          }
          return this.transferDump(context.dumpFile);
        },
      },
      {
        name: 'Collect destination database credentials',
        policy: 'critical',
        run: async (context) => {
          const credentials = await this.prompter.destinationDatabase();
          context.destinationCredentials = credentials;
          return ok(
            `Destination database: ${credentials.name} @ ${credentials.host}`
          );
        },
      },
      {
        name: 'Create destination database',
        policy: 'best-effort',
        run: async (context) => {
          if (!context.destinationCredentials) {
            return fail('Destination database credentials are missing');
          }
          const result = await this.createDestinationDatabase(
            context.destinationCredentials
          );
          if (!result.ok) {
            return fail(
              `${result.message}. The database may need to be created manually`
            );
          }
          return result;
        },
      },
      {
        name: 'Import database',
        policy: 'critical',
        run: async (context) => {
          if (!context.destinationCredentials || !context.dumpFile) {
            return fail('Nothing to import');
          }
          return this.importDatabase(
            context.destinationCredentials,
            context.dumpFile
          );
        },
      },
      {
        name: 'Update site URLs',
        policy: 'critical',
        run: async (context) => {
          if (!context.destinationCredentials || !context.sourceCredentials) {
            return fail('Database credentials are missing');
          }
          return this.updateSiteUrls(
            context.destinationCredentials,
            context.sourceCredentials.tablePrefix,
            context.parameters.newUrl
          );
        },
      },
    ];
  }

  /**
   * Dump the source database to a timestamped file and gzip it.
   * Resolves with the path of the .sql.gz file.
   */
  async exportDatabase(
    credentials: DatabaseCredentials
  ): Promise<StepResult<string>> {
    const dumpFile = path.posix.join(
      DUMP_DIRECTORY,
      `wordpress_db_${fileTimestamp(this.now())}.sql`
    );
    const compressedFile = `${dumpFile}.gz`;

    this.logger.info(`Database: ${credentials.name}`);
    this.logger.info(`Dump file: ${compressedFile}`);

    const mkdir = await this.source.execute(
      ShellCommand.of('mkdir', '-p', DUMP_DIRECTORY)
    );
    if (mkdir.exitCode !== 0) {
      return fail(`Could not create backup directory: ${output(mkdir)}`);
    }

    this.logger.info('Exporting database (this may take a while)...');
    const dump = await this.source.execute(mysqldump(credentials, dumpFile));
    if (dump.exitCode !== 0) {
      await this.source.execute(ShellCommand.of('rm', '-f', dumpFile));
      return fail(`Database export failed: ${output(dump)}`);
    }

    const gzip = await this.source.execute(ShellCommand.of('gzip', '-f', dumpFile));
    if (gzip.exitCode !== 0) {
      return fail(`Could not compress the dump: ${output(gzip)}`);
    }

    const size = await this.source.execute(
      ShellCommand.of('du', '-h', compressedFile).pipe(ShellCommand.of('cut', '-f1'))
    );
    return okWith(
      `Database exported and compressed: ${compressedFile} (${size.stdout || 'unknown size'})`,
      compressedFile
    );
  }

  /**
   * Relay the dump to the same path on the destination, then remove it from
   * the source.
   */
  async transferDump(dumpFile: string): Promise<StepResult> {
    const mkdir = await this.destination.execute(
      ShellCommand.of('mkdir', '-p', path.posix.dirname(dumpFile))
    );
    if (mkdir.exitCode !== 0) {
      return fail(`Could not create destination directory: ${output(mkdir)}`);
    }

    this.logger.info('Transferring file (this may take a while)...');
    const transfer = await relayFile(
      this.source,
      dumpFile,
      this.destination,
      dumpFile,
      this.relayPath
    );
    if (!transfer.ok) {
      return transfer;
    }

    const cleanup = await this.source.execute(ShellCommand.of('rm', '-f', dumpFile));
    if (cleanup.exitCode !== 0) {
      this.logger.warn(`Could not remove ${dumpFile} from the source: ${output(cleanup)}`);
    }

    return ok(transfer.message);
  }

  /**
   * Create the database, user and grants as the MySQL root user unless the
   * database already exists.
   */
  async createDestinationDatabase(
    credentials: DatabaseCredentials
  ): Promise<StepResult> {
    this.logger.info(`Checking whether database '${credentials.name}' exists...`);
    const check = await this.destination.execute(
      mysqlRoot(`SHOW DATABASES LIKE ${sqlString(credentials.name)};`, this.mysqlRootPassword)
    );
    if (
      check.exitCode === 0 &&
      check.stdout.split('\n').some((line) => line.trim() === credentials.name)
    ) {
      return ok(`Database '${credentials.name}' already exists`);
    }

    let sql: string;
    try {
      sql = createDatabaseSql(credentials);
    } catch (error) {
      return fail(`Could not create the database: ${errorMessage(error)}`);
    }

    const create = await this.destination.execute(
      mysqlRoot(sql, this.mysqlRootPassword)
    );
    if (create.exitCode !== 0) {
      return fail(`Could not create the database: ${output(create)}`);
    }
    return ok(`Database '${credentials.name}' created`);
  }

  /**
   * Decompress and import the dump. The decompressed file is removed
   * whatever the outcome; the archive only after a successful import.
   */
  async importDatabase(
    credentials: DatabaseCredentials,
    dumpFile: string
  ): Promise<StepResult> {
    const sqlFile = dumpFile.replace(/\.gz$/, '');

    const gunzip = await this.destination.execute(
      ShellCommand.of('gunzip', '-c', dumpFile).stdoutTo(sqlFile)
    );
    if (gunzip.exitCode !== 0) {
      return fail(`Could not decompress the dump: ${output(gunzip)}`);
    }

    this.logger.info('Importing database (this may take a while)...');
    try {
      const imported = await this.destination.execute(
        mysqlImport(credentials, sqlFile)
      );
      if (imported.exitCode !== 0) {
        return fail(`Database import failed: ${output(imported)}`);
      }
    } finally {
      await this.destination.execute(ShellCommand.of('rm', '-f', sqlFile));
    }

    await this.destination.execute(ShellCommand.of('rm', '-f', dumpFile));
    return ok(`Database imported into '${credentials.name}'`);
  }

  async updateSiteUrls(
    credentials: DatabaseCredentials,
    tablePrefix: string,
    newUrl: string
  ): Promise<StepResult> {
    this.logger.info(`Updating ${tablePrefix}options...`);
    const result = await this.destination.execute(
      mysqlClient(credentials, updateSiteUrlSql(tablePrefix, newUrl))
    );
    if (result.exitCode !== 0) {
      return fail(`Could not update site URLs: ${output(result)}`);
    }
    return ok(`Site URLs updated to ${newUrl}`);
  }
}
