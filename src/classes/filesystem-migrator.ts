import type {
  MigrationPrompter,
  RemoteSession,
} from '../interfaces';
import type { MigrationLogger } from '../lib/logger';
import { fail, ok, okWith, type StepResult } from '../lib/result';
import { ShellCommand } from '../lib/shell-command';
import { fileTimestamp, formatDuration } from '../lib/timestamp';
import { configPath } from '../lib/wp-config';
import { findInstallation, hasWpConfig } from './installation';
import { DEFAULT_RELAY_PATH, relayFile } from './relay';
import { runSteps, type MigrationStep } from './stage-runner';

/**
 * Archive path used on both servers during the transfer.
 */
export const TRANSFER_ARCHIVE = '/tmp/wordpress_files.tar.gz';

export interface FilesystemMigratorOptions {
  logger: MigrationLogger;
  prompter: Pick<MigrationPrompter, 'destinationInstallPath' | 'webServerUser'>;
  createBackup?: boolean;
  relayPath?: string;
  now?: () => Date;
}

export interface FilesystemMigrationResult {
  sourcePath: string;
  destinationPath: string;
  backupPath: string | null;
}

export interface TransferTimings {
  archiveMs: number;
  downloadMs: number;
  uploadMs: number;
  extractMs: number;
}

interface FilesystemMigrationContext {
  requestedSourcePath?: string;
  sourcePath?: string;
  destinationPath?: string;
  backupPath: string | null;
}

function output(result: { stdout: string; stderr: string }): string {
  return [result.stdout, result.stderr].filter(Boolean).join(' ');
}

export class FilesystemMigrator {
  private source: RemoteSession;
  private destination: RemoteSession;
  private logger: MigrationLogger;
  private prompter: Pick<MigrationPrompter, 'destinationInstallPath' | 'webServerUser'>;
  private createBackup: boolean;
  private relayPath: string;
  private now: () => Date;

  constructor(
    source: RemoteSession,
    destination: RemoteSession,
    options: FilesystemMigratorOptions
  ) {
    this.source = source;
    this.destination = destination;
    this.logger = options.logger;
    this.prompter = options.prompter;
    this.createBackup = options.createBackup ?? true;
    this.relayPath = options.relayPath ?? DEFAULT_RELAY_PATH;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Copy the install directory from source to destination and fix its
   * ownership and permissions. requestedSourcePath is only used when it
   * holds a wp-config.php.
   */
  async migrate(
    requestedSourcePath?: string
  ): Promise<StepResult<FilesystemMigrationResult>> {
    this.logger.section('Starting filesystem migration');

    const context: FilesystemMigrationContext = {
      requestedSourcePath,
      backupPath: null,
    };
    const result = await runSteps('filesystem', this.steps(), context, this.logger);
    if (!result.ok) {
      return result;
    }
    if (!context.sourcePath || !context.destinationPath) {
      return fail('Install paths were not resolved');
    }
    return okWith('Filesystem migration completed', {
      sourcePath: context.sourcePath,
      destinationPath: context.destinationPath,
      backupPath: context.backupPath,
    });
  }

  private steps(): MigrationStep<FilesystemMigrationContext>[] {
    return [
      {
        name: 'Locate source installation',
        policy: 'critical',
        run: async (context) => {
          const result = await this.resolveSourcePath(context.requestedSourcePath);
          if (result.ok) {
            context.sourcePath = result.value;
          }
          return result;
        },
      },
      {
        name: 'Choose destination path',
        policy: 'critical',
        run: async (context) => {
          if (!context.sourcePath) {
            return fail('Source path is missing');
          }
          context.destinationPath = await this.prompter.destinationInstallPath(
            context.sourcePath
          );
          return ok(`Destination WordPress: ${context.destinationPath}`);
        },
      },
      {
        name: 'Back up destination installation',
        policy: 'critical',
        run: async (context) => {
          if (!this.createBackup) {
            return ok('Backup disabled');
          }
          if (!context.destinationPath) {
            return fail('Destination path is missing');
          }
          const result = await this.backupDestination(context.destinationPath);
          if (result.ok) {
            context.backupPath = result.value;
          }
          return result;
        },
      },
      {
        name: 'Prepare destination directory',
        policy: 'critical',
        run: async (context) => {
          if (!context.destinationPath) {
            return fail('Destination path is missing');
          }
          return this.prepareDestination(context.destinationPath);
        },
      },
      {
        name: 'Transfer files',
        policy: 'critical',
        run: async (context) => {
          if (!context.sourcePath || !context.destinationPath) {
            return fail('Install paths are missing');
          }
          return this.transferFiles(context.sourcePath, context.destinationPath);
        },
      },
      {
        name: 'Set ownership',
        policy: 'best-effort',
        run: async (context) => {
          if (!context.destinationPath) {
            return fail('Destination path is missing');
          }
          const webUser = await this.prompter.webServerUser();
          const result = await this.setOwnership(context.destinationPath, webUser);
          if (!result.ok) {
            return fail(
              `${result.message}. Ownership may need to be set manually with sudo`
            );
          }
          return result;
        },
      },
      {
        name: 'Set permissions',
        policy: 'critical',
        run: async (context) => {
          if (!context.destinationPath) {
            return fail('Destination path is missing');
          }
          return this.setPermissions(context.destinationPath);
        },
      },
    ];
  }

  async resolveSourcePath(requested?: string): Promise<StepResult<string>> {
    if (requested) {
      if (await hasWpConfig(this.source, requested)) {
        return okWith(`Source WordPress: ${requested}`, requested);
      }
      this.logger.warn(
        `${requested} was given as the source path but has no wp-config.php; searching the usual locations`
      );
    }

    const detected = await findInstallation(this.source);
    if (!detected) {
      return fail('WordPress not found on the source server');
    }
    return okWith(`Source WordPress: ${detected}`, detected);
  }

  /**
   * Copy an existing destination install aside. Resolves with the backup
   * path, or null when there was nothing to back up.
   */
  async backupDestination(
    destinationPath: string
  ): Promise<StepResult<string | null>> {
    const exists = await this.destination.execute(
      ShellCommand.of('test', '-d', destinationPath)
    );
    if (exists.exitCode !== 0) {
      return okWith(
        'No existing WordPress installation on the destination; skipping backup',
        null
      );
    }

    const backupPath = `/tmp/wp_backup_${fileTimestamp(this.now())}`;
    this.logger.info(`Backing up existing WordPress to ${backupPath}`);
    const copy = await this.destination.execute(
      ShellCommand.of('cp', '-r', destinationPath, backupPath)
    );
    if (copy.exitCode !== 0) {
      return fail(`Backup failed: ${output(copy)}`);
    }
    return okWith(`Backup created at ${backupPath}`, backupPath);
  }

  /**
   * Empty the destination directory, or create it when it does not exist.
   */
  async prepareDestination(destinationPath: string): Promise<StepResult> {
    const exists = await this.destination.execute(
      ShellCommand.of('test', '-d', destinationPath)
    );

    if (exists.exitCode === 0) {
      this.logger.info('Removing existing files...');
      const clear = await this.destination.execute(
        ShellCommand.of('find', destinationPath, '-mindepth', '1', '-delete')
      );
      if (clear.exitCode !== 0) {
        return fail(`Could not clear the destination directory: ${output(clear)}`);
      }
      return ok(`Destination directory ${destinationPath} cleared`);
    }

    this.logger.info('Creating destination directory...');
    const create = await this.destination.execute(
      ShellCommand.of('sudo', 'mkdir', '-p', destinationPath)
    );
    if (create.exitCode !== 0) {
      return fail(`Could not create the destination directory: ${output(create)}`);
    }
    return ok(`Destination directory ${destinationPath} created`);
  }

  /**
   * tar on the source, relay, extract on the destination, then remove both
   * archives. Timings are reported only.
   */
  async transferFiles(
    sourcePath: string,
    destinationPath: string
  ): Promise<StepResult<TransferTimings>> {
    const started = Date.now();

    const size = await this.source.execute(
      ShellCommand.of('du', '-sh', sourcePath).pipe(ShellCommand.of('cut', '-f1'))
    );
    if (size.exitCode === 0 && size.stdout) {
      this.logger.info(`Source directory size: ${size.stdout}`);
    }

    this.logger.info('Creating archive on the source server...');
    const archive = await this.source.execute(
      ShellCommand.inDirectory(
        sourcePath,
        ShellCommand.of('tar', '-czf', TRANSFER_ARCHIVE, '.')
      )
    );
    if (archive.exitCode !== 0) {
      return fail(`Could not create the archive: ${output(archive)}`);
    }
    const archiveMs = Date.now() - started;
    this.logger.info(`Archive created in ${formatDuration(archiveMs)}`);

    this.logger.info('Transferring archive (this is the longest step)...');
    const relay = await relayFile(
      this.source,
      TRANSFER_ARCHIVE,
      this.destination,
      TRANSFER_ARCHIVE,
      this.relayPath
    );
    if (!relay.ok) {
      await this.removeArchives();
      return relay;
    }
    const { downloadMs, uploadMs } = relay.value;
    this.logger.info(
      `Downloaded in ${formatDuration(downloadMs)}, uploaded in ${formatDuration(uploadMs)}`
    );

    this.logger.info('Extracting files on the destination server...');
    const extractStart = Date.now();
    const extract = await this.destination.execute(
      ShellCommand.inDirectory(
        destinationPath,
        ShellCommand.of('tar', '-xzf', TRANSFER_ARCHIVE)
      )
    );
    if (extract.exitCode !== 0) {
      await this.removeArchives();
      return fail(`Could not extract the archive: ${output(extract)}`);
    }
    const extractMs = Date.now() - extractStart;
    this.logger.info(`Files extracted in ${formatDuration(extractMs)}`);

    const count = await this.destination.execute(
      ShellCommand.of('find', destinationPath, '-type', 'f').pipe(
        ShellCommand.of('wc', '-l')
      )
    );
    const files = parseInt(count.stdout, 10);
    if (count.exitCode === 0 && files > 0) {
      this.logger.success(`Validated ${files} files on the destination`);
    } else {
      this.logger.warn('Could not validate the file count');
    }

    await this.removeArchives();

    return okWith(
      `Files transferred in ${formatDuration(Date.now() - started)}`,
      { archiveMs, downloadMs, uploadMs, extractMs }
    );
  }

  async setOwnership(destinationPath: string, webUser: string): Promise<StepResult> {
    const chown = await this.destination.execute(
      ShellCommand.of('sudo', 'chown', '-R', `${webUser}:${webUser}`, destinationPath)
    );
    if (chown.exitCode !== 0) {
      return fail(`Could not set ownership: ${output(chown)}`);
    }
    return ok(`Ownership set to ${webUser}:${webUser}`);
  }

  /**
   * 755 for directories and 644 for files; wp-config.php is then
   * restricted to 640 when possible.
   */
  async setPermissions(destinationPath: string): Promise<StepResult> {
    const directories = await this.destination.execute(
      ShellCommand.of('find', destinationPath, '-type', 'd', '-exec', 'chmod', '755', '{}', '+')
    );
    if (directories.exitCode !== 0) {
      return fail(`Could not set directory permissions: ${output(directories)}`);
    }

    const files = await this.destination.execute(
      ShellCommand.of('find', destinationPath, '-type', 'f', '-exec', 'chmod', '644', '{}', '+')
    );
    if (files.exitCode !== 0) {
      return fail(`Could not set file permissions: ${output(files)}`);
    }

    const config = await this.destination.execute(
      ShellCommand.of('chmod', '640', configPath(destinationPath))
    );
    if (config.exitCode === 0) {
      this.logger.success('wp-config.php restricted to 640');
    }

    return ok('Permissions set (directories 755, files 644)');
  }

  private async removeArchives(): Promise<void> {
    await this.source.execute(ShellCommand.of('rm', '-f', TRANSFER_ARCHIVE));
    await this.destination.execute(ShellCommand.of('rm', '-f', TRANSFER_ARCHIVE));
  }
}
