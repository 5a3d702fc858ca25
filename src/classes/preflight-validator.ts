import type {
  RemoteSession,
  ServerEndpoint,
  ServerEndpoints,
  SessionFactory,
} from '../interfaces';
import type { MigrationLogger } from '../lib/logger';
import { mysqlClient, sqlIdentifier } from '../lib/mysql';
import { errorMessage, fail, ok, okWith, type StepResult } from '../lib/result';
import { ShellCommand } from '../lib/shell-command';
import {
  findInstallation,
  readDatabaseCredentials,
  readWordPressVersion,
} from './installation';

/**
 * Destination free space must be at least this multiple of the source size.
 */
export const DISK_SPACE_FACTOR = 2;

export interface CheckOutcome {
  name: string;
  passed: boolean;
  message: string;
}

export interface ValidationReport {
  passed: boolean;
  installPath: string | null;
  checks: CheckOutcome[];
}

export interface PreflightValidatorOptions {
  openSession: SessionFactory;
  logger: MigrationLogger;
}

export function hasEnoughDiskSpace(sourceMb: number, freeMb: number): boolean {
  return freeMb >= sourceMb * DISK_SPACE_FACTOR;
}

function parseMegabytes(output: string): number | null {
  const value = output.trim();
  return /^\d+$/.test(value) ? parseInt(value, 10) : null;
}

/**
 * Checks both servers before anything is changed. Opens its own pair of
 * sessions and closes them before returning.
 */
export class PreflightValidator {
  private openSession: SessionFactory;
  private logger: MigrationLogger;

  constructor(options: PreflightValidatorOptions) {
    this.openSession = options.openSession;
    this.logger = options.logger;
  }

  async validate(
    endpoints: ServerEndpoints<ServerEndpoint>
  ): Promise<ValidationReport> {
    this.logger.section('Starting pre-migration validation');

    const checks: CheckOutcome[] = [];
    const record = (name: string, result: StepResult<unknown>): boolean => {
      checks.push({ name, passed: result.ok, message: result.message });
      if (result.ok) {
        this.logger.success(`PASS: ${result.message}`);
      } else {
        this.logger.error(`FAIL: ${result.message}`);
      }
      return result.ok;
    };

    let source: RemoteSession | null = null;
    let destination: RemoteSession | null = null;
    let installPath: string | null = null;

    try {
      this.logger.info('[VALIDATE] SSH connectivity - source...');
      const sourceResult = await this.connect(endpoints.source);
      record('Source connectivity', sourceResult);
      if (!sourceResult.ok) {
        return { passed: false, installPath, checks };
      }
      source = sourceResult.value;

      this.logger.info('[VALIDATE] SSH connectivity - destination...');
      const destinationResult = await this.connect(endpoints.destination);
      record('Destination connectivity', destinationResult);
      if (!destinationResult.ok) {
        return { passed: false, installPath, checks };
      }
      destination = destinationResult.value;

      let passed = true;

      this.logger.info('[VALIDATE] WordPress installation - source...');
      const installation = await this.checkInstallation(source);
      passed = record('WordPress installation', installation) && passed;
      installPath = installation.ok ? installation.value : null;

      this.logger.info('[VALIDATE] LAMP stack - destination...');
      passed = record('LAMP stack', await this.checkLampStack(destination)) && passed;

      this.logger.info('[VALIDATE] Database credentials - source...');
      if (installPath) {
        passed =
          record('Database', await this.checkDatabase(source, installPath)) &&
          passed;
      } else {
        this.logger.warn('SKIP: WordPress path not found');
        checks.push({ name: 'Database', passed: false, message: 'Skipped' });
        passed = false;
      }

      this.logger.info('[VALIDATE] Disk space - destination...');
      if (installPath) {
        passed =
          record(
            'Disk space',
            await this.checkDiskSpace(source, destination, installPath)
          ) && passed;
      } else {
        this.logger.warn('SKIP: WordPress path not found');
        checks.push({ name: 'Disk space', passed: false, message: 'Skipped' });
        passed = false;
      }

      if (passed) {
        this.logger.success('Validation summary: ALL CHECKS PASSED');
      } else {
        this.logger.error('Validation summary: SOME CHECKS FAILED');
      }

      return { passed, installPath, checks };
    } finally {
      await this.closeQuietly(source);
      await this.closeQuietly(destination);
    }
  }

  async connect(endpoint: ServerEndpoint): Promise<StepResult<RemoteSession>> {
    let session: RemoteSession;
    try {
      session = await this.openSession(endpoint);
    } catch (error) {
      return fail(`${endpoint.label}: connection error: ${errorMessage(error)}`);
    }

    try {
      const result = await session.execute('hostname');
      if (result.exitCode !== 0) {
        await this.closeQuietly(session);
        return fail(
          `${endpoint.label}: connection test failed: ${result.stderr || `exit code ${result.exitCode}`}`
        );
      }
      return okWith(
        `Connected to ${endpoint.label} server: ${result.stdout || endpoint.host}`,
        session
      );
    } catch (error) {
      await this.closeQuietly(session);
      return fail(`${endpoint.label}: connection error: ${errorMessage(error)}`);
    }
  }

  async checkInstallation(session: RemoteSession): Promise<StepResult<string>> {
    const installPath = await findInstallation(session);
    if (!installPath) {
      return fail('WordPress installation not found (wp-config.php missing)');
    }

    const version = await readWordPressVersion(session, installPath);
    return okWith(
      version
        ? `WordPress ${version} found at ${installPath}`
        : `WordPress found at ${installPath} (unknown version)`,
      installPath
    );
  }

  async checkLampStack(session: RemoteSession): Promise<StepResult> {
    const components: string[] = [];
    const missing: string[] = [];

    const isActive = (service: string) =>
      ShellCommand.of('systemctl', 'is-active', service).discardStderr();

    const apache = await session.execute(isActive('apache2').or(isActive('httpd')));
    if (apache.exitCode === 0) {
      components.push('Apache');
    } else {
      const nginx = await session.execute(isActive('nginx'));
      if (nginx.exitCode === 0) {
        components.push('Nginx');
      } else {
        missing.push('Web Server (Apache/Nginx)');
      }
    }

    const database = await session.execute(isActive('mysql').or(isActive('mariadb')));
    if (database.exitCode === 0) {
      components.push('MySQL/MariaDB');
    } else {
      missing.push('MySQL/MariaDB');
    }

    const php = await session.execute(
      ShellCommand.of('php', '-v')
        .pipe(ShellCommand.of('head', '-n1'))
        .pipe(ShellCommand.of('awk', '{print $2}'))
    );
    if (php.exitCode === 0 && php.stdout) {
      components.push(`PHP ${php.stdout}`);
    } else {
      missing.push('PHP');
    }

    if (missing.length > 0) {
      return fail(`Missing components: ${missing.join(', ')}`);
    }
    return ok(`LAMP stack ready: ${components.join(', ')}`);
  }

  async checkDatabase(
    session: RemoteSession,
    installPath: string
  ): Promise<StepResult> {
    const credentials = await readDatabaseCredentials(session, installPath);
    if (!credentials.ok) {
      return credentials;
    }

    const { tablePrefix, ...database } = credentials.value;
    let sql: string;
    try {
      sql = `SELECT COUNT(*) FROM ${sqlIdentifier(`${tablePrefix}posts`, 'Posts table')};`;
    } catch (error) {
      return fail(errorMessage(error));
    }

    const result = await session.execute(mysqlClient(database, sql));
    if (result.exitCode !== 0) {
      return fail(
        `Could not connect to the database: ${result.stderr || result.stdout}`
      );
    }
    return ok(`Database '${database.name}' is reachable`);
  }

  async checkDiskSpace(
    source: RemoteSession,
    destination: RemoteSession,
    installPath: string
  ): Promise<StepResult> {
    const sizeResult = await source.execute(
      ShellCommand.of('du', '-sm', installPath).pipe(
        ShellCommand.of('awk', '{print $1}')
      )
    );
    const sourceMb = sizeResult.exitCode === 0 ? parseMegabytes(sizeResult.stdout) : null;
    if (sourceMb === null) {
      return fail('Could not determine the size of the source directory');
    }

    const freeResult = await destination.execute(
      ShellCommand.of('df', '-m', '/var/www')
        .pipe(ShellCommand.of('tail', '-1'))
        .pipe(ShellCommand.of('awk', '{print $4}'))
    );
    const freeMb = freeResult.exitCode === 0 ? parseMegabytes(freeResult.stdout) : null;
    if (freeMb === null) {
      return fail('Could not determine the available space on the destination');
    }

    const requiredMb = sourceMb * DISK_SPACE_FACTOR;
    if (hasEnoughDiskSpace(sourceMb, freeMb)) {
      return ok(
        `Enough disk space: ${freeMb}MB available, ${sourceMb}MB needed (${requiredMb}MB recommended)`
      );
    }
    return fail(
      `Not enough disk space: ${freeMb}MB available, ${requiredMb}MB required (source: ${sourceMb}MB)`
    );
  }

  private async closeQuietly(session: RemoteSession | null): Promise<void> {
    if (!session) {
      return;
    }
    try {
      await session.close();
    } catch (error) {
      this.logger.warn(`Could not close ${session.label} session: ${errorMessage(error)}`);
    }
  }
}
