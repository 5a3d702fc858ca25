import type { DatabaseCredentials, RemoteSession } from '../interfaces';
import type { MigrationLogger } from '../lib/logger';
import { fail, ok, type StepResult } from '../lib/result';
import { ShellCommand } from '../lib/shell-command';
import {
  DATABASE_DIRECTIVES,
  STOP_EDITING_SENTINEL,
  configPath,
  defineLine,
  directivePattern,
  generateSecrets,
  hasDirectiveCommand,
  insertDirectiveCommand,
  phpString,
  replaceDirectiveCommand,
} from '../lib/wp-config';
import { runSteps, type MigrationStep } from './stage-runner';

export interface PostMigrationOptions {
  installPath: string;
  credentials: DatabaseCredentials;
  enableDebug: boolean;
}

function output(result: { stdout: string; stderr: string }): string {
  return [result.stdout, result.stderr].filter(Boolean).join(' ');
}

/**
 * Rewrites wp-config.php on the destination once the database and the files
 * are in place.
 */
export class PostMigrationConfigurator {
  private destination: RemoteSession;
  private logger: MigrationLogger;

  constructor(destination: RemoteSession, logger: MigrationLogger) {
    this.destination = destination;
    this.logger = logger;
  }

  async configure(options: PostMigrationOptions): Promise<StepResult> {
    this.logger.section('Starting post-migration tasks');
    const file = configPath(options.installPath);
    this.logger.info(`Configuration file: ${file}`);

    const steps: MigrationStep<PostMigrationOptions>[] = [
      {
        name: 'Update database credentials',
        policy: 'critical',
        run: async ({ credentials }) => this.updateDatabaseCredentials(file, credentials),
      },
      {
        name: 'Regenerate security keys and salts',
        policy: 'critical',
        run: async () => this.rotateSecrets(file),
      },
      {
        name: 'Configure debug mode',
        policy: 'critical',
        run: async ({ enableDebug }) => this.setDebugMode(file, enableDebug),
      },
      {
        name: 'Verify wp-config.php',
        policy: 'critical',
        run: async () => this.verifyConfig(file),
      },
    ];

    const result = await runSteps('post-migration', steps, options, this.logger);
    if (!result.ok) {
      return result;
    }
    return ok('Post-migration tasks completed');
  }

  async updateDatabaseCredentials(
    file: string,
    credentials: DatabaseCredentials
  ): Promise<StepResult> {
    this.logger.info(`New database: ${credentials.name}`);
    this.logger.info(`New database host: ${credentials.host}`);

    const fields = ['name', 'user', 'password', 'host'] as const;
    for (const field of fields) {
      const directive = DATABASE_DIRECTIVES[field];
      const result = await this.destination.execute(
        replaceDirectiveCommand(file, directive, phpString(credentials[field]))
      );
      if (result.exitCode !== 0) {
        return fail(
          `Could not update ${directive}: ${output(result) || 'directive not found'}`
        );
      }
      this.logger.success(`${directive} updated`);
    }

    return ok('Database credentials updated');
  }

  /**
   * Replace each key and salt with a fresh random value. A directive that
   * cannot be updated is reported and skipped.
   */
  async rotateSecrets(file: string): Promise<StepResult> {
    const secrets = generateSecrets();
    let updated = 0;

    for (const [name, value] of secrets) {
      const result = await this.destination.execute(
        replaceDirectiveCommand(file, name, phpString(value))
      );
      if (result.exitCode === 0) {
        updated++;
      } else {
        this.logger.warn(
          `Could not update ${name}: ${output(result) || 'directive not found'}`
        );
      }
    }

    return ok(`Security keys and salts regenerated (${updated}/${secrets.size})`);
  }

  /**
   * Set WP_DEBUG, adding it above the "stop editing" comment when missing.
   * Enabling debug also adds WP_DEBUG_LOG and WP_DEBUG_DISPLAY when missing.
   */
  async setDebugMode(file: string, enableDebug: boolean): Promise<StepResult> {
    const value = enableDebug ? 'true' : 'false';
    this.logger.info(`Setting WP_DEBUG to ${value}`);

    const present = await this.hasDirective(file, 'WP_DEBUG');
    if (present === null) {
      return fail(`Could not read ${file}`);
    }

    if (present) {
      const result = await this.destination.execute(
        replaceDirectiveCommand(file, 'WP_DEBUG', value)
      );
      if (result.exitCode !== 0) {
        return fail(`Could not update WP_DEBUG: ${output(result)}`);
      }
    } else {
      const result = await this.destination.execute(
        insertDirectiveCommand(
          file,
          STOP_EDITING_SENTINEL,
          'before',
          defineLine('WP_DEBUG', value)
        )
      );
      if (result.exitCode !== 0) {
        return fail(
          `Could not add WP_DEBUG: ${output(result) || `"${STOP_EDITING_SENTINEL}" line not found`}`
        );
      }
    }

    if (enableDebug) {
      await this.addCompanion(file, 'WP_DEBUG_LOG', 'true', 'WP_DEBUG');
      await this.addCompanion(file, 'WP_DEBUG_DISPLAY', 'false', 'WP_DEBUG_LOG');
    }

    return ok(`Debug mode ${enableDebug ? 'enabled' : 'disabled'}`);
  }

  async verifyConfig(file: string): Promise<StepResult> {
    const exists = await this.destination.execute(ShellCommand.of('test', '-f', file));
    if (exists.exitCode !== 0) {
      return fail(`${file} not found`);
    }

    const mode = await this.destination.execute(ShellCommand.of('stat', '-c', '%a', file));
    if (mode.exitCode === 0) {
      this.logger.info(`File permissions: ${mode.stdout}`);
    }

    const lint = await this.destination.execute(ShellCommand.of('php', '-l', file));
    if (lint.exitCode !== 0) {
      return fail(`PHP syntax error in ${file}: ${output(lint)}`);
    }

    return ok(`${file} verified`);
  }

  /**
   * true or false from grep -q; null when grep itself failed.
   */
  private async hasDirective(file: string, name: string): Promise<boolean | null> {
    const result = await this.destination.execute(hasDirectiveCommand(file, name));
    if (result.exitCode === 0) {
      return true;
    }
    return result.exitCode === 1 ? false : null;
  }

  private async addCompanion(
    file: string,
    name: string,
    value: string,
    after: string
  ): Promise<void> {
    if (await this.hasDirective(file, name)) {
      return;
    }

    const result = await this.destination.execute(
      insertDirectiveCommand(file, directivePattern(after), 'after', defineLine(name, value))
    );
    if (result.exitCode === 0) {
      this.logger.success(`${name} added`);
    } else {
      this.logger.warn(`Could not add ${name}: ${output(result)}`);
    }
  }
}
