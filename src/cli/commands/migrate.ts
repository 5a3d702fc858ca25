import { Command } from 'commander';
import chalk from 'chalk';
import Table from 'cli-table3';
import { MigrationOrchestrator, EXIT_FAILURE, EXIT_SUCCESS } from '../../classes/orchestrator';
import { PreflightValidator } from '../../classes/preflight-validator';
import { connectToEndpoint } from '../../classes/remote-executor';
import type { MigrationPrompter, SessionFactory } from '../../interfaces';
import { loadEnvDefaults, type EnvDefaults } from '../../lib/config';
import { MigrationLogger } from '../../lib/logger';
import { ValidationError } from '../../lib/sanitization';
import { DefaultsPrompter, InquirerPrompter } from '../prompts';

export function sessionFactory(defaults: EnvDefaults): SessionFactory {
  return (endpoint) =>
    connectToEndpoint(endpoint, { readyTimeout: defaults.sshTimeout });
}

function prompterFor(defaults: EnvDefaults, unattended: boolean): MigrationPrompter {
  return unattended ? new DefaultsPrompter(defaults) : new InquirerPrompter(defaults);
}

function reportError(error: unknown): void {
  if (error instanceof ValidationError) {
    console.error(chalk.red(`✗ Validation Error: ${error.message}`));
  } else {
    console.error(
      chalk.red(`✗ Error: ${error instanceof Error ? error.message : String(error)}`)
    );
  }
}

export function registerMigrateCommands(program: Command) {
  // example: npx tsx src/cli/index.ts migrate --yes --log-file /tmp/wp_migration.log
  program
    .command('migrate')
    .description('Migrate a WordPress site from the source server to the destination server')
    .option('-y, --yes', 'Take every answer from the environment without prompting')
    .option('--debug', 'Enable WP_DEBUG on the migrated site')
    .option('--no-backup', 'Do not back up an existing destination installation')
    .option('--log-file <path>', 'Log file (default: WPMIG_LOG_FILE or wp_migration.log)')
    .action(async (options) => {
      const defaults = loadEnvDefaults();
      const logger = new MigrationLogger({
        filePath: options.logFile || defaults.logFile,
      });

      logger.section('WordPress Migration');

      const orchestrator = new MigrationOrchestrator({
        prompter: prompterFor(defaults, Boolean(options.yes)),
        logger,
        openSession: sessionFactory(defaults),
        createBackup: options.backup !== false,
        enableDebug: Boolean(options.debug),
        mysqlRootPassword: defaults.mysqlRootPassword,
      });

      process.once('SIGINT', () => {
        orchestrator
          .interrupt()
          .then((code) => process.exit(code))
          .catch((error) => {
            reportError(error);
            process.exit(EXIT_FAILURE);
          });
      });

      const code = await orchestrator.run();
      process.exit(code);
    });

  // example: npx tsx src/cli/index.ts validate
  program
    .command('validate')
    .description('Run the pre-migration checks without changing anything')
    .option('-y, --yes', 'Take every answer from the environment without prompting')
    .action(async (options) => {
      try {
        const defaults = loadEnvDefaults();
        const logger = new MigrationLogger({ console: false });
        const prompter = prompterFor(defaults, Boolean(options.yes));

        const endpoints = await prompter.serverEndpoints();
        console.log(chalk.bold('🔍 Validating servers...'));

        const validator = new PreflightValidator({
          openSession: sessionFactory(defaults),
          logger,
        });
        const report = await validator.validate(endpoints);

        const table = new Table({
          head: ['Check', 'Result', 'Details'],
          style: { head: ['cyan'] },
          colWidths: [28, 8, 70],
          wordWrap: true,
        });
        for (const check of report.checks) {
          table.push([
            check.name,
            check.passed ? chalk.green('PASS') : chalk.red('FAIL'),
            check.message,
          ]);
        }
        console.log(table.toString());

        if (!report.passed) {
          console.log(chalk.red('✗ Some checks failed'));
          process.exit(EXIT_FAILURE);
        }
        console.log(chalk.green('✓ All checks passed'));
        process.exit(EXIT_SUCCESS);
      } catch (error) {
        reportError(error);
        process.exit(EXIT_FAILURE);
      }
    });
}
