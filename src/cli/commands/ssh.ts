import { Command } from 'commander';
import chalk from 'chalk';
import { connectToEndpoint } from '../../classes/remote-executor';
import { loadEnvDefaults } from '../../lib/config';
import { ValidationError, sanitizeNumber } from '../../lib/sanitization';
import { buildEndpoint } from '../prompts';

export function registerSSHCommands(program: Command) {
  // example: npx tsx src/cli/index.ts ssh-test --server destination
  program
    .command('ssh-test')
    .description('Test the SSH connection to the source or destination server')
    .option('-s, --server <server>', 'source or destination', 'source')
    .option('-h, --host <host>', 'Remote server hostname or IP address')
    .option('-u, --username <username>', 'SSH username')
    .option('-p, --port <port>', 'SSH port')
    .option('--password <password>', 'SSH password (not recommended for production)')
    .option('--private-key <path>', 'Path to private key file')
    .option('--passphrase <passphrase>', 'Passphrase for private key')
    .option('--timeout <timeout>', 'Connection timeout in milliseconds')
    .action(async (options) => {
      console.log(chalk.bold('🔐 Testing SSH Connection...'));

      try {
        if (options.server !== 'source' && options.server !== 'destination') {
          throw new ValidationError('--server must be "source" or "destination"');
        }
        const label: 'source' | 'destination' = options.server;

        // Options win over the SOURCE_* / DESTINATION_* environment values
        const defaults = loadEnvDefaults();
        const values = defaults[label];
        const endpoint = buildEndpoint(label, {
          host: options.host || values.host,
          port: options.port || values.port,
          username: options.username || values.username,
          authMethod: options.password
            ? 'password'
            : options.privateKey
              ? 'key'
              : values.authMethod,
          keyPath: options.privateKey || values.keyPath,
          password: options.password || values.password,
          passphrase: options.passphrase || values.passphrase,
        });
        const timeout = options.timeout
          ? sanitizeNumber(options.timeout, 'timeout', 1000, 120000)
          : defaults.sshTimeout;

        console.log(
          chalk.dim(`Connecting to ${endpoint.username}@${endpoint.host}:${endpoint.port}\n`)
        );
        if (endpoint.password) {
          console.log(chalk.yellow('⚠️  Using password authentication'));
        } else {
          console.log(chalk.blue('🔑 Using private key authentication'));
        }

        const executor = await connectToEndpoint(endpoint, { readyTimeout: timeout });
        console.log(chalk.green('✅ SSH connection test successful!'));

        try {
          const serverInfo = await executor.getServerInfo();
          console.log(chalk.dim('\n📋 Server Information:'));
          console.log(chalk.cyan(`   Hostname: ${serverInfo.hostname}`));
          console.log(chalk.cyan(`   Uptime: ${serverInfo.uptime}`));
        } catch (error) {
          console.log(chalk.yellow('⚠️  Could not retrieve server information'));
        }

        await executor.disconnect();
        console.log(chalk.dim('Connection closed'));
      } catch (error) {
        if (error instanceof ValidationError) {
          console.error(chalk.red(`✗ Validation Error: ${error.message}`));
        } else {
          console.error(
            chalk.red(
              `❌ SSH connection failed: ${error instanceof Error ? error.message : String(error)}`
            )
          );
        }
        process.exit(1);
      }
    });
}
