import inquirer from 'inquirer';
import chalk from 'chalk';
import Table from 'cli-table3';
import type {
  DatabaseCredentials,
  MigrationParameters,
  MigrationPrompter,
  ServerEndpoint,
  ServerEndpoints,
} from '../interfaces';
import type { AuthMethod, EndpointDefaults, EnvDefaults } from '../lib/config';
import {
  ValidationError,
  sanitizeDbHost,
  sanitizeDbIdentifier,
  sanitizePort,
  sanitizeRemotePath,
  sanitizeSSHHost,
  sanitizeSSHKeyPath,
  sanitizeSSHUsername,
  sanitizeSecret,
  sanitizeUnixAccount,
  sanitizeUrl,
} from '../lib/sanitization';

type Label = 'source' | 'destination';

/**
 * Turn a sanitizer into an inquirer validate callback.
 */
function validateWith(sanitize: (value: string) => unknown) {
  return (value: string): true | string => {
    try {
      sanitize(value);
      return true;
    } catch (error) {
      return error instanceof ValidationError ? error.message : String(error);
    }
  };
}

/**
 * Build a validated endpoint from raw values. Throws ValidationError.
 */
export function buildEndpoint(label: Label, values: EndpointDefaults): ServerEndpoint {
  const endpoint: ServerEndpoint = {
    label,
    host: sanitizeSSHHost(values.host),
    port: sanitizePort(values.port),
    username: sanitizeSSHUsername(values.username),
  };

  if (values.authMethod === 'key') {
    endpoint.privateKeyPath = sanitizeSSHKeyPath(values.keyPath);
    if (values.passphrase) {
      endpoint.passphrase = values.passphrase;
    }
  } else {
    endpoint.password = sanitizeSecret(values.password, `${label} SSH password`);
  }

  return endpoint;
}

export function buildDatabaseCredentials(
  values: EnvDefaults['database']
): DatabaseCredentials {
  return {
    name: sanitizeDbIdentifier(values.name, 'Database name'),
    user: sanitizeDbIdentifier(values.user, 'Database user'),
    password: sanitizeSecret(values.password, 'Database password'),
    host: sanitizeDbHost(values.host),
  };
}

export function endpointSummary(
  endpoints: ServerEndpoints<ServerEndpoint>
): string {
  const table = new Table({
    head: ['Server', 'Host', 'Port', 'User', 'Authentication'],
    style: { head: ['cyan'] },
  });

  for (const endpoint of [endpoints.source, endpoints.destination]) {
    table.push([
      endpoint.label,
      endpoint.host,
      String(endpoint.port),
      endpoint.username,
      endpoint.privateKeyPath ? `key ${endpoint.privateKeyPath}` : 'password',
    ]);
  }

  return table.toString();
}

/**
 * Interactive prompts, pre-filled from the environment.
 */
export class InquirerPrompter implements MigrationPrompter {
  private defaults: EnvDefaults;

  constructor(defaults: EnvDefaults) {
    this.defaults = defaults;
  }

  async serverEndpoints(): Promise<ServerEndpoints<ServerEndpoint>> {
    console.log(chalk.bold('\nSource server (current WordPress site)'));
    const source = await this.endpoint('source', this.defaults.source);
    console.log(chalk.bold('\nDestination server (new WordPress site)'));
    const destination = await this.endpoint('destination', this.defaults.destination);

    const endpoints = { source, destination };
    console.log(`\n${endpointSummary(endpoints)}`);
    return endpoints;
  }

  async confirm(message: string, defaultValue: boolean): Promise<boolean> {
    const { value } = await inquirer.prompt<{ value: boolean }>([
      { type: 'confirm', name: 'value', message, default: defaultValue },
    ]);
    return value;
  }

  async migrationParameters(): Promise<MigrationParameters> {
    const answers = await inquirer.prompt<{
      oldUrl: string;
      newUrl: string;
      sourceWpPath: string;
    }>([
      {
        type: 'input',
        name: 'oldUrl',
        message: 'Old site URL (e.g. https://old-site.example):',
        default: this.defaults.oldUrl || undefined,
        validate: validateWith((value) => sanitizeUrl(value, 'Old URL')),
      },
      {
        type: 'input',
        name: 'newUrl',
        message: 'New site URL (e.g. https://new-site.example):',
        default: this.defaults.newUrl || undefined,
        validate: validateWith((value) => sanitizeUrl(value, 'New URL')),
      },
      {
        type: 'input',
        name: 'sourceWpPath',
        message: 'WordPress path on the source server:',
        default: this.defaults.sourceWpPath,
        validate: validateWith((value) => sanitizeRemotePath(value, 'Source path')),
      },
    ]);

    return {
      oldUrl: sanitizeUrl(answers.oldUrl, 'Old URL'),
      newUrl: sanitizeUrl(answers.newUrl, 'New URL'),
      sourceWpPath: sanitizeRemotePath(answers.sourceWpPath, 'Source path'),
    };
  }

  async destinationDatabase(): Promise<DatabaseCredentials> {
    const { database } = this.defaults;
    console.log(chalk.bold('\nDestination database'));

    const answers = await inquirer.prompt<EnvDefaults['database']>([
      {
        type: 'input',
        name: 'name',
        message: 'Database name:',
        default: database.name,
        validate: validateWith((value) => sanitizeDbIdentifier(value, 'Database name')),
      },
      {
        type: 'input',
        name: 'user',
        message: 'Database user:',
        default: database.user,
        validate: validateWith((value) => sanitizeDbIdentifier(value, 'Database user')),
      },
      {
        type: 'password',
        name: 'password',
        message: 'Database password:',
        mask: '*',
        default: database.password || undefined,
        validate: validateWith((value) => sanitizeSecret(value, 'Database password')),
      },
      {
        type: 'input',
        name: 'host',
        message: 'Database host:',
        default: database.host,
        validate: validateWith(sanitizeDbHost),
      },
    ]);

    return buildDatabaseCredentials(answers);
  }

  async destinationInstallPath(sourcePath: string): Promise<string> {
    const { value } = await inquirer.prompt<{ value: string }>([
      {
        type: 'input',
        name: 'value',
        message: 'WordPress path on the destination server:',
        default: this.defaults.destinationWpPath || sourcePath,
        validate: validateWith((input) => sanitizeRemotePath(input, 'Destination path')),
      },
    ]);
    return sanitizeRemotePath(value, 'Destination path');
  }

  async webServerUser(): Promise<string> {
    const { value } = await inquirer.prompt<{ value: string }>([
      {
        type: 'input',
        name: 'value',
        message: 'Web server user on the destination:',
        default: this.defaults.webServerUser,
        validate: validateWith(sanitizeUnixAccount),
      },
    ]);
    return sanitizeUnixAccount(value);
  }

  private async endpoint(label: Label, defaults: EndpointDefaults): Promise<ServerEndpoint> {
    const answers = await inquirer.prompt<{
      host: string;
      port: string;
      username: string;
      authMethod: AuthMethod;
    }>([
      {
        type: 'input',
        name: 'host',
        message: 'Host or IP:',
        default: defaults.host || undefined,
        validate: validateWith(sanitizeSSHHost),
      },
      {
        type: 'input',
        name: 'port',
        message: 'SSH port:',
        default: defaults.port,
        validate: validateWith(sanitizePort),
      },
      {
        type: 'input',
        name: 'username',
        message: 'SSH user:',
        default: defaults.username || undefined,
        validate: validateWith(sanitizeSSHUsername),
      },
      {
        type: 'list',
        name: 'authMethod',
        message: 'Authentication method:',
        choices: [
          { name: 'Private key', value: 'key' },
          { name: 'Password', value: 'password' },
        ],
        default: defaults.authMethod,
      },
    ]);

    const credentials =
      answers.authMethod === 'key'
        ? await inquirer.prompt<{ keyPath: string; passphrase: string }>([
            {
              type: 'input',
              name: 'keyPath',
              message: 'Private key path:',
              default: defaults.keyPath,
              validate: validateWith(sanitizeSSHKeyPath),
            },
            {
              type: 'password',
              name: 'passphrase',
              message: 'Key passphrase (leave empty for none):',
              mask: '*',
              default: defaults.passphrase || undefined,
            },
          ])
        : { keyPath: defaults.keyPath, passphrase: '' };

    const password =
      answers.authMethod === 'password'
        ? (
            await inquirer.prompt<{ password: string }>([
              {
                type: 'password',
                name: 'password',
                message: 'SSH password:',
                mask: '*',
                default: defaults.password || undefined,
                validate: validateWith((value) =>
                  sanitizeSecret(value, `${label} SSH password`)
                ),
              },
            ])
          ).password
        : '';

    return buildEndpoint(label, {
      ...answers,
      keyPath: credentials.keyPath,
      passphrase: credentials.passphrase ?? '',
      password,
    });
  }
}

/**
 * Answers every prompt from the environment, for unattended runs (--yes).
 * A missing or invalid value throws ValidationError.
 */
export class DefaultsPrompter implements MigrationPrompter {
  private defaults: EnvDefaults;

  constructor(defaults: EnvDefaults) {
    this.defaults = defaults;
  }

  async serverEndpoints(): Promise<ServerEndpoints<ServerEndpoint>> {
    return {
      source: buildEndpoint('source', this.defaults.source),
      destination: buildEndpoint('destination', this.defaults.destination),
    };
  }

  async confirm(): Promise<boolean> {
    return true;
  }

  async migrationParameters(): Promise<MigrationParameters> {
    return {
      oldUrl: sanitizeUrl(this.defaults.oldUrl, 'OLD_URL'),
      newUrl: sanitizeUrl(this.defaults.newUrl, 'NEW_URL'),
      sourceWpPath: sanitizeRemotePath(this.defaults.sourceWpPath, 'SOURCE_WP_PATH'),
    };
  }

  async destinationDatabase(): Promise<DatabaseCredentials> {
    return buildDatabaseCredentials(this.defaults.database);
  }

  async destinationInstallPath(sourcePath: string): Promise<string> {
    return sanitizeRemotePath(
      this.defaults.destinationWpPath || sourcePath,
      'DESTINATION_WP_PATH'
    );
  }

  async webServerUser(): Promise<string> {
    return sanitizeUnixAccount(this.defaults.webServerUser);
  }
}
