import type { DatabaseCredentials } from '../interfaces';
import { ShellCommand } from './shell-command';
import { sanitizeDbIdentifier } from './sanitization';

/**
 * A MySQL string literal.
 */
export function sqlString(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

/**
 * A back-quoted MySQL identifier. Names are validated first since they end
 * up inside SQL text.
 */
export function sqlIdentifier(name: string, fieldName = 'Identifier'): string {
  return `\`${sanitizeDbIdentifier(name, fieldName)}\``;
}

/**
 * The mysql client connected as the given user. The password travels in
 * MYSQL_PWD so it never shows up in the remote process list.
 */
export function mysqlClient(
  credentials: DatabaseCredentials,
  sql?: string
): ShellCommand {
  const command = ShellCommand.of('mysql')
    .withEnv('MYSQL_PWD', credentials.password)
    .arg('-h', credentials.host, '-u', credentials.user, credentials.name);

  if (sql !== undefined) {
    command.arg('-e', sql);
  }
  return command;
}

/**
 * The mysql client connected as root, with or without a password.
 */
export function mysqlRoot(sql: string, rootPassword?: string): ShellCommand {
  const command = ShellCommand.of('mysql');
  if (rootPassword) {
    command.withEnv('MYSQL_PWD', rootPassword);
  }
  return command.arg('-u', 'root', '-e', sql);
}

export function mysqldump(
  credentials: DatabaseCredentials,
  outputFile: string
): ShellCommand {
  return ShellCommand.of('mysqldump')
    .withEnv('MYSQL_PWD', credentials.password)
    .arg(
      '--single-transaction',
      '-h',
      credentials.host,
      '-u',
      credentials.user,
      credentials.name
    )
    .stdoutTo(outputFile);
}

export function mysqlImport(
  credentials: DatabaseCredentials,
  inputFile: string
): ShellCommand {
  return mysqlClient(credentials).stdinFrom(inputFile);
}

/**
 * SQL creating the database and a local user with full rights on it.
 */
export function createDatabaseSql(credentials: DatabaseCredentials): string {
  const database = sqlIdentifier(credentials.name, 'Database name');
  const user = `${sqlString(credentials.user)}@'localhost'`;
  return [
    `CREATE DATABASE IF NOT EXISTS ${database};`,
    `CREATE USER IF NOT EXISTS ${user} IDENTIFIED BY ${sqlString(credentials.password)};`,
    `GRANT ALL PRIVILEGES ON ${database}.* TO ${user};`,
    'FLUSH PRIVILEGES;',
  ].join(' ');
}

/**
 * SQL pointing siteurl and home at the new URL.
 */
export function updateSiteUrlSql(tablePrefix: string, newUrl: string): string {
  const table = sqlIdentifier(`${tablePrefix}options`, 'Options table');
  return [
    `UPDATE ${table} SET option_value = ${sqlString(newUrl)} WHERE option_name = 'siteurl';`,
    `UPDATE ${table} SET option_value = ${sqlString(newUrl)} WHERE option_name = 'home';`,
  ].join(' ');
}
