import * as path from 'path';
import { randomInt } from 'crypto';
import { ShellCommand } from './shell-command';

export const WP_CONFIG_FILE = 'wp-config.php';

/**
 * Install directories probed in order when no path is given.
 */
export const INSTALL_CANDIDATES = [
  '/var/www/html',
  '/var/www/wordpress',
  '/usr/share/nginx/html',
] as const;

/**
 * Comment line that closes the editable part of wp-config.php.
 */
export const STOP_EDITING_SENTINEL = "That's all, stop editing";

export const DATABASE_DIRECTIVES = {
  name: 'DB_NAME',
  user: 'DB_USER',
  password: 'DB_PASSWORD',
  host: 'DB_HOST',
} as const;

export const SECRET_DIRECTIVES = [
  'AUTH_KEY',
  'SECURE_AUTH_KEY',
  'LOGGED_IN_KEY',
  'NONCE_KEY',
  'AUTH_SALT',
  'SECURE_AUTH_SALT',
  'LOGGED_IN_SALT',
  'NONCE_SALT',
] as const;

export const SECRET_LENGTH = 64;

export const SECRET_CHARSET =
  'abcdefghijklmnopqrstuvwxyz' +
  'ABCDEFGHIJKLMNOPQRSTUVWXYZ' +
  '0123456789' +
  '!@#$%^&*()-_=+[]{}|;:,.<>?';

export const DEFAULT_TABLE_PREFIX = 'wp_';

export function configPath(installPath: string): string {
  return path.posix.join(installPath, WP_CONFIG_FILE);
}

/**
 * Parse every define('NAME', value) in a wp-config.php source. String
 * values are unescaped, other values (true, 42) are kept as written.
 */
export function parseDirectives(source: string): Map<string, string> {
  const directives = new Map<string, string>();
  const pattern =
    /define\(\s*['"]([A-Za-z0-9_]+)['"]\s*,\s*(?:'((?:[^'\\]|\\.)*)'|"((?:[^"\\]|\\.)*)"|([^\s)]+))\s*\)/g;

  for (const match of source.matchAll(pattern)) {
    const [, name, singleQuoted, doubleQuoted, bare] = match;
    if (singleQuoted !== undefined) {
      directives.set(name, singleQuoted.replace(/\\(['\\])/g, '$1'));
    } else if (doubleQuoted !== undefined) {
      directives.set(name, doubleQuoted.replace(/\\(["\\])/g, '$1'));
    } else if (bare !== undefined) {
      directives.set(name, bare);
    }
  }

  return directives;
}

export function parseTablePrefix(source: string): string {
  const match = source.match(/\$table_prefix\s*=\s*['"]([A-Za-z0-9_]*)['"]/);
  return match ? match[1] : DEFAULT_TABLE_PREFIX;
}

export function parseWordPressVersion(versionSource: string): string | null {
  const match = versionSource.match(/\$wp_version\s*=\s*'([^']+)'/);
  return match ? match[1] : null;
}

/**
 * A PHP single-quoted string literal.
 */
export function phpString(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

export function defineLine(name: string, literal: string): string {
  return `define( '${name}', ${literal} );`;
}

/**
 * Basic regular expression matching the define line of one directive. The
 * closing quote keeps WP_DEBUG from matching WP_DEBUG_LOG.
 */
export function directivePattern(name: string): string {
  return `define([[:space:]]*['"]${name}['"]`;
}

function sedReplacement(text: string): string {
  return text.replace(/[\\/&]/g, '\\$&');
}

function sedText(text: string): string {
  return text.replace(/\\/g, '\\\\');
}

function sedAddress(pattern: string): string {
  return pattern.replace(/\//g, '\\/');
}

/**
 * sed program replacing the whole define line of a directive.
 */
export function replaceLineProgram(name: string, line: string): string {
  return `s/^.*${directivePattern(name)}.*$/${sedReplacement(line)}/`;
}

/**
 * sed program inserting a line immediately before every line matching anchor.
 */
export function insertBeforeProgram(anchor: string, line: string): string {
  return `/${sedAddress(anchor)}/i ${sedText(line)}`;
}

/**
 * sed program inserting a line immediately after every line matching anchor.
 */
export function insertAfterProgram(anchor: string, line: string): string {
  return `/${sedAddress(anchor)}/a ${sedText(line)}`;
}

/**
 * Succeeds only when the directive exists and sed rewrote the file.
 */
export function replaceDirectiveCommand(
  file: string,
  name: string,
  literal: string
): ShellCommand {
  return ShellCommand.of('grep', '-q', directivePattern(name), file).and(
    ShellCommand.of(
      'sed',
      '-i',
      replaceLineProgram(name, defineLine(name, literal)),
      file
    )
  );
}

/**
 * Fails without touching the file when no line matches the anchor.
 */
export function insertDirectiveCommand(
  file: string,
  anchor: string,
  position: 'before' | 'after',
  line: string
): ShellCommand {
  const program =
    position === 'before'
      ? insertBeforeProgram(anchor, line)
      : insertAfterProgram(anchor, line);
  return ShellCommand.of('grep', '-q', anchor, file).and(
    ShellCommand.of('sed', '-i', program, file)
  );
}

export function hasDirectiveCommand(file: string, name: string): ShellCommand {
  return ShellCommand.of('grep', '-q', directivePattern(name), file);
}

export function generateSalt(length: number = SECRET_LENGTH): string {
  let salt = '';
  for (let i = 0; i < length; i++) {
    salt += SECRET_CHARSET[randomInt(SECRET_CHARSET.length)];
  }
  return salt;
}

/**
 * One fresh value per secret directive, all distinct.
 */
export function generateSecrets(): Map<string, string> {
  const secrets = new Map<string, string>();
  const used = new Set<string>();

  for (const name of SECRET_DIRECTIVES) {
    let value = generateSalt();
    while (used.has(value)) {
      value = generateSalt();
    }
    used.add(value);
    secrets.set(name, value);
  }

  return secrets;
}
