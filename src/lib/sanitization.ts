import * as path from 'path';
import * as fs from 'fs';
import * as os from 'os';

/**
 * Sanitization utilities for operator input
 */

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Validates numeric inputs
 */
export function sanitizeNumber(
  value: string,
  fieldName: string,
  min?: number,
  max?: number
): number {
  if (!value || typeof value !== 'string') {
    throw new ValidationError(`${fieldName} is required`);
  }

  if (!/^\d+$/.test(value.trim())) {
    throw new ValidationError(`${fieldName} must be a valid number`);
  }

  const num = parseInt(value, 10);

  if (min !== undefined && num < min) {
    throw new ValidationError(`${fieldName} must be at least ${min}`);
  }

  if (max !== undefined && num > max) {
    throw new ValidationError(`${fieldName} cannot exceed ${max}`);
  }

  return num;
}

/**
 * Validates SSH ports (1-65535)
 */
export function sanitizePort(value: string): number {
  return sanitizeNumber(value, 'SSH port', 1, 65535);
}

/**
 * Expands a leading ~ and validates that the SSH key file exists
 */
export function sanitizeSSHKeyPath(keyPath: string): string {
  if (!keyPath || typeof keyPath !== 'string' || keyPath.trim().length === 0) {
    throw new ValidationError('SSH key path is required');
  }

  const trimmed = keyPath.trim();
  const expanded =
    trimmed === '~' || trimmed.startsWith('~/')
      ? path.join(os.homedir(), trimmed.slice(1))
      : trimmed;
  const resolved = path.resolve(expanded);

  let stats: fs.Stats;
  try {
    stats = fs.statSync(resolved);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ValidationError(`SSH key file does not exist: ${resolved}`);
    }
    throw new ValidationError(`Cannot access SSH key file: ${error}`);
  }

  if (!stats.isFile()) {
    throw new ValidationError('SSH key path must point to a file');
  }

  return resolved;
}

/**
 * Validates SSH hostnames/IPs
 */
export function sanitizeSSHHost(host: string): string {
  if (!host || typeof host !== 'string') {
    throw new ValidationError('SSH host is required');
  }

  const trimmed = host.trim();

  if (trimmed.length === 0) {
    throw new ValidationError('SSH host cannot be empty');
  }

  if (trimmed.length > 253) {
    throw new ValidationError('SSH host name is too long');
  }

  const ipRegex =
    /^(?:(?:25[0-5]|2[0-4][0-9]|[01]?[0-9][0-9]?)\.){3}(?:25[0-5]|2[0-4][0-9]|[01]?[0-9][0-9]?)$/;
  const numericParts = /^[0-9.]+$/.test(trimmed);

  // Something that looks like an IPv4 address must be one
  if (numericParts && !ipRegex.test(trimmed)) {
    throw new ValidationError(
      'SSH host must be a valid hostname or IP address'
    );
  }

  if (!/^[a-zA-Z0-9.-]+$/.test(trimmed)) {
    throw new ValidationError(
      'SSH host must be a valid hostname or IP address'
    );
  }

  return trimmed;
}

/**
 * Validates SSH usernames
 */
export function sanitizeSSHUsername(username: string): string {
  if (!username || typeof username !== 'string') {
    throw new ValidationError('SSH username is required');
  }

  const trimmed = username.trim();

  if (trimmed.length === 0) {
    throw new ValidationError('SSH username cannot be empty');
  }

  if (trimmed.length > 32) {
    throw new ValidationError('SSH username cannot exceed 32 characters');
  }

  if (!/^[a-z_][a-z0-9_.-]*\$?$/i.test(trimmed)) {
    throw new ValidationError('SSH username must be a valid Unix username');
  }

  return trimmed;
}

/**
 * Validates the web server account used for chown (e.g. www-data, apache)
 */
export function sanitizeUnixAccount(account: string): string {
  if (!account || typeof account !== 'string' || account.trim().length === 0) {
    throw new ValidationError('Web server user is required');
  }

  const trimmed = account.trim();

  if (!/^[a-z_][a-z0-9_-]{0,31}$/i.test(trimmed)) {
    throw new ValidationError('Web server user must be a valid Unix account');
  }

  return trimmed;
}

/**
 * Validates absolute paths on a remote server
 */
export function sanitizeRemotePath(remotePath: string, fieldName: string): string {
  if (!remotePath || typeof remotePath !== 'string') {
    throw new ValidationError(`${fieldName} is required`);
  }

  const trimmed = remotePath.trim();

  if (!path.posix.isAbsolute(trimmed)) {
    throw new ValidationError(`${fieldName} must be an absolute path`);
  }

  if (/[\x00-\x1F\x7F]/.test(trimmed)) {
    throw new ValidationError(`${fieldName} contains invalid control characters`);
  }

  if (trimmed.split('/').includes('..')) {
    throw new ValidationError(`${fieldName} contains invalid path traversal`);
  }

  const normalized = path.posix.normalize(trimmed).replace(/\/+$/, '');

  // The destination directory gets emptied, so the root is never acceptable
  if (normalized === '') {
    throw new ValidationError(`${fieldName} cannot be the root directory`);
  }

  return normalized;
}

/**
 * Validates site URLs (http or https)
 */
export function sanitizeUrl(url: string, fieldName: string): string {
  if (!url || typeof url !== 'string' || url.trim().length === 0) {
    throw new ValidationError(`${fieldName} is required`);
  }

  const trimmed = url.trim();
  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch {
    throw new ValidationError(`${fieldName} must be a valid URL`);
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ValidationError(`${fieldName} must use http or https`);
  }

  // WordPress stores siteurl and home without a trailing slash
  return trimmed.replace(/\/+$/, '');
}

/**
 * Validates database and user names used as SQL identifiers
 */
export function sanitizeDbIdentifier(value: string, fieldName: string): string {
  if (!value || typeof value !== 'string' || value.trim().length === 0) {
    throw new ValidationError(`${fieldName} is required`);
  }

  const trimmed = value.trim();

  if (trimmed.length > 64) {
    throw new ValidationError(`${fieldName} cannot exceed 64 characters`);
  }

  if (!/^[A-Za-z0-9_$-]+$/.test(trimmed)) {
    throw new ValidationError(
      `${fieldName} can only contain letters, numbers, underscores, dollar signs and hyphens`
    );
  }

  return trimmed;
}

/**
 * Validates database hosts (hostname, IP, optional :port or socket path)
 */
export function sanitizeDbHost(host: string): string {
  if (!host || typeof host !== 'string' || host.trim().length === 0) {
    throw new ValidationError('Database host is required');
  }

  const trimmed = host.trim();

  if (!/^[A-Za-z0-9._:/-]+$/.test(trimmed)) {
    throw new ValidationError('Database host contains invalid characters');
  }

  return trimmed;
}

/**
 * Validates secrets such as passwords: any printable text on a single line
 */
export function sanitizeSecret(value: string, fieldName: string): string {
  if (typeof value !== 'string' || value.length === 0) {
    throw new ValidationError(`${fieldName} is required`);
  }

  if (/[\x00-\x1F\x7F]/.test(value)) {
    throw new ValidationError(`${fieldName} contains invalid control characters`);
  }

  return value;
}
