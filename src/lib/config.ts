import { DEFAULT_READY_TIMEOUT } from '../classes/remote-executor';

export type AuthMethod = 'key' | 'password';

export interface EndpointDefaults {
  host: string;
  port: string;
  username: string;
  authMethod: AuthMethod;
  keyPath: string;
  password: string;
  passphrase: string;
}

export interface EnvDefaults {
  source: EndpointDefaults;
  destination: EndpointDefaults;
  sourceWpPath: string;
  destinationWpPath: string;
  webServerUser: string;
  database: {
    name: string;
    user: string;
    password: string;
    host: string;
  };
  mysqlRootPassword?: string;
  oldUrl: string;
  newUrl: string;
  logFile: string;
  sshTimeout: number;
}

export const DEFAULT_LOG_FILE = 'wp_migration.log';
export const DEFAULT_SOURCE_WP_PATH = '/var/www/html';
export const DEFAULT_WEB_SERVER_USER = 'www-data';
export const DEFAULT_KEY_PATH = '~/.ssh/id_rsa';

type Env = Record<string, string | undefined>;

function read(env: Env, name: string, fallback = ''): string {
  const value = env[name];
  return value === undefined || value.trim() === '' ? fallback : value.trim();
}

/**
 * AUTH_METHOD is "1" for a private key and "2" for a password.
 */
export function parseAuthMethod(value: string): AuthMethod {
  return value === '2' || value.toLowerCase() === 'password' ? 'password' : 'key';
}

function endpointDefaults(env: Env, prefix: 'SOURCE' | 'DESTINATION'): EndpointDefaults {
  return {
    host: read(env, `${prefix}_HOST`),
    port: read(env, `${prefix}_PORT`, '22'),
    username: read(env, `${prefix}_USER`),
    authMethod: parseAuthMethod(read(env, `${prefix}_AUTH_METHOD`, '1')),
    keyPath: read(env, `${prefix}_KEY_PATH`, DEFAULT_KEY_PATH),
    // secrets are taken as written
    password: env[`${prefix}_PASSWORD`] ?? '',
    passphrase: env[`${prefix}_PASSPHRASE`] ?? '',
  };
}

/**
 * Typed defaults from the environment (after dotenv has loaded .env).
 * Nothing here is validated; prompts and --yes run the sanitizers.
 */
export function loadEnvDefaults(env: Env = process.env): EnvDefaults {
  const timeout = parseInt(read(env, 'SSH_TIMEOUT'), 10);
  const rootPassword = env.MYSQL_ROOT_PASSWORD;

  return {
    source: endpointDefaults(env, 'SOURCE'),
    destination: endpointDefaults(env, 'DESTINATION'),
    sourceWpPath: read(env, 'SOURCE_WP_PATH', DEFAULT_SOURCE_WP_PATH),
    destinationWpPath: read(env, 'DESTINATION_WP_PATH'),
    webServerUser: read(
      env,
      'DESTINATION_WEB_USER',
      read(env, 'WEB_USER', DEFAULT_WEB_SERVER_USER)
    ),
    database: {
      name: read(env, 'DESTINATION_DB_NAME', 'wordpress_db'),
      user: read(env, 'DESTINATION_DB_USER', 'wordpress_user'),
      password: env.DESTINATION_DB_PASS ?? '',
      host: read(env, 'DESTINATION_DB_HOST', 'localhost'),
    },
    mysqlRootPassword: rootPassword ? rootPassword : undefined,
    oldUrl: read(env, 'OLD_URL'),
    newUrl: read(env, 'NEW_URL'),
    logFile: read(env, 'WPMIG_LOG_FILE', DEFAULT_LOG_FILE),
    sshTimeout: Number.isFinite(timeout) && timeout > 0 ? timeout : DEFAULT_READY_TIMEOUT,
  };
}
