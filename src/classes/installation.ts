import path from 'path';
import type { RemoteSession, SourceDatabaseCredentials } from '../interfaces';
import { fail, okWith, type StepResult } from '../lib/result';
import { ShellCommand } from '../lib/shell-command';
import {
  DATABASE_DIRECTIVES,
  INSTALL_CANDIDATES,
  configPath,
  parseDirectives,
  parseTablePrefix,
  parseWordPressVersion,
} from '../lib/wp-config';

const CREDENTIAL_FIELDS = ['name', 'user', 'password', 'host'] as const;

export async function hasWpConfig(
  session: RemoteSession,
  installPath: string
): Promise<boolean> {
  const result = await session.execute(
    ShellCommand.of('test', '-f', configPath(installPath))
  );
  return result.exitCode === 0;
}

/**
 * First candidate directory holding a wp-config.php, or null.
 */
export async function findInstallation(
  session: RemoteSession,
  candidates: readonly string[] = INSTALL_CANDIDATES
): Promise<string | null> {
  for (const candidate of candidates) {
    if (await hasWpConfig(session, candidate)) {
      return candidate;
    }
  }
  return null;
}

export async function readWordPressVersion(
  session: RemoteSession,
  installPath: string
): Promise<string | null> {
  const versionFile = path.posix.join(installPath, 'wp-includes', 'version.php');
  const result = await session.execute(
    ShellCommand.of('grep', '$wp_version', versionFile)
  );
  return result.exitCode === 0 ? parseWordPressVersion(result.stdout) : null;
}

/**
 * Database settings of an installation, read from its wp-config.php.
 */
export async function readDatabaseCredentials(
  session: RemoteSession,
  installPath: string
): Promise<StepResult<SourceDatabaseCredentials>> {
  const file = configPath(installPath);
  const result = await session.execute(ShellCommand.of('cat', file));
  if (result.exitCode !== 0) {
    return fail(`Could not read ${file}: ${result.stderr || result.stdout}`);
  }

  const directives = parseDirectives(result.stdout);
  const values: Record<keyof typeof DATABASE_DIRECTIVES, string> = {
    name: '',
    user: '',
    password: '',
    host: '',
  };

  for (const field of CREDENTIAL_FIELDS) {
    const directive = DATABASE_DIRECTIVES[field];
    const value = directives.get(directive);
    if (!value) {
      return fail(`Could not extract ${directive} from ${file}`);
    }
    values[field] = value;
  }

  return okWith(`Database credentials extracted: ${values.name} @ ${values.host}`, {
    ...values,
    tablePrefix: parseTablePrefix(result.stdout),
  });
}
