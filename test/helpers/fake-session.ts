import fs from 'fs';
import os from 'os';
import path from 'path';
import type { CommandResult, RemoteSession } from '../../src/interfaces';
import type { ShellCommand } from '../../src/lib/shell-command';

export type CommandMatcher = string | RegExp | ((command: string) => boolean);

export interface FakeResponse {
  exitCode?: number;
  stdout?: string;
  stderr?: string;
}

interface Rule {
  matcher: CommandMatcher;
  response: FakeResponse | Error;
}

export const WP_CONFIG_FIXTURE = fs.readFileSync(
  path.join(__dirname, '..', 'fixtures', 'wp-config.php'),
  'utf8'
);

export function exactly(expected: ShellCommand | string): CommandMatcher {
  const text = expected.toString();
  return (command) => command === text;
}

export function tempPath(name: string): string {
  return path.join(os.tmpdir(), `wpmig-test-${process.pid}-${name}`);
}

function matches(matcher: CommandMatcher, command: string): boolean {
  if (typeof matcher === 'string') {
    return command.includes(matcher);
  }
  if (matcher instanceof RegExp) {
    return matcher.test(command);
  }
  return matcher(command);
}

/**
 * In-process stand-in for an SSH session. Commands succeed with empty output
 * unless a rule says otherwise; the rule registered last wins.
 */
export class FakeSession implements RemoteSession {
  readonly label: string;
  readonly commands: string[] = [];
  readonly files = new Map<string, string>();
  readonly uploaded = new Map<string, string>();
  closeCount = 0;
  uploadError: Error | null = null;
  private readonly rules: Rule[] = [];
  private readonly missing = new Set<string>();

  constructor(label: string) {
    this.label = label;
  }

  on(matcher: CommandMatcher, response: FakeResponse | Error): this {
    this.rules.push({ matcher, response });
    return this;
  }

  missingFile(remotePath: string): this {
    this.missing.add(remotePath);
    return this;
  }

  ran(matcher: CommandMatcher): boolean {
    return this.commands.some((command) => matches(matcher, command));
  }

  async execute(command: ShellCommand | string): Promise<CommandResult> {
    const text = command.toString();
    this.commands.push(text);

    const rule = [...this.rules].reverse().find((r) => matches(r.matcher, text));
    const response: FakeResponse | Error = rule ? rule.response : {};
    if (response instanceof Error) {
      throw response;
    }

    return {
      exitCode: response.exitCode ?? 0,
      stdout: response.stdout ?? '',
      stderr: response.stderr ?? '',
      duration: 1,
    };
  }

  async downloadFile(remotePath: string, localPath: string): Promise<void> {
    if (this.missing.has(remotePath)) {
      throw new Error(`No such file: ${remotePath}`);
    }
    await fs.promises.writeFile(
      localPath,
      this.files.get(remotePath) ?? `${this.label}:${remotePath}`
    );
  }

  async uploadFile(localPath: string, remotePath: string): Promise<void> {
    if (this.uploadError) {
      throw this.uploadError;
    }
    this.uploaded.set(remotePath, await fs.promises.readFile(localPath, 'utf8'));
  }

  async close(): Promise<void> {
    this.closeCount++;
  }
}
