import shellEscape from 'shell-escape';

/**
 * Quote a single value for a POSIX shell. Values made only of safe
 * characters are left as they are.
 */
export function quote(value: string): string {
  if (value === '') {
    return "''";
  }
  return shellEscape([value]);
}

/**
 * A shell command assembled from a trusted program name, escaped arguments
 * and trusted operators. Every value that comes from configuration or
 * operator input goes through arg() or withEnv() so it is quoted once,
 * here, and never interpolated by hand.
 */
export class ShellCommand {
  private readonly env: string[] = [];
  private readonly parts: string[];

  private constructor(program: string) {
    this.parts = [program];
  }

  static of(program: string, ...args: string[]): ShellCommand {
    return new ShellCommand(program).arg(...args);
  }

  arg(...values: string[]): this {
    for (const value of values) {
      this.parts.push(quote(value));
    }
    return this;
  }

  /**
   * Prefix the command with NAME=value. Keeps secrets out of the argument list.
   */
  withEnv(name: string, value: string): this {
    if (!/^[A-Z_][A-Z0-9_]*$/.test(name)) {
      throw new Error(`Invalid environment variable name: ${name}`);
    }
    this.env.push(`${name}=${quote(value)}`);
    return this;
  }

  stdoutTo(path: string): this {
    return this.operator('>', path);
  }

  stdinFrom(path: string): this {
    return this.operator('<', path);
  }

  discardStderr(): this {
    this.parts.push('2>/dev/null');
    return this;
  }

  pipe(next: ShellCommand): ShellCommand {
    return this.join('|', next);
  }

  and(next: ShellCommand): ShellCommand {
    return this.join('&&', next);
  }

  or(next: ShellCommand): ShellCommand {
    return this.join('||', next);
  }

  /**
   * Run the command from inside the given directory.
   */
  static inDirectory(directory: string, command: ShellCommand): ShellCommand {
    return ShellCommand.of('cd', directory).and(command);
  }

  toString(): string {
    return [...this.env, ...this.parts].join(' ');
  }

  private operator(symbol: string, path: string): this {
    this.parts.push(symbol, quote(path));
    return this;
  }

  private join(symbol: string, next: ShellCommand): ShellCommand {
    this.parts.push(symbol, next.toString());
    return this;
  }
}
