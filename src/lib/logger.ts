import chalk from 'chalk';
import * as fs from 'fs';

export type LogLevel = 'info' | 'warn' | 'error';

export interface MigrationLoggerOptions {
  /**
   * File every line is appended to. Omit to log to the console only.
   */
  filePath?: string;
  /**
   * Mirror every line to the console.
   * @default true
   */
  console?: boolean;
  now?: () => Date;
}

const RULE = '='.repeat(60);

/**
 * The single log sink shared by every stage of a run. It is created once by
 * the CLI and passed to each component.
 */
export class MigrationLogger {
  readonly filePath?: string;
  private readonly toConsole: boolean;
  private readonly now: () => Date;

  constructor(options: MigrationLoggerOptions = {}) {
    this.filePath = options.filePath;
    this.toConsole = options.console ?? true;
    this.now = options.now ?? (() => new Date());
  }

  info(message: string): void {
    this.write('info', message, chalk.white);
  }

  success(message: string): void {
    this.write('info', `✓ ${message}`, chalk.green);
  }

  warn(message: string): void {
    this.write('warn', `! ${message}`, chalk.yellow);
  }

  error(message: string): void {
    this.write('error', `✗ ${message}`, chalk.red);
  }

  section(title: string): void {
    this.write('info', RULE, chalk.dim);
    this.write('info', title, chalk.bold);
    this.write('info', RULE, chalk.dim);
  }

  /**
   * Mark a pipeline stage as finished, e.g. "[STAGE] database completed".
   */
  stage(name: string): void {
    this.write('info', `[STAGE] ${name} completed`, chalk.green.bold);
  }

  private write(
    level: LogLevel,
    message: string,
    color: (text: string) => string
  ): void {
    if (this.filePath) {
      const line = `${this.now().toISOString()} - ${level.toUpperCase()} - ${message}\n`;
      fs.appendFileSync(this.filePath, line, 'utf8');
    }

    if (this.toConsole) {
      const output = color(message);
      if (level === 'error') {
        console.error(output);
      } else {
        console.log(output);
      }
    }
  }
}
