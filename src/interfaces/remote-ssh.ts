import type { ShellCommand } from '../lib/shell-command';

export interface ServerEndpoint {
  /**
   * @description Name used in logs, e.g. "source" or "destination".
   */
  label: string;
  host: string;
  port: number; // 1-65535
  username: string;

  // exactly one of privateKeyPath or password must be provided
  privateKeyPath?: string;
  password?: string;
  passphrase?: string; // only used together with privateKeyPath
}

export interface SSHConnectionOptions {
  /**
   * @description Connection establishment timeout in milliseconds.
   */
  readyTimeout?: number;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
}

/**
 * An open, authenticated channel to one endpoint.
 */
export interface RemoteSession {
  readonly label: string;
  execute(command: ShellCommand | string): Promise<CommandResult>;
  downloadFile(remotePath: string, localPath: string): Promise<void>;
  uploadFile(localPath: string, remotePath: string): Promise<void>;
  close(): Promise<void>;
}

export type SessionFactory = (endpoint: ServerEndpoint) => Promise<RemoteSession>;
