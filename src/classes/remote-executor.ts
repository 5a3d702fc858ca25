import { NodeSSH } from 'node-ssh';
import fs from 'fs';
import type {
  CommandResult,
  RemoteSession,
  ServerEndpoint,
  SSHConnectionOptions,
} from '../interfaces';
import type { ShellCommand } from '../lib/shell-command';

export const DEFAULT_READY_TIMEOUT = 10000;

/**
 * A session-level fault: the connection could not be opened, was lost, or was
 * never authenticated. A command that ran and exited nonzero is not one.
 */
export class ConnectionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConnectionError';
  }
}

export class RemoteExecutor implements RemoteSession {
  private ssh: NodeSSH;
  private endpoint: ServerEndpoint;
  private options: SSHConnectionOptions;

  constructor(endpoint: ServerEndpoint, options: SSHConnectionOptions = {}) {
    this.ssh = new NodeSSH();
    this.endpoint = endpoint;
    this.options = options;
  }

  get label(): string {
    return this.endpoint.label;
  }

  /**
   * Connect to the remote server
   */
  async connect(): Promise<void> {
    const { host, port, username, privateKeyPath, password, passphrase } =
      this.endpoint;

    // Authentication is checked before any network activity
    if (!privateKeyPath && !password) {
      throw new ConnectionError(
        `${this.label}: either a private key path or a password is required`
      );
    }

    let privateKey: string | undefined;
    if (privateKeyPath) {
      if (!fs.existsSync(privateKeyPath)) {
        throw new ConnectionError(
          `${this.label}: private key file not found: ${privateKeyPath}`
        );
      }
      privateKey = fs.readFileSync(privateKeyPath, 'utf8');
    }

    try {
      // No hostVerifier: unknown host keys are accepted
      await this.ssh.connect({
        host,
        port,
        username,
        ...(privateKey ? { privateKey, passphrase } : { password }),
        readyTimeout: this.options.readyTimeout ?? DEFAULT_READY_TIMEOUT,
      });
    } catch (error) {
      throw new ConnectionError(
        `${this.label}: failed to connect to ${username}@${host}:${port}: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }
  }

  /**
   * Disconnect from the remote server
   */
  async disconnect(): Promise<void> {
    this.ssh.dispose();
  }

  async close(): Promise<void> {
    await this.disconnect();
  }

  /**
   * Run one shell command and wait for it to exit. No timeout is applied.
   */
  async execute(command: ShellCommand | string): Promise<CommandResult> {
    if (!this.ssh.isConnected()) {
      throw new ConnectionError(`${this.label}: session is not connected`);
    }

    const startTime = Date.now();

    try {
      const result = await this.ssh.execCommand(command.toString());

      return {
        // code is null when the command was killed by a signal
        exitCode: result.code ?? 1,
        stdout: result.stdout.trim(),
        stderr: result.stderr.trim(),
        duration: Date.now() - startTime,
      };
    } catch (error) {
      throw new ConnectionError(
        `${this.label}: error executing command: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }
  }

  /**
   * Copy a remote file to the local machine over SFTP
   */
  async downloadFile(remotePath: string, localPath: string): Promise<void> {
    try {
      await this.ssh.getFile(localPath, remotePath);
    } catch (error) {
      throw new ConnectionError(
        `${this.label}: error downloading ${remotePath}: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }
  }

  /**
   * Copy a local file to the remote server over SFTP
   */
  async uploadFile(localPath: string, remotePath: string): Promise<void> {
    try {
      await this.ssh.putFile(localPath, remotePath);
    } catch (error) {
      throw new ConnectionError(
        `${this.label}: error uploading to ${remotePath}: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }
  }

  /**
   * Get remote server information
   */
  async getServerInfo(): Promise<{ hostname: string; uptime: string }> {
    const hostnameResult = await this.execute('hostname');
    const uptimeResult = await this.execute('uptime');

    return {
      hostname: hostnameResult.stdout,
      uptime: uptimeResult.stdout,
    };
  }

  /**
   * Test the connection to the remote server
   */
  async testConnection(): Promise<boolean> {
    try {
      const result = await this.execute('hostname');
      return result.exitCode === 0;
    } catch (error) {
      return false;
    }
  }
}

/**
 * Open and verify a session to one endpoint.
 */
export async function connectToEndpoint(
  endpoint: ServerEndpoint,
  options: SSHConnectionOptions = {}
): Promise<RemoteExecutor> {
  const executor = new RemoteExecutor(endpoint, options);
  await executor.connect();

  if (!(await executor.testConnection())) {
    await executor.disconnect();
    throw new ConnectionError(`${endpoint.label}: connection test failed`);
  }

  return executor;
}
