import { mkdir } from 'fs/promises';
import { RemoteSyncClient as IRemoteSyncClient } from '../interfaces/RemoteSyncClient';
import { RemoteSyncDestinationConfig } from '../interfaces/BackupConfig';
import { Logger } from '../interfaces/Logger';
import { runProcess, ProcessResult } from '../utils/ProcessRunner';
import { formatError, toError } from '../utils/errors';

export class RemoteCommandError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly exitCode?: number,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'RemoteCommandError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * Quote a value for a POSIX shell on the remote side
 */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Quote an argument only when it carries characters outside a safe set
 */
function quoteArg(value: string): string {
  return /^[\w@%+=:,./-]+$/.test(value) ? value : shellQuote(value);
}

/**
 * Runs ssh and rsync against one remote host
 */
export class RemoteSyncClient implements IRemoteSyncClient {
  private config: RemoteSyncDestinationConfig;
  private logger: Logger;

  constructor(config: RemoteSyncDestinationConfig, logger: Logger) {
    this.config = config;
    this.logger = logger;
  }

  async runCommand(command: string): Promise<string> {
    const result = await this.spawn('ssh', [...this.sshArgs(), this.destination(), command], 'command');
    if (result.exitCode !== 0) {
      throw new RemoteCommandError(
        `ssh command failed on ${this.config.host} (exit code ${result.exitCode}): ${result.stderr.trim()}`,
        'command',
        result.exitCode
      );
    }
    return result.stdout;
  }

  async upload(localDir: string, remoteDir: string): Promise<void> {
    await this.runCommand(`mkdir -p ${shellQuote(remoteDir)}`);
    await this.rsync(`${trailingSlash(localDir)}`, `${this.destination()}:${trailingSlash(remoteDir)}`, 'upload');
  }

  async download(remoteDir: string, localDir: string): Promise<void> {
    await mkdir(localDir, { recursive: true });
    await this.rsync(`${this.destination()}:${trailingSlash(remoteDir)}`, trailingSlash(localDir), 'download');
  }

  async testConnection(): Promise<boolean> {
    try {
      await this.runCommand('exit');
      return true;
    } catch (error) {
      this.logger.warn('Remote host connection test failed', {
        host: this.config.host,
        port: this.config.port,
        error: formatError(error),
      });
      return false;
    }
  }

  sshArgs(): string[] {
    const args = [
      '-p',
      String(this.config.port),
      '-o',
      'StrictHostKeyChecking=no',
      '-o',
      'ConnectTimeout=5',
    ];
    if (this.config.sshKeyPath) {
      args.push('-i', this.config.sshKeyPath);
    }
    return args;
  }

  private destination(): string {
    return `${this.config.user}@${this.config.host}`;
  }

  private async rsync(source: string, target: string, operation: string): Promise<void> {
    const sshCommand = ['ssh', '-p', String(this.config.port), '-o', 'StrictHostKeyChecking=no'];
    if (this.config.sshKeyPath) {
      sshCommand.push('-i', this.config.sshKeyPath);
    }

    this.logger.debug('Running rsync', { operation, source, target });
    const sshShell = sshCommand.map(quoteArg).join(' ');
    const result = await this.spawn('rsync', ['-az', '-e', sshShell, source, target], operation);

    if (result.exitCode !== 0) {
      throw new RemoteCommandError(
        `rsync ${operation} failed (exit code ${result.exitCode}): ${result.stderr.trim()}`,
        operation,
        result.exitCode
      );
    }
  }

  private async spawn(command: string, args: string[], operation: string): Promise<ProcessResult> {
    try {
      return await runProcess(command, args);
    } catch (error) {
      throw new RemoteCommandError(
        `Failed to execute ${command}: ${formatError(error)}`,
        operation,
        undefined,
        toError(error)
      );
    }
  }
}

function trailingSlash(path: string): string {
  return path.endsWith('/') ? path : `${path}/`;
}
