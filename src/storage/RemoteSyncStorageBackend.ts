import { join } from 'path';
import { StorageBackend } from '../interfaces/StorageBackend';
import { RemoteSyncDestinationConfig } from '../interfaces/BackupConfig';
import { ArtifactEntry } from '../interfaces/Artifacts';
import { RemoteSyncClient } from '../interfaces/RemoteSyncClient';
import { isArtifactFile, isFolderId } from '../utils/ArtifactNaming';
import { formatError, toError } from '../utils/errors';
import { shellQuote } from '../clients/RemoteSyncClient';
import { StorageError, TransferError } from './errors';

/**
 * Backup folders kept in a directory on a host reached over SSH
 */
export class RemoteSyncStorageBackend implements StorageBackend {
  readonly kind = 'remote' as const;
  readonly label: string;
  readonly retentionDays: number;
  private remotePath: string;
  private client: RemoteSyncClient;

  constructor(config: RemoteSyncDestinationConfig, client: RemoteSyncClient) {
    this.remotePath = config.remotePath;
    this.retentionDays = config.retentionDays;
    this.label = `${config.user}@${config.host}:${config.remotePath}`;
    this.client = client;
  }

  async listFolders(): Promise<string[]> {
    const output = await this.run(
      `find ${shellQuote(this.remotePath)} -mindepth 1 -maxdepth 1 -type d -name '20*'`,
      'list'
    );

    return lines(output)
      .map(path => path.slice(path.lastIndexOf('/') + 1))
      .filter(isFolderId)
      .sort()
      .reverse();
  }

  async listArtifacts(folderId: string): Promise<ArtifactEntry[]> {
    const output = await this.run(
      `find ${shellQuote(this.folderPath(folderId))} -maxdepth 1 -type f -name '*.sql.gz' -printf '%f\\t%s\\n'`,
      'list_artifacts'
    );

    const artifacts: ArtifactEntry[] = [];
    for (const line of lines(output)) {
      const [fileName, size] = line.split('\t');
      if (fileName && isArtifactFile(fileName)) {
        artifacts.push({ fileName, size: Number(size) || 0 });
      }
    }
    return artifacts.sort((a, b) => a.fileName.localeCompare(b.fileName));
  }

  async pushFolder(localPath: string, folderId: string): Promise<void> {
    try {
      await this.client.upload(localPath, this.folderPath(folderId));
    } catch (error) {
      throw new TransferError(
        `Failed to sync ${localPath} to ${this.label}/${folderId}: ${formatError(error)}`,
        this.kind,
        'push',
        toError(error)
      );
    }
  }

  async fetchFolder(folderId: string, destRoot: string): Promise<string> {
    const folders = await this.listFolders().catch(error => {
      throw new TransferError(
        `Failed to list ${this.label}: ${formatError(error)}`,
        this.kind,
        'fetch',
        toError(error)
      );
    });

    if (!folders.includes(folderId)) {
      throw new TransferError(`Backup folder not found: ${this.label}/${folderId}`, this.kind, 'fetch');
    }

    const target = join(destRoot, folderId);
    try {
      await this.client.download(this.folderPath(folderId), target);
    } catch (error) {
      throw new TransferError(
        `Failed to sync ${this.label}/${folderId} to ${target}: ${formatError(error)}`,
        this.kind,
        'fetch',
        toError(error)
      );
    }
    return target;
  }

  async deleteFolder(folderId: string): Promise<void> {
    if (!isFolderId(folderId)) {
      throw new StorageError(`Refusing to delete invalid folder id: ${folderId}`, this.kind, 'delete');
    }
    await this.run(`rm -rf ${shellQuote(this.folderPath(folderId))}`, 'delete');
  }

  async isReachable(): Promise<boolean> {
    return this.client.testConnection();
  }

  private folderPath(folderId: string): string {
    return `${this.remotePath}/${folderId}`;
  }

  private async run(command: string, operation: string): Promise<string> {
    try {
      return await this.client.runCommand(command);
    } catch (error) {
      throw new StorageError(
        `Remote ${operation} failed on ${this.label}: ${formatError(error)}`,
        this.kind,
        operation,
        toError(error)
      );
    }
  }
}

function lines(output: string): string[] {
  return output
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0);
}
