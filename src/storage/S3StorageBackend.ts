import { promises as fs } from 'fs';
import { join, relative, sep } from 'path';
import { StorageBackend } from '../interfaces/StorageBackend';
import { S3DestinationConfig } from '../interfaces/BackupConfig';
import { ArtifactEntry } from '../interfaces/Artifacts';
import { S3Client } from '../interfaces/S3Client';
import { Logger } from '../interfaces/Logger';
import { isArtifactFile, isFolderId } from '../utils/ArtifactNaming';
import { formatError, toError } from '../utils/errors';
import { StorageError, TransferError } from './errors';

/**
 * Backup folders stored as key prefixes in an S3-compatible bucket
 */
export class S3StorageBackend implements StorageBackend {
  readonly kind = 's3' as const;
  readonly label: string;
  readonly retentionDays: number;
  private prefix: string;
  private s3Client: S3Client;
  private logger: Logger;

  constructor(config: S3DestinationConfig, s3Client: S3Client, logger: Logger) {
    this.prefix = config.prefix;
    this.retentionDays = config.retentionDays;
    this.label = `s3://${config.bucket}/${config.prefix}`;
    this.s3Client = s3Client;
    this.logger = logger;
  }

  async listFolders(): Promise<string[]> {
    let prefixes: string[];
    try {
      prefixes = await this.s3Client.listPrefixes(this.rootPrefix());
    } catch (error) {
      throw new StorageError(
        `Failed to list folders in ${this.label}: ${formatError(error)}`,
        this.kind,
        'list',
        toError(error)
      );
    }

    return prefixes
      .map(prefix => prefix.slice(this.rootPrefix().length).replace(/\/$/, ''))
      .filter(isFolderId)
      .sort()
      .reverse();
  }

  async listArtifacts(folderId: string): Promise<ArtifactEntry[]> {
    const folderPrefix = this.folderPrefix(folderId);
    let objects;
    try {
      objects = await this.s3Client.listObjects(folderPrefix);
    } catch (error) {
      throw new StorageError(
        `Failed to list artifacts in ${folderPrefix}: ${formatError(error)}`,
        this.kind,
        'list_artifacts',
        toError(error)
      );
    }

    return objects
      .map(object => ({ fileName: object.key.slice(folderPrefix.length), size: object.size }))
      .filter(entry => !entry.fileName.includes('/') && isArtifactFile(entry.fileName))
      .sort((a, b) => a.fileName.localeCompare(b.fileName));
  }

  async pushFolder(localPath: string, folderId: string): Promise<void> {
    let files: string[];
    try {
      files = await this.collectFiles(localPath);
    } catch (error) {
      throw new TransferError(
        `Failed to read ${localPath}: ${formatError(error)}`,
        this.kind,
        'push',
        toError(error)
      );
    }

    for (const filePath of files) {
      const key = this.folderPrefix(folderId) + relative(localPath, filePath).split(sep).join('/');
      try {
        await this.s3Client.uploadFile(filePath, key);
        this.logger.debug('Uploaded artifact', { key });
      } catch (error) {
        throw new TransferError(
          `Failed to upload ${filePath} to ${key}: ${formatError(error)}`,
          this.kind,
          'push',
          toError(error)
        );
      }
    }
  }

  async fetchFolder(folderId: string, destRoot: string): Promise<string> {
    const folderPrefix = this.folderPrefix(folderId);
    const target = join(destRoot, folderId);

    let objects;
    try {
      objects = await this.s3Client.listObjects(folderPrefix);
    } catch (error) {
      throw new TransferError(
        `Failed to list ${folderPrefix}: ${formatError(error)}`,
        this.kind,
        'fetch',
        toError(error)
      );
    }

    if (objects.length === 0) {
      throw new TransferError(`Backup folder not found: ${this.label}/${folderId}`, this.kind, 'fetch');
    }

    for (const object of objects) {
      const relativeKey = object.key.slice(folderPrefix.length);
      try {
        await this.s3Client.downloadFile(object.key, join(target, ...relativeKey.split('/')));
      } catch (error) {
        throw new TransferError(
          `Failed to download ${object.key}: ${formatError(error)}`,
          this.kind,
          'fetch',
          toError(error)
        );
      }
    }

    return target;
  }

  async deleteFolder(folderId: string): Promise<void> {
    if (!isFolderId(folderId)) {
      throw new StorageError(`Refusing to delete invalid folder id: ${folderId}`, this.kind, 'delete');
    }

    try {
      const objects = await this.s3Client.listObjects(this.folderPrefix(folderId));
      for (const object of objects) {
        await this.s3Client.deleteObject(object.key);
      }
    } catch (error) {
      throw new StorageError(
        `Failed to delete ${this.folderPrefix(folderId)}: ${formatError(error)}`,
        this.kind,
        'delete',
        toError(error)
      );
    }
  }

  async isReachable(): Promise<boolean> {
    return this.s3Client.testConnection();
  }

  private rootPrefix(): string {
    return this.prefix ? `${this.prefix}/` : '';
  }

  private folderPrefix(folderId: string): string {
    return `${this.rootPrefix()}${folderId}/`;
  }

  private async collectFiles(dir: string): Promise<string[]> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    const files: string[] = [];

    for (const entry of entries) {
      const fullPath = join(dir, entry.name);
      if (entry.isDirectory()) {
        files.push(...(await this.collectFiles(fullPath)));
      } else if (entry.isFile()) {
        files.push(fullPath);
      }
    }
    return files.sort();
  }
}
