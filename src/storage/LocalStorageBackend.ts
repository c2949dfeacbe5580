import { promises as fs, constants, Stats } from 'fs';
import { join, resolve } from 'path';
import { StorageBackend } from '../interfaces/StorageBackend';
import { LocalDestinationConfig } from '../interfaces/BackupConfig';
import { ArtifactEntry } from '../interfaces/Artifacts';
import { Logger } from '../interfaces/Logger';
import { isArtifactFile, isFolderId } from '../utils/ArtifactNaming';
import { errorCode, formatError, toError } from '../utils/errors';
import { StorageError, TransferError } from './errors';

/**
 * Backup folders kept under a directory on this host
 */
export class LocalStorageBackend implements StorageBackend {
  readonly kind = 'local' as const;
  readonly label: string;
  readonly retentionDays: number;
  private rootDir: string;
  private logger: Logger;

  constructor(config: LocalDestinationConfig, logger: Logger) {
    this.rootDir = config.rootDir;
    this.retentionDays = config.retentionDays;
    this.label = `local:${config.rootDir}`;
    this.logger = logger;
  }

  folderPath(folderId: string): string {
    return join(this.rootDir, folderId);
  }

  async listFolders(): Promise<string[]> {
    let entries;
    try {
      entries = await fs.readdir(this.rootDir, { withFileTypes: true });
    } catch (error) {
      // A root that was never written to holds no backups
      if (errorCode(error) === 'ENOENT') {
        return [];
      }
      throw new StorageError(
        `Failed to list ${this.rootDir}: ${formatError(error)}`,
        this.kind,
        'list',
        toError(error)
      );
    }

    return entries
      .filter(entry => entry.isDirectory() && isFolderId(entry.name))
      .map(entry => entry.name)
      .sort()
      .reverse();
  }

  async listArtifacts(folderId: string): Promise<ArtifactEntry[]> {
    const folder = this.folderPath(folderId);
    let names: string[];
    try {
      names = await fs.readdir(folder);
    } catch (error) {
      throw new StorageError(
        `Failed to list artifacts in ${folder}: ${formatError(error)}`,
        this.kind,
        'list_artifacts',
        toError(error)
      );
    }

    const artifacts: ArtifactEntry[] = [];
    for (const fileName of names.filter(isArtifactFile).sort()) {
      const stats = await this.statEntry(join(folder, fileName), 'list_artifacts');
      if (stats?.isFile()) {
        artifacts.push({ fileName, size: stats.size });
      }
    }
    return artifacts;
  }

  /**
   * Bytes under the folder, recursively
   */
  async folderSize(folderId: string): Promise<number> {
    return this.directorySize(this.folderPath(folderId));
  }

  async pushFolder(localPath: string, folderId: string): Promise<void> {
    const target = this.folderPath(folderId);
    if (resolve(localPath) === resolve(target)) {
      this.logger.debug('Folder already in local backup root', { folderId });
      return;
    }

    try {
      await fs.mkdir(this.rootDir, { recursive: true });
      await fs.cp(localPath, target, { recursive: true, force: true });
    } catch (error) {
      throw new TransferError(
        `Failed to copy ${localPath} to ${target}: ${formatError(error)}`,
        this.kind,
        'push',
        toError(error)
      );
    }
  }

  async fetchFolder(folderId: string): Promise<string> {
    const folder = this.folderPath(folderId);
    const isDirectory = await fs.stat(folder).then(
      stats => stats.isDirectory(),
      () => false
    );

    if (!isDirectory) {
      throw new TransferError(`Backup folder not found: ${folder}`, this.kind, 'fetch');
    }
    return folder;
  }

  async deleteFolder(folderId: string): Promise<void> {
    if (!isFolderId(folderId)) {
      throw new StorageError(`Refusing to delete invalid folder id: ${folderId}`, this.kind, 'delete');
    }

    try {
      await fs.rm(this.folderPath(folderId), { recursive: true, force: true });
    } catch (error) {
      throw new StorageError(
        `Failed to delete ${this.folderPath(folderId)}: ${formatError(error)}`,
        this.kind,
        'delete',
        toError(error)
      );
    }
  }

  private async directorySize(dir: string): Promise<number> {
    let entries;
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return 0;
      }
      throw new StorageError(`Failed to size ${dir}: ${formatError(error)}`, this.kind, 'size', toError(error));
    }

    let total = 0;
    for (const entry of entries) {
      const path = join(dir, entry.name);
      if (entry.isDirectory()) {
        total += await this.directorySize(path);
      } else {
        const stats = await this.statEntry(path, 'size');
        total += stats?.isFile() ? stats.size : 0;
      }
    }
    return total;
  }

  /**
   * Stat a folder entry; null when it vanished after the directory was read
   */
  private async statEntry(path: string, operation: string): Promise<Stats | null> {
    try {
      return await fs.stat(path);
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        this.logger.debug('Skipping entry removed during listing', { path });
        return null;
      }
      throw new StorageError(`Failed to stat ${path}: ${formatError(error)}`, this.kind, operation, toError(error));
    }
  }

  async isReachable(): Promise<boolean> {
    try {
      const stats = await fs.stat(this.rootDir);
      if (!stats.isDirectory()) {
        return false;
      }
      await fs.access(this.rootDir, constants.R_OK);
      return true;
    } catch (error) {
      this.logger.debug('Local backup root is not accessible', {
        rootDir: this.rootDir,
        error: formatError(error),
      });
      return false;
    }
  }
}
