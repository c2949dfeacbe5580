import { promises as fs } from 'fs';
import { join } from 'path';
import { v4 as uuidv4 } from 'uuid';
import {
  BackupManager as IBackupManager,
  BackupCycleResult,
  ArtifactOutcome,
  PushOutcome,
} from '../interfaces/BackupManager';
import { PostgreSQLClient, DumpInfo } from '../interfaces/PostgreSQLClient';
import { RetentionManager, RetentionResult } from '../interfaces/RetentionManager';
import { StorageBackend } from '../interfaces/StorageBackend';
import { Logger } from '../interfaces/Logger';
import { ArtifactKind } from '../interfaces/Artifacts';
import { artifactFileName, folderName } from '../utils/ArtifactNaming';
import { formatBytes } from '../utils/format';
import { formatError, toError } from '../utils/errors';

/**
 * Custom error classes for backup cycle operations
 */
export class BackupError extends Error {
  constructor(message: string, public readonly operation: string, public readonly cause?: Error) {
    super(message);
    this.name = 'BackupError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

export interface BackupManagerOptions {
  /** Local root the cycle folder is written under */
  backupDir: string;

  /** Destinations the folder is replicated to, local root included */
  destinations: StorageBackend[];

  /** Clock used for the folder name and duration */
  now?: () => Date;
}

/**
 * BackupManager implementation that orchestrates one backup cycle:
 * dumps into a timestamp folder, replicates it, then prunes every destination
 */
export class BackupManager implements IBackupManager {
  private postgresClient: PostgreSQLClient;
  private retentionManager: RetentionManager;
  private logger: Logger;
  private backupDir: string;
  private destinations: StorageBackend[];
  private now: () => Date;

  constructor(
    postgresClient: PostgreSQLClient,
    retentionManager: RetentionManager,
    logger: Logger,
    options: BackupManagerOptions
  ) {
    this.postgresClient = postgresClient;
    this.retentionManager = retentionManager;
    this.logger = logger;
    this.backupDir = options.backupDir;
    this.destinations = options.destinations;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Execute a complete backup cycle.
   * Only a failure to create the local folder escapes; everything else is reported in the result.
   */
  async executeBackup(): Promise<BackupCycleResult> {
    const startedAt = this.now();
    const operationId = uuidv4();
    const folderId = folderName(startedAt);
    const folderPath = join(this.backupDir, folderId);

    this.logger.logCycleStart(operationId, folderId);

    try {
      await fs.mkdir(folderPath, { recursive: true });
    } catch (error) {
      const backupError = new BackupError(
        `Failed to create backup folder ${folderPath}: ${formatError(error)}`,
        'create_folder',
        toError(error)
      );
      this.logger.error(backupError.message, backupError, { operationId });
      throw backupError;
    }

    const artifacts: ArtifactOutcome[] = [];
    const errors: string[] = [];

    artifacts.push(
      await this.dump({ type: 'cluster' }, folderPath, operationId, path => this.postgresClient.dumpCluster(path))
    );
    artifacts.push(
      await this.dump({ type: 'globals' }, folderPath, operationId, path => this.postgresClient.dumpGlobals(path))
    );

    let databases: string[] = [];
    try {
      databases = await this.postgresClient.listDatabases();
      this.logger.info(`Found ${databases.length} databases to back up`, { operationId, databases });
    } catch (error) {
      const message = `Failed to enumerate databases: ${formatError(error)}`;
      errors.push(message);
      this.logger.error(message, toError(error), { operationId });
    }

    for (const database of databases) {
      artifacts.push(
        await this.dump({ type: 'database', name: database }, folderPath, operationId, path =>
          this.postgresClient.dumpDatabase(database, path)
        )
      );
    }

    const pushes: PushOutcome[] = [];
    for (const destination of this.destinations) {
      pushes.push(await this.push(destination, folderPath, folderId, operationId));
    }

    const retention: RetentionResult[] = [];
    for (const destination of this.destinations) {
      retention.push(await this.retentionManager.prune(destination));
    }

    const failed =
      errors.length > 0 ||
      artifacts.some(artifact => !artifact.success) ||
      pushes.some(push => !push.success) ||
      retention.some(result => result.errors.length > 0);

    const result: BackupCycleResult = {
      operationId,
      folderId,
      status: failed ? 'partial' : 'success',
      artifacts,
      pushes,
      retention,
      errors,
      duration: this.now().getTime() - startedAt.getTime(),
    };

    this.logger.logCycleComplete(operationId, folderId, result.status, result.duration);
    return result;
  }

  /**
   * Validate the current configuration.
   * The PostgreSQL connection is required; destinations are only reported.
   */
  async validateConfiguration(): Promise<boolean> {
    this.logger.info('Testing PostgreSQL connection...', { target: this.postgresClient.getTarget() });
    const pgConnected = await this.postgresClient.testConnection();
    if (!pgConnected) {
      this.logger.error('PostgreSQL connection test failed', undefined, {
        target: this.postgresClient.getTarget(),
      });
      return false;
    }
    this.logger.info('PostgreSQL connection test passed');

    for (const destination of this.destinations) {
      const reachable = await destination.isReachable();
      if (reachable) {
        this.logger.info(`Destination reachable: ${destination.label}`, { destination: destination.kind });
      } else {
        this.logger.warn(`Destination not reachable: ${destination.label}`, { destination: destination.kind });
      }
    }

    return true;
  }

  private async dump(
    kind: ArtifactKind,
    folderPath: string,
    operationId: string,
    run: (outputPath: string) => Promise<DumpInfo>
  ): Promise<ArtifactOutcome> {
    const fileName = artifactFileName(kind);

    try {
      const info = await run(join(folderPath, fileName));
      this.logger.info(`Dump created: ${fileName} (${formatBytes(info.fileSize)})`, {
        operationId,
        fileName,
        fileSize: info.fileSize,
      });
      return { fileName, success: true, fileSize: info.fileSize };
    } catch (error) {
      this.logger.logArtifactError(fileName, toError(error), { operationId });
      return { fileName, success: false, fileSize: 0, error: formatError(error) };
    }
  }

  private async push(
    destination: StorageBackend,
    folderPath: string,
    folderId: string,
    operationId: string
  ): Promise<PushOutcome> {
    try {
      await destination.pushFolder(folderPath, folderId);
      this.logger.info(`Backup folder replicated to ${destination.label}`, {
        operationId,
        destination: destination.kind,
      });
      return { destination: destination.kind, label: destination.label, success: true };
    } catch (error) {
      this.logger.error(`Failed to replicate backup folder to ${destination.label}`, toError(error), {
        operationId,
        destination: destination.kind,
      });
      return {
        destination: destination.kind,
        label: destination.label,
        success: false,
        error: formatError(error),
      };
    }
  }
}
