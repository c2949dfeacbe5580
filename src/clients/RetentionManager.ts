import {
  RetentionManager as IRetentionManager,
  RetentionResult,
} from '../interfaces/RetentionManager';
import { StorageBackend } from '../interfaces/StorageBackend';
import { Logger } from '../interfaces/Logger';
import { parseTimestamp } from '../utils/ArtifactNaming';
import { formatError, toError } from '../utils/errors';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Custom error classes for retention management operations
 */
export class RetentionError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'RetentionError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

export class RetentionListingError extends RetentionError {
  constructor(message: string, cause?: Error) {
    super(message, 'listing', cause);
    this.name = 'RetentionListingError';
  }
}

export class RetentionDeletionError extends RetentionError {
  constructor(
    message: string,
    public readonly folderId: string,
    cause?: Error
  ) {
    super(message, 'deletion', cause);
    this.name = 'RetentionDeletionError';
  }
}

/**
 * Age-based pruning of timestamp folders on any storage backend.
 * Age comes from the folder id, never from file modification times.
 */
export class RetentionManager implements IRetentionManager {
  private logger: Logger;
  private now: () => Date;

  constructor(logger: Logger, now: () => Date = () => new Date()) {
    this.logger = logger;
    this.now = now;
  }

  async prune(backend: StorageBackend, retentionDays: number = backend.retentionDays): Promise<RetentionResult> {
    const result: RetentionResult = {
      destination: backend.kind,
      retentionDays,
      totalCount: 0,
      deletedFolders: [],
      skippedFolders: [],
      errors: [],
    };

    let folders: string[];
    try {
      folders = await backend.listFolders();
    } catch (error) {
      const listingError = new RetentionListingError(
        `Failed to list folders on ${backend.label}: ${formatError(error)}`,
        toError(error)
      );
      result.errors.push(listingError.message);
      this.logger.error(listingError.message, listingError, { destination: backend.kind });
      return result;
    }

    result.totalCount = folders.length;
    this.logger.debug(`Checking ${folders.length} folders on ${backend.label}`, {
      destination: backend.kind,
      retentionDays,
    });

    for (const folderId of folders) {
      const expired = this.isFolderExpired(folderId, retentionDays);

      if (expired === null) {
        result.skippedFolders.push(folderId);
        this.logger.warn(`Skipping folder with unparseable timestamp: ${folderId}`, {
          destination: backend.kind,
        });
        continue;
      }

      if (!expired) {
        continue;
      }

      try {
        await backend.deleteFolder(folderId);
        result.deletedFolders.push(folderId);
        this.logger.info(`Deleted expired backup folder: ${folderId}`, { destination: backend.kind });
      } catch (error) {
        const deletionError = new RetentionDeletionError(
          `Failed to delete ${folderId} on ${backend.label}: ${formatError(error)}`,
          folderId,
          toError(error)
        );
        result.errors.push(deletionError.message);
        this.logger.error(deletionError.message, deletionError, { destination: backend.kind });
      }
    }

    this.logger.logRetentionCleanup(backend.kind, result.deletedFolders.length, retentionDays);

    if (result.errors.length > 0) {
      this.logger.warn(
        `Retention cleanup had ${result.errors.length} errors. Some folders may not have been deleted.`,
        { destination: backend.kind }
      );
    }

    return result;
  }

  isFolderExpired(folderId: string, retentionDays: number): boolean | null {
    const timestamp = parseTimestamp(folderId);
    if (!timestamp) {
      return null;
    }

    const age = this.now().getTime() - timestamp.getTime();
    return age > retentionDays * DAY_MS;
  }
}
