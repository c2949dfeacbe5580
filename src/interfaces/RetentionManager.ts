import { DestinationKind } from './BackupConfig';
import { StorageBackend } from './StorageBackend';

/**
 * Result of pruning one destination
 */
export interface RetentionResult {
  destination: DestinationKind;

  /** Threshold applied, in days */
  retentionDays: number;

  /** Number of folders found */
  totalCount: number;

  /** Folders that were deleted */
  deletedFolders: string[];

  /** Folders whose id could not be parsed as a timestamp */
  skippedFolders: string[];

  /** Any errors encountered while listing or deleting */
  errors: string[];
}

/**
 * Interface for age-based pruning of backup folders
 */
export interface RetentionManager {
  /**
   * Delete every folder on the destination older than the retention threshold
   * @param retentionDays defaults to the destination's own threshold
   */
  prune(backend: StorageBackend, retentionDays?: number): Promise<RetentionResult>;

  /**
   * Check if a folder is past the threshold; folders exactly at it are kept
   * @returns null if the folder id is not a valid timestamp
   */
  isFolderExpired(folderId: string, retentionDays: number): boolean | null;
}
