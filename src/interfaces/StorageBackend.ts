import { DestinationKind } from './BackupConfig';
import { ArtifactEntry } from './Artifacts';

/**
 * Uniform access to a backup repository: a local root, an object store prefix
 * or a directory on a remote host
 */
export interface StorageBackend {
  readonly kind: DestinationKind;

  /** Human-readable location, used in logs and reports */
  readonly label: string;

  /** Maximum age in days before a folder is pruned from this destination */
  readonly retentionDays: number;

  /** Timestamp folder ids, newest first */
  listFolders(): Promise<string[]>;

  /** Compressed artifacts stored in one folder */
  listArtifacts(folderId: string): Promise<ArtifactEntry[]>;

  /** Bytes the folder occupies, where the destination can measure more than its artifacts */
  folderSize?(folderId: string): Promise<number>;

  /** Replicate a local folder to this destination, overwriting what is there */
  pushFolder(localPath: string, folderId: string): Promise<void>;

  /** Make the folder available locally and return its path */
  fetchFolder(folderId: string, destRoot: string): Promise<string>;

  /** Remove the folder and every artifact in it */
  deleteFolder(folderId: string): Promise<void>;

  /** Connectivity probe; resolves false instead of throwing */
  isReachable(): Promise<boolean>;
}
