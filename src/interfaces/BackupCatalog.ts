import { DestinationKind } from './BackupConfig';
import { ArtifactEntry, FolderCompleteness } from './Artifacts';

/**
 * Contents of one folder, from a follow-up listing
 */
export interface FolderInspection {
  folderId: string;
  artifacts: ArtifactEntry[];
  completeness: FolderCompleteness;
  totalSize: number;
  databases: string[];
}

export interface CatalogEntry {
  folderId: string;

  /** Age in milliseconds, null when the id is not a calendar-valid timestamp */
  ageMs: number | null;

  /** Present when the folder has been inspected */
  inspection?: FolderInspection;
}

export interface SourceStatus {
  kind: DestinationKind;
  label: string;
  reachable: boolean;
  folderCount: number;
  latestFolder?: string;
  error?: string;
}
