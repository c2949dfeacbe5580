import { DestinationKind } from './BackupConfig';
import { RetentionResult } from './RetentionManager';

/**
 * Outcome of one dump inside a backup cycle
 */
export interface ArtifactOutcome {
  /** Name of the artifact file */
  fileName: string;

  /** Whether the dump succeeded */
  success: boolean;

  /** Size of the artifact in bytes (0 on failure) */
  fileSize: number;

  /** Error message if the dump failed */
  error?: string;
}

/**
 * Outcome of replicating the cycle folder to one destination
 */
export interface PushOutcome {
  destination: DestinationKind;
  label: string;
  success: boolean;
  error?: string;
}

/**
 * Result of a backup cycle
 */
export interface BackupCycleResult {
  /** Identifier of this cycle in the logs */
  operationId: string;

  /** Timestamp folder the cycle wrote */
  folderId: string;

  /** 'success' only if every dump, push and prune succeeded */
  status: 'success' | 'partial';

  artifacts: ArtifactOutcome[];
  pushes: PushOutcome[];
  retention: RetentionResult[];

  /** Errors that are not tied to one artifact, such as database enumeration */
  errors: string[];

  /** Duration of the cycle in milliseconds */
  duration: number;
}

/**
 * Interface for the backup cycle orchestrator
 */
export interface BackupManager {
  /** Execute a complete backup cycle */
  executeBackup(): Promise<BackupCycleResult>;

  /** Validate the current configuration */
  validateConfiguration(): Promise<boolean>;
}
