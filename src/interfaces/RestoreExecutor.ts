import { ArtifactKind } from './Artifacts';
import { DestinationKind } from './BackupConfig';
import { FolderIntegrityReport } from './IntegrityVerifier';

/** What a restore applies: one artifact of a folder */
export type RestoreScope = ArtifactKind;

/**
 * A single restore to carry out, consumed once by the executor
 */
export interface RestoreRequest {
  source: DestinationKind;
  folderId: string;
  scope: RestoreScope;
}

export type RestoreState =
  | 'requested'
  | 'resolved'
  | 'verified'
  | 'confirmed'
  | 'applied'
  | 'post-verified';

export type RestoreMode = 'interactive' | 'automated';

/**
 * An action put to the operator before it happens
 */
export type ProposedAction =
  | {
      kind: 'restore';
      request: RestoreRequest;
      fileName: string;
      consequences: string[];
      target: string;
    }
  | {
      kind: 'ignore-integrity-failure';
      folderId: string;
      corrupted: string[];
    };

/** Decides whether a proposed action goes ahead */
export type ConfirmFn = (action: ProposedAction) => Promise<boolean>;

export interface PostRestoreReport {
  databases?: string[];
  roles?: string[];
  tables?: string[];
}

export interface RestoreOutcome {
  operationId: string;
  request: RestoreRequest;
  status: 'succeeded' | 'failed' | 'cancelled';

  /** States reached, in order */
  states: RestoreState[];

  /** State the restore was trying to reach when it stopped */
  failedState?: RestoreState;
  error?: string;

  integrity?: FolderIntegrityReport;

  /** Absent when post-restore verification failed */
  verification?: PostRestoreReport;
}
