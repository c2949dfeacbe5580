export type ArtifactKind =
  | { type: 'cluster' }
  | { type: 'globals' }
  | { type: 'database'; name: string };

/**
 * One compressed dump file inside a timestamp folder
 */
export interface ArtifactEntry {
  fileName: string;
  size: number;
}

export type FolderCompleteness = 'empty' | 'complete' | 'partial' | 'incomplete';
