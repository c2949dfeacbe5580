export interface FileIntegrityResult {
  fileName: string;
  ok: boolean;
  error?: string;
}

export interface FolderIntegrityReport {
  folderPath: string;
  files: FileIntegrityResult[];
  corrupted: string[];

  /** True when at least one file was checked and none were corrupted */
  ok: boolean;
}
