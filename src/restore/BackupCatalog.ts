import { StorageBackend } from '../interfaces/StorageBackend';
import { ArtifactEntry, FolderCompleteness } from '../interfaces/Artifacts';
import { CatalogEntry, FolderInspection, SourceStatus } from '../interfaces/BackupCatalog';
import { Logger } from '../interfaces/Logger';
import { parseArtifactKind, parseTimestamp } from '../utils/ArtifactNaming';
import { formatError } from '../utils/errors';

export function classifyFolder(artifacts: ArtifactEntry[]): FolderCompleteness {
  if (artifacts.length === 0) {
    return 'empty';
  }

  const kinds = new Set(artifacts.map(artifact => parseArtifactKind(artifact.fileName)?.type));
  const hasCluster = kinds.has('cluster');
  const hasGlobals = kinds.has('globals');

  if (hasCluster && hasGlobals) return 'complete';
  if (hasCluster) return 'partial';
  return 'incomplete';
}

export function listBackupDatabases(artifacts: ArtifactEntry[]): string[] {
  const databases: string[] = [];
  for (const artifact of artifacts) {
    const kind = parseArtifactKind(artifact.fileName);
    if (kind?.type === 'database') {
      databases.push(kind.name);
    }
  }
  return databases.sort();
}

/**
 * Lists and classifies backup folders across destinations.
 * Remote folders are inspected on demand and remembered until refresh().
 */
export class BackupCatalog {
  private logger: Logger;
  private now: () => Date;
  private inspections = new Map<string, FolderInspection>();

  constructor(logger: Logger, now: () => Date = () => new Date()) {
    this.logger = logger;
    this.now = now;
  }

  /**
   * Folders newest first; local folders come back inspected
   */
  async discover(backend: StorageBackend): Promise<CatalogEntry[]> {
    const folders = await backend.listFolders();
    const entries: CatalogEntry[] = [];

    for (const folderId of folders) {
      const entry: CatalogEntry = { folderId, ageMs: this.ageOf(folderId) };
      if (backend.kind === 'local') {
        entry.inspection = await this.inspect(backend, folderId);
      } else {
        const cached = this.inspections.get(this.cacheKey(backend, folderId));
        if (cached) {
          entry.inspection = cached;
        }
      }
      entries.push(entry);
    }

    return entries;
  }

  async inspect(backend: StorageBackend, folderId: string): Promise<FolderInspection> {
    const key = this.cacheKey(backend, folderId);
    const cached = this.inspections.get(key);
    if (cached) {
      return cached;
    }

    const artifacts = await backend.listArtifacts(folderId);
    const totalSize = backend.folderSize
      ? await backend.folderSize(folderId)
      : artifacts.reduce((sum, artifact) => sum + artifact.size, 0);
    const inspection: FolderInspection = {
      folderId,
      artifacts,
      completeness: classifyFolder(artifacts),
      totalSize,
      databases: listBackupDatabases(artifacts),
    };

    if (backend.kind !== 'local') {
      this.inspections.set(key, inspection);
    }
    return inspection;
  }

  refresh(): void {
    this.inspections.clear();
  }

  /**
   * Reachability and folder count per destination; failures are reported, not raised
   */
  async describeAllSources(backends: StorageBackend[]): Promise<SourceStatus[]> {
    const statuses: SourceStatus[] = [];

    for (const backend of backends) {
      const status: SourceStatus = {
        kind: backend.kind,
        label: backend.label,
        reachable: false,
        folderCount: 0,
      };

      try {
        status.reachable = await backend.isReachable();
        if (status.reachable) {
          const folders = await backend.listFolders();
          status.folderCount = folders.length;
          status.latestFolder = folders[0];
        }
      } catch (error) {
        status.reachable = false;
        status.error = formatError(error);
        this.logger.warn(`Failed to describe ${backend.label}`, { error: status.error });
      }

      statuses.push(status);
    }

    return statuses;
  }

  ageOf(folderId: string): number | null {
    const timestamp = parseTimestamp(folderId);
    return timestamp ? this.now().getTime() - timestamp.getTime() : null;
  }

  private cacheKey(backend: StorageBackend, folderId: string): string {
    return `${backend.kind}:${backend.label}:${folderId}`;
  }
}
