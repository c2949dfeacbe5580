import { DestinationKind, RestoreParameters } from '../interfaces/BackupConfig';
import { RestoreRequest, RestoreScope } from '../interfaces/RestoreExecutor';
import { StorageBackend } from '../interfaces/StorageBackend';
import { CatalogEntry } from '../interfaces/BackupCatalog';
import { Prompter } from '../interfaces/Prompter';
import { StorageBackends, backendFor } from '../storage';
import { artifactFileName, isFolderId } from '../utils/ArtifactNaming';
import { formatAge, formatBytes } from '../utils/format';
import { BackupCatalog } from './BackupCatalog';
import { describeScope, restorableScopes, scopeConsequences } from './scopes';

export class InvalidSelectionError extends Error {
  constructor(
    message: string,
    public readonly input?: string
  ) {
    super(message);
    this.name = 'InvalidSelectionError';
  }
}

export type ScopeChoice =
  | { kind: 'restore'; scope: RestoreScope }
  | { kind: 'dry-run' }
  | { kind: 'cancel' };

export interface DryRunReport {
  request: RestoreRequest;
  fileName: string;
  size: number;
  consequences: string[];
  target: string;
}

const DESTINATION_KINDS: readonly DestinationKind[] = ['local', 's3', 'remote'];

function isDestinationKind(value: string): value is DestinationKind {
  return DESTINATION_KINDS.some(kind => kind === value);
}

/**
 * Turns operator input, typed or supplied as parameters, into a restore request
 */
export class RestoreSelector {
  private prompter: Prompter;
  private catalog: BackupCatalog;
  private backends: StorageBackends;
  private target: string;

  constructor(prompter: Prompter, catalog: BackupCatalog, backends: StorageBackends, target: string) {
    this.prompter = prompter;
    this.catalog = catalog;
    this.backends = backends;
    this.target = target;
  }

  /**
   * Build a request from RESTORE_* parameters.
   * Returns null unless source, folder and type are all given.
   */
  static resolveParameters(params: RestoreParameters): RestoreRequest | null {
    const { source, folder, type, database } = params;
    if (!source || !folder || !type) {
      return null;
    }

    if (!isDestinationKind(source)) {
      throw new InvalidSelectionError(`Unknown RESTORE_SOURCE: ${source} (expected local, s3 or remote)`, source);
    }

    if (!isFolderId(folder)) {
      throw new InvalidSelectionError(`RESTORE_FOLDER is not a backup folder name: ${folder}`, folder);
    }

    let scope: RestoreScope;
    switch (type) {
      case 'cluster':
        scope = { type: 'cluster' };
        break;
      case 'globals':
        scope = { type: 'globals' };
        break;
      case 'database':
        if (!database) {
          throw new InvalidSelectionError('RESTORE_DATABASE must be set for database restore');
        }
        scope = { type: 'database', name: database };
        break;
      default:
        throw new InvalidSelectionError(
          `Unknown RESTORE_TYPE: ${type} (expected cluster, globals or database)`,
          type
        );
    }

    return { source, folderId: folder, scope };
  }

  /**
   * Numbered newest-first folder list; 0 cancels and resolves to null
   */
  async selectFolder(backend: StorageBackend): Promise<string | null> {
    const entries = await this.catalog.discover(backend);
    if (entries.length === 0) {
      this.prompter.write(`No backups found in ${backend.label}`);
      return null;
    }

    this.prompter.write('');
    this.prompter.write('Available backups:');
    this.prompter.write('------------------');
    entries.forEach((entry, index) => {
      this.prompter.write(`${index + 1}. ${this.describeEntry(entry)}`);
    });
    this.prompter.write('');

    const answer = await this.prompter.ask('Select backup number (or 0 to cancel): ');
    const selection = parseSelection(answer, entries.length, true);
    return selection === 0 ? null : entries[selection - 1].folderId;
  }

  async selectScope(backend: StorageBackend, folderId: string): Promise<ScopeChoice> {
    const inspection = await this.catalog.inspect(backend, folderId);
    const options: ScopeChoice[] = [
      ...restorableScopes(inspection).map((scope): ScopeChoice => ({ kind: 'restore', scope })),
      { kind: 'dry-run' },
      { kind: 'cancel' },
    ];

    this.prompter.write('');
    this.prompter.write('Restore Options:');
    this.prompter.write('----------------');
    options.forEach((option, index) => {
      this.prompter.write(`${index + 1}. ${describeChoice(option)}`);
    });
    this.prompter.write('');

    const answer = await this.prompter.ask('Select restore option: ');
    return options[parseSelection(answer, options.length, false) - 1];
  }

  /**
   * Pick the scope a dry run simulates; the last option cancels
   */
  async selectDryRunScope(backend: StorageBackend, folderId: string): Promise<RestoreScope | null> {
    const scopes = restorableScopes(await this.catalog.inspect(backend, folderId));
    if (scopes.length === 0) {
      throw new InvalidSelectionError(`No restorable artifacts in ${folderId}`);
    }

    this.prompter.write('');
    this.prompter.write('Dry run for:');
    scopes.forEach((scope, index) => {
      this.prompter.write(`${index + 1}. ${describeScope(scope)}`);
    });
    this.prompter.write(`${scopes.length + 1}. Cancel`);
    this.prompter.write('');

    const selection = parseSelection(await this.prompter.ask('Select restore type for dry run: '), scopes.length + 1, false);
    return selection > scopes.length ? null : scopes[selection - 1];
  }

  /**
   * Describe what a restore would do from a listing alone; nothing is downloaded or changed
   */
  async dryRun(request: RestoreRequest): Promise<DryRunReport> {
    const backend = backendFor(this.backends, request.source);
    if (!backend) {
      throw new InvalidSelectionError(`Backup source is not configured: ${request.source}`, request.source);
    }

    const fileName = artifactFileName(request.scope);
    const inspection = await this.catalog.inspect(backend, request.folderId);
    const artifact = inspection.artifacts.find(entry => entry.fileName === fileName);
    if (!artifact) {
      throw new InvalidSelectionError(`${fileName} not found in ${request.folderId}`, fileName);
    }

    return {
      request,
      fileName,
      size: artifact.size,
      consequences: scopeConsequences(request.scope),
      target: this.target,
    };
  }

  private describeEntry(entry: CatalogEntry): string {
    const age = entry.ageMs === null ? 'age unknown' : `${formatAge(entry.ageMs)} ago`;
    if (!entry.inspection) {
      return `${entry.folderId} - ${age}`;
    }
    const { totalSize, completeness } = entry.inspection;
    return `${entry.folderId} - ${formatBytes(totalSize)} - ${age} [${completeness}]`;
  }
}

function describeChoice(choice: ScopeChoice): string {
  switch (choice.kind) {
    case 'restore':
      return describeScope(choice.scope);
    case 'dry-run':
      return 'Dry Run (show what would be restored)';
    case 'cancel':
      return 'Cancel';
  }
}

/**
 * Parse a 1-based menu answer; 0 is accepted only when it means cancel
 */
function parseSelection(answer: string, max: number, allowZero: boolean): number {
  const trimmed = answer.trim();
  const selection = /^\d+$/.test(trimmed) ? parseInt(trimmed, 10) : NaN;
  const min = allowZero ? 0 : 1;

  if (isNaN(selection) || selection < min || selection > max) {
    throw new InvalidSelectionError(`Invalid selection: ${trimmed || '(empty)'}`, answer);
  }
  return selection;
}
