import { RestoreScope } from '../interfaces/RestoreExecutor';
import { FolderInspection } from '../interfaces/BackupCatalog';
import { CLUSTER_FILE_NAME, GLOBALS_FILE_NAME } from '../utils/ArtifactNaming';

export function describeScope(scope: RestoreScope): string {
  switch (scope.type) {
    case 'cluster':
      return 'Full Cluster Restore (all databases + roles)';
    case 'globals':
      return 'Globals Only (users/roles/permissions)';
    case 'database':
      return `Database: ${scope.name}`;
  }
}

export function scopeConsequences(scope: RestoreScope): string[] {
  switch (scope.type) {
    case 'cluster':
      return [
        'All databases will be restored',
        'All roles will be restored',
        'Existing data will be overwritten',
      ];
    case 'globals':
      return ['All roles will be restored', 'Permissions will be restored'];
    case 'database':
      return [
        `Database '${scope.name}' will be dropped and recreated`,
        `Existing data in '${scope.name}' will be overwritten`,
      ];
  }
}

/**
 * Scopes the folder can restore, in menu order
 */
export function restorableScopes(inspection: FolderInspection): RestoreScope[] {
  const names = new Set(inspection.artifacts.map(artifact => artifact.fileName));
  const scopes: RestoreScope[] = [];

  if (names.has(CLUSTER_FILE_NAME)) scopes.push({ type: 'cluster' });
  if (names.has(GLOBALS_FILE_NAME)) scopes.push({ type: 'globals' });
  for (const name of inspection.databases) {
    scopes.push({ type: 'database', name });
  }
  return scopes;
}
