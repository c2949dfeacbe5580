import { promises as fs } from 'fs';
import { join } from 'path';
import { v4 as uuidv4 } from 'uuid';
import {
  ConfirmFn,
  PostRestoreReport,
  ProposedAction,
  RestoreMode,
  RestoreOutcome,
  RestoreRequest,
  RestoreScope,
  RestoreState,
} from '../interfaces/RestoreExecutor';
import { FolderIntegrityReport } from '../interfaces/IntegrityVerifier';
import { PostgreSQLClient } from '../interfaces/PostgreSQLClient';
import { Logger, LogMeta } from '../interfaces/Logger';
import { ConnectionError } from '../clients/PostgreSQLClient';
import { StorageBackends, backendFor } from '../storage';
import { artifactFileName } from '../utils/ArtifactNaming';
import { formatError, toError } from '../utils/errors';
import { IntegrityError, IntegrityVerifier } from './IntegrityVerifier';
import { scopeConsequences } from './scopes';

export interface RestoreExecutorOptions {
  backends: StorageBackends;
  postgresClient: PostgreSQLClient;
  verifier: IntegrityVerifier;
  logger: Logger;

  /** Staging root for folders fetched from remote destinations; a copy is removed once applied */
  restoreDir: string;

  /** Asked before anything destructive happens in interactive mode */
  confirm: ConfirmFn;
}

/**
 * Carries one restore request through
 * requested, resolved, verified, confirmed, applied and post-verified.
 * Stops at the first failure and reports it in the outcome.
 */
export class RestoreExecutor {
  private backends: StorageBackends;
  private postgresClient: PostgreSQLClient;
  private verifier: IntegrityVerifier;
  private logger: Logger;
  private restoreDir: string;
  private confirm: ConfirmFn;

  constructor(options: RestoreExecutorOptions) {
    this.backends = options.backends;
    this.postgresClient = options.postgresClient;
    this.verifier = options.verifier;
    this.logger = options.logger;
    this.restoreDir = options.restoreDir;
    this.confirm = options.confirm;
  }

  async execute(request: RestoreRequest, mode: RestoreMode): Promise<RestoreOutcome> {
    const outcome: RestoreOutcome = {
      operationId: uuidv4(),
      request,
      status: 'failed',
      states: [],
    };
    this.reach(outcome, 'requested', { mode, source: request.source, folderId: request.folderId });

    // resolved
    const backend = backendFor(this.backends, request.source);
    if (!backend) {
      return this.fail(outcome, 'resolved', new Error(`Backup source is not configured: ${request.source}`));
    }

    let folderPath: string;
    try {
      folderPath = await backend.fetchFolder(request.folderId, this.restoreDir);
    } catch (error) {
      return this.fail(outcome, 'resolved', error);
    }

    const fileName = artifactFileName(request.scope);
    const artifactPath = join(folderPath, fileName);
    const artifactExists = await fs.stat(artifactPath).then(
      stats => stats.isFile(),
      () => false
    );
    if (!artifactExists) {
      return this.fail(outcome, 'resolved', new Error(`${fileName} not found in ${request.folderId}`));
    }
    this.reach(outcome, 'resolved', { folderPath });

    // verified
    let integrity: FolderIntegrityReport;
    try {
      integrity = await this.verifier.verifyFolder(folderPath);
    } catch (error) {
      return this.fail(outcome, 'verified', error);
    }
    outcome.integrity = integrity;

    if (!integrity.ok) {
      const integrityError = new IntegrityError(
        integrity.files.length === 0
          ? `No artifacts found in ${request.folderId}`
          : `Corrupted artifacts: ${integrity.corrupted.join(', ')}`,
        integrity.corrupted
      );

      if (mode === 'automated' || integrity.files.length === 0) {
        return this.fail(outcome, 'verified', integrityError);
      }

      const proceed = await this.ask(outcome, 'verified', {
        kind: 'ignore-integrity-failure',
        folderId: request.folderId,
        corrupted: integrity.corrupted,
      });
      if (proceed === null) {
        return outcome;
      }
      if (!proceed) {
        return this.cancel(outcome, 'verified');
      }
      this.logger.warn('Continuing despite integrity failure', {
        operationId: outcome.operationId,
        corrupted: integrity.corrupted,
      });
    }
    this.reach(outcome, 'verified');

    // The target must answer before anyone is asked to confirm
    const target = this.postgresClient.getTarget();
    if (!(await this.postgresClient.testConnection())) {
      return this.fail(outcome, 'confirmed', new ConnectionError(`Cannot connect to PostgreSQL at ${target}`));
    }

    // confirmed
    if (mode === 'interactive') {
      const confirmed = await this.ask(outcome, 'confirmed', {
        kind: 'restore',
        request,
        fileName,
        consequences: scopeConsequences(request.scope),
        target,
      });
      if (confirmed === null) {
        return outcome;
      }
      if (!confirmed) {
        return this.cancel(outcome, 'confirmed');
      }
    }
    this.reach(outcome, 'confirmed');

    // applied
    try {
      await this.postgresClient.restoreDump(artifactPath, request.scope);
    } catch (error) {
      return this.fail(outcome, 'applied', error);
    }
    this.reach(outcome, 'applied', { fileName, target });

    if (backend.kind !== 'local') {
      await this.removeStagedFolder(folderPath, outcome.operationId);
    }

    // post-verified
    try {
      outcome.verification = await this.postVerify(request.scope);
      this.reach(outcome, 'post-verified');
    } catch (error) {
      this.logger.warn('Post-restore verification failed', {
        operationId: outcome.operationId,
        error: formatError(error),
      });
    }

    outcome.status = 'succeeded';
    return outcome;
  }

  private async postVerify(scope: RestoreScope): Promise<PostRestoreReport> {
    switch (scope.type) {
      case 'cluster':
        return {
          databases: await this.postgresClient.listDatabases(),
          roles: await this.postgresClient.listRoles(),
        };
      case 'globals':
        return { roles: await this.postgresClient.listRoles() };
      case 'database': {
        const tables = await this.postgresClient.listTables(scope.name);
        return { tables: tables.map(table => `${table.schema}.${table.name}`) };
      }
    }
  }

  /**
   * Drop a fetched copy once it has been applied; failed restores keep theirs for inspection
   */
  private async removeStagedFolder(folderPath: string, operationId: string): Promise<void> {
    try {
      await fs.rm(folderPath, { recursive: true, force: true });
      this.logger.debug('Removed staged backup folder', { operationId, folderPath });
    } catch (error) {
      this.logger.warn('Failed to remove staged backup folder', {
        operationId,
        folderPath,
        error: formatError(error),
      });
    }
  }

  /**
   * Put an action to the operator; null means asking failed and the outcome is already failed
   */
  private async ask(outcome: RestoreOutcome, state: RestoreState, action: ProposedAction): Promise<boolean | null> {
    try {
      return await this.confirm(action);
    } catch (error) {
      this.fail(outcome, state, error);
      return null;
    }
  }

  private reach(outcome: RestoreOutcome, state: RestoreState, meta?: LogMeta): void {
    outcome.states.push(state);
    this.logger.logRestoreState(outcome.operationId, state, meta);
  }

  private fail(outcome: RestoreOutcome, state: RestoreState, error: unknown): RestoreOutcome {
    outcome.status = 'failed';
    outcome.failedState = state;
    outcome.error = formatError(error);
    this.logger.error(`Restore failed before reaching ${state}`, toError(error), {
      operationId: outcome.operationId,
      request: outcome.request,
    });
    return outcome;
  }

  private cancel(outcome: RestoreOutcome, state: RestoreState): RestoreOutcome {
    outcome.status = 'cancelled';
    outcome.failedState = state;
    this.logger.info('Restore cancelled by operator', { operationId: outcome.operationId, state });
    return outcome;
  }
}
