import { BackupConfig, DestinationKind } from '../interfaces/BackupConfig';
import { ConfirmFn, RestoreOutcome, RestoreRequest } from '../interfaces/RestoreExecutor';
import { PostgreSQLClient } from '../interfaces/PostgreSQLClient';
import { Prompter } from '../interfaces/Prompter';
import { Logger } from '../interfaces/Logger';
import { StorageBackends, backendFor, listBackends } from '../storage';
import { formatBytes } from '../utils/format';
import { formatError, toError } from '../utils/errors';
import { BackupCatalog } from './BackupCatalog';
import { RestoreExecutor } from './RestoreExecutor';
import { DryRunReport, InvalidSelectionError, RestoreSelector } from './RestoreSelector';
import { PromptClosedError } from './ReadlinePrompter';
import { describeScope } from './scopes';

const SOURCE_NAMES: Record<DestinationKind, string> = {
  local: 'Local',
  s3: 'S3',
  remote: 'Remote',
};

/**
 * Confirmation that only goes ahead on a literal "yes"
 */
export function promptConfirm(prompter: Prompter): ConfirmFn {
  return async action => {
    prompter.write('');
    switch (action.kind) {
      case 'restore':
        prompter.write(`WARNING: ${describeScope(action.request.scope)}`);
        prompter.write(`Backup: ${action.request.folderId}/${action.fileName}`);
        prompter.write(`Target: ${action.target}`);
        for (const consequence of action.consequences) {
          prompter.write(`  - ${consequence}`);
        }
        break;
      case 'ignore-integrity-failure':
        prompter.write(`Backup integrity check failed for ${action.folderId}`);
        for (const fileName of action.corrupted) {
          prompter.write(`  - corrupted: ${fileName}`);
        }
        break;
    }

    const question =
      action.kind === 'restore' ? "Type 'yes' to proceed: " : 'Continue anyway? (yes/no): ';
    const answer = await prompter.ask(question);
    return answer.trim() === 'yes';
  };
}

export interface RestoreToolOptions {
  config: BackupConfig;
  backends: StorageBackends;
  catalog: BackupCatalog;
  selector: RestoreSelector;
  executor: RestoreExecutor;
  postgresClient: PostgreSQLClient;
  prompter: Prompter;
  logger: Logger;
}

/**
 * Restore front end: parameter-driven when RESTORE_* is complete, a menu otherwise
 */
export class RestoreTool {
  private config: BackupConfig;
  private backends: StorageBackends;
  private catalog: BackupCatalog;
  private selector: RestoreSelector;
  private executor: RestoreExecutor;
  private postgresClient: PostgreSQLClient;
  private prompter: Prompter;
  private logger: Logger;

  constructor(options: RestoreToolOptions) {
    this.config = options.config;
    this.backends = options.backends;
    this.catalog = options.catalog;
    this.selector = options.selector;
    this.executor = options.executor;
    this.postgresClient = options.postgresClient;
    this.prompter = options.prompter;
    this.logger = options.logger;
  }

  /**
   * Resolves to the process exit code
   */
  async run(): Promise<number> {
    let request: RestoreRequest | null;
    try {
      request = RestoreSelector.resolveParameters(this.config.restore);
    } catch (error) {
      this.logger.error('Invalid restore parameters', toError(error));
      return 1;
    }

    return request ? this.runAutomated(request) : this.runInteractive();
  }

  async runAutomated(request: RestoreRequest): Promise<number> {
    this.logger.info('Running in non-interactive mode', {
      source: request.source,
      folderId: request.folderId,
      scope: describeScope(request.scope),
    });

    const outcome = await this.executor.execute(request, 'automated');
    this.printOutcome(outcome);
    return outcome.status === 'succeeded' ? 0 : 1;
  }

  async runInteractive(): Promise<number> {
    this.prompter.write('PostgreSQL Restore Tool');

    for (;;) {
      this.showMenu();

      let option: string;
      try {
        option = (await this.prompter.ask('Select option: ')).trim();
      } catch (error) {
        if (error instanceof PromptClosedError) {
          return 0;
        }
        throw error;
      }

      try {
        switch (option) {
          case '1':
            await this.processRestore('local');
            break;
          case '2':
            await this.processRestore('s3');
            break;
          case '3':
            await this.processRestore('remote');
            break;
          case '4':
            await this.showAllSources();
            break;
          case '5':
            await this.testConnection();
            break;
          case '6':
            this.prompter.write('Goodbye!');
            return 0;
          default:
            this.prompter.write(`Invalid option: ${option}`);
        }
      } catch (error) {
        if (error instanceof PromptClosedError) {
          return 0;
        }
        if (error instanceof InvalidSelectionError) {
          this.prompter.write(error.message);
        } else {
          this.logger.error('Restore menu action failed', toError(error));
          this.prompter.write(`Error: ${formatError(error)}`);
        }
      }
    }
  }

  async processRestore(kind: DestinationKind): Promise<void> {
    const backend = backendFor(this.backends, kind);
    if (!backend) {
      this.prompter.write(this.notConfiguredNotice(kind));
      return;
    }

    const folderId = await this.selector.selectFolder(backend);
    if (!folderId) {
      this.prompter.write('Cancelled');
      return;
    }
    this.prompter.write(`Selected backup: ${folderId}`);

    const choice = await this.selector.selectScope(backend, folderId);
    switch (choice.kind) {
      case 'cancel':
        this.prompter.write('Cancelled');
        return;
      case 'dry-run': {
        const scope = await this.selector.selectDryRunScope(backend, folderId);
        if (!scope) {
          this.prompter.write('Cancelled');
          return;
        }
        this.printDryRun(await this.selector.dryRun({ source: kind, folderId, scope }));
        return;
      }
      case 'restore': {
        const outcome = await this.executor.execute({ source: kind, folderId, scope: choice.scope }, 'interactive');
        this.printOutcome(outcome);
        return;
      }
    }
  }

  async showAllSources(): Promise<void> {
    this.prompter.write('');
    this.prompter.write('Backup sources:');

    const statuses = await this.catalog.describeAllSources(listBackends(this.backends));
    for (const status of statuses) {
      const name = SOURCE_NAMES[status.kind];
      if (!status.reachable) {
        this.prompter.write(`${name}: ${status.label} - unreachable${status.error ? ` (${status.error})` : ''}`);
        continue;
      }
      const latest = status.latestFolder ? `, latest ${status.latestFolder}` : '';
      this.prompter.write(`${name}: ${status.label} - ${status.folderCount} backups${latest}`);
    }

    for (const kind of ['s3', 'remote'] as const) {
      if (!backendFor(this.backends, kind)) {
        this.prompter.write(this.notConfiguredNotice(kind));
      }
    }
  }

  async testConnection(): Promise<void> {
    const target = this.postgresClient.getTarget();
    const connected = await this.postgresClient.testConnection();
    this.prompter.write(
      connected ? `PostgreSQL connection OK (${target})` : `Cannot connect to PostgreSQL at ${target}`
    );
  }

  private showMenu(): void {
    this.prompter.write('');
    this.prompter.write('Main Menu:');
    this.prompter.write('----------');
    this.prompter.write('1. List and restore from Local backups');
    this.prompter.write('2. List and restore from S3 backups');
    this.prompter.write('3. List and restore from Remote backups');
    this.prompter.write('4. Show all backup sources');
    this.prompter.write('5. Test PostgreSQL connection');
    this.prompter.write('6. Exit');
    this.prompter.write('');
  }

  private notConfiguredNotice(kind: DestinationKind): string {
    const disabled = this.config.disabledDestinations.find(destination => destination.kind === kind);
    if (disabled) {
      return `${SOURCE_NAMES[kind]}: disabled, missing ${disabled.missing.join(', ')}`;
    }
    return `${SOURCE_NAMES[kind]}: not configured`;
  }

  private printDryRun(report: DryRunReport): void {
    this.prompter.write('');
    this.prompter.write('DRY RUN - No Changes Will Be Made');
    this.prompter.write(`Backup folder: ${report.request.folderId}`);
    this.prompter.write(`Restore type: ${describeScope(report.request.scope)}`);
    this.prompter.write(`Would restore ${report.fileName} (${formatBytes(report.size)}) into ${report.target}`);
    for (const consequence of report.consequences) {
      this.prompter.write(`  - ${consequence}`);
    }
  }

  private printOutcome(outcome: RestoreOutcome): void {
    this.prompter.write('');
    switch (outcome.status) {
      case 'succeeded': {
        this.prompter.write('Restore completed successfully');
        const verification = outcome.verification;
        if (verification?.databases) {
          this.prompter.write(`Databases: ${verification.databases.join(', ')}`);
        }
        if (verification?.roles) {
          this.prompter.write(`Roles: ${verification.roles.join(', ')}`);
        }
        if (verification?.tables) {
          this.prompter.write(`Tables: ${verification.tables.join(', ') || '(none)'}`);
        }
        break;
      }
      case 'cancelled':
        this.prompter.write('Restore cancelled');
        break;
      case 'failed':
        this.prompter.write(`Restore failed (${outcome.failedState ?? 'unknown'}): ${outcome.error ?? 'unknown error'}`);
        break;
    }
  }
}
