import { ConfigurationManager, ConfigurationError } from './config/ConfigurationManager';
import { Logger } from './clients/Logger';
import { createComponents } from './components';
import { BackupCatalog } from './restore/BackupCatalog';
import { IntegrityVerifier } from './restore/IntegrityVerifier';
import { ReadlinePrompter } from './restore/ReadlinePrompter';
import { RestoreExecutor } from './restore/RestoreExecutor';
import { RestoreSelector } from './restore/RestoreSelector';
import { RestoreTool, promptConfirm } from './restore/RestoreTool';
import { BackupConfig } from './interfaces/BackupConfig';
import { Prompter } from './interfaces/Prompter';

/**
 * Assemble the restore tool from configuration
 */
export function createRestoreTool(config: BackupConfig, logger: Logger, prompter: Prompter): RestoreTool {
  const { postgresClient, backends } = createComponents(config, logger);
  const catalog = new BackupCatalog(logger);

  return new RestoreTool({
    config,
    backends,
    catalog,
    selector: new RestoreSelector(prompter, catalog, backends, postgresClient.getTarget()),
    executor: new RestoreExecutor({
      backends,
      postgresClient,
      verifier: new IntegrityVerifier(logger),
      logger,
      restoreDir: config.restoreDir,
      confirm: promptConfirm(prompter),
    }),
    postgresClient,
    prompter,
    logger,
  });
}

async function main(): Promise<number> {
  let config: BackupConfig;
  try {
    config = ConfigurationManager.loadConfiguration();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      new Logger().error('Configuration error', error);
      return 1;
    }
    throw error;
  }

  const logger = Logger.createFromLevel(config.logLevel);
  const prompter = new ReadlinePrompter();
  try {
    return await createRestoreTool(config, logger, prompter).run();
  } finally {
    prompter.close();
  }
}

if (require.main === module) {
  main().then(
    code => {
      process.exitCode = code;
    },
    error => {
      console.error('Fatal error in restore tool:', error);
      process.exitCode = 1;
    }
  );
}
