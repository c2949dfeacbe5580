import { ConfigurationManager, ConfigurationError } from './config/ConfigurationManager';
import { Logger } from './clients/Logger';
import { BackupManager } from './clients/BackupManager';
import { CronScheduler } from './clients/CronScheduler';
import { RetentionManager } from './clients/RetentionManager';
import { createComponents } from './components';
import { listBackends } from './storage';
import { BackupConfig } from './interfaces/BackupConfig';
import { formatError, toError } from './utils/errors';

type Environment = Record<string, string | undefined>;

/**
 * Backup daemon: loads configuration, validates the database connection and
 * runs backup cycles on the configured schedule
 */
class BackupApplication {
  private env: Environment;
  private logger: Logger;
  private config: BackupConfig | null = null;
  private cronScheduler: CronScheduler | null = null;
  private isShuttingDown = false;

  constructor(env: Environment = process.env) {
    this.env = env;
    // Replaced once the configured level is known
    this.logger = new Logger();
  }

  /**
   * Initialize the application with configuration and component setup
   */
  async initialize(): Promise<void> {
    try {
      this.logger.info('PostgreSQL backup service starting...');

      const config = ConfigurationManager.loadConfiguration(this.env);
      this.config = config;
      this.logger = Logger.createFromLevel(config.logLevel);
      this.logger.logConfigurationStart(ConfigurationManager.sanitizeForLogging(config));

      const { postgresClient, backends } = createComponents(config, this.logger);
      const backupManager = new BackupManager(postgresClient, new RetentionManager(this.logger), this.logger, {
        backupDir: config.backupDir,
        destinations: listBackends(backends),
      });

      this.logger.info('Validating configuration and testing connections...');
      const isValid = await backupManager.validateConfiguration();
      if (!isValid) {
        throw new Error('Configuration validation failed');
      }

      this.cronScheduler = new CronScheduler(
        {
          cronExpression: config.backupSchedule,
          timezone: config.scheduleTimezone,
          runOnInit: config.backupOnStart,
        },
        backupManager,
        this.logger
      );

      this.logger.info('Application initialized successfully');
    } catch (error) {
      if (error instanceof ConfigurationError) {
        this.logger.error('Configuration error', error);
        process.exit(1);
      } else {
        this.logger.error('Failed to initialize application', toError(error));
        process.exit(2);
      }
    }
  }

  /**
   * Start the application and begin scheduled backups
   */
  async start(): Promise<void> {
    try {
      if (!this.cronScheduler || !this.config) {
        throw new Error('Application not initialized. Call initialize() first.');
      }

      this.logger.info(`Starting backup scheduler with schedule: ${this.config.backupSchedule}`);
      this.cronScheduler.start();
      this.logger.info('PostgreSQL backup service started successfully');
    } catch (error) {
      this.logger.error('Failed to start application', toError(error));
      process.exit(3);
    }
  }

  async shutdown(): Promise<void> {
    if (this.isShuttingDown) {
      this.logger.warn('Shutdown already in progress');
      return;
    }

    this.isShuttingDown = true;
    this.logger.info('Initiating graceful shutdown...');

    if (this.cronScheduler && this.cronScheduler.isRunning()) {
      this.cronScheduler.stop();
    }

    if (this.cronScheduler?.isBackupInProgress()) {
      this.logger.warn('A backup cycle is still running; its folder may be incomplete');
    }

    this.logger.info('PostgreSQL backup service shutdown completed');
  }

  setupSignalHandlers(): void {
    const signals = ['SIGTERM', 'SIGINT'] as const;

    signals.forEach(signal => {
      process.on(signal, () => {
        this.logger.info(`Received ${signal}, initiating graceful shutdown...`);
        this.shutdown().then(
          () => process.exit(0),
          error => {
            this.logger.error('Error during shutdown', toError(error));
            process.exit(4);
          }
        );
      });
    });

    process.on('unhandledRejection', reason => {
      this.logger.error('Unhandled promise rejection', new Error(formatError(reason)));
    });
  }
}

/**
 * Main application entry point
 */
async function main(): Promise<void> {
  const app = new BackupApplication();
  app.setupSignalHandlers();

  await app.initialize();
  await app.start();
}

export { BackupApplication, main };

if (require.main === module) {
  main().catch(error => {
    console.error('Fatal error starting application:', error);
    process.exit(3);
  });
}
