import * as cron from 'node-cron';
import { CronScheduler as ICronScheduler, CronSchedulerConfig } from '../interfaces/CronScheduler';
import { BackupManager, BackupCycleResult } from '../interfaces/BackupManager';
import { Logger } from '../interfaces/Logger';
import { formatError, toError } from '../utils/errors';

/**
 * Custom error classes for cron scheduling operations
 */
export class CronSchedulerError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'CronSchedulerError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

export class CronValidationError extends CronSchedulerError {
  constructor(
    message: string,
    public readonly expression: string
  ) {
    super(message, 'validation');
    this.name = 'CronValidationError';
  }
}

/**
 * CronScheduler implementation using node-cron library.
 * A trigger that fires while a cycle is still running is skipped.
 */
export class CronScheduler implements ICronScheduler {
  private task: cron.ScheduledTask | null = null;
  private config: CronSchedulerConfig;
  private backupManager: BackupManager;
  private logger: Logger;
  private isBackupRunning = false;

  constructor(config: CronSchedulerConfig, backupManager: BackupManager, logger: Logger) {
    this.config = config;
    this.backupManager = backupManager;
    this.logger = logger;
  }

  start(): void {
    if (this.task) {
      this.logger.warn('CronScheduler is already running');
      return;
    }

    if (!this.validateCronExpression(this.config.cronExpression)) {
      throw new CronValidationError(
        `Invalid cron expression: ${this.config.cronExpression}`,
        this.config.cronExpression
      );
    }

    try {
      this.task = cron.schedule(
        this.config.cronExpression,
        () => {
          this.logger.logScheduledExecution(this.config.cronExpression);
          this.runCycle().catch(error => {
            this.logger.error('Unexpected error in scheduled backup execution', toError(error));
          });
        },
        {
          scheduled: false,
          timezone: this.config.timezone,
        }
      );
      this.task.start();
    } catch (error) {
      this.task = null;
      throw new CronSchedulerError(
        `Failed to start cron scheduler: ${formatError(error)}`,
        'start',
        toError(error)
      );
    }

    this.logger.info('CronScheduler started', {
      cronExpression: this.config.cronExpression,
      timezone: this.config.timezone ?? 'host',
    });

    if (this.config.runOnInit) {
      this.logger.info('Running initial backup on start');
      this.runCycle().catch(error => {
        this.logger.error('Initial backup execution failed', toError(error));
      });
    }
  }

  stop(): void {
    if (!this.task) {
      this.logger.warn('CronScheduler is not running');
      return;
    }

    this.task.stop();
    this.task = null;
    this.logger.info('CronScheduler stopped');
  }

  isRunning(): boolean {
    return this.task !== null;
  }

  /**
   * True while a cycle started by this scheduler is in progress
   */
  isBackupInProgress(): boolean {
    return this.isBackupRunning;
  }

  validateCronExpression(expression: string): boolean {
    try {
      return cron.validate(expression);
    } catch (error) {
      this.logger.error('Cron expression validation error', toError(error), { expression });
      return false;
    }
  }

  /**
   * Run one cycle unless another is in progress.
   * Resolves to null when the trigger was skipped or the cycle threw.
   */
  async runCycle(): Promise<BackupCycleResult | null> {
    if (this.isBackupRunning) {
      this.logger.warn('Backup is already running, skipping this execution');
      return null;
    }

    this.isBackupRunning = true;
    try {
      return await this.backupManager.executeBackup();
    } catch (error) {
      this.logger.error('Backup cycle failed', toError(error), {
        cronExpression: this.config.cronExpression,
      });
      return null;
    } finally {
      this.isBackupRunning = false;
    }
  }
}
