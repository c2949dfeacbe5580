import { BackupCycleResult } from './BackupManager';

/**
 * Drives backup cycles from a cron schedule, one cycle at a time
 */
export interface CronScheduler {
  start(): void;
  stop(): void;
  isRunning(): boolean;

  /** True while a cycle started by the scheduler has not settled */
  isBackupInProgress(): boolean;

  /** Run one cycle now; null when skipped because another is in progress */
  runCycle(): Promise<BackupCycleResult | null>;

  validateCronExpression(expression: string): boolean;
}

export interface CronSchedulerConfig {
  /** BACKUP_SCHEDULE, five or six field cron syntax */
  cronExpression: string;

  /** BACKUP_TIMEZONE; node-cron uses the host zone when absent */
  timezone?: string;

  /** BACKUP_ON_START */
  runOnInit?: boolean;
}
