export type LogMeta = Record<string, unknown>;

export interface Logger {
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, error?: Error, meta?: LogMeta): void;
  debug(message: string, meta?: LogMeta): void;

  // Specialized logging methods for backup and restore operations
  logCycleStart(operationId: string, folderId: string): void;
  logCycleComplete(operationId: string, folderId: string, status: string, duration: number): void;
  logArtifactError(fileName: string, error: Error, meta?: LogMeta): void;
  logRetentionCleanup(destination: string, deletedCount: number, retentionDays: number): void;
  logConfigurationStart(config: LogMeta): void;
  logScheduledExecution(cronExpression: string): void;
  logRestoreState(operationId: string, state: string, meta?: LogMeta): void;
}

export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
}
