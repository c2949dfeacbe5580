import winston from 'winston';
import { Logger as ILogger, LogLevel, LogMeta } from '../interfaces/Logger';

const SENSITIVE_KEYS = ['password', 'secret', 'key', 'token', 'credential'];

function isPlainObject(value: unknown): value is LogMeta {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Recursively replace values stored under sensitive keys
 */
export function sanitizeMeta(meta: LogMeta): LogMeta {
  const sanitized: LogMeta = {};

  for (const [key, value] of Object.entries(meta)) {
    const lowerKey = key.toLowerCase();
    const isSensitive = SENSITIVE_KEYS.some(sensitive => lowerKey.includes(sensitive));

    if (isSensitive) {
      sanitized[key] = '[REDACTED]';
    } else if (isPlainObject(value)) {
      sanitized[key] = sanitizeMeta(value);
    } else {
      sanitized[key] = value;
    }
  }

  return sanitized;
}

export class Logger implements ILogger {
  private winston: winston.Logger;

  constructor(logLevel: LogLevel = LogLevel.INFO) {
    this.winston = winston.createLogger({
      level: logLevel,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.printf(info => {
          const { timestamp, level, message, stack, ...meta } = info;
          const logEntry: LogMeta = {
            timestamp,
            level,
            message,
          };

          if (stack) {
            logEntry['stack'] = stack;
          }

          if (Object.keys(meta).length > 0) {
            logEntry['meta'] = sanitizeMeta(meta);
          }

          return JSON.stringify(logEntry);
        })
      ),
      transports: [new winston.transports.Console()],
    });
  }

  info(message: string, meta?: LogMeta): void {
    this.winston.info(message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.winston.warn(message, meta);
  }

  error(message: string, error?: Error, meta?: LogMeta): void {
    const errorMeta: LogMeta = {
      ...meta,
      ...(error && {
        error: {
          name: error.name,
          message: error.message,
          stack: error.stack,
          ...this.systemErrorFields(error),
        },
      }),
    };
    this.winston.error(message, errorMeta);
  }

  debug(message: string, meta?: LogMeta): void {
    this.winston.debug(message, meta);
  }

  logCycleStart(operationId: string, folderId: string): void {
    this.info('Backup cycle started', {
      operation: 'cycle_start',
      operationId,
      folderId,
    });
  }

  logCycleComplete(operationId: string, folderId: string, status: string, duration: number): void {
    const meta = {
      operation: 'cycle_complete',
      operationId,
      folderId,
      status,
      duration,
    };

    if (status === 'success') {
      this.info('Backup cycle completed successfully', meta);
    } else {
      this.warn('Backup cycle completed with failures', meta);
    }
  }

  logArtifactError(fileName: string, error: Error, meta?: LogMeta): void {
    this.error(`Dump failed: ${fileName}`, error, {
      operation: 'artifact_error',
      fileName,
      ...meta,
    });
  }

  logRetentionCleanup(destination: string, deletedCount: number, retentionDays: number): void {
    this.info('Retention cleanup completed', {
      operation: 'retention_cleanup',
      destination,
      deletedCount,
      retentionDays,
    });
  }

  logConfigurationStart(config: LogMeta): void {
    this.info('Application starting with configuration', {
      operation: 'startup',
      config: sanitizeMeta(config),
    });
  }

  logScheduledExecution(cronExpression: string): void {
    this.info('Scheduled backup execution triggered', {
      operation: 'scheduled_execution',
      cronExpression,
    });
  }

  logRestoreState(operationId: string, state: string, meta?: LogMeta): void {
    this.info(`Restore reached state: ${state}`, {
      operation: 'restore_state',
      operationId,
      state,
      ...meta,
    });
  }

  private systemErrorFields(error: Error): LogMeta {
    const ownFields: LogMeta = { ...error };
    const fields: LogMeta = {};
    for (const field of ['code', 'errno', 'syscall', 'path']) {
      if (ownFields[field] !== undefined) {
        fields[field] = ownFields[field];
      }
    }
    return fields;
  }

  /**
   * Create a logger for a level name, falling back to INFO for unknown names
   */
  static createFromLevel(level: string | undefined): Logger {
    const logLevel = Object.values(LogLevel).find(value => value === level?.toLowerCase());

    if (!logLevel) {
      if (level) {
        console.warn(`Invalid LOG_LEVEL: ${level}. Using INFO level.`);
      }
      return new Logger(LogLevel.INFO);
    }

    return new Logger(logLevel);
  }
}
