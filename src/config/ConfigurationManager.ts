import * as cron from 'node-cron';
import {
  BackupConfig,
  DisabledDestination,
  LocalDestinationConfig,
  RemoteSyncDestinationConfig,
  S3DestinationConfig,
} from '../interfaces/BackupConfig';
import { LogMeta } from '../interfaces/Logger';

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

type Environment = Record<string, string | undefined>;

const DEFAULTS = {
  pgPort: 5432,
  backupSchedule: '0 2 * * *',
  backupDir: '/backups',
  restoreDir: '/restore',
  localRetentionDays: 1,
  s3Region: 'us-east-1',
  s3Prefix: 'postgres-backups',
  s3RetentionDays: 7,
  rsyncPort: 22,
  rsyncRetentionDays: 30,
  logLevel: 'info',
} as const;

/**
 * Builds the explicit configuration value from environment-style key/value pairs.
 * Nothing else in the application reads the environment.
 */
export class ConfigurationManager {
  static loadConfiguration(env: Environment = process.env): BackupConfig {
    const missing = ['PGHOST', 'PGUSER'].filter(name => !this.value(env, name));
    if (missing.length > 0) {
      throw new ConfigurationError(
        `Missing required environment variables: ${missing.join(', ')}`,
        missing[0]
      );
    }

    const backupSchedule = this.value(env, 'BACKUP_SCHEDULE') ?? DEFAULTS.backupSchedule;
    if (!cron.validate(backupSchedule)) {
      throw new ConfigurationError(
        `BACKUP_SCHEDULE must be a valid cron expression: ${backupSchedule}`,
        'BACKUP_SCHEDULE'
      );
    }

    const backupDir = this.value(env, 'BACKUP_DIR') ?? DEFAULTS.backupDir;
    const disabledDestinations: DisabledDestination[] = [];

    const local: LocalDestinationConfig = {
      kind: 'local',
      rootDir: backupDir,
      retentionDays: this.parseDays(env, 'LOCAL_RETENTION_DAYS', DEFAULTS.localRetentionDays),
    };

    const config: BackupConfig = {
      postgres: {
        host: this.required(env, 'PGHOST'),
        port: this.parsePort(env, 'PGPORT', DEFAULTS.pgPort),
        user: this.required(env, 'PGUSER'),
        password: this.value(env, 'PGPASSWORD'),
      },
      backupSchedule,
      scheduleTimezone: this.value(env, 'BACKUP_TIMEZONE'),
      backupOnStart: this.parseBoolean(env, 'BACKUP_ON_START', true),
      backupDir,
      restoreDir: this.value(env, 'RESTORE_DIR') ?? DEFAULTS.restoreDir,
      local,
      disabledDestinations,
      restore: {
        source: this.value(env, 'RESTORE_SOURCE'),
        folder: this.value(env, 'RESTORE_FOLDER'),
        type: this.value(env, 'RESTORE_TYPE'),
        database: this.value(env, 'RESTORE_DATABASE'),
      },
      logLevel: this.value(env, 'LOG_LEVEL') ?? DEFAULTS.logLevel,
    };

    if (this.parseBoolean(env, 'S3_ENABLED', false)) {
      const s3Missing = ['S3_BUCKET', 'S3_ACCESS_KEY', 'S3_SECRET_KEY', 'S3_ENDPOINT'].filter(
        name => !this.value(env, name)
      );
      if (s3Missing.length > 0) {
        disabledDestinations.push({ kind: 's3', missing: s3Missing });
      } else {
        config.s3 = this.loadS3Destination(env);
      }
    }

    if (this.parseBoolean(env, 'RSYNC_ENABLED', false)) {
      const rsyncMissing = ['RSYNC_HOST', 'RSYNC_USER', 'RSYNC_PATH'].filter(
        name => !this.value(env, name)
      );
      if (rsyncMissing.length > 0) {
        disabledDestinations.push({ kind: 'remote', missing: rsyncMissing });
      } else {
        config.remote = this.loadRemoteDestination(env);
      }
    }

    return config;
  }

  /**
   * Configuration with credentials removed, for the startup log
   */
  static sanitizeForLogging(config: BackupConfig): LogMeta {
    return {
      postgres: {
        host: config.postgres.host,
        port: config.postgres.port,
        user: config.postgres.user,
        password: config.postgres.password ? '[REDACTED]' : undefined,
      },
      backupSchedule: config.backupSchedule,
      scheduleTimezone: config.scheduleTimezone,
      backupOnStart: config.backupOnStart,
      backupDir: config.backupDir,
      restoreDir: config.restoreDir,
      localRetentionDays: config.local.retentionDays,
      s3: config.s3 && {
        bucket: config.s3.bucket,
        region: config.s3.region,
        endpoint: config.s3.endpoint,
        prefix: config.s3.prefix,
        retentionDays: config.s3.retentionDays,
      },
      remote: config.remote && {
        host: config.remote.host,
        port: config.remote.port,
        user: config.remote.user,
        remotePath: config.remote.remotePath,
        retentionDays: config.remote.retentionDays,
      },
      disabledDestinations: config.disabledDestinations,
      logLevel: config.logLevel,
    };
  }

  private static loadS3Destination(env: Environment): S3DestinationConfig {
    const prefix = (this.value(env, 'S3_PREFIX') ?? DEFAULTS.s3Prefix)
      .replace(/^\/+/, '')
      .replace(/\/+$/, '');

    return {
      kind: 's3',
      bucket: this.required(env, 'S3_BUCKET'),
      region: this.value(env, 'S3_REGION') ?? DEFAULTS.s3Region,
      endpoint: this.required(env, 'S3_ENDPOINT'),
      accessKey: this.required(env, 'S3_ACCESS_KEY'),
      secretKey: this.required(env, 'S3_SECRET_KEY'),
      prefix,
      retentionDays: this.parseDays(env, 'S3_RETENTION_DAYS', DEFAULTS.s3RetentionDays),
    };
  }

  private static loadRemoteDestination(env: Environment): RemoteSyncDestinationConfig {
    const remote: RemoteSyncDestinationConfig = {
      kind: 'remote',
      host: this.required(env, 'RSYNC_HOST'),
      port: this.parsePort(env, 'RSYNC_PORT', DEFAULTS.rsyncPort),
      user: this.required(env, 'RSYNC_USER'),
      remotePath: this.required(env, 'RSYNC_PATH').replace(/(.)\/+$/, '$1'),
      retentionDays: this.parseDays(env, 'RSYNC_RETENTION_DAYS', DEFAULTS.rsyncRetentionDays),
    };

    const sshKeyPath = this.value(env, 'RSYNC_SSH_KEY');
    if (sshKeyPath) {
      remote.sshKeyPath = sshKeyPath;
    }

    return remote;
  }

  private static value(env: Environment, name: string): string | undefined {
    const raw = env[name]?.trim();
    return raw ? raw : undefined;
  }

  private static required(env: Environment, name: string): string {
    const raw = this.value(env, name);
    if (raw === undefined) {
      throw new ConfigurationError(`Missing required environment variable: ${name}`, name);
    }
    return raw;
  }

  private static parseBoolean(env: Environment, name: string, fallback: boolean): boolean {
    const raw = this.value(env, name);
    if (raw === undefined) {
      return fallback;
    }
    return ['true', '1', 'yes'].includes(raw.toLowerCase());
  }

  private static parseDays(env: Environment, name: string, fallback: number): number {
    const raw = this.value(env, name);
    if (raw === undefined) {
      return fallback;
    }

    if (!/^\d+$/.test(raw)) {
      throw new ConfigurationError(`${name} must be a non-negative integer`, name);
    }
    return parseInt(raw, 10);
  }

  private static parsePort(env: Environment, name: string, fallback: number): number {
    const raw = this.value(env, name);
    if (raw === undefined) {
      return fallback;
    }

    const port = /^\d+$/.test(raw) ? parseInt(raw, 10) : NaN;
    if (isNaN(port) || port < 1 || port > 65535) {
      throw new ConfigurationError(`${name} must be a valid port number`, name);
    }
    return port;
  }
}
