/**
 * Connection settings for the target PostgreSQL server
 */
export interface PostgresConnectionConfig {
  host: string;
  port: number;
  user: string;
  password?: string;
}

export type DestinationKind = 'local' | 's3' | 'remote';

export interface LocalDestinationConfig {
  kind: 'local';
  rootDir: string;
  retentionDays: number;
}

export interface S3DestinationConfig {
  kind: 's3';
  bucket: string;
  region: string;
  endpoint: string;
  accessKey: string;
  secretKey: string;
  prefix: string;
  retentionDays: number;
}

export interface RemoteSyncDestinationConfig {
  kind: 'remote';
  host: string;
  port: number;
  user: string;
  remotePath: string;
  sshKeyPath?: string;
  retentionDays: number;
}

/**
 * A destination that was enabled but could not be configured
 */
export interface DisabledDestination {
  kind: Exclude<DestinationKind, 'local'>;
  missing: string[];
}

/**
 * Raw restore selectors as supplied by the operator, validated by the restore selector
 */
export interface RestoreParameters {
  source?: string;
  folder?: string;
  type?: string;
  database?: string;
}

export interface BackupConfig {
  postgres: PostgresConnectionConfig;
  backupSchedule: string; // cron format
  scheduleTimezone?: string;
  backupOnStart: boolean;
  backupDir: string;
  restoreDir: string;
  local: LocalDestinationConfig;
  s3?: S3DestinationConfig;
  remote?: RemoteSyncDestinationConfig;
  disabledDestinations: DisabledDestination[];
  restore: RestoreParameters;
  logLevel: string;
}
