import { BackupConfig } from './interfaces/BackupConfig';
import { Logger } from './interfaces/Logger';
import { PostgreSQLClient } from './clients/PostgreSQLClient';
import { S3Client } from './clients/S3Client';
import { RemoteSyncClient } from './clients/RemoteSyncClient';
import { StorageBackends, createStorageBackends } from './storage';

export interface Components {
  postgresClient: PostgreSQLClient;
  backends: StorageBackends;
}

/**
 * Wire the clients and storage backends shared by the daemon and the restore tool
 */
export function createComponents(config: BackupConfig, logger: Logger): Components {
  const postgresClient = new PostgreSQLClient(config.postgres, logger);
  const backends = createStorageBackends(
    config,
    {
      s3: config.s3 && new S3Client(config.s3, logger),
      remote: config.remote && new RemoteSyncClient(config.remote, logger),
    },
    logger
  );

  for (const disabled of config.disabledDestinations) {
    logger.warn(`Destination ${disabled.kind} disabled: missing ${disabled.missing.join(', ')}`);
  }

  return { postgresClient, backends };
}
