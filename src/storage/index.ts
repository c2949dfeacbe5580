import { BackupConfig, DestinationKind } from '../interfaces/BackupConfig';
import { StorageBackend } from '../interfaces/StorageBackend';
import { S3Client } from '../interfaces/S3Client';
import { RemoteSyncClient } from '../interfaces/RemoteSyncClient';
import { Logger } from '../interfaces/Logger';
import { LocalStorageBackend } from './LocalStorageBackend';
import { S3StorageBackend } from './S3StorageBackend';
import { RemoteSyncStorageBackend } from './RemoteSyncStorageBackend';

export { LocalStorageBackend, S3StorageBackend, RemoteSyncStorageBackend };
export { StorageError, TransferError } from './errors';

export interface StorageClients {
  s3?: S3Client;
  remote?: RemoteSyncClient;
}

export interface StorageBackends {
  local: LocalStorageBackend;
  s3?: S3StorageBackend;
  remote?: RemoteSyncStorageBackend;
}

/**
 * Build a backend for every configured destination; the local root always exists
 */
export function createStorageBackends(
  config: BackupConfig,
  clients: StorageClients,
  logger: Logger
): StorageBackends {
  const backends: StorageBackends = {
    local: new LocalStorageBackend(config.local, logger),
  };

  if (config.s3 && clients.s3) {
    backends.s3 = new S3StorageBackend(config.s3, clients.s3, logger);
  }

  if (config.remote && clients.remote) {
    backends.remote = new RemoteSyncStorageBackend(config.remote, clients.remote);
  }

  return backends;
}

/**
 * Backends in replication order: local first, then S3, then remote
 */
export function listBackends(backends: StorageBackends): StorageBackend[] {
  const list: StorageBackend[] = [backends.local];
  if (backends.s3) list.push(backends.s3);
  if (backends.remote) list.push(backends.remote);
  return list;
}

export function backendFor(backends: StorageBackends, kind: DestinationKind): StorageBackend | undefined {
  switch (kind) {
    case 'local':
      return backends.local;
    case 's3':
      return backends.s3;
    case 'remote':
      return backends.remote;
  }
}
