import { DestinationKind } from '../interfaces/BackupConfig';

/**
 * Custom error classes for storage backend operations
 */
export class StorageError extends Error {
  constructor(
    message: string,
    public readonly destination: DestinationKind,
    public readonly operation: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'StorageError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * A folder could not be moved to or from a destination
 */
export class TransferError extends StorageError {
  constructor(message: string, destination: DestinationKind, operation: string, cause?: Error) {
    super(message, destination, operation, cause);
    this.name = 'TransferError';
  }
}
