/**
 * One object under a backup prefix
 */
export interface S3Object {
  key: string;
  size: number;
  /** LastModified from the listing, epoch when the store omits it */
  lastModified: Date;
}

/**
 * Object store operations used by the S3 destination.
 * Keys are full object keys including the configured prefix.
 */
export interface S3Client {
  /** Upload one file, returning its s3:// location */
  uploadFile(filePath: string, key: string): Promise<string>;
  downloadFile(key: string, filePath: string): Promise<void>;

  /** Every object below a prefix, across all listing pages */
  listObjects(prefix: string): Promise<S3Object[]>;

  /** Common prefixes one level below a prefix, as full keys ending in '/' */
  listPrefixes(prefix: string): Promise<string[]>;

  deleteObject(key: string): Promise<void>;

  /** HeadBucket; false on any failure */
  testConnection(): Promise<boolean>;
}
