import {
  S3Client as AWSS3Client,
  S3ClientConfig,
  PutObjectCommand,
  GetObjectCommand,
  ListObjectsV2Command,
  DeleteObjectCommand,
  HeadBucketCommand,
  PutObjectCommandInput,
  ListObjectsV2CommandInput,
  ListObjectsV2CommandOutput,
  DeleteObjectCommandInput,
} from '@aws-sdk/client-s3';
import { createReadStream, createWriteStream } from 'fs';
import { mkdir, stat } from 'fs/promises';
import { dirname } from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { S3Client as IS3Client, S3Object } from '../interfaces/S3Client';
import { S3DestinationConfig } from '../interfaces/BackupConfig';
import { Logger } from '../interfaces/Logger';
import { toError } from '../utils/errors';

const NON_RETRYABLE_CODES = [
  'InvalidAccessKeyId',
  'SignatureDoesNotMatch',
  'AccessDenied',
  'NoSuchBucket',
  'NoSuchKey',
  'InvalidBucketName',
];

interface ErrorDetails {
  name?: unknown;
  Code?: unknown;
  $metadata?: { httpStatusCode?: number };
}

/**
 * S3Client implementation using AWS SDK v3
 * Provides upload, download, listing and deletion with retry logic
 */
export class S3Client implements IS3Client {
  private client: AWSS3Client;
  private bucket: string;
  private logger: Logger;
  private maxRetries: number = 3;
  private baseDelay: number = 1000; // 1 second

  constructor(config: S3DestinationConfig, logger: Logger) {
    const clientConfig: S3ClientConfig = {
      region: config.region,
      credentials: {
        accessKeyId: config.accessKey,
        secretAccessKey: config.secretKey,
      },
      endpoint: config.endpoint,
      forcePathStyle: true, // Required for MinIO and other S3-compatible services
    };

    this.client = new AWSS3Client(clientConfig);
    this.bucket = config.bucket;
    this.logger = logger;
  }

  /**
   * Upload a file to S3 with retry logic
   */
  async uploadFile(filePath: string, key: string): Promise<string> {
    return this.withRetry(async () => {
      const fileStats = await stat(filePath);
      const fileStream = createReadStream(filePath);

      const uploadParams: PutObjectCommandInput = {
        Bucket: this.bucket,
        Key: key,
        Body: fileStream,
        ContentLength: fileStats.size,
        ContentType: 'application/gzip',
      };

      await this.client.send(new PutObjectCommand(uploadParams));

      return `s3://${this.bucket}/${key}`;
    }, `upload file ${filePath} to ${key}`);
  }

  /**
   * Download an object to a local file, creating parent directories
   */
  async downloadFile(key: string, filePath: string): Promise<void> {
    return this.withRetry(async () => {
      const response = await this.client.send(
        new GetObjectCommand({ Bucket: this.bucket, Key: key })
      );

      const body = response.Body;
      if (!(body instanceof Readable)) {
        throw new Error(`Object ${key} has no readable body`);
      }

      await mkdir(dirname(filePath), { recursive: true });
      await pipeline(body, createWriteStream(filePath));
    }, `download ${key} to ${filePath}`);
  }

  /**
   * List every object under a prefix, following continuation tokens
   */
  async listObjects(prefix: string): Promise<S3Object[]> {
    const objects: S3Object[] = [];

    await this.paginate(prefix, undefined, response => {
      for (const obj of response.Contents ?? []) {
        if (obj.Key) {
          objects.push({
            key: obj.Key,
            lastModified: obj.LastModified ?? new Date(0),
            size: obj.Size ?? 0,
          });
        }
      }
    });

    return objects;
  }

  /**
   * List the common prefixes one level below a prefix (S3 "directories")
   */
  async listPrefixes(prefix: string): Promise<string[]> {
    const prefixes: string[] = [];

    await this.paginate(prefix, '/', response => {
      for (const entry of response.CommonPrefixes ?? []) {
        if (entry.Prefix) {
          prefixes.push(entry.Prefix);
        }
      }
    });

    return prefixes;
  }

  /**
   * Delete an object from S3
   */
  async deleteObject(key: string): Promise<void> {
    return this.withRetry(async () => {
      const deleteParams: DeleteObjectCommandInput = {
        Bucket: this.bucket,
        Key: key,
      };

      await this.client.send(new DeleteObjectCommand(deleteParams));
    }, `delete object ${key}`);
  }

  /**
   * Test S3 connectivity and permissions
   */
  async testConnection(): Promise<boolean> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: this.bucket }));
      return true;
    } catch (error) {
      this.logger.warn('S3 connection test failed', {
        bucket: this.bucket,
        error: toError(error).message,
      });
      return false;
    }
  }

  private async paginate(
    prefix: string,
    delimiter: string | undefined,
    collect: (response: ListObjectsV2CommandOutput) => void
  ): Promise<void> {
    let continuationToken: string | undefined;

    do {
      const listParams: ListObjectsV2CommandInput = {
        Bucket: this.bucket,
        Prefix: prefix,
        Delimiter: delimiter,
        ContinuationToken: continuationToken,
      };

      const response = await this.withRetry(
        () => this.client.send(new ListObjectsV2Command(listParams)),
        `list objects with prefix ${prefix}`
      );

      collect(response);
      continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
    } while (continuationToken);
  }

  /**
   * Execute an operation with exponential backoff retry logic
   */
  private async withRetry<T>(operation: () => Promise<T>, operationName: string): Promise<T> {
    let lastError: Error = new Error(`Failed to ${operationName}`);

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        return await operation();
      } catch (error) {
        lastError = toError(error);

        // Don't retry on certain error types
        if (this.isNonRetryableError(error)) {
          throw lastError;
        }

        if (attempt === this.maxRetries) {
          throw new Error(
            `Failed to ${operationName} after ${this.maxRetries} attempts. Last error: ${lastError.message}`
          );
        }

        // Calculate exponential backoff delay
        const delay = this.baseDelay * Math.pow(2, attempt - 1);
        this.logger.warn(
          `Attempt ${attempt} failed for ${operationName}: ${lastError.message}. Retrying in ${delay}ms...`
        );

        await this.sleep(delay);
      }
    }

    throw lastError;
  }

  /**
   * Check if an error should not be retried
   */
  private isNonRetryableError(error: unknown): boolean {
    if (typeof error !== 'object' || error === null) {
      return false;
    }

    const details: ErrorDetails = error;
    const status = details.$metadata?.httpStatusCode;

    return (
      NON_RETRYABLE_CODES.some(code => code === details.name || code === details.Code) ||
      (status !== undefined && status >= 400 && status < 500)
    );
  }

  /**
   * Sleep for specified milliseconds
   */
  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}
