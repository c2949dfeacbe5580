// Mock AWS SDK; commands keep their input so the calls can be inspected
const mockSend = jest.fn();
const mockS3Client = {
  send: mockSend,
};

jest.mock('@aws-sdk/client-s3', () => ({
  S3Client: jest.fn(() => mockS3Client),
  PutObjectCommand: jest.fn((input: unknown) => ({ input })),
  GetObjectCommand: jest.fn((input: unknown) => ({ input })),
  ListObjectsV2Command: jest.fn((input: unknown) => ({ input })),
  DeleteObjectCommand: jest.fn((input: unknown) => ({ input })),
  HeadBucketCommand: jest.fn((input: unknown) => ({ input })),
}));

import { promises as fs } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { Readable } from 'stream';
import {
  S3Client as AWSS3Client,
  PutObjectCommand,
  ListObjectsV2Command,
  DeleteObjectCommand,
  HeadBucketCommand,
} from '@aws-sdk/client-s3';
import { S3Client } from '../src/clients/S3Client';
import { S3DestinationConfig } from '../src/interfaces/BackupConfig';
import { createMockLogger } from './helpers/mockLogger';

describe('S3Client', () => {
  let s3Client: S3Client;
  const logger = createMockLogger();

  const config: S3DestinationConfig = {
    kind: 's3',
    bucket: 'test-bucket',
    region: 'us-east-1',
    endpoint: 'http://minio:9000',
    accessKey: 'test-access-key',
    secretKey: 'test-secret',
    prefix: 'postgres-backups',
    retentionDays: 7,
  };

  beforeEach(() => {
    jest.clearAllMocks();
    s3Client = new S3Client(config, logger);
  });

  describe('constructor', () => {
    it('should create the AWS client with credentials, endpoint and path-style addressing', () => {
      expect(AWSS3Client).toHaveBeenCalledWith({
        region: 'us-east-1',
        credentials: {
          accessKeyId: 'test-access-key',
          secretAccessKey: 'test-secret',
        },
        endpoint: 'http://minio:9000',
        forcePathStyle: true,
      });
    });
  });

  describe('file transfers', () => {
    let workDir: string;

    beforeEach(async () => {
      workDir = await fs.mkdtemp(join(tmpdir(), 's3-client-'));
    });

    afterEach(async () => {
      await fs.rm(workDir, { recursive: true, force: true });
    });

    it('should upload a file with its length and return its URL', async () => {
      const filePath = join(workDir, 'postgres_cluster.sql.gz');
      await fs.writeFile(filePath, 'twelve bytes');
      mockSend.mockResolvedValue({});

      const url = await s3Client.uploadFile(filePath, 'postgres-backups/20250101_000000/postgres_cluster.sql.gz');

      expect(url).toBe('s3://test-bucket/postgres-backups/20250101_000000/postgres_cluster.sql.gz');
      expect(PutObjectCommand).toHaveBeenCalledWith(
        expect.objectContaining({
          Bucket: 'test-bucket',
          Key: 'postgres-backups/20250101_000000/postgres_cluster.sql.gz',
          ContentLength: 12,
          ContentType: 'application/gzip',
        })
      );
    });

    it('should download an object into a new directory', async () => {
      mockSend.mockResolvedValue({ Body: Readable.from([Buffer.from('dump body')]) });
      const target = join(workDir, '20250101_000000', 'postgres_globals.sql.gz');

      await s3Client.downloadFile('postgres-backups/20250101_000000/postgres_globals.sql.gz', target);

      await expect(fs.readFile(target, 'utf8')).resolves.toBe('dump body');
    });

    it('should fail a download without a readable body', async () => {
      mockSend.mockResolvedValue({});

      await expect(s3Client.downloadFile('missing-body', join(workDir, 'x'))).rejects.toThrow(
        'Object missing-body has no readable body'
      );
    });
  });

  describe('listing', () => {
    it('should follow continuation tokens when listing objects', async () => {
      const modified = new Date('2025-01-01T00:00:00Z');
      mockSend
        .mockResolvedValueOnce({
          Contents: [{ Key: 'p/20250101_000000/postgres_cluster.sql.gz', Size: 10, LastModified: modified }],
          IsTruncated: true,
          NextContinuationToken: 'next-page',
        })
        .mockResolvedValueOnce({
          Contents: [{ Key: 'p/20250101_000000/postgres_globals.sql.gz', Size: 4 }],
          IsTruncated: false,
        });

      const objects = await s3Client.listObjects('p/20250101_000000/');

      expect(objects).toEqual([
        { key: 'p/20250101_000000/postgres_cluster.sql.gz', size: 10, lastModified: modified },
        { key: 'p/20250101_000000/postgres_globals.sql.gz', size: 4, lastModified: new Date(0) },
      ]);
      expect(ListObjectsV2Command).toHaveBeenLastCalledWith(
        expect.objectContaining({ ContinuationToken: 'next-page', Prefix: 'p/20250101_000000/' })
      );
    });

    it('should list common prefixes with a delimiter', async () => {
      mockSend.mockResolvedValue({
        CommonPrefixes: [{ Prefix: 'p/20250101_000000/' }, { Prefix: 'p/20250102_000000/' }],
      });

      await expect(s3Client.listPrefixes('p/')).resolves.toEqual(['p/20250101_000000/', 'p/20250102_000000/']);
      expect(ListObjectsV2Command).toHaveBeenCalledWith(
        expect.objectContaining({ Bucket: 'test-bucket', Prefix: 'p/', Delimiter: '/' })
      );
    });
  });

  describe('deleteObject', () => {
    it('should delete the object by key', async () => {
      mockSend.mockResolvedValue({});

      await s3Client.deleteObject('p/20250101_000000/postgres_cluster.sql.gz');

      expect(DeleteObjectCommand).toHaveBeenCalledWith({
        Bucket: 'test-bucket',
        Key: 'p/20250101_000000/postgres_cluster.sql.gz',
      });
    });

    it('should not retry access errors', async () => {
      const accessDenied = Object.assign(new Error('Access Denied'), { name: 'AccessDenied' });
      mockSend.mockRejectedValue(accessDenied);

      await expect(s3Client.deleteObject('k')).rejects.toBe(accessDenied);
      expect(mockSend).toHaveBeenCalledTimes(1);
    });

    it('should not retry client errors reported by status code', async () => {
      mockSend.mockRejectedValue(Object.assign(new Error('Forbidden'), { $metadata: { httpStatusCode: 403 } }));

      await expect(s3Client.deleteObject('k')).rejects.toThrow('Forbidden');
      expect(mockSend).toHaveBeenCalledTimes(1);
    });

    it('should retry transient errors with backoff', async () => {
      jest.useFakeTimers({ doNotFake: ['nextTick', 'setImmediate', 'queueMicrotask'] });
      try {
        mockSend.mockRejectedValueOnce(new Error('socket hang up')).mockResolvedValueOnce({});

        const deleting = s3Client.deleteObject('k');
        await jest.advanceTimersByTimeAsync(1000);
        await deleting;

        expect(mockSend).toHaveBeenCalledTimes(2);
        expect(logger.warn).toHaveBeenCalledWith(
          'Attempt 1 failed for delete object k: socket hang up. Retrying in 1000ms...'
        );
      } finally {
        jest.useRealTimers();
      }
    });
  });

  describe('testConnection', () => {
    it('should return true when the bucket is reachable', async () => {
      mockSend.mockResolvedValue({});

      await expect(s3Client.testConnection()).resolves.toBe(true);
      expect(HeadBucketCommand).toHaveBeenCalledWith({ Bucket: 'test-bucket' });
    });

    it('should return false and warn when the bucket is not reachable', async () => {
      mockSend.mockRejectedValue(new Error('getaddrinfo ENOTFOUND minio'));

      await expect(s3Client.testConnection()).resolves.toBe(false);
      expect(logger.warn).toHaveBeenCalledWith('S3 connection test failed', {
        bucket: 'test-bucket',
        error: 'getaddrinfo ENOTFOUND minio',
      });
    });
  });
});
