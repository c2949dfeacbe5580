import { promises as fs } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { S3StorageBackend } from '../src/storage/S3StorageBackend';
import { StorageError, TransferError } from '../src/storage/errors';
import { S3Client } from '../src/interfaces/S3Client';
import { createMockLogger } from './helpers/mockLogger';

describe('S3StorageBackend', () => {
  let mockS3Client: jest.Mocked<S3Client>;
  let backend: S3StorageBackend;
  const logger = createMockLogger();

  beforeEach(() => {
    mockS3Client = {
      uploadFile: jest.fn(),
      downloadFile: jest.fn(),
      listObjects: jest.fn(),
      listPrefixes: jest.fn(),
      deleteObject: jest.fn(),
      testConnection: jest.fn(),
    };

    backend = new S3StorageBackend(
      {
        kind: 's3',
        bucket: 'backups',
        region: 'us-east-1',
        endpoint: 'http://minio:9000',
        accessKey: 'test-access-key',
        secretKey: 'test-secret',
        prefix: 'postgres-backups',
        retentionDays: 7,
      },
      mockS3Client,
      logger
    );
  });

  it('should label itself with bucket and prefix', () => {
    expect(backend.label).toBe('s3://backups/postgres-backups');
  });

  describe('listFolders', () => {
    it('should turn common prefixes into folder ids, newest first', async () => {
      mockS3Client.listPrefixes.mockResolvedValue([
        'postgres-backups/20250101_000000/',
        'postgres-backups/archive/',
        'postgres-backups/20250103_000000/',
      ]);

      await expect(backend.listFolders()).resolves.toEqual(['20250103_000000', '20250101_000000']);
      expect(mockS3Client.listPrefixes).toHaveBeenCalledWith('postgres-backups/');
    });

    it('should wrap listing failures', async () => {
      mockS3Client.listPrefixes.mockRejectedValue(new Error('timeout'));

      await expect(backend.listFolders()).rejects.toThrow(StorageError);
    });
  });

  describe('listArtifacts', () => {
    it('should keep top-level dumps of the folder', async () => {
      mockS3Client.listObjects.mockResolvedValue([
        { key: 'postgres-backups/20250101_000000/postgres_globals.sql.gz', size: 4, lastModified: new Date(0) },
        { key: 'postgres-backups/20250101_000000/postgres_cluster.sql.gz', size: 10, lastModified: new Date(0) },
        { key: 'postgres-backups/20250101_000000/nested/postgres_db_x.sql.gz', size: 3, lastModified: new Date(0) },
        { key: 'postgres-backups/20250101_000000/README', size: 1, lastModified: new Date(0) },
      ]);

      await expect(backend.listArtifacts('20250101_000000')).resolves.toEqual([
        { fileName: 'postgres_cluster.sql.gz', size: 10 },
        { fileName: 'postgres_globals.sql.gz', size: 4 },
      ]);
      expect(mockS3Client.listObjects).toHaveBeenCalledWith('postgres-backups/20250101_000000/');
    });
  });

  describe('pushFolder', () => {
    let workDir: string;

    beforeEach(async () => {
      workDir = await fs.mkdtemp(join(tmpdir(), 's3-backend-'));
    });

    afterEach(async () => {
      await fs.rm(workDir, { recursive: true, force: true });
    });

    it('should upload every file under the folder prefix', async () => {
      await fs.writeFile(join(workDir, 'postgres_cluster.sql.gz'), 'a');
      await fs.writeFile(join(workDir, 'postgres_globals.sql.gz'), 'b');
      mockS3Client.uploadFile.mockResolvedValue('s3://backups/key');

      await backend.pushFolder(workDir, '20250101_000000');

      expect(mockS3Client.uploadFile.mock.calls).toEqual([
        [join(workDir, 'postgres_cluster.sql.gz'), 'postgres-backups/20250101_000000/postgres_cluster.sql.gz'],
        [join(workDir, 'postgres_globals.sql.gz'), 'postgres-backups/20250101_000000/postgres_globals.sql.gz'],
      ]);
    });

    it('should upload the same keys when a folder is pushed twice', async () => {
      await fs.writeFile(join(workDir, 'postgres_cluster.sql.gz'), 'a');
      await fs.writeFile(join(workDir, 'postgres_globals.sql.gz'), 'b');
      mockS3Client.uploadFile.mockResolvedValue('s3://backups/key');

      await backend.pushFolder(workDir, '20250101_000000');
      const firstKeys = mockS3Client.uploadFile.mock.calls.map(([, key]) => key);
      mockS3Client.uploadFile.mockClear();
      await backend.pushFolder(workDir, '20250101_000000');
      const secondKeys = mockS3Client.uploadFile.mock.calls.map(([, key]) => key);

      expect(secondKeys).toEqual(firstKeys);
      expect(new Set(firstKeys)).toEqual(
        new Set([
          'postgres-backups/20250101_000000/postgres_cluster.sql.gz',
          'postgres-backups/20250101_000000/postgres_globals.sql.gz',
        ])
      );
      expect(mockS3Client.deleteObject).not.toHaveBeenCalled();
    });

    it('should stop at the first failed upload', async () => {
      await fs.writeFile(join(workDir, 'postgres_cluster.sql.gz'), 'a');
      await fs.writeFile(join(workDir, 'postgres_globals.sql.gz'), 'b');
      mockS3Client.uploadFile.mockRejectedValue(new Error('Access Denied'));

      await expect(backend.pushFolder(workDir, '20250101_000000')).rejects.toThrow(TransferError);
      expect(mockS3Client.uploadFile).toHaveBeenCalledTimes(1);
    });
  });

  describe('fetchFolder', () => {
    it('should download each object below the destination root', async () => {
      mockS3Client.listObjects.mockResolvedValue([
        { key: 'postgres-backups/20250101_000000/postgres_cluster.sql.gz', size: 10, lastModified: new Date(0) },
      ]);
      mockS3Client.downloadFile.mockResolvedValue(undefined);

      const path = await backend.fetchFolder('20250101_000000', '/restore');

      expect(path).toBe(join('/restore', '20250101_000000'));
      expect(mockS3Client.downloadFile).toHaveBeenCalledWith(
        'postgres-backups/20250101_000000/postgres_cluster.sql.gz',
        join('/restore', '20250101_000000', 'postgres_cluster.sql.gz')
      );
    });

    it('should report a folder without objects as missing', async () => {
      mockS3Client.listObjects.mockResolvedValue([]);

      await expect(backend.fetchFolder('20250101_000000', '/restore')).rejects.toThrow(
        'Backup folder not found: s3://backups/postgres-backups/20250101_000000'
      );
      expect(mockS3Client.downloadFile).not.toHaveBeenCalled();
    });
  });

  describe('deleteFolder', () => {
    it('should delete every object of the folder', async () => {
      mockS3Client.listObjects.mockResolvedValue([
        { key: 'postgres-backups/20250101_000000/postgres_cluster.sql.gz', size: 10, lastModified: new Date(0) },
        { key: 'postgres-backups/20250101_000000/postgres_globals.sql.gz', size: 4, lastModified: new Date(0) },
      ]);
      mockS3Client.deleteObject.mockResolvedValue(undefined);

      await backend.deleteFolder('20250101_000000');

      expect(mockS3Client.deleteObject.mock.calls).toEqual([
        ['postgres-backups/20250101_000000/postgres_cluster.sql.gz'],
        ['postgres-backups/20250101_000000/postgres_globals.sql.gz'],
      ]);
    });

    it('should refuse names that are not folder ids', async () => {
      await expect(backend.deleteFolder('')).rejects.toThrow('Refusing to delete invalid folder id: ');
      expect(mockS3Client.listObjects).not.toHaveBeenCalled();
    });
  });

  it('should probe reachability through the client', async () => {
    mockS3Client.testConnection.mockResolvedValue(false);

    await expect(backend.isReachable()).resolves.toBe(false);
  });
});
