import { promises as fs } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { LocalStorageBackend } from '../src/storage/LocalStorageBackend';
import { StorageError, TransferError } from '../src/storage/errors';
import { createMockLogger } from './helpers/mockLogger';

describe('LocalStorageBackend', () => {
  let workDir: string;
  let rootDir: string;
  let backend: LocalStorageBackend;
  const logger = createMockLogger();

  beforeEach(async () => {
    workDir = await fs.mkdtemp(join(tmpdir(), 'local-backend-'));
    rootDir = join(workDir, 'backups');
    backend = new LocalStorageBackend({ kind: 'local', rootDir, retentionDays: 1 }, logger);
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  it('should label itself with the root directory', () => {
    expect(backend.label).toBe(`local:${rootDir}`);
    expect(backend.retentionDays).toBe(1);
  });

  describe('listFolders', () => {
    it('should return an empty list when the root does not exist', async () => {
      await expect(backend.listFolders()).resolves.toEqual([]);
    });

    it('should list timestamp directories newest first and ignore other entries', async () => {
      await fs.mkdir(join(rootDir, '20250101_000000'), { recursive: true });
      await fs.mkdir(join(rootDir, '20250102_000000'));
      await fs.mkdir(join(rootDir, 'lost+found'));
      await fs.writeFile(join(rootDir, '20250103_000000'), '');

      await expect(backend.listFolders()).resolves.toEqual(['20250102_000000', '20250101_000000']);
    });
  });

  describe('listArtifacts', () => {
    it('should list compressed dumps with their sizes', async () => {
      const folder = join(rootDir, '20250101_000000');
      await fs.mkdir(folder, { recursive: true });
      await fs.writeFile(join(folder, 'postgres_globals.sql.gz'), 'abcd');
      await fs.writeFile(join(folder, 'postgres_cluster.sql.gz'), 'abcdefghij');
      await fs.writeFile(join(folder, 'notes.txt'), 'ignored');

      await expect(backend.listArtifacts('20250101_000000')).resolves.toEqual([
        { fileName: 'postgres_cluster.sql.gz', size: 10 },
        { fileName: 'postgres_globals.sql.gz', size: 4 },
      ]);
    });

    it('should throw StorageError for a missing folder', async () => {
      await expect(backend.listArtifacts('20250101_000000')).rejects.toThrow(StorageError);
    });

    it('should skip a dump that disappears while the folder is listed', async () => {
      const folder = join(rootDir, '20250101_000000');
      await fs.mkdir(folder, { recursive: true });
      await fs.writeFile(join(folder, 'postgres_cluster.sql.gz'), 'abcdefghij');
      await fs.symlink(join(folder, 'removed.partial'), join(folder, 'postgres_db_app.sql.gz'));

      await expect(backend.listArtifacts('20250101_000000')).resolves.toEqual([
        { fileName: 'postgres_cluster.sql.gz', size: 10 },
      ]);
    });
  });

  describe('folderSize', () => {
    it('should count every file below the folder', async () => {
      const folder = join(rootDir, '20250101_000000');
      await fs.mkdir(join(folder, 'extra'), { recursive: true });
      await fs.writeFile(join(folder, 'postgres_cluster.sql.gz'), 'abcdefghij');
      await fs.writeFile(join(folder, 'notes.txt'), 'abc');
      await fs.writeFile(join(folder, 'extra', 'data.bin'), 'ab');

      await expect(backend.folderSize('20250101_000000')).resolves.toBe(15);
    });

    it('should be zero for a missing folder', async () => {
      await expect(backend.folderSize('20250101_000000')).resolves.toBe(0);
    });
  });

  describe('pushFolder', () => {
    it('should copy a staged folder into the root', async () => {
      const staged = join(workDir, 'staging', '20250101_000000');
      await fs.mkdir(staged, { recursive: true });
      await fs.writeFile(join(staged, 'postgres_cluster.sql.gz'), 'dump');

      await backend.pushFolder(staged, '20250101_000000');

      await expect(fs.readFile(join(rootDir, '20250101_000000', 'postgres_cluster.sql.gz'), 'utf8')).resolves.toBe(
        'dump'
      );
    });

    it('should leave the same result when a folder is pushed twice', async () => {
      const staged = join(workDir, 'staging', '20250101_000000');
      await fs.mkdir(staged, { recursive: true });
      await fs.writeFile(join(staged, 'postgres_cluster.sql.gz'), 'cluster');
      await fs.writeFile(join(staged, 'postgres_globals.sql.gz'), 'globals');
      const target = join(rootDir, '20250101_000000');

      await backend.pushFolder(staged, '20250101_000000');
      const afterFirst = await readTree(target);
      await backend.pushFolder(staged, '20250101_000000');

      expect(await readTree(target)).toEqual(afterFirst);
      expect(afterFirst).toEqual({ 'postgres_cluster.sql.gz': 'cluster', 'postgres_globals.sql.gz': 'globals' });
    });

    it('should overwrite an artifact left by an earlier push', async () => {
      const staged = join(workDir, 'staging', '20250101_000000');
      await fs.mkdir(staged, { recursive: true });
      await fs.mkdir(join(rootDir, '20250101_000000'), { recursive: true });
      await fs.writeFile(join(rootDir, '20250101_000000', 'postgres_cluster.sql.gz'), 'stale');
      await fs.writeFile(join(staged, 'postgres_cluster.sql.gz'), 'fresh');

      await backend.pushFolder(staged, '20250101_000000');

      await expect(fs.readFile(join(rootDir, '20250101_000000', 'postgres_cluster.sql.gz'), 'utf8')).resolves.toBe(
        'fresh'
      );
    });

    it('should leave a folder that already lives in the root alone', async () => {
      const folder = join(rootDir, '20250101_000000');
      await fs.mkdir(folder, { recursive: true });

      await backend.pushFolder(folder, '20250101_000000');

      expect(logger.debug).toHaveBeenCalledWith('Folder already in local backup root', {
        folderId: '20250101_000000',
      });
    });

    it('should throw TransferError when the source is missing', async () => {
      await expect(backend.pushFolder(join(workDir, 'nowhere'), '20250101_000000')).rejects.toThrow(TransferError);
    });
  });

  describe('fetchFolder', () => {
    it('should return the folder path in place', async () => {
      await fs.mkdir(join(rootDir, '20250101_000000'), { recursive: true });

      await expect(backend.fetchFolder('20250101_000000')).resolves.toBe(join(rootDir, '20250101_000000'));
    });

    it('should report a missing folder', async () => {
      await expect(backend.fetchFolder('20250101_000000')).rejects.toThrow(
        `Backup folder not found: ${join(rootDir, '20250101_000000')}`
      );
    });
  });

  describe('deleteFolder', () => {
    it('should remove the folder and its artifacts', async () => {
      const folder = join(rootDir, '20250101_000000');
      await fs.mkdir(folder, { recursive: true });
      await fs.writeFile(join(folder, 'postgres_cluster.sql.gz'), 'dump');

      await backend.deleteFolder('20250101_000000');

      await expect(fs.stat(folder)).rejects.toThrow();
    });

    it('should refuse names that are not folder ids', async () => {
      await expect(backend.deleteFolder('..')).rejects.toThrow('Refusing to delete invalid folder id: ..');
    });
  });

  describe('isReachable', () => {
    it('should be reachable once the root exists', async () => {
      await fs.mkdir(rootDir);

      await expect(backend.isReachable()).resolves.toBe(true);
    });

    it('should not be reachable without the root', async () => {
      await expect(backend.isReachable()).resolves.toBe(false);
    });
  });
});

async function readTree(dir: string): Promise<Record<string, string>> {
  const tree: Record<string, string> = {};
  for (const name of (await fs.readdir(dir)).sort()) {
    tree[name] = await fs.readFile(join(dir, name), 'utf8');
  }
  return tree;
}
