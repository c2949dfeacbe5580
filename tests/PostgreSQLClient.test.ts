import { promises as fs } from 'fs';
import { gunzipSync, gzipSync } from 'zlib';
import { join } from 'path';
import { tmpdir } from 'os';
import { createMockLogger } from './helpers/mockLogger';

const mockPgClient = {
  connect: jest.fn(),
  query: jest.fn(),
  end: jest.fn(),
};

jest.mock('pg', () => ({
  Client: jest.fn(() => mockPgClient),
}));
jest.mock('../src/utils/ProcessRunner');

import { Client } from 'pg';
import { runProcess } from '../src/utils/ProcessRunner';
import { PostgreSQLClient, EngineError, ConnectionError } from '../src/clients/PostgreSQLClient';

const mockRunProcess = jest.mocked(runProcess);

describe('PostgreSQLClient', () => {
  let client: PostgreSQLClient;
  let workDir: string;
  const logger = createMockLogger();

  beforeEach(async () => {
    jest.clearAllMocks();
    mockPgClient.end.mockResolvedValue(undefined);
    workDir = await fs.mkdtemp(join(tmpdir(), 'pg-client-'));
    client = new PostgreSQLClient(
      { host: 'db.internal', port: 5433, user: 'postgres', password: 'test-secret' },
      logger
    );
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  describe('testConnection', () => {
    it('should return true when SELECT 1 succeeds', async () => {
      mockPgClient.connect.mockResolvedValue(undefined);
      mockPgClient.query.mockResolvedValue({ rows: [] });

      await expect(client.testConnection()).resolves.toBe(true);

      expect(Client).toHaveBeenCalledWith({
        host: 'db.internal',
        port: 5433,
        user: 'postgres',
        password: 'test-secret',
        database: 'postgres',
      });
      expect(mockPgClient.query).toHaveBeenCalledWith('SELECT 1');
      expect(mockPgClient.end).toHaveBeenCalled();
    });

    it('should return false when the connection fails', async () => {
      mockPgClient.connect.mockRejectedValue(new Error('connect ECONNREFUSED'));

      await expect(client.testConnection()).resolves.toBe(false);
      expect(mockPgClient.end).toHaveBeenCalled();
    });
  });

  describe('dumps', () => {
    it('should gzip the cluster dump into the output file', async () => {
      mockRunProcess.mockImplementation(async (_command, _args, options) => {
        options?.output?.end('-- cluster dump\n');
        return { exitCode: 0, stdout: '', stderr: '' };
      });
      const outputPath = join(workDir, 'postgres_cluster.sql.gz');

      const info = await client.dumpCluster(outputPath);

      expect(mockRunProcess).toHaveBeenCalledWith(
        'pg_dumpall',
        [
          '--host=db.internal',
          '--port=5433',
          '--username=postgres',
          '--no-password',
          '--clean',
          '--if-exists',
        ],
        expect.objectContaining({ env: { PGPASSWORD: 'test-secret' } })
      );
      const written = await fs.readFile(outputPath);
      expect(gunzipSync(written).toString()).toBe('-- cluster dump\n');
      expect(info.fileSize).toBe(written.length);
      expect(info.filePath).toBe(outputPath);
    });

    it('should dump globals only', async () => {
      mockRunProcess.mockImplementation(async (_command, _args, options) => {
        options?.output?.end('CREATE ROLE app;\n');
        return { exitCode: 0, stdout: '', stderr: '' };
      });

      await client.dumpGlobals(join(workDir, 'postgres_globals.sql.gz'));

      expect(mockRunProcess.mock.calls[0][1]).toContain('--globals-only');
    });

    it('should dump one database with create and clean', async () => {
      mockRunProcess.mockImplementation(async (_command, _args, options) => {
        options?.output?.end('CREATE DATABASE app;\n');
        return { exitCode: 0, stdout: '', stderr: '' };
      });

      await client.dumpDatabase('app', join(workDir, 'postgres_db_app.sql.gz'));

      const [command, args] = mockRunProcess.mock.calls[0];
      expect(command).toBe('pg_dump');
      expect(args.slice(4)).toEqual(['--create', '--clean', '--if-exists', '--dbname=app']);
    });

    it('should remove the partial file and throw EngineError on a non-zero exit', async () => {
      mockRunProcess.mockImplementation(async (_command, _args, options) => {
        options?.output?.end('partial');
        return { exitCode: 1, stdout: '', stderr: 'pg_dumpall: error: password authentication failed' };
      });
      const outputPath = join(workDir, 'postgres_cluster.sql.gz');

      const dumping = client.dumpCluster(outputPath);

      await expect(dumping).rejects.toThrow(EngineError);
      await expect(dumping).rejects.toThrow(
        'pg_dumpall authentication failed (exit code 1). Please check database credentials.'
      );
      await expect(fs.stat(outputPath)).rejects.toThrow();
    });

    it('should report a missing binary', async () => {
      mockRunProcess.mockRejectedValue(new Error('spawn pg_dump ENOENT'));

      await expect(client.dumpDatabase('app', join(workDir, 'postgres_db_app.sql.gz'))).rejects.toThrow(
        'pg_dump command not found. Please ensure PostgreSQL client tools are installed.'
      );
    });
  });

  describe('restoreDump', () => {
    it('should stream the decompressed dump into psql on the maintenance database', async () => {
      const inputPath = join(workDir, 'postgres_globals.sql.gz');
      await fs.writeFile(inputPath, gzipSync('CREATE ROLE app;\n'));
      let received = '';
      mockRunProcess.mockImplementation(async (_command, _args, options) => {
        if (options?.input) {
          for await (const chunk of options.input) {
            received += String(chunk);
          }
        }
        return { exitCode: 0, stdout: '', stderr: '' };
      });

      await client.restoreDump(inputPath, { type: 'globals' });

      expect(received).toBe('CREATE ROLE app;\n');
      expect(mockRunProcess).toHaveBeenCalledWith(
        'psql',
        [
          '--host=db.internal',
          '--port=5433',
          '--username=postgres',
          '--no-password',
          '--no-psqlrc',
          '--quiet',
          '--dbname=postgres',
        ],
        expect.objectContaining({ env: { PGPASSWORD: 'test-secret' } })
      );
    });

    it('should stop at the first error when restoring a single database', async () => {
      const inputPath = join(workDir, 'postgres_db_app.sql.gz');
      await fs.writeFile(inputPath, gzipSync('DROP DATABASE IF EXISTS app;\n'));
      mockRunProcess.mockImplementation(async (_command, _args, options) => {
        options?.input?.resume();
        return { exitCode: 0, stdout: '', stderr: '' };
      });

      await client.restoreDump(inputPath, { type: 'database', name: 'app' });

      expect(mockRunProcess).toHaveBeenCalledWith(
        'psql',
        [
          '--host=db.internal',
          '--port=5433',
          '--username=postgres',
          '--no-password',
          '--no-psqlrc',
          '--quiet',
          '--dbname=postgres',
          '--set=ON_ERROR_STOP=1',
        ],
        expect.objectContaining({ env: { PGPASSWORD: 'test-secret' } })
      );
    });

    it('should throw EngineError when psql exits non-zero', async () => {
      const inputPath = join(workDir, 'postgres_cluster.sql.gz');
      await fs.writeFile(inputPath, gzipSync('SELECT 1;\n'));
      mockRunProcess.mockImplementation(async (_command, _args, options) => {
        options?.input?.resume();
        return { exitCode: 3, stdout: '', stderr: 'ERROR: permission denied for database' };
      });

      await expect(client.restoreDump(inputPath, { type: 'cluster' })).rejects.toThrow(
        'psql failed: insufficient permissions (exit code 3).'
      );
    });
  });

  describe('catalog queries', () => {
    beforeEach(() => {
      mockPgClient.connect.mockResolvedValue(undefined);
    });

    it('should list non-template databases', async () => {
      mockPgClient.query.mockResolvedValue({ rows: [{ datname: 'app' }, { datname: 'postgres' }] });

      await expect(client.listDatabases()).resolves.toEqual(['app', 'postgres']);
      expect(mockPgClient.query).toHaveBeenCalledWith(
        'SELECT datname FROM pg_database WHERE datistemplate = false ORDER BY datname'
      );
    });

    it('should list tables of the given database', async () => {
      mockPgClient.query.mockResolvedValue({ rows: [{ schemaname: 'public', tablename: 'orders' }] });

      await expect(client.listTables('app')).resolves.toEqual([{ schema: 'public', name: 'orders' }]);
      expect(Client).toHaveBeenCalledWith(expect.objectContaining({ database: 'app' }));
    });

    it('should throw ConnectionError when the database cannot be reached', async () => {
      mockPgClient.connect.mockRejectedValue(new Error('timeout'));

      await expect(client.listRoles()).rejects.toThrow(ConnectionError);
    });
  });

  it('should describe its target as host:port', () => {
    expect(client.getTarget()).toBe('db.internal:5433');
  });
});
