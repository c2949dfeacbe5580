import { Client, QueryResultRow } from 'pg';
import { createReadStream, createWriteStream, promises as fs } from 'fs';
import { pipeline } from 'stream/promises';
import { createGunzip, createGzip } from 'zlib';
import {
  PostgreSQLClient as IPostgreSQLClient,
  DumpInfo,
  TableInfo,
} from '../interfaces/PostgreSQLClient';
import { PostgresConnectionConfig } from '../interfaces/BackupConfig';
import { RestoreScope } from '../interfaces/RestoreExecutor';
import { Logger } from '../interfaces/Logger';
import { runProcess, ProcessResult } from '../utils/ProcessRunner';
import { formatError, toError } from '../utils/errors';

/**
 * Custom error classes for PostgreSQL operations
 */
export class PostgreSQLError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'PostgreSQLError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

export class ConnectionError extends PostgreSQLError {
  constructor(message: string, cause?: Error) {
    super(message, 'connection', cause);
    this.name = 'ConnectionError';
  }
}

/**
 * Failure of the dump or restore engine (pg_dumpall, pg_dump, psql)
 */
export class EngineError extends PostgreSQLError {
  constructor(
    message: string,
    operation: string,
    public readonly exitCode?: number,
    cause?: Error
  ) {
    super(message, operation, cause);
    this.name = 'EngineError';
  }
}

const MAINTENANCE_DATABASE = 'postgres';

/**
 * PostgreSQL client: spawns the dump and restore tools and runs catalog queries
 */
export class PostgreSQLClient implements IPostgreSQLClient {
  private connection: PostgresConnectionConfig;
  private logger: Logger;

  constructor(connection: PostgresConnectionConfig, logger: Logger) {
    this.connection = connection;
    this.logger = logger;
  }

  /**
   * Test connection to the PostgreSQL server
   */
  async testConnection(): Promise<boolean> {
    const client = this.createClient(MAINTENANCE_DATABASE);

    try {
      await client.connect();
      await client.query('SELECT 1');
      return true;
    } catch (error) {
      this.logger.error('PostgreSQL connection test failed', toError(error), {
        target: this.getTarget(),
      });
      return false;
    } finally {
      await client.end().catch(cleanupError => {
        this.logger.warn('Failed to close database connection during cleanup', {
          error: formatError(cleanupError),
        });
      });
    }
  }

  async dumpCluster(outputPath: string): Promise<DumpInfo> {
    return this.dumpToFile('pg_dumpall', ['--clean', '--if-exists'], outputPath, 'cluster_dump');
  }

  async dumpGlobals(outputPath: string): Promise<DumpInfo> {
    return this.dumpToFile('pg_dumpall', ['--globals-only'], outputPath, 'globals_dump');
  }

  /**
   * The dump carries CREATE DATABASE and a preceding DROP, so restoring it
   * replaces the database as a whole
   */
  async dumpDatabase(databaseName: string, outputPath: string): Promise<DumpInfo> {
    return this.dumpToFile(
      'pg_dump',
      ['--create', '--clean', '--if-exists', `--dbname=${databaseName}`],
      outputPath,
      'database_dump'
    );
  }

  /**
   * Decompress a dump and stream it into psql connected to the maintenance database
   */
  async restoreDump(inputPath: string, scope: RestoreScope): Promise<void> {
    const gunzip = createGunzip();
    const reading = pipeline(createReadStream(inputPath), gunzip);
    const args = [
      ...this.connectionArgs(),
      '--no-psqlrc',
      '--quiet',
      `--dbname=${MAINTENANCE_DATABASE}`,
    ];
    // Cluster and globals dumps hit "already exists" errors that are safe to pass over
    if (scope.type === 'database') {
      args.push('--set=ON_ERROR_STOP=1');
    }

    this.logger.info('Streaming dump into psql', {
      inputPath,
      scope: scope.type,
      target: this.getTarget(),
    });

    let result: ProcessResult;
    try {
      [result] = await Promise.all([
        runProcess('psql', args, { env: this.processEnv(), input: gunzip }),
        reading,
      ]);
    } catch (error) {
      gunzip.destroy();
      throw new EngineError(
        `Restore stream failed: ${this.analyzeSpawnError('psql', toError(error))}`,
        'restore',
        undefined,
        toError(error)
      );
    }

    if (result.exitCode !== 0) {
      throw new EngineError(
        this.analyzeToolError('psql', result, 'restore'),
        'restore',
        result.exitCode
      );
    }

    if (result.stderr.trim()) {
      this.logger.warn('psql reported errors during restore', {
        stderr: result.stderr.trim().slice(0, 4000),
      });
    }
  }

  /**
   * Every non-template database on the server
   */
  async listDatabases(): Promise<string[]> {
    const rows = await this.query<{ datname: string }>(
      MAINTENANCE_DATABASE,
      'SELECT datname FROM pg_database WHERE datistemplate = false ORDER BY datname'
    );
    return rows.map(row => row.datname);
  }

  async listRoles(): Promise<string[]> {
    const rows = await this.query<{ rolname: string }>(
      MAINTENANCE_DATABASE,
      "SELECT rolname FROM pg_roles WHERE rolname NOT LIKE 'pg\\_%' ORDER BY rolname"
    );
    return rows.map(row => row.rolname);
  }

  async listTables(databaseName: string): Promise<TableInfo[]> {
    const rows = await this.query<{ schemaname: string; tablename: string }>(
      databaseName,
      `SELECT schemaname, tablename FROM pg_tables
       WHERE schemaname NOT IN ('pg_catalog', 'information_schema')
       ORDER BY schemaname, tablename`
    );
    return rows.map(row => ({ schema: row.schemaname, name: row.tablename }));
  }

  getTarget(): string {
    return `${this.connection.host}:${this.connection.port}`;
  }

  private async query<R extends QueryResultRow>(database: string, sql: string): Promise<R[]> {
    const client = this.createClient(database);

    try {
      await client.connect();
    } catch (error) {
      await client.end().catch(cleanupError => {
        this.logger.debug('Failed to close unconnected client', { error: formatError(cleanupError) });
      });
      throw new ConnectionError(
        `Failed to connect to ${this.getTarget()}/${database}: ${formatError(error)}`,
        toError(error)
      );
    }

    try {
      const result = await client.query<R>(sql);
      return result.rows;
    } finally {
      await client.end();
    }
  }

  private createClient(database: string): Client {
    return new Client({
      host: this.connection.host,
      port: this.connection.port,
      user: this.connection.user,
      password: this.connection.password,
      database,
    });
  }

  private connectionArgs(): string[] {
    return [
      `--host=${this.connection.host}`,
      `--port=${this.connection.port}`,
      `--username=${this.connection.user}`,
      '--no-password',
    ];
  }

  private processEnv(): Record<string, string | undefined> {
    return this.connection.password ? { PGPASSWORD: this.connection.password } : {};
  }

  /**
   * Run a dump tool with its stdout gzip-compressed into outputPath
   */
  private async dumpToFile(
    command: string,
    toolArgs: string[],
    outputPath: string,
    operation: string
  ): Promise<DumpInfo> {
    const timestamp = new Date();
    const gzip = createGzip();
    const writing = pipeline(gzip, createWriteStream(outputPath));

    this.logger.debug(`Executing ${command}`, { operation, outputPath });

    let result: ProcessResult;
    try {
      [result] = await Promise.all([
        runProcess(command, [...this.connectionArgs(), ...toolArgs], {
          env: this.processEnv(),
          output: gzip,
        }),
        writing,
      ]);
    } catch (error) {
      gzip.destroy();
      await this.removePartialFile(outputPath);
      throw new EngineError(
        this.analyzeSpawnError(command, toError(error)),
        operation,
        undefined,
        toError(error)
      );
    }

    if (result.exitCode !== 0) {
      await this.removePartialFile(outputPath);
      throw new EngineError(this.analyzeToolError(command, result, operation), operation, result.exitCode);
    }

    const stats = await fs.stat(outputPath);

    if (result.stderr.includes('WARNING')) {
      this.logger.warn(`${command} warnings`, { operation, stderr: result.stderr.trim() });
    }

    return {
      filePath: outputPath,
      fileSize: stats.size,
      timestamp,
    };
  }

  private async removePartialFile(filePath: string): Promise<void> {
    try {
      await fs.rm(filePath, { force: true });
    } catch (error) {
      this.logger.warn('Failed to cleanup partial dump file', {
        filePath,
        error: formatError(error),
      });
    }
  }

  /**
   * Turn a tool's exit status and stderr into a helpful error message
   */
  private analyzeToolError(command: string, result: ProcessResult, operation: string): string {
    const { exitCode, stderr } = result;
    const lowerStderr = stderr.toLowerCase();

    if (lowerStderr.includes('password authentication failed') || lowerStderr.includes('authentication failed')) {
      return `${command} authentication failed (exit code ${exitCode}). Please check database credentials.`;
    }

    if (lowerStderr.includes('database') && lowerStderr.includes('does not exist')) {
      return `${command} failed: database does not exist (exit code ${exitCode}).`;
    }

    if (lowerStderr.includes('permission denied')) {
      return `${command} failed: insufficient permissions (exit code ${exitCode}).`;
    }

    if (lowerStderr.includes('connection') && (lowerStderr.includes('refused') || lowerStderr.includes('timeout'))) {
      return `${command} failed: unable to connect to ${this.getTarget()} (exit code ${exitCode}).`;
    }

    if (lowerStderr.includes('no space left on device')) {
      return `${command} failed: insufficient disk space (exit code ${exitCode}).`;
    }

    const details = stderr.trim() || 'No additional error information available';
    return `${command} ${operation} failed with exit code ${exitCode}. Error details: ${details}`;
  }

  private analyzeSpawnError(command: string, error: Error): string {
    const message = error.message.toLowerCase();

    if (message.includes('enoent')) {
      return `${command} command not found. Please ensure PostgreSQL client tools are installed.`;
    }

    if (message.includes('eacces')) {
      return `Permission denied executing ${command}.`;
    }

    return `Failed to execute ${command}: ${error.message}`;
  }
}
