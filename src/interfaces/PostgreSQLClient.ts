import { RestoreScope } from './RestoreExecutor';

export interface DumpInfo {
  filePath: string;
  fileSize: number;
  timestamp: Date;
}

export interface TableInfo {
  schema: string;
  name: string;
}

/**
 * Dump engine, restore engine and catalog queries against the target server
 */
export interface PostgreSQLClient {
  testConnection(): Promise<boolean>;

  dumpCluster(outputPath: string): Promise<DumpInfo>;
  dumpGlobals(outputPath: string): Promise<DumpInfo>;
  dumpDatabase(databaseName: string, outputPath: string): Promise<DumpInfo>;

  /** Stream a compressed dump into the server */
  restoreDump(inputPath: string, scope: RestoreScope): Promise<void>;

  listDatabases(): Promise<string[]>;
  listRoles(): Promise<string[]>;
  listTables(databaseName: string): Promise<TableInfo[]>;

  /** host:port the client talks to */
  getTarget(): string;
}
