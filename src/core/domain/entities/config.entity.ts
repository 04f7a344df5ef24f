export type LoaderKind = "psql" | "pg-copy" | "sqlite";

export type CleanupPolicy = "on-success" | "never";

export interface PsqlLoaderConfig {
  command: string;
  database: string;
}

export interface PgCopyLoaderConfig {
  /** Falls back to the PG* environment variables when unset. */
  connectionString?: string;
  maxConnections: number;
}

export interface SqliteLoaderConfig {
  path: string;
}

export interface LoaderConfig {
  kind: LoaderKind;
  table: string;
  delimiter: string;
  psql: PsqlLoaderConfig;
  pg: PgCopyLoaderConfig;
  sqlite: SqliteLoaderConfig;
}

export interface RunConfig {
  chunks: number;
  /** Upper bound on parallel loads when no explicit concurrency is given. */
  maxConcurrency: number;
  concurrency?: number;
  /** 0 disables the per-chunk timeout. */
  chunkTimeoutMs: number;
  /** Parent of the per-run workspace; empty means the OS temp dir. */
  workDir: string;
  cleanup: CleanupPolicy;
  failOnChunkError: boolean;
}

export interface LoggingConfig {
  dir: string;
  runLog: string;
}

export interface ReportConfig {
  enabled: boolean;
  outputDir: string;
  retainCount: number;
}

export interface Config {
  loader: LoaderConfig;
  run: RunConfig;
  logging: LoggingConfig;
  report: ReportConfig;
}
