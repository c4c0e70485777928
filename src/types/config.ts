/**
 * Entry store configuration types.
 */

/** pino log levels accepted by the logger factory. */
export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggingConfig {
  /** Minimum level for store loggers and the root logger (default: 'info') */
  level: LogLevel;
  /** Log file path relative to the log root passed to initLogger (default: 'logs/entry-store.log') */
  filePath: string;
}

export interface EntryStoreConfig {
  /**
   * Rewrite the backing file through a temp file and rename instead of
   * overwriting it in place (default: false).
   */
  atomicRewrite: boolean;
  /** Permission bits used when the backing file is created (default: 0o644) */
  fileMode: number;
  logging: LoggingConfig;
}

/** Overrides accepted by loadConfig and EntryStore.open. */
export interface EntryStoreOptions {
  atomicRewrite?: boolean;
  fileMode?: number;
  logging?: Partial<LoggingConfig>;
}
