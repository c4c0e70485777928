/**
 * pino logger factory for entry stores.
 *
 * One process-wide root logger, installed by initLogger and resolved through
 * the same config as the stores (options > ENTRY_STORE_LOG_* env > defaults).
 * Stores take child loggers from getLogger('store:entries') at open time and
 * apply their own configured level to that child.
 *
 * Until initLogger runs, getLogger returns a warn-level stderr logger, so
 * library code never writes to stdout.
 */

import pino from 'pino';
import type { Logger } from 'pino';
import { join } from 'node:path';
import { loadConfig } from './config.js';
import type { EntryStoreOptions } from '../types/config.js';

let rootLogger: Logger | null = null;
let destination: ReturnType<typeof pino.destination> | null = null;

const levelFormatter = (label: string) => ({ level: label.toUpperCase() });

/**
 * Install the root logger, writing JSON lines to `logging.filePath` under
 * `logRoot`. Replaces any logger installed before.
 *
 * @returns The root logger and the resolved log file path
 */
export function initLogger(
  logRoot: string,
  options?: EntryStoreOptions,
): { logger: Logger; filePath: string } {
  const { logging } = loadConfig(options);
  const filePath = join(logRoot, logging.filePath);

  closeLogger();

  // Sync writes: a CLI or test process may exit right after the last call.
  const dest = pino.destination({ dest: filePath, mkdir: true, sync: true });
  destination = dest;
  rootLogger = pino(
    {
      level: logging.level,
      formatters: { level: levelFormatter },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    dest,
  );

  return { logger: rootLogger, filePath };
}

/**
 * Get a child logger bound to a subsystem name.
 *
 * @param subsystem - Logical subsystem name (e.g. 'store:entries')
 */
export function getLogger(subsystem: string): Logger {
  if (!rootLogger) {
    return pino({ level: 'warn', formatters: { level: levelFormatter } }, pino.destination(2))
      .child({ subsystem });
  }
  return rootLogger.child({ subsystem });
}

/**
 * Flush and close the root logger. Loggers handed out afterwards fall back
 * to stderr.
 */
export function closeLogger(): void {
  if (rootLogger) {
    rootLogger.flush();
  }
  destination?.end();
  rootLogger = null;
  destination = null;
}
