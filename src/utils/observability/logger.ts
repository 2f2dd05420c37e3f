/**
 * Structured JSON logger.
 *
 * Records go to stdout (stderr for warn/error) as one JSON object per line.
 * In development they are also appended to an NDJSON file under
 * `APP_LOG_DIR/<date>/app.ndjson` unless `APP_LOG_FILE=off`.
 *
 * `APP_LOG_LEVEL` sets the threshold (debug, info, warn, error, silent).
 * It is read on every call so tests can flip it.
 */

import { WriteStream, createWriteStream, existsSync, mkdirSync } from 'fs';
import { dirname, join } from 'path';
import { getLogContext } from './context.js';
import { redactSecrets } from './redaction.js';
import type {
  AppLogger,
  AppLogRecord,
  LogContext,
  LogData,
  LogLevel,
  LogThreshold,
} from './types.js';

const LEVEL_RANK: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isDevelopment(): boolean {
  return process.env.NODE_ENV === 'development';
}

function currentThreshold(): LogThreshold {
  const raw = process.env.APP_LOG_LEVEL?.toLowerCase();
  if (raw === 'debug' || raw === 'info' || raw === 'warn' || raw === 'error' || raw === 'silent') {
    return raw;
  }
  return isDevelopment() ? 'debug' : 'info';
}

function isEnabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[currentThreshold()];
}

/**
 * Append-only NDJSON file, reopened when the target path changes (new day
 * or new APP_LOG_FILE). Failures are reported once on stderr and disable
 * the sink until the path changes.
 */
class FileSink {
  private current: { path: string; stream: WriteStream | null } | null = null;

  write(line: string): void {
    if (!isDevelopment() || process.env.APP_LOG_FILE === 'off') return;

    const stream = this.streamFor(this.targetPath());
    stream?.write(`${line}\n`);
  }

  close(): void {
    this.current?.stream?.end();
    this.current = null;
  }

  private targetPath(): string {
    if (process.env.APP_LOG_FILE) return process.env.APP_LOG_FILE;
    const baseDir = process.env.APP_LOG_DIR || './logs';
    return join(baseDir, new Date().toISOString().slice(0, 10), 'app.ndjson');
  }

  private streamFor(path: string): WriteStream | null {
    if (this.current?.path === path) return this.current.stream;
    this.close();

    try {
      const dir = dirname(path);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
      const stream = createWriteStream(path, { flags: 'a', encoding: 'utf-8' });
      stream.on('error', (error) => {
        process.stderr.write(`log file sink failed: ${error.message}\n`);
        if (this.current?.stream === stream) this.current.stream = null;
      });
      this.current = { path, stream };
    } catch (error) {
      process.stderr.write(`log file sink unavailable: ${error instanceof Error ? error.message : String(error)}\n`);
      this.current = { path, stream: null };
    }
    return this.current.stream;
  }
}

const fileSink = new FileSink();
let exitHookInstalled = false;

function toRecord(
  level: LogLevel,
  event: string,
  baseContext: LogContext,
  data?: LogData,
): AppLogRecord {
  return {
    timestamp: new Date().toISOString(),
    level,
    event,
    ...getLogContext(),
    ...baseContext,
    ...(data ? redactSecrets(data) : {}),
  };
}

function emit(record: AppLogRecord): void {
  const line = JSON.stringify(record);
  const stream = record.level === 'warn' || record.level === 'error' ? process.stderr : process.stdout;
  stream.write(`${line}\n`);
  fileSink.write(line);
}

export function createLogger(baseContext: LogContext = {}): AppLogger {
  const log = (level: LogLevel, event: string, data?: LogData): void => {
    if (!isEnabled(level)) return;
    emit(toRecord(level, event, baseContext, data));
  };

  return {
    debug: (event, data) => log('debug', event, data),
    info: (event, data) => log('info', event, data),
    warn: (event, data) => log('warn', event, data),
    error: (event, data) => log('error', event, data),
    child: (context) => createLogger({ ...baseContext, ...context }),
  };
}

/**
 * Flush the file sink when the process exits. Safe to call more than once.
 */
export function initObservability(): void {
  if (exitHookInstalled) return;
  exitHookInstalled = true;
  process.once('exit', () => fileSink.close());
}
