// ──────────────────────────────────────────
// Platform: tagged console logger with optional rotating file
// ──────────────────────────────────────────

import fs from 'fs';
import path from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export const MAX_LOG_BYTES = 5 * 1024 * 1024;
const BACKUP_COUNT = 3;

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

interface LoggerSettings {
  level: LogLevel;
  file: string | null;
}

const settings: LoggerSettings = {
  level: parseLevel(process.env.LOG_LEVEL),
  file: null,
};

function parseLevel(raw: string | undefined): LogLevel {
  return raw === 'debug' || raw === 'warn' || raw === 'error' ? raw : 'info';
}

export function configureLogger(next: Partial<LoggerSettings>): void {
  if (next.level) settings.level = next.level;
  if (next.file !== undefined) {
    settings.file = next.file;
    if (next.file) fs.mkdirSync(path.dirname(next.file), { recursive: true });
  }
}

function rotate(file: string): void {
  for (let i = BACKUP_COUNT - 1; i >= 1; i--) {
    const from = `${file}.${i}`;
    if (fs.existsSync(from)) fs.renameSync(from, `${file}.${i + 1}`);
  }
  fs.renameSync(file, `${file}.1`);
}

/** Whether appending `line` and its newline would push a file of `size` bytes past the cap. */
export function exceedsLogCap(size: number, line: string): boolean {
  return size + Buffer.byteLength(line, 'utf-8') + 1 > MAX_LOG_BYTES;
}

function writeFile(file: string, line: string): void {
  try {
    if (fs.existsSync(file) && exceedsLogCap(fs.statSync(file).size, line)) {
      rotate(file);
    }
    fs.appendFileSync(file, `${line}\n`);
  } catch (err) {
    // File logging is best-effort; the console line has already been written.
    settings.file = null;
    console.error('[Logger] Disabled file output:', err instanceof Error ? err.message : err);
  }
}

function emit(level: LogLevel, tag: string, message: string, data?: Record<string, unknown>): void {
  if (LEVELS[level] < LEVELS[settings.level]) return;

  const suffix = data ? ` ${JSON.stringify(data)}` : '';
  const line = `[${tag}] ${message}${suffix}`;

  switch (level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.info(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line);
      break;
  }

  if (settings.file) {
    writeFile(settings.file, `${new Date().toISOString()} | ${level.toUpperCase().padEnd(5)} | ${line}`);
  }
}

export function createLogger(tag: string): Logger {
  return {
    debug: (message, data) => emit('debug', tag, message, data),
    info: (message, data) => emit('info', tag, message, data),
    warn: (message, data) => emit('warn', tag, message, data),
    error: (message, data) => emit('error', tag, message, data),
  };
}
