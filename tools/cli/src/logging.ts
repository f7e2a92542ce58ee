import { appendFileSync } from 'node:fs';
import { formatTimestamp } from './time';

export type LogLevel = 'INFO' | 'WARNING' | 'ERROR';

export type Logger = {
  info: (message: string, meta?: unknown) => void;
  warn: (message: string, meta?: unknown) => void;
  error: (message: string, meta?: unknown) => void;
};

export type LoggerOptions = {
  filePath?: string;
  console?: boolean;
  now?: () => Date;
};

type SerializableValue = Record<string, unknown> | unknown[] | string | number | boolean | null | undefined;

const COLORS: Record<LogLevel, string> = {
  INFO: '',
  WARNING: '\x1b[33m',
  ERROR: '\x1b[31m',
};

const RESET = '\x1b[0m';

const sanitize = (value: unknown, seen = new WeakSet<object>()): SerializableValue => {
  if (value === null || value === undefined) {
    return value;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value !== 'object') {
    return String(value);
  }
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  if (seen.has(value)) {
    return '[circular]';
  }
  seen.add(value);
  if (Array.isArray(value)) {
    return value.map((entry) => sanitize(entry, seen));
  }
  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    result[key] = sanitize(entry, seen);
  }
  return result;
};

const serialize = (value: unknown): string => {
  try {
    return JSON.stringify(sanitize(value)) ?? String(value);
  } catch {
    return '[unserializable]';
  }
};

export const formatLogLine = (level: LogLevel, message: string, meta: unknown, at: Date): string => {
  const suffix = meta === undefined ? '' : ` ${serialize(meta)}`;
  return `${formatTimestamp(at)} [${level}] ${message}${suffix}`;
};

/**
 * Console + file logger. Lines are appended synchronously so the log is
 * complete even when the process exits right after a fatal error.
 */
export const createLogger = (options: LoggerOptions = {}): Logger => {
  const now = options.now ?? (() => new Date());
  const toConsole = options.console ?? true;
  let filePath = options.filePath;

  const write = (level: LogLevel, message: string, meta?: unknown): void => {
    const line = formatLogLine(level, message, meta, now());
    if (toConsole) {
      const colored = COLORS[level] ? `${COLORS[level]}${line}${RESET}` : line;
      if (level === 'ERROR') {
        console.error(colored);
      } else if (level === 'WARNING') {
        console.warn(colored);
      } else {
        console.log(colored);
      }
    }
    if (filePath) {
      try {
        appendFileSync(filePath, `${line}\n`, 'utf8');
      } catch (error) {
        const failedPath = filePath;
        filePath = undefined;
        console.error(
          `${COLORS.ERROR}log file ${failedPath} is no longer writable: ${serialize(error)}${RESET}`,
        );
      }
    }
  };

  return {
    info: (message, meta) => write('INFO', message, meta),
    warn: (message, meta) => write('WARNING', message, meta),
    error: (message, meta) => write('ERROR', message, meta),
  };
};
