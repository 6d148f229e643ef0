/**
 * Leveled logging for the indexer, the stores and the CLI.
 *
 * Level comes from CODEATLAS_LOG_LEVEL; CODEATLAS_QUIET=true drops everything
 * below ERROR. Messages and metadata pass through secret redaction before they
 * are written.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export type LogValue = string | number | boolean | null | undefined | LogValue[] | { [key: string]: LogValue };

export interface LogMetadata {
  [key: string]: LogValue;
}

const REDACTION_TEXT = '[REDACTED]';

const SECRET_VALUE_PATTERNS: RegExp[] = [
  /sk-[a-zA-Z0-9_-]{16,}/g, // OpenAI style keys
  /Bearer\s+[A-Za-z0-9._-]{20,}/gi,
  /eyJ[A-Za-z0-9_-]{10,}\.[A-Za-z0-9_-]{10,}\.[A-Za-z0-9_-]{5,}/g, // JWT
  /(?:api[_-]?key|secret|token|password)[\s:=]+[A-Za-z0-9._-]{8,}/gi
];

const SECRET_ENV_NAMES = ['OPENAI_API_KEY', 'CODEATLAS_EMBEDDING_API_KEY'];

const SENSITIVE_KEY_TOKENS = new Set([
  'token',
  'secret',
  'password',
  'authorization',
  'apikey',
  'bearer'
]);

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function keyTokens(key: string): string[] {
  return key
    .replace(/([a-z])([A-Z])/g, '$1_$2')
    .split(/[^a-zA-Z0-9]+/)
    .filter(Boolean)
    .map((token) => token.toLowerCase());
}

function isSensitiveKey(key: string): boolean {
  const tokens = keyTokens(key);
  if (tokens.includes('api') && tokens.includes('key')) return true;
  return tokens.some((token) => SENSITIVE_KEY_TOKENS.has(token));
}

export function redactString(value: string): string {
  let redacted = value;

  for (const envName of SECRET_ENV_NAMES) {
    const pattern = new RegExp(`\\b${escapeRegExp(envName)}\\s*=\\s*([^\\s;]+)`, 'g');
    redacted = redacted.replace(pattern, `${envName}=${REDACTION_TEXT}`);
  }

  for (const pattern of SECRET_VALUE_PATTERNS) {
    pattern.lastIndex = 0;
    redacted = redacted.replace(pattern, REDACTION_TEXT);
  }

  return redacted;
}

function redactValue(value: LogValue): LogValue {
  if (typeof value === 'string') return redactString(value);
  if (Array.isArray(value)) return value.map(redactValue);
  if (value !== null && typeof value === 'object') {
    return redactMetadata(value);
  }
  return value;
}

function redactMetadata(meta: LogMetadata): LogMetadata {
  const result: LogMetadata = {};
  for (const [key, value] of Object.entries(meta)) {
    result[key] = isSensitiveKey(key) ? REDACTION_TEXT : redactValue(value);
  }
  return result;
}

export function redactLogData(message: string, meta?: LogMetadata): { message: string; meta?: LogMetadata } {
  return {
    message: redactString(message),
    meta: meta ? redactMetadata(meta) : undefined
  };
}

export function parseLogLevel(raw: string | undefined, fallback: LogLevel): LogLevel {
  switch (raw?.toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    case 'silent':
      return LogLevel.SILENT;
    default:
      return fallback;
  }
}

class Logger {
  private level: LogLevel;
  private quiet: boolean;

  constructor() {
    this.quiet = process.env.CODEATLAS_QUIET === 'true';
    this.level = parseLogLevel(
      process.env.CODEATLAS_LOG_LEVEL,
      this.quiet ? LogLevel.ERROR : LogLevel.INFO
    );
  }

  private formatMessage(level: string, message: string, meta?: LogMetadata): string {
    const prefix = `[${new Date().toISOString()}] [${level}]`;
    const safe = redactLogData(message, meta);

    if (safe.meta && Object.keys(safe.meta).length > 0) {
      return `${prefix} ${safe.message} ${JSON.stringify(safe.meta)}`;
    }
    return `${prefix} ${safe.message}`;
  }

  debug(message: string, meta?: LogMetadata): void {
    if (this.level > LogLevel.DEBUG) return;
    process.stderr.write(`${this.formatMessage('DEBUG', message, meta)}\n`);
  }

  info(message: string, meta?: LogMetadata): void {
    if (this.level > LogLevel.INFO) return;
    process.stderr.write(`${this.formatMessage('INFO', message, meta)}\n`);
  }

  warn(message: string, meta?: LogMetadata): void {
    if (this.level > LogLevel.WARN) return;
    console.warn(this.formatMessage('WARN', message, meta));
  }

  error(message: string, error?: unknown, meta?: LogMetadata): void {
    if (this.level > LogLevel.ERROR) return;

    const errorMeta: LogMetadata = {
      ...meta,
      ...(error instanceof Error
        ? { errorName: error.name, errorMessage: error.message, errorStack: error.stack }
        : error === undefined ? {} : { error: String(error) })
    };

    console.error(this.formatMessage('ERROR', message, errorMeta));
  }

  isQuiet(): boolean {
    return this.quiet;
  }

  /** Quiet mode raises the level to at least WARN. */
  setQuiet(quiet: boolean): void {
    this.quiet = quiet;
    if (quiet && this.level < LogLevel.WARN) {
      this.level = LogLevel.WARN;
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }
}

export const logger = new Logger();

/**
 * User-facing CLI output, written to stdout without a level prefix.
 */
export function print(message: string): void {
  process.stdout.write(`${message}\n`);
}

export const log = {
  debug: (message: string, meta?: LogMetadata) => logger.debug(message, meta),
  info: (message: string, meta?: LogMetadata) => logger.info(message, meta),
  warn: (message: string, meta?: LogMetadata) => logger.warn(message, meta),
  error: (message: string, error?: unknown, meta?: LogMetadata) =>
    logger.error(message, error, meta),
  isQuiet: () => logger.isQuiet(),
  setQuiet: (quiet: boolean) => logger.setQuiet(quiet),
  setLevel: (level: LogLevel) => logger.setLevel(level),
  getLevel: () => logger.getLevel(),
};
