import chalk from 'chalk';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogFields = Record<string, unknown>;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLOR: Record<LogLevel, (text: string) => string> = {
  debug: (text) => chalk.gray(text),
  info: (text) => chalk.blue(text),
  warn: (text) => chalk.yellow(text),
  error: (text) => chalk.red(text),
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Unknown levels fall back to info
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = (value ?? '').toLowerCase();
  return isLogLevel(normalized) ? normalized : 'info';
}

/**
 * Strip CR/LF so a value cannot forge extra log lines
 */
export function sanitizeForLog(text: string): string {
  return text.replace(/[\r\n]/g, '');
}

function formatFieldValue(value: unknown): string {
  if (value instanceof Error) {
    return JSON.stringify(sanitizeForLog(value.message));
  }
  if (typeof value === 'string') {
    const clean = sanitizeForLog(value);
    return /[\s"=]/.test(clean) || clean === '' ? JSON.stringify(clean) : clean;
  }
  if (value === undefined) {
    return 'undefined';
  }
  return sanitizeForLog(JSON.stringify(value) ?? String(value));
}

export function formatFields(fields: LogFields): string {
  return Object.entries(fields)
    .map(([key, value]) => `${key}=${formatFieldValue(value)}`)
    .join(' ');
}

export class Logger {
  private level: LogLevel;
  private readonly write: (line: string) => void;

  constructor(level: LogLevel = 'info', write: (line: string) => void = (line) => process.stderr.write(line)) {
    this.level = level;
    this.write = write;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }

  log(level: LogLevel, message: string, fields?: LogFields): void {
    if (!this.isEnabled(level)) {
      return;
    }

    let line = `${LEVEL_COLOR[level](level.toUpperCase())} ${sanitizeForLog(message)}`;
    if (fields && Object.keys(fields).length > 0) {
      line += ` ${chalk.gray(formatFields(fields))}`;
    }

    this.write(`${line}\n`);
  }

  debug(message: string, fields?: LogFields): void {
    this.log('debug', message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.log('info', message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.log('warn', message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.log('error', message, fields);
  }
}
