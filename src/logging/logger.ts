import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  /** Adds values that must never appear in output from this logger */
  addRedaction(...secrets: string[]): void;
}

export type LogSink = (level: LogLevel, line: string) => void;

export interface ConsoleLoggerOptions {
  redact?: string[];
  verbose?: boolean;
  sink?: LogSink;
}

export const REDACTED = '<redacted>';

const LEVEL_STYLE: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red
};

const consoleSink: LogSink = (level, line) => {
  if (level === 'error') console.error(line);
  else if (level === 'warn') console.warn(line);
  else console.log(line);
};

export class ConsoleLogger implements Logger {
  private readonly secrets: string[] = [];
  private readonly verbose: boolean;
  private readonly sink: LogSink;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.sink = options.sink ?? consoleSink;
    this.addRedaction(...(options.redact ?? []));
  }

  debug(message: string, meta?: LogMeta): void {
    if (this.verbose) this.emit('debug', message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.emit('info', message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.emit('warn', message, meta);
  }

  error(message: string, meta?: LogMeta): void {
    this.emit('error', message, meta);
  }

  addRedaction(...secrets: string[]): void {
    for (const secret of secrets) {
      if (secret && !this.secrets.includes(secret)) {
        this.secrets.push(secret);
      }
    }
    // longest first so a secret containing another is replaced whole
    this.secrets.sort((a, b) => b.length - a.length);
  }

  redact(text: string): string {
    return this.secrets.reduce((out, secret) => out.split(secret).join(REDACTED), text);
  }

  private emit(level: LogLevel, message: string, meta?: LogMeta): void {
    // metadata strings are redacted before JSON escaping can split a secret apart
    const suffix = meta && Object.keys(meta).length > 0
      ? ` ${JSON.stringify(meta, (_key, value: unknown) => (typeof value === 'string' ? this.redact(value) : value))}`
      : '';
    const line = this.redact(`${message}${suffix}`);
    this.sink(level, `${LEVEL_STYLE[level](level.toUpperCase().padEnd(5))} ${line}`);
  }
}

export function createLogger(options: ConsoleLoggerOptions = {}): ConsoleLogger {
  return new ConsoleLogger(options);
}
