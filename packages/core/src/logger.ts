export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Prefix shown after the timestamp, e.g. "render". */
  scope?: string;
  /** Sink for formatted lines. Defaults to process.stderr. */
  write?: (line: string) => void;
  /** Clock used for timestamps (tests pin it). */
  now?: () => Date;
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) return arg.stack ?? arg.message;
  if (typeof arg === 'string') return arg;
  try {
    return JSON.stringify(arg);
  } catch {
    return String(arg);
  }
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Leveled logger writing `[timestamp] LEVEL scope: message` lines.
 * Messages below the threshold are dropped; `silent` drops everything.
 */
export class ConsoleLogger implements Logger {
  private readonly threshold: number;
  private readonly write: (line: string) => void;
  private readonly now: () => Date;

  constructor(private readonly options: LoggerOptions = {}) {
    this.threshold = LOG_LEVELS.indexOf(options.level ?? 'info');
    this.write = options.write ?? ((line) => process.stderr.write(line));
    this.now = options.now ?? (() => new Date());
  }

  /** Same sink and level, different scope. */
  child(scope: string): ConsoleLogger {
    const parent = this.options.scope;
    return new ConsoleLogger({ ...this.options, scope: parent ? `${parent}:${scope}` : scope });
  }

  debug(message: string, ...args: unknown[]): void {
    this.log('debug', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.log('info', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.log('warn', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.log('error', message, args);
  }

  private log(level: Exclude<LogLevel, 'silent'>, message: string, args: unknown[]): void {
    if (LOG_LEVELS.indexOf(level) < this.threshold) return;
    const scope = this.options.scope ? ` ${this.options.scope}:` : '';
    const extra = args.length > 0 ? ` ${args.map(formatArg).join(' ')}` : '';
    this.write(`[${this.now().toISOString()}] ${level.toUpperCase()}${scope} ${message}${extra}\n`);
  }
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export function createLogger(options: LoggerOptions = {}): ConsoleLogger {
  return new ConsoleLogger(options);
}
