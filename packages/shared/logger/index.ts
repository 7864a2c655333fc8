/**
 * Bakeline Logger — named loggers with adjustable levels
 *
 * Loggers are looked up by name and shared process-wide, so a level set on
 * `getLogger('recipes')` affects every module that logs through it.
 *
 * Environment:
 *   BAKELINE_LOG_LEVEL = debug|info|warn|error (default: info)
 *   BAKELINE_LOG_JSON  = 1 for JSON lines
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function defaultLevel(): LogLevel {
  const raw = (process.env.BAKELINE_LOG_LEVEL || 'info').toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

export type LogSink = (level: LogLevel, line: string) => void;

const consoleSink: LogSink = (level, line) => {
  if (level === 'error' || level === 'warn') {
    process.stderr.write(line + '\n');
  } else {
    process.stdout.write(line + '\n');
  }
};

let sink: LogSink = consoleSink;

/** Redirect all log output. Returns a function restoring the previous sink. */
export function setLogSink(next: LogSink): () => void {
  const previous = sink;
  sink = next;
  return () => {
    sink = previous;
  };
}

export class Logger {
  readonly name: string;
  private level: LogLevel;
  // Active withLogLevel scopes; the most verbose one wins while any is open.
  private overrides = new Map<symbol, LogLevel>();

  constructor(name: string, level: LogLevel = defaultLevel()) {
    this.name = name;
    this.level = level;
  }

  /** The effective level, including any open override. */
  getLevel(): LogLevel {
    let effective = this.level;
    for (const forced of this.overrides.values()) {
      if (LEVEL_ORDER[forced] < LEVEL_ORDER[effective]) effective = forced;
    }
    return effective;
  }

  /** Sets the base level; open overrides still apply on top of it. */
  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /** Opens an override scope. The returned function closes it. */
  override(level: LogLevel): () => void {
    const token = Symbol(this.name);
    this.overrides.set(token, level);
    return () => {
      this.overrides.delete(token);
    };
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.getLevel()];
  }

  debug(msg: string, data?: Record<string, unknown>): void { this.emit('debug', msg, data); }
  info(msg: string, data?: Record<string, unknown>): void { this.emit('info', msg, data); }
  warn(msg: string, data?: Record<string, unknown>): void { this.emit('warn', msg, data); }
  error(msg: string, data?: Record<string, unknown>): void { this.emit('error', msg, data); }

  private emit(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) return;

    const ts = new Date().toISOString();
    if (process.env.BAKELINE_LOG_JSON === '1') {
      const entry: Record<string, unknown> = { ts, level, logger: this.name, msg: message };
      if (data) entry.data = data;
      sink(level, JSON.stringify(entry));
      return;
    }

    const prefix = `[${ts}] [${level.toUpperCase().padEnd(5)}] [${this.name}]`;
    sink(level, data ? `${prefix} ${message} ${JSON.stringify(data)}` : `${prefix} ${message}`);
  }
}

const registry = new Map<string, Logger>();

export function getLogger(name: string): Logger {
  let logger = registry.get(name);
  if (!logger) {
    logger = new Logger(name);
    registry.set(name, logger);
  }
  return logger;
}

/**
 * Run `fn` with the named logger forced to at least `level` until `fn`
 * settles. Overlapping calls each hold their own scope, so the base level
 * comes back only once the last of them has finished.
 */
export async function withLogLevel<T>(name: string, level: LogLevel, fn: () => Promise<T>): Promise<T> {
  const release = getLogger(name).override(level);
  try {
    return await fn();
  } finally {
    release();
  }
}
