export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

interface LevelRef {
  value: number;
}

/** Render an unknown thrown value for a log line. */
export function describeError(err: unknown): Record<string, unknown> {
  if (err instanceof Error) {
    return { error: err.message, errorName: err.name, stack: err.stack };
  }
  return { error: String(err) };
}

/**
 * JSON-lines logger. Children share their parent's level, so a runtime
 * level change applies to all of them.
 */
export class Logger {
  private readonly level: LevelRef;
  private readonly bindings: Record<string, unknown>;

  constructor(level: LogLevel = 'info', bindings: Record<string, unknown> = {}, shared?: LevelRef) {
    this.level = shared ?? { value: LEVELS[level] ?? LEVELS.info };
    this.bindings = bindings;
  }

  /** A logger that adds `bindings` to every entry. */
  child(bindings: Record<string, unknown>): Logger {
    return new Logger('info', { ...this.bindings, ...bindings }, this.level);
  }

  setLevel(level: LogLevel): void {
    this.level.value = LEVELS[level];
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.log('debug', msg, data);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.log('info', msg, data);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.log('warn', msg, data);
  }

  error(msg: string, data?: Record<string, unknown>): void {
    this.log('error', msg, data);
  }

  private log(level: LogLevel, msg: string, data?: Record<string, unknown>): void {
    if (LEVELS[level] < this.level.value) return;
    const entry = {
      timestamp: new Date().toISOString(),
      level,
      msg,
      ...this.bindings,
      ...data,
    };
    process.stdout.write(JSON.stringify(entry) + '\n');
  }
}
