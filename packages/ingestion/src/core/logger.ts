export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogMeta = Record<string, unknown>;

export type LogWriter = (line: string) => void;

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

// stdout belongs to the record sink; diagnostics always go to stderr.
const stderrWriter: LogWriter = (line) => {
  process.stderr.write(`${line}\n`);
};

function serializeValue(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message, stack: value.stack };
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  return value;
}

interface LoggerState {
  level: LogLevel;
}

export class Logger {
  private readonly state: LoggerState;

  constructor(
    level: LogLevel | LoggerState = 'info',
    private readonly write: LogWriter = stderrWriter,
    private readonly scope?: string,
  ) {
    // Children share the parent's state so a later setLevel reaches them too.
    this.state = typeof level === 'string' ? { level } : level;
  }

  get level(): LogLevel {
    return this.state.level;
  }

  setLevel(level: LogLevel) {
    this.state.level = level;
  }

  child(scope: string): Logger {
    return new Logger(this.state, this.write, this.scope ? `${this.scope}.${scope}` : scope);
  }

  private log(level: LogLevel, message: string, meta?: LogMeta) {
    if (LEVEL_WEIGHT[level] < LEVEL_WEIGHT[this.state.level]) return;

    const entry: LogMeta = {
      timestamp: new Date().toISOString(),
      level,
      ...(this.scope ? { scope: this.scope } : {}),
      message,
    };
    for (const [key, value] of Object.entries(meta ?? {})) {
      entry[key] = serializeValue(value);
    }
    this.write(JSON.stringify(entry));
  }

  debug(message: string, meta?: LogMeta) {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: LogMeta) {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: LogMeta) {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: LogMeta) {
    this.log('error', message, meta);
  }
}

export const logger = new Logger();
