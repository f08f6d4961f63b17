export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'json' | 'human';
export type LogFields = Record<string, unknown>;

interface LogRecord extends LogFields {
  level: LogLevel;
  msg: string;
  time: string; // ISO timestamp
}

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

// ANSI color codes
const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  gray: '\x1b[90m',
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: COLORS.gray,
  info: COLORS.blue,
  warn: COLORS.yellow,
  error: COLORS.red
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  color?: boolean;
}

/**
 * Leveled logger. Warnings and errors go to stderr, everything else to stdout.
 * Children share the parent's level and add their own bound fields.
 */
export class Logger {
  private state: { level: LogLevel };
  private readonly format: LogFormat;
  private readonly color: boolean;

  constructor(options: LoggerOptions = {}, private readonly bindings: LogFields = {}, state?: { level: LogLevel }) {
    this.state = state ?? { level: options.level ?? 'info' };
    this.format = options.format ?? 'human';
    this.color = options.color ?? false;
  }

  setLevel(level: LogLevel): void {
    this.state.level = level;
  }

  getLevel(): LogLevel {
    return this.state.level;
  }

  child(bindings: LogFields): Logger {
    return new Logger(
      { format: this.format, color: this.color },
      { ...this.bindings, ...bindings },
      this.state
    );
  }

  debug(msg: string, fields?: LogFields): void { this.write('debug', msg, fields); }
  info(msg: string, fields?: LogFields): void { this.write('info', msg, fields); }
  warn(msg: string, fields?: LogFields): void { this.write('warn', msg, fields); }
  error(msg: string, fields?: LogFields): void { this.write('error', msg, fields); }

  private write(level: LogLevel, msg: string, fields?: LogFields): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.state.level]) return;

    const merged = { ...this.bindings, ...fields };
    const line = this.format === 'json'
      ? this.formatJson(level, msg, merged)
      : this.formatHuman(level, msg, merged);

    const stream = LEVEL_ORDER[level] >= LEVEL_ORDER.warn ? process.stderr : process.stdout;
    stream.write(`${line}\n`);
  }

  private paint(color: string, text: string): string {
    return this.color ? `${color}${text}${COLORS.reset}` : text;
  }

  private formatHuman(level: LogLevel, msg: string, fields: LogFields): string {
    const time = this.paint(COLORS.gray, new Date().toISOString().slice(11, 19));
    const label = this.paint(LEVEL_COLORS[level], level.toUpperCase().padEnd(5));
    const pairs = Object.entries(fields)
      .filter(([, value]) => value !== undefined)
      .map(([key, value]) => this.paint(COLORS.dim, `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`));

    return [time, label, msg, ...pairs].join(' ');
  }

  private formatJson(level: LogLevel, msg: string, fields: LogFields): string {
    const record: LogRecord = {
      ...fields,
      level,
      msg,
      time: new Date().toISOString()
    };
    return JSON.stringify(record);
  }
}

const envLevel = (process.env.LOG_LEVEL || 'info').toLowerCase();

export const logger = new Logger({
  level: isLogLevel(envLevel) ? envLevel : 'info',
  format: process.env.LOG_FORMAT === 'json' ? 'json' : 'human',
  color: Boolean(process.stdout.isTTY) && !process.env.NO_COLOR
});
