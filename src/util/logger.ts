interface LogFields {
  [key: string]: unknown;
  msg: string;
  level: string;
  time: string; // ISO timestamp
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'json' | 'human';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];
export const LOG_FORMATS: readonly LogFormat[] = ['human', 'json'];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

const RESET = '\x1b[0m';
const DIM = '\x1b[2m';

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m',
  info: '\x1b[34m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

export function isLogFormat(value: string): value is LogFormat {
  return LOG_FORMATS.some(format => format === value);
}

export type LogSink = (line: string) => void;

const stdoutSink: LogSink = line => {
  process.stdout.write(line);
};

export class Logger {
  constructor(
    private level: LogLevel = 'warn',
    private format: LogFormat = 'human',
    private sink: LogSink = stdoutSink
  ) {}

  setLevel(level: LogLevel) {
    this.level = level;
  }

  setFormat(format: LogFormat) {
    this.format = format;
  }

  setSink(sink: LogSink) {
    this.sink = sink;
  }

  private should(level: LogLevel) {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private formatTime(date: Date): string {
    return date.toLocaleTimeString('en-US', {
      hour12: false,
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit'
    });
  }

  private formatFields(fields?: Record<string, unknown>): string {
    if (!fields || Object.keys(fields).length === 0) return '';

    const formatted = Object.entries(fields)
      .map(([key, value]) => {
        const valueStr = typeof value === 'string' ? value : JSON.stringify(value);
        return `${DIM}${key}=${valueStr}${RESET}`;
      })
      .join(' ');

    return ` ${formatted}`;
  }

  /** `HH:MM:SS LEVEL message key=value ...`, level padded to one width. */
  private writeHuman(level: LogLevel, msg: string, fields?: Record<string, unknown>) {
    const timestamp = `${DIM}${this.formatTime(new Date())}${RESET}`;
    const levelStr = `${LEVEL_COLORS[level]}${level.toUpperCase().padEnd(5)}${RESET}`;
    this.sink(`${timestamp} ${levelStr} ${msg}${this.formatFields(fields)}\n`);
  }

  private writeJson(level: LogLevel, msg: string, fields?: Record<string, unknown>) {
    const rec: LogFields = {
      ...(fields || {}),
      level,
      msg,
      time: new Date().toISOString()
    };
    this.sink(JSON.stringify(rec) + '\n');
  }

  private write(level: LogLevel, msg: string, fields?: Record<string, unknown>) {
    if (!this.should(level)) return;

    if (this.format === 'human') {
      this.writeHuman(level, msg, fields);
    } else {
      this.writeJson(level, msg, fields);
    }
  }

  debug(msg: string, fields?: Record<string, unknown>) { this.write('debug', msg, fields); }
  info(msg: string, fields?: Record<string, unknown>) { this.write('info', msg, fields); }
  warn(msg: string, fields?: Record<string, unknown>) { this.write('warn', msg, fields); }
  error(msg: string, fields?: Record<string, unknown>) { this.write('error', msg, fields); }
}

const envLevel = process.env.LOG_LEVEL ?? '';
const envFormat = process.env.LOG_FORMAT ?? '';

export const logger = new Logger(
  isLogLevel(envLevel) ? envLevel : 'warn',
  isLogFormat(envFormat) ? envFormat : 'human'
);
