/**
 * Structured Logger — leveled logging with a component tag and bound context
 *
 * JSON lines in production (for log shippers), short human-readable lines
 * everywhere else. Level comes from ITEM_ISSUER_LOG_LEVEL unless given.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'debug',
  [LogLevel.INFO]: 'info',
  [LogLevel.WARN]: 'warn',
  [LogLevel.ERROR]: 'error',
  [LogLevel.SILENT]: 'silent',
};

export type LogFields = Record<string, unknown>;

export interface LogEntry {
  timestamp: string;
  level: string;
  component: string;
  message: string;
  [key: string]: unknown;
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  switch ((value ?? '').trim().toLowerCase()) {
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
      return undefined;
  }
}

export class StructuredLogger {
  private minLevel: LogLevel;
  private defaultContext: LogFields;
  private useJson: boolean;

  constructor(opts?: {
    minLevel?: LogLevel;
    context?: LogFields;
    json?: boolean;
  }) {
    this.minLevel = opts?.minLevel ?? parseLogLevel(process.env.ITEM_ISSUER_LOG_LEVEL) ?? LogLevel.INFO;
    this.defaultContext = opts?.context ?? {};
    this.useJson = opts?.json ?? (process.env.NODE_ENV === 'production');
  }

  get level(): LogLevel {
    return this.minLevel;
  }

  child(context: LogFields): StructuredLogger {
    return new StructuredLogger({
      minLevel: this.minLevel,
      context: { ...this.defaultContext, ...context },
      json: this.useJson,
    });
  }

  debug(component: string, message: string, data?: LogFields): void {
    this.log(LogLevel.DEBUG, component, message, data);
  }

  info(component: string, message: string, data?: LogFields): void {
    this.log(LogLevel.INFO, component, message, data);
  }

  warn(component: string, message: string, data?: LogFields): void {
    this.log(LogLevel.WARN, component, message, data);
  }

  error(component: string, message: string, data?: LogFields): void {
    this.log(LogLevel.ERROR, component, message, data);
  }

  private log(level: LogLevel, component: string, message: string, data?: LogFields): void {
    if (level < this.minLevel || this.minLevel === LogLevel.SILENT) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: LEVEL_NAMES[level],
      component,
      message,
      ...this.defaultContext,
      ...data,
    };

    if (this.useJson) {
      const output = JSON.stringify(entry);
      if (level >= LogLevel.ERROR) {
        process.stderr.write(output + '\n');
      } else {
        process.stdout.write(output + '\n');
      }
      return;
    }

    const ts = entry.timestamp.substring(11, 23); // HH:MM:SS.mmm
    const lvl = LEVEL_NAMES[level].toUpperCase().padEnd(5);
    const fields = { ...this.defaultContext, ...data };
    const extra = Object.keys(fields).length > 0 ? ' ' + JSON.stringify(fields) : '';
    const line = `${ts} ${lvl} [${component}] ${message}${extra}`;
    if (level >= LogLevel.ERROR) {
      console.error(line);
    } else if (level >= LogLevel.WARN) {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}

export const logger = new StructuredLogger();

export const silentLogger = new StructuredLogger({ minLevel: LogLevel.SILENT });
