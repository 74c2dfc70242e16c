import { createLogger, format, transports } from 'winston';
import type { Format, TransformableInfo } from 'logform';
import DailyRotateFile from 'winston-daily-rotate-file';
import type TransportStream from 'winston-transport';
import type { Logger, LoggerFactory } from 'global-logger-factory';
import { WinstonLogger } from 'global-logger-factory';
import { CRITICAL_MARKER } from './critical';
import { logContext } from './LogContext';

export interface ConfigurableLoggerOptions {
  /** Append-only log file. With `rotate`, a `%DATE%` pattern is allowed. */
  fileName?: string;
  rotate?: boolean;
  maxSize?: string;
  maxFiles?: string;
  /** Mirror entries to stderr. Defaults to true. */
  console?: boolean;
}

export interface LogLineFields {
  timestamp: string;
  level: string;
  label?: string;
  message: string;
  cycle?: number;
}

const LEVEL_NAMES: Record<string, string> = {
  error: 'ERROR',
  warn: 'WARNING',
  info: 'INFO',
  verbose: 'VERBOSE',
  debug: 'DEBUG',
  silly: 'SILLY',
};

const ALL_LEVELS = Object.keys(LEVEL_NAMES);

/**
 * `2026-01-01 12:00:00 [WARNING] [SupervisionLoop] (cycle 3) message`
 */
export function formatLogLine(fields: LogLineFields): string {
  let severity = LEVEL_NAMES[fields.level] ?? fields.level.toUpperCase();
  let message = fields.message;
  if (fields.level === 'error' && message.startsWith(CRITICAL_MARKER)) {
    severity = 'CRITICAL';
    message = message.slice(CRITICAL_MARKER.length);
  }
  const label = fields.label ? ` [${fields.label}]` : '';
  const cycle = fields.cycle === undefined ? '' : ` (cycle ${fields.cycle})`;
  return `${fields.timestamp} [${severity}]${label}${cycle} ${message}`;
}

export class ConfigurableLoggerFactory implements LoggerFactory {
  private readonly level: string;
  private readonly console: boolean;
  private readonly fileTransport?: TransportStream;

  public constructor(level: string, options: ConfigurableLoggerOptions = {}) {
    this.level = level;
    this.console = options.console ?? true;
    if (options.fileName) {
      this.fileTransport = options.rotate ?
        new DailyRotateFile({
          filename: options.fileName,
          datePattern: 'YYYY-MM-DD',
          maxSize: options.maxSize ?? '10m',
          maxFiles: options.maxFiles ?? '14d',
        }) :
        new transports.File({ filename: options.fileName });
      // Shared by every logger the factory creates.
      this.fileTransport.setMaxListeners(Infinity);
    }
  }

  public createLogger(label: string): Logger {
    return new WinstonLogger(createLogger({
      level: this.level,
      format: this.getFormat(label),
      transports: this.createTransports(),
    }));
  }

  protected createTransports(): TransportStream[] {
    const result: TransportStream[] = [];
    if (this.console) {
      // stdout is reserved for command output.
      result.push(new transports.Console({ stderrLevels: ALL_LEVELS }));
    }
    if (this.fileTransport) {
      result.push(this.fileTransport);
    }
    return result;
  }

  protected getFormat(label: string): Format {
    return format.combine(
      format.label({ label: shortLabel(label) }),
      format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      format.printf((info: TransformableInfo): string => formatLogLine({
        timestamp: String(info.timestamp),
        level: info.level,
        label: typeof info.label === 'string' ? info.label : undefined,
        message: String(info.message),
        cycle: logContext.getStore()?.cycle,
      })),
    );
  }
}

function shortLabel(label: string): string {
  return label.split('/').pop() ?? label;
}
