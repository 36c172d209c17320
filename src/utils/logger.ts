import { IDebugConfig, LogLevel, loadDebugConfig } from '../config/debug';
import { ILogger } from '../parser/types';

interface ILogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  [key: string]: unknown;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3
};

function serializeError(error: Error): Record<string, unknown> {
  return { name: error.name, message: error.message, stack: error.stack };
}

const replacer = (_key: string, value: unknown): unknown =>
  value instanceof Error ? serializeError(value) : value;

function formatPretty(entry: ILogEntry): string {
  const { timestamp, level, message, ...rest } = entry;
  const base = `${timestamp} [${level.toUpperCase()}] [restfilter] ${message}`;

  if (Object.keys(rest).length === 0) {
    return base;
  }
  return `${base} ${JSON.stringify(rest, replacer)}`;
}

function formatJson(entry: ILogEntry): string {
  return JSON.stringify(entry, replacer);
}

/**
 * Where formatted lines go. Defaults to stderr so that stdout stays free
 * for the host application.
 */
export type LogSink = (line: string) => void;

/**
 * Console-backed logger honouring the debug configuration
 */
export class ConsoleLogger implements ILogger {
  constructor(
    private readonly config: IDebugConfig = loadDebugConfig(),
    private readonly sink: LogSink = line => console.error(line)
  ) {}

  public debug(message: string, payload?: unknown): void {
    if (this.config.enabled) {
      this.emit(LogLevel.DEBUG, message, payload);
    }
  }

  public info(message: string, payload?: unknown): void {
    this.emit(LogLevel.INFO, message, payload);
  }

  public warn(message: string, payload?: unknown): void {
    this.emit(LogLevel.WARN, message, payload);
  }

  public error(message: string, payload?: unknown): void {
    this.emit(LogLevel.ERROR, message, payload);
  }

  private emit(level: LogLevel, message: string, payload?: unknown): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.config.logLevel]) {
      return;
    }

    const entry: ILogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message
    };

    if (payload instanceof Error) {
      entry.error = serializeError(payload);
    } else if (typeof payload === 'object' && payload !== null && !Array.isArray(payload)) {
      Object.assign(entry, payload);
    } else if (payload !== undefined) {
      entry.data = payload;
    }

    this.sink(this.config.logFormat === 'json' ? formatJson(entry) : formatPretty(entry));
  }
}

/**
 * Shared logger configured from the environment at load time
 */
export const logger: ILogger = new ConsoleLogger();
