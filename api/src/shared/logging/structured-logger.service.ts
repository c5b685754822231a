import { Inject, Injectable, LoggerService, LogLevel, Optional } from '@nestjs/common';

const SEVERITY: LogLevel[] = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'];

export type LogLine = {
  ts: string;
  level: LogLevel;
  service: string;
  context: string;
  [field: string]: unknown;
};

export type LogSink = (line: LogLine) => void;

export const LOG_SINK = Symbol('LOG_SINK');

const consoleSink: LogSink = (line) => {
  const text = JSON.stringify(line);
  if (line.level === 'error' || line.level === 'fatal') {
    console.error(text);
    return;
  }
  console.log(text);
};

function isLogLevel(value: string): value is LogLevel {
  return SEVERITY.some((level) => level === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Error);
}

/**
 * JSON-lines logger used by Nest and by the domain services. Structured events
 * (`{ type: 'dispatch_cycle_completed', ... }`) are spread into the line so each
 * field is queryable on its own.
 */
@Injectable()
export class StructuredLoggerService implements LoggerService {
  private enabled = new Set<LogLevel>(StructuredLoggerService.levelsUpTo(process.env.LOG_LEVEL));
  private readonly sink: LogSink;
  private readonly service = process.env.SERVICE_NAME ?? 'campaign-dispatch-api';

  constructor(@Optional() @Inject(LOG_SINK) sink?: LogSink) {
    this.sink = sink ?? consoleSink;
  }

  static levelsUpTo(threshold?: string): LogLevel[] {
    const level = threshold && isLogLevel(threshold) ? threshold : 'log';
    return SEVERITY.slice(0, SEVERITY.indexOf(level) + 1);
  }

  setLogLevels(levels: LogLevel[]): void {
    this.enabled = new Set(levels);
  }

  log(message: unknown, context?: string): void {
    this.write('log', message, context);
  }

  error(message: unknown, trace?: string, context?: string): void {
    this.write('error', message, context, trace);
  }

  warn(message: unknown, context?: string): void {
    this.write('warn', message, context);
  }

  debug(message: unknown, context?: string): void {
    this.write('debug', message, context);
  }

  verbose(message: unknown, context?: string): void {
    this.write('verbose', message, context);
  }

  fatal(message: unknown, trace?: string, context?: string): void {
    this.write('fatal', message, context, trace);
  }

  private write(level: LogLevel, message: unknown, context?: string, trace?: string): void {
    if (!this.enabled.has(level)) {
      return;
    }

    const base = {
      ts: new Date().toISOString(),
      level,
      service: this.service,
      context: context ?? 'app'
    };
    const fields = isRecord(message)
      ? message
      : { message: message instanceof Error ? message.message : String(message) };

    this.sink(trace ? { ...fields, ...base, trace } : { ...fields, ...base });
  }
}
