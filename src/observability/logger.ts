/**
 * JSON-lines logger for client activity.
 *
 * Each entry carries an RFC 5424 level and, inside an active OpenTelemetry
 * span, its trace and span IDs. Entries go to stderr unless an output is
 * given: stdout belongs to command output and the stdio transport.
 */

import { context, isSpanContextValid, trace } from '@opentelemetry/api';
import { getConfig } from '../config.js';
import { isLevelEnabled, type LogLevel } from '../logging/levels.js';

export interface LogEntry {
  /** ISO 8601 */
  timestamp: string;
  level: LogLevel;
  message: string;
  /** Dotted component path, e.g. `mcp-client.paginator` */
  logger?: string;
  traceId?: string;
  spanId?: string;
  data?: unknown;
}

export type LogOutput = (json: string) => void;

export interface StructuredLoggerOptions {
  name?: string;
  /** Entries below this level are dropped (default: config logLevel) */
  minLevel?: LogLevel;
  output?: LogOutput;
}

const writeToStderr: LogOutput = (json) => console.error(json);

function activeSpanIds(): Pick<LogEntry, 'traceId' | 'spanId'> {
  const spanContext = trace.getSpan(context.active())?.spanContext();
  if (!spanContext || !isSpanContextValid(spanContext)) {
    return {};
  }
  return { traceId: spanContext.traceId, spanId: spanContext.spanId };
}

/**
 * @example
 * ```typescript
 * const logger = new StructuredLogger({ name: 'mcp-client' });
 * logger.child('paginator').debug('Fetched page', { collection: 'tools', page: 1 });
 * // {"timestamp":"...","level":"debug","message":"Fetched page","logger":"mcp-client.paginator","data":{...}}
 * ```
 */
export class StructuredLogger {
  private readonly name: string | undefined;
  private readonly minLevel: LogLevel;
  private readonly output: LogOutput;

  constructor(options: StructuredLoggerOptions = {}) {
    this.name = options.name;
    this.minLevel = options.minLevel ?? getConfig().logLevel;
    this.output = options.output ?? writeToStderr;
  }

  getLevel(): LogLevel {
    return this.minLevel;
  }

  log(level: LogLevel, message: string, data?: unknown): void {
    if (!isLevelEnabled(level, this.minLevel)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(this.name !== undefined && { logger: this.name }),
      ...activeSpanIds(),
      ...(data !== undefined && { data }),
    };
    this.output(JSON.stringify(entry));
  }

  debug(message: string, data?: unknown): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.log('info', message, data);
  }

  warning(message: string, data?: unknown): void {
    this.log('warning', message, data);
  }

  error(message: string, data?: unknown): void {
    this.log('error', message, data);
  }

  /** Same level and output; the name gains a `.`-separated segment. */
  child(name: string): StructuredLogger {
    return new StructuredLogger({
      name: this.name === undefined ? name : `${this.name}.${name}`,
      minLevel: this.minLevel,
      output: this.output,
    });
  }
}

export { type LogLevel } from '../logging/levels.js';
