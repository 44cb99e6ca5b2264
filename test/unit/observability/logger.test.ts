import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { trace, TraceFlags, type Span, type SpanContext } from '@opentelemetry/api';
import { StructuredLogger, type LogEntry } from '../../../src/observability/logger.js';
import { LOG_LEVEL_PRIORITY, isLevelEnabled } from '../../../src/logging/levels.js';
import { reloadConfig, resetConfig } from '../../../src/config.js';

// =============================================================================
// Test Setup
// =============================================================================

const originalEnv = { ...process.env };

function createMockSpan(traceId: string, spanId: string): Span {
  return {
    spanContext: () =>
      ({
        traceId,
        spanId,
        traceFlags: TraceFlags.SAMPLED,
        isRemote: false,
      }) as SpanContext,
  } as unknown as Span;
}

function capture(): { lines: string[]; output: (json: string) => void } {
  const lines: string[] = [];
  return { lines, output: (json) => lines.push(json) };
}

function parse(line: string | undefined): LogEntry {
  return JSON.parse(line ?? '{}') as LogEntry;
}

// =============================================================================
// Level Tests
// =============================================================================

describe('log levels', () => {
  it('should order levels by RFC 5424 priority', () => {
    expect(LOG_LEVEL_PRIORITY.emergency).toBe(0);
    expect(LOG_LEVEL_PRIORITY.warning).toBe(4);
    expect(LOG_LEVEL_PRIORITY.debug).toBe(7);
  });

  it('should enable levels at or above the threshold', () => {
    expect(isLevelEnabled('error', 'warning')).toBe(true);
    expect(isLevelEnabled('warning', 'warning')).toBe(true);
    expect(isLevelEnabled('info', 'warning')).toBe(false);
  });
});

// =============================================================================
// StructuredLogger Tests
// =============================================================================

describe('StructuredLogger', () => {
  beforeEach(() => {
    delete process.env['MCP_LOG_LEVEL'];
    resetConfig();
  });

  afterEach(() => {
    process.env = { ...originalEnv };
    resetConfig();
    vi.restoreAllMocks();
  });

  describe('constructor', () => {
    it('should default to info', () => {
      expect(new StructuredLogger().getLevel()).toBe('info');
    });

    it('should take its default level from the configuration', () => {
      process.env['MCP_LOG_LEVEL'] = 'warning';
      expect(new StructuredLogger().getLevel()).toBe('warning');
    });

    it('should follow a configuration reload', () => {
      expect(new StructuredLogger().getLevel()).toBe('info');

      process.env['MCP_LOG_LEVEL'] = 'error';
      reloadConfig();

      expect(new StructuredLogger().getLevel()).toBe('error');
    });

    it('should prefer options.minLevel over the configuration', () => {
      process.env['MCP_LOG_LEVEL'] = 'warning';
      expect(new StructuredLogger({ minLevel: 'debug' }).getLevel()).toBe('debug');
    });

    it('should write to stderr by default', () => {
      new StructuredLogger({ name: 'default-output' }).info('hello');

      expect(console.error).toHaveBeenCalledTimes(1);
      expect(console.log).not.toHaveBeenCalled();
    });
  });

  describe('log', () => {
    it('should write a JSON entry with name, message and data', () => {
      const { lines, output } = capture();
      const logger = new StructuredLogger({ name: 'paginator', output });

      logger.info('Traversal completed', { pages: 2 });

      expect(lines).toHaveLength(1);
      const entry = parse(lines[0]);
      expect(entry.level).toBe('info');
      expect(entry.message).toBe('Traversal completed');
      expect(entry.logger).toBe('paginator');
      expect(entry.data).toEqual({ pages: 2 });
      expect(Number.isNaN(Date.parse(entry.timestamp))).toBe(false);
    });

    it('should omit data and logger when absent', () => {
      const { lines, output } = capture();
      new StructuredLogger({ output }).warning('Careful');

      const entry = parse(lines[0]);
      expect(entry).not.toHaveProperty('data');
      expect(entry).not.toHaveProperty('logger');
    });

    it('should filter messages below the minimum level', () => {
      const { lines, output } = capture();
      const logger = new StructuredLogger({ minLevel: 'warning', output });

      logger.debug('hidden');
      logger.info('hidden');
      logger.warning('shown');
      logger.error('shown');

      expect(lines.map((line) => parse(line).level)).toEqual(['warning', 'error']);
    });

    it('should include trace context from the active span', () => {
      const { lines, output } = capture();
      const logger = new StructuredLogger({ output });
      const span = createMockSpan('0af7651916cd43dd8448eb211c80319c', 'b7ad6b7169203331');
      vi.spyOn(trace, 'getSpan').mockReturnValue(span);

      logger.info('traced');

      const entry = parse(lines[0]);
      expect(entry.traceId).toBe('0af7651916cd43dd8448eb211c80319c');
      expect(entry.spanId).toBe('b7ad6b7169203331');
    });

    it('should skip all-zero trace context', () => {
      const { lines, output } = capture();
      const logger = new StructuredLogger({ output });
      const span = createMockSpan('00000000000000000000000000000000', '0000000000000000');
      vi.spyOn(trace, 'getSpan').mockReturnValue(span);

      logger.info('untraced');

      const entry = parse(lines[0]);
      expect(entry).not.toHaveProperty('traceId');
      expect(entry).not.toHaveProperty('spanId');
    });

    it('should not add trace context without an active span', () => {
      const { lines, output } = capture();
      vi.spyOn(trace, 'getSpan').mockReturnValue(undefined);

      new StructuredLogger({ output }).info('plain');

      expect(parse(lines[0])).not.toHaveProperty('traceId');
    });
  });

  describe('child', () => {
    it('should join names with a dot', () => {
      const { lines, output } = capture();
      new StructuredLogger({ name: 'mcp-client', output }).child('paginator').info('x');

      expect(parse(lines[0]).logger).toBe('mcp-client.paginator');
    });

    it('should use the child name alone when the parent has none', () => {
      const { lines, output } = capture();
      new StructuredLogger({ output }).child('paginator').info('x');

      expect(parse(lines[0]).logger).toBe('paginator');
    });

    it('should inherit level and output', () => {
      const { lines, output } = capture();
      const child = new StructuredLogger({ name: 'a', minLevel: 'error', output }).child('b');

      child.warning('hidden');
      child.error('shown');

      expect(child.getLevel()).toBe('error');
      expect(lines).toHaveLength(1);
      expect(parse(lines[0]).logger).toBe('a.b');
    });
  });
});
