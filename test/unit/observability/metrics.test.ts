import { describe, it, expect, beforeEach, vi } from 'vitest';
import { metrics, type Meter } from '@opentelemetry/api';
import {
  METRIC_NAMES,
  PaginationMetrics,
  createPaginationMetrics,
} from '../../../src/observability/metrics.js';

// =============================================================================
// Constants Tests
// =============================================================================

describe('Metrics Constants', () => {
  it('should export metric names', () => {
    expect(METRIC_NAMES.PAGES_FETCHED).toBe('mcp.client.pages.fetched');
    expect(METRIC_NAMES.ITEMS_FETCHED).toBe('mcp.client.items.fetched');
    expect(METRIC_NAMES.TRAVERSALS_TOTAL).toBe('mcp.client.traversals.total');
    expect(METRIC_NAMES.PROTOCOL_VIOLATIONS_TOTAL).toBe('mcp.client.protocol_violations.total');
  });
});

// =============================================================================
// PaginationMetrics Tests
// =============================================================================

describe('PaginationMetrics', () => {
  let paginationMetrics: PaginationMetrics;

  beforeEach(() => {
    paginationMetrics = createPaginationMetrics('metrics-test');
  });

  it('should start empty', () => {
    expect(paginationMetrics.getMetrics()).toEqual({
      pages: { total: 0, byCollection: {} },
      items: { total: 0 },
      traversals: { total: 0, byOutcome: {} },
      violations: { total: 0, byKind: {} },
    });
  });

  it('should count pages and items per collection', () => {
    paginationMetrics.recordPage('tools', 50);
    paginationMetrics.recordPage('tools', 20);
    paginationMetrics.recordPage('prompts', 3);

    const summary = paginationMetrics.getMetrics();
    expect(summary.pages).toEqual({ total: 3, byCollection: { tools: 2, prompts: 1 } });
    expect(summary.items.total).toBe(73);
  });

  it('should count traversals by outcome', () => {
    paginationMetrics.recordTraversal('tools', 'completed');
    paginationMetrics.recordTraversal('tools', 'completed');
    paginationMetrics.recordTraversal('resources', 'stopped');

    expect(paginationMetrics.getMetrics().traversals).toEqual({
      total: 3,
      byOutcome: { completed: 2, stopped: 1 },
    });
  });

  it('should count violations by kind', () => {
    paginationMetrics.recordViolation('tools', 'duplicate_cursor');
    paginationMetrics.recordViolation('prompts', 'page_limit_exceeded');

    expect(paginationMetrics.getMetrics().violations).toEqual({
      total: 2,
      byKind: { duplicate_cursor: 1, page_limit_exceeded: 1 },
    });
  });

  it('should return copies of internal records', () => {
    paginationMetrics.recordPage('tools', 1);
    const summary = paginationMetrics.getMetrics();
    summary.pages.byCollection['tools'] = 99;

    expect(paginationMetrics.getMetrics().pages.byCollection['tools']).toBe(1);
  });

  it('should reset', () => {
    paginationMetrics.recordPage('tools', 1);
    paginationMetrics.recordTraversal('tools', 'failed');
    paginationMetrics.recordViolation('tools', 'duplicate_cursor');
    paginationMetrics.resetMetrics();

    expect(paginationMetrics.getMetrics()).toEqual({
      pages: { total: 0, byCollection: {} },
      items: { total: 0 },
      traversals: { total: 0, byOutcome: {} },
      violations: { total: 0, byKind: {} },
    });
  });

  it('should record through OpenTelemetry counters with attributes', () => {
    const add = vi.fn();
    const meter = {
      createCounter: vi.fn(() => ({ add })),
    } as unknown as Meter;
    const recorder = new PaginationMetrics(meter);

    recorder.recordPage('tools', 4);
    recorder.recordTraversal('tools', 'cancelled');
    recorder.recordViolation('tools', 'page_limit_exceeded');

    expect(meter.createCounter).toHaveBeenCalledTimes(4);
    expect(add.mock.calls).toEqual([
      [1, { collection: 'tools' }],
      [4, { collection: 'tools' }],
      [1, { collection: 'tools', outcome: 'cancelled' }],
      [1, { collection: 'tools', kind: 'page_limit_exceeded' }],
    ]);
  });

  it('should use the global meter provider', () => {
    const getMeter = vi.spyOn(metrics, 'getMeter');
    createPaginationMetrics();
    expect(getMeter).toHaveBeenCalledWith('mcp-client');
  });
});
