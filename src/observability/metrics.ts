/**
 * MCP Client Pagination Metrics
 *
 * Records pagination activity through the OpenTelemetry metrics API:
 * - Pages fetched per collection
 * - Traversal outcomes
 * - Pagination protocol violations by kind
 *
 * Without a registered OpenTelemetry SDK the global meter is a no-op and
 * only the internal totals are kept.
 */

import { metrics, type Meter, type Counter, type Attributes } from '@opentelemetry/api';
import type { ProtocolViolationKind } from '../protocol/errors.js';

// =============================================================================
// Types
// =============================================================================

export type TraversalOutcome = 'completed' | 'failed' | 'cancelled' | 'stopped';

export interface PaginationMetricsSummary {
  pages: {
    total: number;
    byCollection: Record<string, number>;
  };
  items: {
    total: number;
  };
  traversals: {
    total: number;
    byOutcome: Record<string, number>;
  };
  violations: {
    total: number;
    byKind: Record<string, number>;
  };
}

// =============================================================================
// Constants
// =============================================================================

export const METRIC_NAMES = {
  PAGES_FETCHED: 'mcp.client.pages.fetched',
  ITEMS_FETCHED: 'mcp.client.items.fetched',
  TRAVERSALS_TOTAL: 'mcp.client.traversals.total',
  PROTOCOL_VIOLATIONS_TOTAL: 'mcp.client.protocol_violations.total',
} as const;

// =============================================================================
// PaginationMetrics
// =============================================================================

/**
 * @example
 * ```typescript
 * const paginationMetrics = createPaginationMetrics();
 * paginationMetrics.recordPage('tools', 50);
 * paginationMetrics.recordTraversal('tools', 'completed');
 * ```
 */
export class PaginationMetrics {
  private readonly pagesCounter: Counter;
  private readonly itemsCounter: Counter;
  private readonly traversalsCounter: Counter;
  private readonly violationsCounter: Counter;

  // Internal tracking for getMetrics() (testing/debugging)
  private pagesTotal = 0;
  private pagesByCollection: Record<string, number> = {};
  private itemsTotal = 0;
  private traversalsTotal = 0;
  private traversalsByOutcome: Record<string, number> = {};
  private violationsTotal = 0;
  private violationsByKind: Record<string, number> = {};

  constructor(meter: Meter) {
    this.pagesCounter = meter.createCounter(METRIC_NAMES.PAGES_FETCHED, {
      description: 'Number of list pages fetched from MCP servers',
      unit: '1',
    });

    this.itemsCounter = meter.createCounter(METRIC_NAMES.ITEMS_FETCHED, {
      description: 'Number of collection items received in list pages',
      unit: '1',
    });

    this.traversalsCounter = meter.createCounter(METRIC_NAMES.TRAVERSALS_TOTAL, {
      description: 'Number of finished pagination traversals',
      unit: '1',
    });

    this.violationsCounter = meter.createCounter(METRIC_NAMES.PROTOCOL_VIOLATIONS_TOTAL, {
      description: 'Number of pagination contract violations by servers',
      unit: '1',
    });
  }

  /**
   * Records one fetched page and the number of items it carried.
   */
  recordPage(collection: string, itemCount: number): void {
    const attributes: Attributes = { collection };
    this.pagesCounter.add(1, attributes);
    this.itemsCounter.add(itemCount, attributes);

    this.pagesTotal++;
    this.pagesByCollection[collection] = (this.pagesByCollection[collection] ?? 0) + 1;
    this.itemsTotal += itemCount;
  }

  recordTraversal(collection: string, outcome: TraversalOutcome): void {
    this.traversalsCounter.add(1, { collection, outcome });

    this.traversalsTotal++;
    this.traversalsByOutcome[outcome] = (this.traversalsByOutcome[outcome] ?? 0) + 1;
  }

  recordViolation(collection: string, kind: ProtocolViolationKind): void {
    this.violationsCounter.add(1, { collection, kind });

    this.violationsTotal++;
    this.violationsByKind[kind] = (this.violationsByKind[kind] ?? 0) + 1;
  }

  /**
   * Gets a summary of internally tracked values (not the exported OpenTelemetry data).
   */
  getMetrics(): PaginationMetricsSummary {
    return {
      pages: {
        total: this.pagesTotal,
        byCollection: { ...this.pagesByCollection },
      },
      items: {
        total: this.itemsTotal,
      },
      traversals: {
        total: this.traversalsTotal,
        byOutcome: { ...this.traversalsByOutcome },
      },
      violations: {
        total: this.violationsTotal,
        byKind: { ...this.violationsByKind },
      },
    };
  }

  resetMetrics(): void {
    this.pagesTotal = 0;
    this.pagesByCollection = {};
    this.itemsTotal = 0;
    this.traversalsTotal = 0;
    this.traversalsByOutcome = {};
    this.violationsTotal = 0;
    this.violationsByKind = {};
  }
}

// =============================================================================
// Factory Function
// =============================================================================

/**
 * Creates PaginationMetrics on a meter from the global OpenTelemetry provider.
 *
 * @param meterName - Meter name (default: 'mcp-client')
 */
export function createPaginationMetrics(meterName = 'mcp-client'): PaginationMetrics {
  return new PaginationMetrics(metrics.getMeter(meterName));
}
