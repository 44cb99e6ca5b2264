/**
 * Cursor Pagination Traversal
 *
 * Drives fetch → normalize → guard → continue over a paginated collection.
 * Each traversal owns a fresh CursorGuard, so concurrent traversals never
 * share cursor state.
 *
 * Two delivery modes run on the same loop:
 * - listAll(): collects every item, resolves once the last page arrived
 * - enumerate(): async generator yielding one item at a time; the next page
 *   is requested only after the current page is consumed
 */

import { getConfig } from '../config.js';
import { StructuredLogger } from '../observability/logger.js';
import type { PaginationMetrics, TraversalOutcome } from '../observability/metrics.js';
import {
  CursorGuard,
  assertValidMaxPages,
  normalizeCursor,
  type Cursor,
  type PageFetcher,
} from '../protocol/pagination.js';
import { RequestCancelledError, isPaginationProtocolError } from '../protocol/errors.js';

// =============================================================================
// Types
// =============================================================================

export type TraversalState = 'fetching' | 'validating' | 'continuing' | 'terminated' | 'failed';

export interface PaginatorOptions {
  /** Maximum cursors admitted per traversal (default: config maxPages) */
  maxPages?: number;
  /** Checked before every fetch and handed to the fetcher */
  signal?: AbortSignal;
  logger?: StructuredLogger;
  metrics?: PaginationMetrics;
  /** Collection label for logs and metrics (default: 'items') */
  collection?: string;
}

// =============================================================================
// Paginator
// =============================================================================

/**
 * @example
 * ```typescript
 * const paginator = new Paginator(fetchToolsPage, { collection: 'tools' });
 *
 * const tools = await paginator.listAll();
 *
 * for await (const tool of paginator.enumerate()) {
 *   if (tool.name === 'search') break; // no further pages are requested
 * }
 * ```
 */
export class Paginator<T> {
  private readonly maxPages: number;
  private readonly collection: string;
  private readonly logger: StructuredLogger;

  constructor(
    private readonly fetchPage: PageFetcher<T>,
    private readonly options: PaginatorOptions = {}
  ) {
    this.maxPages = options.maxPages ?? getConfig().maxPages;
    assertValidMaxPages(this.maxPages);
    this.collection = options.collection ?? 'items';
    this.logger = options.logger ?? new StructuredLogger({ name: 'paginator' });
  }

  /**
   * Fetch every page and return all items in order.
   *
   * Rejects with the transport's error, a PaginationProtocolError or a
   * RequestCancelledError; partial results are discarded.
   */
  async listAll(): Promise<T[]> {
    const items: T[] = [];
    for await (const pageItems of this.pages()) {
      for (const item of pageItems) {
        items.push(item);
      }
    }
    return items;
  }

  /**
   * Lazily yield items across pages.
   *
   * The returned sequence is finite and cannot be restarted; call again for
   * a new traversal. On failure every item already fetched has been yielded
   * before the error is thrown.
   */
  async *enumerate(): AsyncGenerator<T, void, undefined> {
    for await (const pageItems of this.pages()) {
      yield* pageItems;
    }
  }

  /**
   * Page-level traversal shared by both delivery modes.
   *
   * A page's items are yielded before its next cursor is admitted, so a
   * rejected cursor never hides the valid items that came with it.
   */
  private async *pages(): AsyncGenerator<readonly T[], void, undefined> {
    const guard = new CursorGuard(this.maxPages);
    const { signal } = this.options;
    let cursor: Cursor | undefined;
    let state: TraversalState = 'fetching';
    let outcome: TraversalOutcome | undefined;
    let pagesFetched = 0;
    let itemsFetched = 0;

    try {
      for (;;) {
        state = 'fetching';
        if (signal?.aborted) {
          throw new RequestCancelledError(signal.reason);
        }

        const page = await this.fetchPage(cursor, signal);
        pagesFetched++;
        itemsFetched += page.items.length;
        this.options.metrics?.recordPage(this.collection, page.items.length);

        state = 'validating';
        const next = normalizeCursor(page.nextCursor);
        this.logger.debug('Fetched page', {
          collection: this.collection,
          page: pagesFetched,
          items: page.items.length,
          hasNextCursor: next !== undefined,
        });

        if (next === undefined) {
          state = 'terminated';
          yield page.items;
          outcome = 'completed';
          this.logger.info('Traversal completed', {
            collection: this.collection,
            pages: pagesFetched,
            items: itemsFetched,
          });
          return;
        }

        yield page.items;
        guard.admit(next);
        state = 'continuing';
        cursor = next;
      }
    } catch (error) {
      outcome = this.classifyFailure(error, state);
      throw error;
    } finally {
      this.options.metrics?.recordTraversal(this.collection, outcome ?? 'stopped');
      if (outcome === undefined) {
        this.logger.debug('Traversal stopped by consumer', {
          collection: this.collection,
          pages: pagesFetched,
        });
      }
    }
  }

  private classifyFailure(error: unknown, state: TraversalState): TraversalOutcome {
    if (isPaginationProtocolError(error)) {
      this.options.metrics?.recordViolation(this.collection, error.kind);
      this.logger.warning('Server violated the pagination contract', {
        collection: this.collection,
        error: error.name,
        message: error.message,
      });
      return 'failed';
    }

    if (this.options.signal?.aborted) {
      this.logger.info('Traversal cancelled', { collection: this.collection, state });
      return 'cancelled';
    }

    this.logger.error('Traversal failed', {
      collection: this.collection,
      state,
      error: error instanceof Error ? error.message : String(error),
    });
    return 'failed';
  }
}

// =============================================================================
// Convenience Functions
// =============================================================================

/**
 * Collect every item of a paginated collection.
 */
export function listAll<T>(fetchPage: PageFetcher<T>, options?: PaginatorOptions): Promise<T[]> {
  return new Paginator(fetchPage, options).listAll();
}

/**
 * Lazily iterate a paginated collection.
 */
export function enumerate<T>(
  fetchPage: PageFetcher<T>,
  options?: PaginatorOptions
): AsyncGenerator<T, void, undefined> {
  return new Paginator(fetchPage, options).enumerate();
}
