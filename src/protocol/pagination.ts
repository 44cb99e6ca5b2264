/**
 * Pagination Support for MCP List Operations
 *
 * Client-side view of opaque cursor pagination:
 * - Page and fetcher contracts shared by every paginated collection
 * - Cursor normalization (absent, null and "" all mean "no more pages")
 * - Per-traversal cursor guard against repeated cursors and endless paging
 */

import { z } from 'zod';
import { DEFAULT_MAX_PAGES } from '../config.js';
import { DuplicateCursorError, PageLimitExceededError } from './errors.js';

export { DEFAULT_MAX_PAGES };

// =============================================================================
// Pagination Types
// =============================================================================

/** Opaque, server-defined continuation token. Compared by exact equality. */
export type Cursor = string;

/** Next-cursor value as it arrives from the peer */
export type RawCursor = string | null | undefined;

/**
 * One fetched batch of a collection
 */
export interface Page<T> {
  items: readonly T[];
  /** Cursor for the next page; absent, null or "" ends the traversal */
  nextCursor?: RawCursor;
}

/**
 * Fetches one page. `cursor` is undefined for the first page.
 *
 * Rejections are treated as transport errors and surface unchanged.
 */
export type PageFetcher<T> = (cursor: Cursor | undefined, signal?: AbortSignal) => Promise<Page<T>>;

/**
 * Bookkeeping for a single traversal. Never shared between traversals.
 */
export interface PaginationState {
  readonly seen: Set<Cursor>;
  pageCount: number;
}

// =============================================================================
// Schemas
// =============================================================================

export const MaxPagesSchema = z.number().int().positive();

// =============================================================================
// Cursor Normalization
// =============================================================================

/**
 * Map a raw next-cursor to its canonical form.
 *
 * @returns undefined when there are no further pages, otherwise the cursor unchanged
 */
export function normalizeCursor(raw: RawCursor): Cursor | undefined {
  if (raw === undefined || raw === null || raw === '') {
    return undefined;
  }
  return raw;
}

export function createPaginationState(): PaginationState {
  return { seen: new Set<Cursor>(), pageCount: 0 };
}

/**
 * Throws a RangeError unless `maxPages` is a positive integer.
 */
export function assertValidMaxPages(maxPages: number): void {
  if (!MaxPagesSchema.safeParse(maxPages).success) {
    throw new RangeError(`maxPages must be a positive integer, got ${maxPages}`);
  }
}

// =============================================================================
// Cursor Guard
// =============================================================================

/**
 * Admits each next-cursor of one traversal at most once, and at most
 * `maxPages` cursors in total.
 *
 * @example
 * ```typescript
 * const guard = new CursorGuard(100);
 * guard.admit('c1');
 * guard.admit('c1'); // throws DuplicateCursorError
 * ```
 */
export class CursorGuard {
  private readonly state: PaginationState = createPaginationState();

  constructor(public readonly maxPages: number = DEFAULT_MAX_PAGES) {
    assertValidMaxPages(maxPages);
  }

  /**
   * Record `cursor` as the continuation of the current page.
   *
   * The page counter is incremented and checked before the duplicate
   * lookup, so the limit bounds the total number of admissions.
   *
   * @throws PageLimitExceededError when the counter passes maxPages
   * @throws DuplicateCursorError when the cursor was admitted before
   */
  admit(cursor: Cursor): void {
    this.state.pageCount += 1;
    if (this.state.pageCount > this.maxPages) {
      throw new PageLimitExceededError(this.maxPages);
    }

    if (this.state.seen.has(cursor)) {
      throw new DuplicateCursorError(cursor);
    }

    this.state.seen.add(cursor);
  }

  has(cursor: Cursor): boolean {
    return this.state.seen.has(cursor);
  }

  /** Admission attempts so far, including rejected ones */
  get pageCount(): number {
    return this.state.pageCount;
  }

  get seenCount(): number {
    return this.state.seen.size;
  }
}
