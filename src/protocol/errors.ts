/**
 * MCP Client Error Handling
 *
 * Error taxonomy for paginated list traversals:
 * - Pagination protocol violations detected on the peer's cursors
 * - Cancellation requested by the caller
 *
 * Transport failures are not represented here: they reach the caller
 * exactly as the transport raised them.
 */

// =============================================================================
// Error Codes
// =============================================================================

/** Request was cancelled by the caller */
export const REQUEST_CANCELLED = -32800;

// Implementation-defined range: -32000 to -32099

/** Peer returned a cursor already seen in the same traversal */
export const DUPLICATE_CURSOR = -32010;

/** Traversal admitted more pages than the configured maximum */
export const PAGE_LIMIT_EXCEEDED = -32011;

// =============================================================================
// Base MCP Error Class
// =============================================================================

/**
 * Base error class for MCP client errors.
 * Includes error code and optional data for additional context.
 */
export class McpError extends Error {
  constructor(
    public readonly code: number,
    message: string,
    public readonly data?: unknown
  ) {
    super(message);
    this.name = 'McpError';
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert to a plain object suitable for JSON serialization.
   */
  toJSON(): { code: number; message: string; data?: unknown } {
    const result: { code: number; message: string; data?: unknown } = {
      code: this.code,
      message: this.message,
    };
    if (this.data !== undefined) {
      result.data = this.data;
    }
    return result;
  }
}

// =============================================================================
// Pagination Protocol Errors
// =============================================================================

export type ProtocolViolationKind = 'duplicate_cursor' | 'page_limit_exceeded';

/**
 * The peer broke the pagination contract. Distinct from transport errors
 * so callers can tell a misbehaving server apart from a failing network.
 */
export abstract class PaginationProtocolError extends McpError {
  abstract readonly kind: ProtocolViolationKind;
}

export class DuplicateCursorError extends PaginationProtocolError {
  readonly kind = 'duplicate_cursor' as const;

  constructor(public readonly cursor: string) {
    super(DUPLICATE_CURSOR, 'Server returned a pagination cursor that was already used', {
      cursor,
    });
    this.name = 'DuplicateCursorError';
  }
}

export class PageLimitExceededError extends PaginationProtocolError {
  readonly kind = 'page_limit_exceeded' as const;

  constructor(public readonly maxPages: number) {
    super(PAGE_LIMIT_EXCEEDED, `Pagination exceeded the limit of ${maxPages} pages`, {
      maxPages,
    });
    this.name = 'PageLimitExceededError';
  }
}

// =============================================================================
// Cancellation
// =============================================================================

/**
 * The caller's abort signal fired before the next page was requested.
 */
export class RequestCancelledError extends McpError {
  constructor(reason?: unknown) {
    super(
      REQUEST_CANCELLED,
      'Request cancelled',
      reason !== undefined ? { reason: describeReason(reason) } : undefined
    );
    this.name = 'RequestCancelledError';
  }
}

function describeReason(reason: unknown): string {
  if (reason instanceof Error) {
    return reason.message;
  }
  return String(reason);
}

// =============================================================================
// Type Guards
// =============================================================================

export function isMcpError(error: unknown): error is McpError {
  return error instanceof McpError;
}

export function isPaginationProtocolError(error: unknown): error is PaginationProtocolError {
  return error instanceof PaginationProtocolError;
}

export function isDuplicateCursorError(error: unknown): error is DuplicateCursorError {
  return error instanceof DuplicateCursorError;
}

export function isPageLimitExceededError(error: unknown): error is PageLimitExceededError {
  return error instanceof PageLimitExceededError;
}

export function isRequestCancelledError(error: unknown): error is RequestCancelledError {
  return error instanceof RequestCancelledError;
}
