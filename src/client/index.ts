/**
 * MCP Client Module
 *
 * Exports for programmatic use of the MCP client and pagination engine.
 */

// MCP Client
export { MCPClient } from './mcp-client.js';
export type {
  MCPClientOptions,
  ListOptions,
  ToolCallResult,
  ConnectionOptions,
  StdioConnectionOptions,
  HttpConnectionOptions,
} from './mcp-client.js';

// Pagination
export { Paginator, listAll, enumerate } from './paginator.js';
export type { PaginatorOptions, TraversalState } from './paginator.js';

// Collections
export {
  COLLECTIONS,
  COLLECTION_KINDS,
  NO_TIMEOUT_MS,
  createCollectionFetcher,
} from './collections.js';
export type {
  CollectionItemMap,
  CollectionKind,
  CollectionDescriptor,
  CollectionFetcherOptions,
  ListSource,
} from './collections.js';

// CLI utilities
export {
  parseCommand,
  parseCollectionKind,
  parseMaxPages,
  formatItem,
  describeError,
} from './format.js';
