/**
 * Paginated MCP Collections
 *
 * Adapts the SDK client's list requests (tools/list, prompts/list,
 * resources/list, resources/templates/list) to the PageFetcher contract.
 */

import type { Prompt, Resource, ResourceTemplate, Tool } from '@modelcontextprotocol/sdk/types.js';
import type { Cursor, PageFetcher } from '../protocol/pagination.js';

// =============================================================================
// Types
// =============================================================================

export interface CollectionItemMap {
  tools: Tool;
  prompts: Prompt;
  resources: Resource;
  resourceTemplates: ResourceTemplate;
}

export type CollectionKind = keyof CollectionItemMap;

export interface CollectionDescriptor {
  /** JSON-RPC method name */
  method: string;
  /** Key of the item array in the list result */
  resultKey: string;
}

interface ListParams {
  cursor?: string;
}

interface ListRequestOptions {
  signal?: AbortSignal;
  timeout?: number;
}

interface ListResult {
  nextCursor?: string | undefined;
}

/**
 * The list operations of an MCP client. Satisfied by the SDK's Client.
 */
export interface ListSource {
  listTools(
    params?: ListParams,
    options?: ListRequestOptions
  ): Promise<ListResult & { tools: Tool[] }>;
  listPrompts(
    params?: ListParams,
    options?: ListRequestOptions
  ): Promise<ListResult & { prompts: Prompt[] }>;
  listResources(
    params?: ListParams,
    options?: ListRequestOptions
  ): Promise<ListResult & { resources: Resource[] }>;
  listResourceTemplates(
    params?: ListParams,
    options?: ListRequestOptions
  ): Promise<ListResult & { resourceTemplates: ResourceTemplate[] }>;
}

export interface CollectionFetcherOptions {
  /** Per-request timeout in milliseconds; 0 disables it, undefined keeps the SDK default */
  timeoutMs?: number;
}

// =============================================================================
// Collection Descriptors
// =============================================================================

export const COLLECTIONS = {
  tools: { method: 'tools/list', resultKey: 'tools' },
  prompts: { method: 'prompts/list', resultKey: 'prompts' },
  resources: { method: 'resources/list', resultKey: 'resources' },
  resourceTemplates: { method: 'resources/templates/list', resultKey: 'resourceTemplates' },
} as const satisfies Record<CollectionKind, CollectionDescriptor>;

export const COLLECTION_KINDS: readonly CollectionKind[] = [
  'tools',
  'prompts',
  'resources',
  'resourceTemplates',
];

// =============================================================================
// Fetchers
// =============================================================================

type FetcherFactories = {
  [K in CollectionKind]: (
    source: ListSource,
    options: CollectionFetcherOptions
  ) => PageFetcher<CollectionItemMap[K]>;
};

/** Largest delay a Node.js timer accepts; longer delays fire immediately */
export const NO_TIMEOUT_MS = 2_147_483_647;

/** The first request carries no cursor at all */
function toParams(cursor: Cursor | undefined): ListParams | undefined {
  return cursor === undefined ? undefined : { cursor };
}

function toRequestOptions(
  signal: AbortSignal | undefined,
  options: CollectionFetcherOptions
): ListRequestOptions | undefined {
  const requestOptions: ListRequestOptions = {};
  if (signal) requestOptions.signal = signal;
  if (options.timeoutMs !== undefined) {
    requestOptions.timeout = options.timeoutMs === 0 ? NO_TIMEOUT_MS : options.timeoutMs;
  }
  return Object.keys(requestOptions).length > 0 ? requestOptions : undefined;
}

const FETCHERS: FetcherFactories = {
  tools: (source, options) => async (cursor, signal) => {
    const result = await source.listTools(toParams(cursor), toRequestOptions(signal, options));
    return { items: result.tools, nextCursor: result.nextCursor };
  },
  prompts: (source, options) => async (cursor, signal) => {
    const result = await source.listPrompts(toParams(cursor), toRequestOptions(signal, options));
    return { items: result.prompts, nextCursor: result.nextCursor };
  },
  resources: (source, options) => async (cursor, signal) => {
    const result = await source.listResources(toParams(cursor), toRequestOptions(signal, options));
    return { items: result.resources, nextCursor: result.nextCursor };
  },
  resourceTemplates: (source, options) => async (cursor, signal) => {
    const result = await source.listResourceTemplates(
      toParams(cursor),
      toRequestOptions(signal, options)
    );
    return { items: result.resourceTemplates, nextCursor: result.nextCursor };
  },
};

/**
 * Create a PageFetcher for one collection of `source`.
 */
export function createCollectionFetcher<K extends CollectionKind>(
  source: ListSource,
  kind: K,
  options: CollectionFetcherOptions = {}
): PageFetcher<CollectionItemMap[K]> {
  return FETCHERS[kind](source, options);
}
