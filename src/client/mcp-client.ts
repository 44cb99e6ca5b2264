/**
 * MCP Client Wrapper
 *
 * Wraps @modelcontextprotocol/sdk Client with a simplified interface for
 * connecting to MCP servers via stdio or HTTP transport and for walking
 * their paginated collections safely.
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import type { Prompt, Resource, ResourceTemplate, Tool } from '@modelcontextprotocol/sdk/types.js';
import { getConfig } from '../config.js';
import { StructuredLogger } from '../observability/logger.js';
import type { PaginationMetrics } from '../observability/metrics.js';
import {
  COLLECTIONS,
  createCollectionFetcher,
  type CollectionItemMap,
  type CollectionKind,
} from './collections.js';
import { Paginator } from './paginator.js';

export interface StdioConnectionOptions {
  command: string;
  args?: string[];
  env?: Record<string, string>;
  cwd?: string;
  /** Aborts the initialize handshake */
  signal?: AbortSignal;
}

export interface HttpConnectionOptions {
  url: string;
  headers?: Record<string, string>;
  /** Aborts the initialize handshake */
  signal?: AbortSignal;
}

export type ConnectionOptions =
  | ({ type: 'stdio' } & StdioConnectionOptions)
  | ({ type: 'http' } & HttpConnectionOptions);

export interface ToolCallResult {
  content: Array<{
    type: string;
    text?: string;
    [key: string]: unknown;
  }>;
  isError?: boolean | undefined;
}

export interface MCPClientOptions {
  name?: string | undefined;
  version?: string | undefined;
  /** Log at debug level */
  verbose?: boolean | undefined;
  /** Default page limit for every traversal (default: config maxPages) */
  maxPages?: number | undefined;
  /** Per-request timeout in milliseconds (default: config requestTimeoutMs) */
  requestTimeoutMs?: number | undefined;
  logger?: StructuredLogger | undefined;
  metrics?: PaginationMetrics | undefined;
}

/**
 * Per-call traversal options
 */
export interface ListOptions {
  signal?: AbortSignal;
  maxPages?: number;
}

/**
 * MCP Client wrapper for simplified server interaction
 */
export class MCPClient {
  private client: Client;
  private transport: Transport | null = null;
  private connected = false;
  private readonly logger: StructuredLogger;
  private readonly metrics: PaginationMetrics | undefined;
  private readonly maxPages: number;
  private readonly requestTimeoutMs: number;

  constructor(options: MCPClientOptions = {}) {
    const config = getConfig();
    this.maxPages = options.maxPages ?? config.maxPages;
    this.requestTimeoutMs = options.requestTimeoutMs ?? config.requestTimeoutMs;
    this.metrics = options.metrics;
    this.logger =
      options.logger ??
      new StructuredLogger({
        name: 'mcp-client',
        minLevel: options.verbose ? 'debug' : config.logLevel,
      });

    this.client = new Client(
      {
        name: options.name ?? config.clientName,
        version: options.version ?? config.clientVersion,
      },
      {
        capabilities: {},
      }
    );
  }

  /**
   * Connect to an MCP server via stdio transport
   */
  async connectStdio(options: StdioConnectionOptions): Promise<void> {
    if (this.connected) {
      throw new Error('Already connected. Disconnect first.');
    }

    this.logger.info('Connecting via stdio', {
      command: options.command,
      args: options.args ?? [],
    });

    const transportParams: { command: string; args?: string[]; env?: Record<string, string>; cwd?: string } = {
      command: options.command,
    };
    if (options.args) transportParams.args = options.args;
    if (options.env) transportParams.env = options.env;
    if (options.cwd) transportParams.cwd = options.cwd;

    this.transport = new StdioClientTransport(transportParams);

    await this.client.connect(this.transport, options.signal ? { signal: options.signal } : undefined);
    this.connected = true;
    this.logger.info('Connected');
  }

  /**
   * Connect to an MCP server via HTTP transport (StreamableHTTP)
   */
  async connectHttp(options: HttpConnectionOptions): Promise<void> {
    if (this.connected) {
      throw new Error('Already connected. Disconnect first.');
    }

    this.logger.info('Connecting via HTTP', { url: options.url });

    this.transport = new StreamableHTTPClientTransport(
      new URL(options.url),
      options.headers ? { requestInit: { headers: options.headers } } : undefined
    );
    await this.client.connect(this.transport, options.signal ? { signal: options.signal } : undefined);
    this.connected = true;
    this.logger.info('Connected');
  }

  /**
   * Connect using unified options
   */
  async connect(options: ConnectionOptions): Promise<void> {
    if (options.type === 'stdio') {
      await this.connectStdio(options);
    } else {
      await this.connectHttp(options);
    }
  }

  // ===========================================================================
  // Paginated Collections
  // ===========================================================================

  /**
   * Fetch every page of a collection.
   */
  async listAll<K extends CollectionKind>(
    kind: K,
    options: ListOptions = {}
  ): Promise<Array<CollectionItemMap[K]>> {
    this.ensureConnected();
    const items = await this.createPaginator(kind, options).listAll();
    this.logger.debug(`Found ${items.length} ${kind}`);
    return items;
  }

  /**
   * Lazily iterate a collection; pages are requested as the caller consumes.
   */
  enumerate<K extends CollectionKind>(
    kind: K,
    options: ListOptions = {}
  ): AsyncGenerator<CollectionItemMap[K], void, undefined> {
    this.ensureConnected();
    return this.createPaginator(kind, options).enumerate();
  }

  listTools(options?: ListOptions): Promise<Tool[]> {
    return this.listAll('tools', options);
  }

  listPrompts(options?: ListOptions): Promise<Prompt[]> {
    return this.listAll('prompts', options);
  }

  listResources(options?: ListOptions): Promise<Resource[]> {
    return this.listAll('resources', options);
  }

  listResourceTemplates(options?: ListOptions): Promise<ResourceTemplate[]> {
    return this.listAll('resourceTemplates', options);
  }

  enumerateTools(options?: ListOptions): AsyncGenerator<Tool, void, undefined> {
    return this.enumerate('tools', options);
  }

  enumeratePrompts(options?: ListOptions): AsyncGenerator<Prompt, void, undefined> {
    return this.enumerate('prompts', options);
  }

  enumerateResources(options?: ListOptions): AsyncGenerator<Resource, void, undefined> {
    return this.enumerate('resources', options);
  }

  enumerateResourceTemplates(
    options?: ListOptions
  ): AsyncGenerator<ResourceTemplate, void, undefined> {
    return this.enumerate('resourceTemplates', options);
  }

  // ===========================================================================
  // Tools
  // ===========================================================================

  /**
   * Call a tool with arguments
   */
  async callTool(name: string, args: Record<string, unknown> = {}): Promise<ToolCallResult> {
    this.ensureConnected();
    this.logger.debug(`Calling tool: ${name}`, { arguments: args });

    const result = await this.client.callTool({ name, arguments: args });

    const content: ToolCallResult['content'] = [];
    if (Array.isArray(result.content)) {
      for (const block of result.content) {
        if (isContentBlock(block)) {
          content.push(block);
        }
      }
    }

    return {
      content,
      isError: result.isError === true ? true : undefined,
    };
  }

  /**
   * Check if connected to a server
   */
  isConnected(): boolean {
    return this.connected;
  }

  /**
   * Disconnect from the server
   */
  async disconnect(): Promise<void> {
    if (!this.connected || !this.transport) {
      return;
    }

    this.logger.info('Disconnecting');
    await this.transport.close();
    this.transport = null;
    this.connected = false;
    this.logger.info('Disconnected');
  }

  /**
   * Get the underlying client for advanced usage
   */
  getClient(): Client {
    return this.client;
  }

  private createPaginator<K extends CollectionKind>(
    kind: K,
    options: ListOptions
  ): Paginator<CollectionItemMap[K]> {
    const maxPages = options.maxPages ?? this.maxPages;
    this.logger.debug(`Listing ${kind}`, { method: COLLECTIONS[kind].method, maxPages });

    const fetchPage = createCollectionFetcher(this.client, kind, {
      timeoutMs: this.requestTimeoutMs,
    });

    return new Paginator(fetchPage, {
      maxPages,
      collection: kind,
      logger: this.logger.child('paginator'),
      ...(options.signal ? { signal: options.signal } : {}),
      ...(this.metrics ? { metrics: this.metrics } : {}),
    });
  }

  private ensureConnected(): void {
    if (!this.connected) {
      throw new Error('Not connected to a server');
    }
  }
}

function isContentBlock(value: unknown): value is ToolCallResult['content'][number] {
  return (
    typeof value === 'object' &&
    value !== null &&
    'type' in value &&
    typeof value.type === 'string' &&
    (!('text' in value) || typeof value.text === 'string')
  );
}
