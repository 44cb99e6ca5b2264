#!/usr/bin/env node
/**
 * MCP List CLI
 *
 * Lists the tools, prompts, resources or resource templates of an MCP
 * server, following every page the server offers.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { MCPClient } from './mcp-client.js';
import type { CollectionKind } from './collections.js';
import {
  describeError,
  formatItem,
  parseCollectionKind,
  parseCommand,
  parseMaxPages,
} from './format.js';

interface ListCommandOptions {
  server?: string;
  url?: string;
  maxPages?: number;
  json?: boolean;
  verbose?: boolean;
}

const program = new Command();

program
  .name('mcp-list')
  .description('List paginated collections of an MCP server')
  .version('1.0.0')
  .argument('<collection>', 'tools, prompts, resources or templates', parseCollectionKind)
  .option('-s, --server <command>', 'Server command to spawn (e.g., "node dist/server.js")')
  .option('-u, --url <url>', 'HTTP URL to connect to')
  .option('--max-pages <n>', 'Maximum pages to follow', parseMaxPages)
  .option('--json', 'Print the whole collection as JSON')
  .option('-v, --verbose', 'Log pagination activity to stderr')
  .action(async (collection: CollectionKind, options: ListCommandOptions) => {
    await runList(collection, options);
  });

async function connect(
  client: MCPClient,
  options: ListCommandOptions,
  signal: AbortSignal
): Promise<void> {
  const { server, url } = options;

  if (server) {
    const [command, ...args] = parseCommand(server);
    if (command === undefined) {
      throw new Error('Server command is empty');
    }
    await client.connectStdio({ command, args, signal });
  } else if (url) {
    await client.connectHttp({ url, signal });
  } else {
    throw new Error('Either --server or --url is required');
  }
}

async function runList(kind: CollectionKind, options: ListCommandOptions): Promise<void> {
  const client = new MCPClient({
    verbose: options.verbose ?? false,
    maxPages: options.maxPages,
  });

  // Ctrl-C cancels the handshake as well as the traversal
  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());
  const listOptions = { signal: controller.signal };

  try {
    await connect(client, options, controller.signal);

    if (options.json) {
      const items = await client.listAll(kind, listOptions);
      console.log(JSON.stringify(items, null, 2));
    } else {
      let count = 0;
      for await (const item of client.enumerate(kind, listOptions)) {
        count++;
        console.log(chalk.white(formatItem(kind, item)));
      }
      console.log(chalk.green(`\n${count} ${kind}`));
    }

    await client.disconnect();
  } catch (error) {
    console.error(chalk.red(`Error: ${describeError(error)}`));
    await client.disconnect();
    process.exit(1);
  }
}

await program.parseAsync();
