/**
 * Environment configuration loader with Zod validation
 */

import { z } from 'zod';
import { LogLevelSchema } from './logging/levels.js';

/** Default upper bound on pages admitted during one traversal */
export const DEFAULT_MAX_PAGES = 10000;

/**
 * Configuration schema with validation rules
 */
export const ConfigSchema = z.object({
  maxPages: z.number().int().min(1).default(DEFAULT_MAX_PAGES),
  logLevel: LogLevelSchema.default('info'),
  clientName: z.string().min(1).default('mcp-pagination-client'),
  clientVersion: z.string().min(1).default('1.0.0'),
  /** Per-request timeout handed to the transport; 0 disables it */
  requestTimeoutMs: z.number().int().min(0).default(60000),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse a number from an environment variable string.
 * Non-numeric text yields NaN so that the schema rejects it.
 */
function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return Number(value);
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(): Config {
  const rawConfig: Record<string, unknown> = {
    maxPages: parseInteger(process.env['MCP_MAX_PAGES']),
    logLevel: process.env['MCP_LOG_LEVEL'] || undefined,
    clientName: process.env['MCP_CLIENT_NAME'] || undefined,
    clientVersion: process.env['MCP_CLIENT_VERSION'] || undefined,
    requestTimeoutMs: parseInteger(process.env['MCP_REQUEST_TIMEOUT_MS']),
  };

  // Drop undefined values so schema defaults apply
  const configInput = Object.fromEntries(
    Object.entries(rawConfig).filter(([, v]) => v !== undefined)
  );

  return ConfigSchema.parse(configInput);
}

let config: Config | null = null;

/**
 * Get the current configuration (singleton)
 * Loads from environment on first call
 */
export function getConfig(): Config {
  if (!config) {
    config = loadConfig();
  }
  return config;
}

/**
 * Force reload configuration from environment
 */
export function reloadConfig(): Config {
  config = loadConfig();
  return config;
}

/**
 * Reset config singleton (for testing)
 */
export function resetConfig(): void {
  config = null;
}
