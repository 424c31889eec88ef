#!/usr/bin/env node
/**
 * Contract Search MCP Server
 *
 * Entry point for the MCP server using stdio transport.
 * Exposes contract indexing, hybrid search and metadata extraction tools.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module index
 */

import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';
import { fileURLToPath } from 'url';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadServerConfig } from './server/config.js';
import { registerAllTools } from './server/register-tools.js';
import { createServices } from './server/services.js';
import type { ServiceContainer } from './server/types.js';

// Load .env from the first candidate that exists:
// 1. CONTRACT_SEARCH_ENV_FILE (explicit override)
// 2. CWD/.env
// 3. Package root/.env
const __dirname = path.dirname(fileURLToPath(import.meta.url));
const envCandidates = [
  process.env.CONTRACT_SEARCH_ENV_FILE,
  path.resolve(process.cwd(), '.env'),
  path.resolve(__dirname, '..', '.env'),
].filter((p): p is string => typeof p === 'string');

for (const envPath of envCandidates) {
  if (fs.existsSync(envPath)) {
    dotenv.config({ path: envPath, quiet: true });
    break;
  }
}

const server = new McpServer({
  name: 'contract-search-mcp',
  version: '1.0.0',
});

let services: ServiceContainer | null = null;

async function main(): Promise<void> {
  const config = loadServerConfig();
  services = createServices(config);
  const toolCount = registerAllTools(server, services);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error('Contract Search MCP Server running on stdio');
  console.error(`Tools registered: ${toolCount}`);
}

function handleShutdown(signal: string): void {
  console.error(`[Shutdown] Received ${signal}, shutting down gracefully...`);
  server
    .close()
    .then(() => {
      services?.store.close();
      console.error('[Shutdown] Server closed successfully');
      process.exit(0);
    })
    .catch((err: unknown) => {
      console.error(`[Shutdown] Error closing server: ${String(err)}`);
      process.exit(1);
    });
  // Force exit after 5s if graceful shutdown hangs
  setTimeout(() => {
    console.error('[Shutdown] Forced exit after timeout');
    process.exit(1);
  }, 5000).unref();
}

process.on('SIGTERM', () => handleShutdown('SIGTERM'));
process.on('SIGINT', () => handleShutdown('SIGINT'));

main().catch((error: unknown) => {
  console.error('Fatal error starting MCP server:', error);
  services?.store.close();
  process.exit(1);
});
