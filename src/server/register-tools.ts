/**
 * Shared Tool Registration
 *
 * Registers all MCP tools on a given McpServer instance.
 *
 * CRITICAL: NEVER use console.log() - stdout may be reserved for JSON-RPC protocol.
 *
 * @module server/register-tools
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ToolDefinition, ToolModule } from '../tools/shared.js';
import type { ServiceContainer } from './types.js';

import { createSearchTools } from '../tools/search.js';
import { createIngestionTools } from '../tools/ingestion.js';
import { createDocumentTools } from '../tools/documents.js';
import { createMetadataTools } from '../tools/metadata.js';
import { createHealthTools } from '../tools/health.js';

/** All tool modules in registration order */
const allToolModules: ToolModule[] = [
  createSearchTools,
  createIngestionTools,
  createDocumentTools,
  createMetadataTools,
  createHealthTools,
];

/**
 * Build every tool around the given services.
 *
 * @throws Error if two modules define the same tool name
 */
export function buildAllTools(services: ServiceContainer): Record<string, ToolDefinition> {
  const tools: Record<string, ToolDefinition> = {};
  for (const createModule of allToolModules) {
    for (const [name, tool] of Object.entries(createModule(services))) {
      if (name in tools) {
        throw new Error(`Duplicate tool name detected: "${name}"`);
      }
      tools[name] = tool;
    }
  }
  return tools;
}

/**
 * Register all tools on the given MCP server instance.
 *
 * @returns Number of tools registered
 */
export function registerAllTools(server: McpServer, services: ServiceContainer): number {
  const tools = buildAllTools(services);
  for (const [name, tool] of Object.entries(tools)) {
    server.tool(name, tool.description, tool.inputSchema, tool.handler);
  }
  return Object.keys(tools).length;
}
