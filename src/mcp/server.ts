/**
 * threatreg — MCP Server
 *
 * Creates and configures the MCP server with all tools and resources.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type Database from 'better-sqlite3';
import { registerInventoryTools } from './tools/inventory.js';
import { registerPatternTools } from './tools/pattern.js';
import { registerEvaluateTool } from './tools/evaluate.js';
import { registerResources } from './resources.js';

/**
 * Create a fully configured MCP server with all threatreg tools and resources.
 *
 * @param db - The better-sqlite3 database instance (already migrated)
 */
export function createMcpServer(db: Database.Database): McpServer {
  const server = new McpServer({
    name: 'threatreg',
    version: '0.1.0',
  });

  registerInventoryTools(server, db); // add_threat, add_product, add_instance, add_tag, assign_tag, add_relationship
  registerPatternTools(server, db); // create/get/update/delete/list_patterns, add/update/delete_condition
  registerEvaluateTool(server, db); // evaluate_patterns

  registerResources(server, db);

  return server;
}
