#!/usr/bin/env node

/**
 * Session Insights MCP Server
 * Answers usage questions from the local metrics database over stdio
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { handleToolCall, tools } from './tools/registry.js';
import { resolveConfig } from './utils/config.js';
import { PACKAGE_NAME, PACKAGE_VERSION } from './utils/constants.js';

const config = resolveConfig();

const server = new Server(
  {
    name: PACKAGE_NAME,
    version: PACKAGE_VERSION,
  },
  {
    capabilities: {
      tools: {},
    },
  }
);

server.setRequestHandler(ListToolsRequestSchema, async () => {
  return { tools: [...tools] };
});

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;
  return handleToolCall(name, args, { dbPath: config.dbPath, userId: config.userId });
});

// ====================
// Start Server
// ====================

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);

  // Log to stderr (stdout is used for MCP protocol)
  console.error(`Session Insights MCP Server v${PACKAGE_VERSION}`);
  console.error(`Database: ${config.dbPath}`);
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
