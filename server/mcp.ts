#!/usr/bin/env node
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { bootstrapServices } from './app-services.js';
import { loadAppConfig } from './config/app-config.js';
import { createMcpServer } from './mcp-server.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('MCP');

async function main(): Promise<void> {
  const services = await bootstrapServices(loadAppConfig());
  const server = createMcpServer(services.dispatcher);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info('🚀 Real estate investment MCP server running on stdio');
}

main().catch((error) => {
  log.error('❌ Failed to start MCP server:', error);
  process.exit(1);
});
