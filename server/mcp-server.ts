/**
 * MCP Server
 *
 * Exposes the tool dispatcher and the registry resources over the Model
 * Context Protocol.
 *
 * Tools:
 * - analyze_property, register_property, register_investor
 * - compare_properties, portfolio_analysis
 * - estimate_sale_price and the lookup_* market data tools
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  ReadResourceRequestSchema
} from '@modelcontextprotocol/sdk/types.js';
import type { ToolDispatcher } from './services/tool-dispatcher.js';
import { ToolError } from './utils/estimation-errors.js';
import { createLogger } from './utils/logger.js';
import { describeError } from './utils/result.js';

const log = createLogger('MCP');

export const MCP_SERVER_NAME = 'real-estate-investment-mcp';
export const MCP_SERVER_VERSION = '1.0.0';

export function createMcpServer(dispatcher: ToolDispatcher): Server {
  const server = new Server(
    { name: MCP_SERVER_NAME, version: MCP_SERVER_VERSION },
    {
      capabilities: { tools: {}, resources: {} },
      instructions: 'Tools for analyzing, comparing and pricing rental real-estate investments.'
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: dispatcher.listTools()
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    try {
      const text = await dispatcher.callTool(name, args ?? {});
      return { content: [{ type: 'text', text }] };
    } catch (error) {
      if (error instanceof ToolError) {
        return { content: [{ type: 'text', text: error.message }], isError: true };
      }
      log.error(`❌ Tool ${name} failed:`, error);
      return { content: [{ type: 'text', text: `Error: ${describeError(error)}` }], isError: true };
    }
  });

  server.setRequestHandler(ListResourcesRequestSchema, async () => ({
    resources: await dispatcher.listResources()
  }));

  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    const { uri } = request.params;
    const text = await dispatcher.readResource(uri);
    return { contents: [{ uri, mimeType: 'application/json', text }] };
  });

  return server;
}
