/**
 * MCP server wiring: `tools/list` and `tools/call` answered from a
 * ToolRegistry, with one ToolContext shared by every call on the
 * connection.  `initialize` and protocol errors are handled by the SDK.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { type ToolContext } from './types';
import { type ToolRegistry } from './registry';
import { dispatchToolCall } from './dispatch';

export const SERVER_INFO = { name: 'miro-mcp', version: '1.0.0' } as const;

export function createServer(registry: ToolRegistry, context: ToolContext): Server {
  const server = new Server(
    { name: SERVER_INFO.name, version: SERVER_INFO.version },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: registry.list(),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return dispatchToolCall(registry, name, args ?? {}, context);
  });

  return server;
}
