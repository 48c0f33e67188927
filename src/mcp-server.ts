import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  McpError,
  ReadResourceRequestSchema
} from '@modelcontextprotocol/sdk/types.js';
import type { ProtocolDispatcher } from './core/dispatcher.js';
import { NotFoundError } from './core/errors.js';

/** JSON-RPC error code MCP clients expect for an unknown resource URI. */
export const RESOURCE_NOT_FOUND = -32002;

export const SERVER_INFO = { name: 'tasklink', version: '0.1.0' } as const;

/**
 * Bind the dispatcher to an MCP server. Transport is left to the caller:
 * stdio in production, in-memory in tests.
 */
export function createMcpServer(dispatcher: ProtocolDispatcher): Server {
  const server = new Server(SERVER_INFO, {
    capabilities: {
      tools: {},
      resources: {}
    }
  });

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: dispatcher.listTools() };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    try {
      return await dispatcher.callTool(name, args);
    } catch (err) {
      if (err instanceof NotFoundError) {
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
      }
      throw err;
    }
  });

  server.setRequestHandler(ListResourcesRequestSchema, async () => {
    return { resources: dispatcher.listResources() };
  });

  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    const { uri } = request.params;
    try {
      return { contents: [dispatcher.readResource(uri)] };
    } catch (err) {
      if (err instanceof NotFoundError) {
        throw new McpError(RESOURCE_NOT_FOUND, `Unknown resource: ${uri}`);
      }
      throw err;
    }
  });

  return server;
}
