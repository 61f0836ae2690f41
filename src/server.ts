/**
 * MCP server wiring: tool listing and dispatch
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  ListToolsRequestSchema,
  CallToolRequestSchema,
  type CallToolResult,
} from '@modelcontextprotocol/sdk/types.js';

import { allTools, findHandler, type ToolContext } from './tools/index.js';

export const SERVER_NAME = 'anki-card-mcp';
export const SERVER_VERSION = '0.1.0';

/**
 * Run a tool by name and wrap its JSON output as an MCP tool result
 */
export async function callTool(
  name: string,
  args: unknown,
  context: ToolContext
): Promise<CallToolResult> {
  const handler = findHandler(name);

  if (!handler) {
    return {
      content: [
        {
          type: 'text',
          text: JSON.stringify({ error: 'Unknown tool', name }),
        },
      ],
      isError: true,
    };
  }

  try {
    const result = await handler(args, context);

    // Handlers report failures in the payload rather than by throwing
    const parsed: unknown = JSON.parse(result);
    const isError = typeof parsed === 'object' && parsed !== null && 'error' in parsed;

    return {
      content: [
        {
          type: 'text',
          text: result,
        },
      ],
      isError,
    };
  } catch (error) {
    context.logger.error(`Tool ${name} failed unexpectedly`, error);
    return {
      content: [
        {
          type: 'text',
          text: JSON.stringify({
            error: 'Tool execution failed',
            message: error instanceof Error ? error.message : String(error),
            success: false,
          }),
        },
      ],
      isError: true,
    };
  }
}

/**
 * Create and configure MCP server
 */
export function createServer(context: ToolContext): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  // Handle list_tools request
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: allTools.map((tool) => ({
        name: tool.name,
        description: tool.description,
        inputSchema: tool.inputSchema,
      })),
    };
  });

  // Handle call_tool request
  server.setRequestHandler(CallToolRequestSchema, async (request): Promise<CallToolResult> => {
    const { name, arguments: args } = request.params;
    context.logger.debug(`Calling tool ${name}`);
    return callTool(name, args, context);
  });

  return server;
}
