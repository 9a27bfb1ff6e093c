/**
 * MCP Server initialization and tool registration
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolRequest
} from '@modelcontextprotocol/sdk/types.js';
import { CONFIG } from './config.js';
import { BANNER } from './guidance.js';
import { resetTools } from './tools/reset.js';
import { setupTools } from './tools/setup.js';
import type { RegisteredTool } from './tools/define.js';
import * as logger from './utils/logger.js';
import { SafetyValidator } from './utils/validator.js';

export const allTools: Record<string, RegisteredTool> = {
  ...setupTools,
  ...resetTools
};

/**
 * Create and configure MCP server with all tools
 */
export function createServer(): Server {
  const server = new Server(
    {
      name: 'mtk-reset-mcp-server',
      version: '1.0.0'
    },
    {
      capabilities: {
        tools: {}
      }
    }
  );

  // Handle tools/list request
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    const toolsList = Object.entries(allTools).map(([name, tool]) => ({
      name,
      description: tool.description,
      inputSchema: tool.inputSchema
    }));

    return { tools: toolsList };
  });

  // Handle tools/call requests
  server.setRequestHandler(CallToolRequestSchema, async (request: CallToolRequest) => {
    const toolName = request.params.name;
    const tool = Object.prototype.hasOwnProperty.call(allTools, toolName) ? allTools[toolName] : undefined;

    if (!tool) {
      throw new Error(`Unknown tool: ${toolName}`);
    }

    if (SafetyValidator.isDestructive(toolName)) {
      logger.warn(`Destructive tool requested: ${toolName}`);
    }

    try {
      const result = await tool.run(request.params.arguments);
      return {
        content: [
          {
            type: 'text',
            text: result
          }
        ]
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return {
        content: [
          {
            type: 'text',
            text: `Error: ${message}`
          }
        ],
        isError: true
      };
    }
  });

  return server;
}

/**
 * Start the MCP server
 */
export async function startServer(): Promise<void> {
  const server = createServer();
  const transport = new StdioServerTransport();

  await server.connect(transport);

  const destructive = CONFIG.DESTRUCTIVE_OPERATIONS.join(', ');
  BANNER.forEach(line => logger.info(line));
  logger.info('MTK Reset MCP Server running on stdio');
  logger.info(`Available tools: ${Object.keys(allTools).length} (setup: ${Object.keys(setupTools).length}, reset: ${Object.keys(resetTools).length})`);
  logger.info(`Destructive tools requiring confirmation tokens: ${destructive}`);
  logger.info(`Install directory: ${CONFIG.INSTALL_DIR}`);
}
