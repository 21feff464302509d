import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerAllTools } from '../tools/index.js';
import { SERVER_INSTRUCTIONS } from './server-instructions.js';

export const SERVER_INFO = {
  name: 'utility-tools',
  version: '1.0.0',
} as const;

export interface ToolsServerOptions {
  /**
   * Restrict the server to these tool names. Unknown names are ignored.
   * All tools are registered when omitted.
   */
  toolFilter?: readonly string[];
}

/**
 * Creates an MCP server with the utility tools registered.
 * Used by both the per-session HTTP transport and the stdio transport.
 */
export function createToolsServer(options: ToolsServerOptions = {}): McpServer {
  const server = new McpServer(
    { ...SERVER_INFO },
    {
      capabilities: {
        tools: { listChanged: true },
      },
      instructions: SERVER_INSTRUCTIONS,
    }
  );

  registerAllTools(server, options.toolFilter);

  return server;
}
