import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import type { ClientCapabilities } from '@modelcontextprotocol/sdk/types.js';
import type { ToolsServerOptions } from './server-factory.js';

export interface ClientInfo {
  name: string;
  version: string;
}

/**
 * Information about a connected client session.
 */
export interface SessionInfo {
  sessionId: string;
  clientInfo: ClientInfo;
  capabilities: ClientCapabilities;
  createdAt: Date;
  /** Tool names requested via `?tools=`, if any */
  toolFilter?: readonly string[];
  transport: StreamableHTTPServerTransport;
  server: McpServer;
}

/**
 * Summary of session info (without internal server/transport references).
 * Safe to expose via API.
 */
export interface SessionSummary {
  clientInfo: ClientInfo;
  capabilities: ClientCapabilities;
  createdAt: Date;
  toolFilter?: readonly string[];
}

/**
 * Factory for the per-session MCP server.
 */
export type ServerFactory = (options: ToolsServerOptions) => McpServer;

/**
 * Options for SessionManager construction.
 */
export interface SessionManagerOptions {
  /**
   * Builds the MCP server for each new session.
   * Defaults to {@link createToolsServer}.
   */
  createServer?: ServerFactory;
}
