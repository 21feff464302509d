import { randomUUID } from 'crypto';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import type { ClientCapabilities } from '@modelcontextprotocol/sdk/types.js';
import { createToolsServer } from './server-factory.js';
import type { ClientInfo, ServerFactory, SessionInfo, SessionManagerOptions, SessionSummary } from './types.js';

/**
 * Manages MCP client sessions for the Streamable HTTP transport.
 *
 * Each session has its own McpServer and transport, so a tool filter chosen
 * at initialization only affects that client.
 */
export class SessionManager {
  private sessions = new Map<string, SessionInfo>();
  private createServer: ServerFactory;

  constructor(options: SessionManagerOptions = {}) {
    this.createServer = options.createServer ?? createToolsServer;
  }

  /**
   * Creates a new session for a connecting client.
   */
  async createSession(
    clientInfo: ClientInfo,
    capabilities: ClientCapabilities,
    toolFilter?: readonly string[]
  ): Promise<SessionInfo> {
    const sessionId = randomUUID();
    const { server, transport } = await this.createMcpServerWithTransport(sessionId, toolFilter);

    const sessionInfo: SessionInfo = {
      sessionId,
      clientInfo,
      capabilities,
      createdAt: new Date(),
      toolFilter,
      transport,
      server,
    };

    this.sessions.set(sessionId, sessionInfo);
    console.log(`[Tools Server] Session created: ${sessionId} for client ${clientInfo.name}`);
    return sessionInfo;
  }

  /**
   * Retrieves a session by ID.
   */
  getSession(sessionId: string): SessionInfo | undefined {
    return this.sessions.get(sessionId);
  }

  /**
   * Deletes a session, closing its transport.
   */
  async deleteSession(sessionId: string): Promise<boolean> {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return false;
    }
    this.sessions.delete(sessionId);
    await session.transport.close();
    console.log(`[Tools Server] Session closed: ${sessionId}`);
    return true;
  }

  /**
   * Closes every session. Used on shutdown.
   */
  async closeAll(): Promise<void> {
    await Promise.all([...this.sessions.keys()].map((sessionId) => this.deleteSession(sessionId)));
  }

  /**
   * Returns all sessions as a summary (without internal references).
   */
  getAllSessions(): Record<string, SessionSummary> {
    const result: Record<string, SessionSummary> = {};
    for (const [sessionId, info] of this.sessions) {
      result[sessionId] = {
        clientInfo: info.clientInfo,
        capabilities: info.capabilities,
        createdAt: info.createdAt,
        ...(info.toolFilter ? { toolFilter: info.toolFilter } : {}),
      };
    }
    return result;
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  /**
   * Creates an MCP server with transport for a session.
   */
  private async createMcpServerWithTransport(
    sessionId: string,
    toolFilter?: readonly string[]
  ): Promise<{
    server: McpServer;
    transport: StreamableHTTPServerTransport;
  }> {
    const server = this.createServer({ toolFilter });

    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => sessionId,
    });

    await server.connect(transport);

    return { server, transport };
  }
}
