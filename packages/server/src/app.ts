import express from 'express';
import type { Request, Response } from 'express';
import type { ClientCapabilities } from '@modelcontextprotocol/sdk/types.js';
import { SessionManager } from './core/session-manager.js';
import type { SessionManagerOptions } from './core/types.js';
import { setSpanAttributes, MCP_ATTRIBUTES } from './telemetry/index.js';
import { toolNames } from './tools/index.js';

export { SessionManager } from './core/session-manager.js';
export { createToolsServer, SERVER_INFO } from './core/server-factory.js';
export { toolNames, registerAllTools } from './tools/index.js';
export type { ToolEnvelope, SuccessEnvelope, ErrorEnvelope } from './tools/envelope.js';

/**
 * Options for configuring the utility tools HTTP app.
 */
export interface AppOptions {
  /**
   * Session manager options, e.g. a custom server factory.
   */
  sessions?: SessionManagerOptions;
}

export interface App {
  app: express.Express;
  sessionManager: SessionManager;
}

interface JsonRpcBody {
  jsonrpc?: string;
  id?: string | number | null;
  method?: string;
  params?: {
    clientInfo?: { name: string; version: string };
    capabilities?: ClientCapabilities;
  };
}

function readSessionId(req: Request): string | undefined {
  const header = req.headers['mcp-session-id'];
  return typeof header === 'string' ? header : undefined;
}

/**
 * Parses `?tools=a,b` into a list of names. Returns undefined when absent.
 */
function readToolFilter(req: Request): string[] | undefined {
  const { tools } = req.query;
  if (typeof tools !== 'string') {
    return undefined;
  }
  return tools
    .split(',')
    .map((tool) => tool.trim())
    .filter((tool) => tool.length > 0);
}

function sendJsonRpcError(res: Response, status: number, message: string, id: JsonRpcBody['id'] = null): void {
  res.status(status).json({
    jsonrpc: '2.0',
    error: { code: -32600, message },
    id: id ?? null,
  });
}

export function createApp(options?: AppOptions): App {
  const app = express();

  // Parse JSON bodies
  app.use(express.json());

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', tools: toolNames });
  });

  // Session manager for multi-client support
  const sessionManager = new SessionManager(options?.sessions);

  // Debug endpoint to list all sessions and their capabilities
  app.get('/debug/sessions', (_req, res) => {
    const sessions = sessionManager.getAllSessions();
    res.json({
      sessions,
      sessionCount: Object.keys(sessions).length,
    });
  });

  // Looks up the session named by the Mcp-Session-Id header, answering with an error when there is none
  function requireSession(req: Request, res: Response, id?: JsonRpcBody['id']) {
    const sessionId = readSessionId(req);
    if (!sessionId) {
      sendJsonRpcError(res, 400, 'Missing Mcp-Session-Id header', id);
      return undefined;
    }
    const session = sessionManager.getSession(sessionId);
    if (!session) {
      sendJsonRpcError(res, 404, 'Session not found', id);
      return undefined;
    }
    return session;
  }

  // Handle POST requests to /mcp
  app.post('/mcp', async (req, res) => {
    const sessionId = readSessionId(req);
    const body: JsonRpcBody | undefined = req.body;

    // Add OTEL span attributes for MCP messages
    if (body?.method) {
      setSpanAttributes({
        [MCP_ATTRIBUTES.MESSAGE_METHOD]: body.method,
        [MCP_ATTRIBUTES.MESSAGE_ID]: body.id != null ? String(body.id) : 'notification',
        [MCP_ATTRIBUTES.MESSAGE_TYPE]: body.id != null ? 'request' : 'notification',
      });
    }

    if (sessionId) {
      setSpanAttributes({
        [MCP_ATTRIBUTES.SESSION_ID]: sessionId,
      });
    }

    if (body?.method === 'initialize') {
      // Create a new session for the client
      const clientInfo = body.params?.clientInfo ?? { name: 'unknown', version: '0.0.0' };
      const capabilities = body.params?.capabilities ?? {};

      setSpanAttributes({
        [MCP_ATTRIBUTES.CLIENT_NAME]: clientInfo.name,
        [MCP_ATTRIBUTES.CLIENT_VERSION]: clientInfo.version,
      });

      const session = await sessionManager.createSession(clientInfo, capabilities, readToolFilter(req));
      console.log(`[Tools Server] Client ${clientInfo.name} ${clientInfo.version} initialized`);

      await session.transport.handleRequest(req, res, body);
      return;
    }

    // For non-initialize requests, require a valid session ID
    const session = requireSession(req, res, body?.id);
    if (!session) {
      return;
    }

    await session.transport.handleRequest(req, res, body);
  });

  // Handle GET requests to /mcp (SSE stream)
  app.get('/mcp', async (req, res) => {
    const session = requireSession(req, res);
    if (!session) {
      return;
    }

    await session.transport.handleRequest(req, res);
  });

  // Handle DELETE requests to /mcp (session termination)
  app.delete('/mcp', async (req, res) => {
    const session = requireSession(req, res);
    if (!session) {
      return;
    }

    // Let the transport handle the DELETE first
    await session.transport.handleRequest(req, res);

    await sessionManager.deleteSession(session.sessionId);
  });

  return {
    app,
    sessionManager,
  };
}
