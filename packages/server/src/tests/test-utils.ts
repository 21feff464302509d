import request from 'supertest';
import type { Express } from 'express';
import { createApp as createAppInternal } from '../app.js';

export interface JsonRpcMessage<R = unknown> {
  jsonrpc: string;
  id?: number | string | null;
  result?: R;
  error?: { code: number; message: string };
}

export interface ToolsListResult {
  tools: { name: string; description?: string }[];
}

export interface ToolCallResult {
  content: { type: string; text: string }[];
  structuredContent?: Record<string, unknown>;
  isError?: boolean;
}

export interface InitializeResult {
  protocolVersion: string;
  serverInfo: { name: string; version: string };
  instructions?: string;
  capabilities: { tools?: { listChanged?: boolean } };
}

// Wrapper that returns just the Express app
export function createApp(): Express {
  const result = createAppInternal();
  return result.app;
}

// Parse SSE response to extract JSON-RPC message
export function parseSSE<R = unknown>(text: string): JsonRpcMessage<R> {
  const lines = text.split('\n');
  for (const line of lines) {
    if (line.startsWith('data: ')) {
      return JSON.parse(line.slice(6));
    }
  }
  throw new Error('No data line found in SSE response');
}

function readMessage<R>(response: request.Response): JsonRpcMessage<R> {
  const contentType: unknown = response.headers['content-type'];
  return typeof contentType === 'string' && contentType.includes('text/event-stream')
    ? parseSSE<R>(response.text)
    : response.body;
}

function readSessionHeader(response: request.Response): string | undefined {
  const header: unknown = response.headers['mcp-session-id'];
  return typeof header === 'string' ? header : undefined;
}

// Helper to make MCP requests with session support
export async function mcpRequest<R = unknown>(
  app: Express,
  body: object,
  sessionId?: string
): Promise<{ status: number; body: JsonRpcMessage<R>; sessionId?: string }> {
  let req = request(app)
    .post('/mcp')
    .set('Accept', 'application/json, text/event-stream')
    .set('Content-Type', 'application/json');

  if (sessionId) {
    req = req.set('Mcp-Session-Id', sessionId);
  }

  const response = await req.send(body);

  return {
    status: response.status,
    body: readMessage<R>(response),
    sessionId: readSessionHeader(response),
  };
}

// Helper to initialize MCP session and return session ID
export async function initializeSession(
  app: Express,
  options: { clientName?: string; capabilities?: Record<string, unknown>; tools?: string[] } = {}
): Promise<{ status: number; body: JsonRpcMessage<InitializeResult>; sessionId: string }> {
  const url = options.tools ? `/mcp?tools=${options.tools.join(',')}` : '/mcp';

  const response = await request(app)
    .post(url)
    .set('Accept', 'application/json, text/event-stream')
    .set('Content-Type', 'application/json')
    .send({
      jsonrpc: '2.0',
      id: 1,
      method: 'initialize',
      params: {
        protocolVersion: '2025-03-26',
        capabilities: options.capabilities ?? {},
        clientInfo: { name: options.clientName ?? 'test-client', version: '1.0.0' },
      },
    });

  const sessionId = readSessionHeader(response);
  if (!sessionId) {
    throw new Error(`initialize returned no session ID (status ${response.status})`);
  }

  return {
    status: response.status,
    body: readMessage<InitializeResult>(response),
    sessionId,
  };
}

// Helper to call a tool and return its result
export async function callTool(
  app: Express,
  sessionId: string,
  name: string,
  args: Record<string, unknown>
): Promise<{ status: number; body: JsonRpcMessage<ToolCallResult> }> {
  return mcpRequest<ToolCallResult>(
    app,
    {
      jsonrpc: '2.0',
      id: 2,
      method: 'tools/call',
      params: { name, arguments: args },
    },
    sessionId
  );
}

// Helper to list tools for a session
export async function listTools(
  app: Express,
  sessionId: string
): Promise<{ status: number; body: JsonRpcMessage<ToolsListResult> }> {
  return mcpRequest<ToolsListResult>(app, { jsonrpc: '2.0', id: 2, method: 'tools/list', params: {} }, sessionId);
}

// Re-export request for convenience
export { request };
