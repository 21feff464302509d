import { describe, it, expect } from 'vitest';
import { createApp, initializeSession, listTools, mcpRequest, request } from './test-utils.js';

describe('multi-client sessions', () => {
  it('assigns unique session IDs to each client', async () => {
    const app = createApp();

    const clientA = await initializeSession(app, { clientName: 'client-a' });
    const clientB = await initializeSession(app, { clientName: 'client-b' });

    expect(clientA.status).toBe(200);
    expect(clientB.status).toBe(200);
    expect(clientA.sessionId).not.toBe(clientB.sessionId);
  });

  it('keeps tool filters separate between sessions', async () => {
    const app = createApp();

    const filtered = await initializeSession(app, { clientName: 'client-a', tools: ['calculate'] });
    const unfiltered = await initializeSession(app, { clientName: 'client-b' });

    const filteredTools = await listTools(app, filtered.sessionId);
    const unfilteredTools = await listTools(app, unfiltered.sessionId);

    expect(filteredTools.body.result?.tools.map((t) => t.name)).toEqual(['calculate']);
    expect(unfilteredTools.body.result?.tools).toHaveLength(5);
  });

  it('debug endpoint shows all connected sessions', async () => {
    const app = createApp();

    const clientA = await initializeSession(app, {
      clientName: 'client-with-sampling',
      capabilities: { sampling: {} },
      tools: ['get_weather'],
    });
    const clientB = await initializeSession(app, { clientName: 'client-without-sampling' });

    const debugResponse = await request(app).get('/debug/sessions');

    expect(debugResponse.status).toBe(200);
    expect(debugResponse.body.sessionCount).toBe(2);

    const sessionA = debugResponse.body.sessions[clientA.sessionId];
    const sessionB = debugResponse.body.sessions[clientB.sessionId];

    expect(sessionA.clientInfo.name).toBe('client-with-sampling');
    expect(sessionB.clientInfo.name).toBe('client-without-sampling');
    expect(sessionA.capabilities.sampling).toEqual({});
    expect(sessionB.capabilities.sampling).toBeUndefined();
    expect(sessionA.toolFilter).toEqual(['get_weather']);
    expect(sessionB.toolFilter).toBeUndefined();
  });

  it('rejects requests without a session ID header', async () => {
    const app = createApp();
    await initializeSession(app);

    const { status, body } = await mcpRequest(app, { jsonrpc: '2.0', id: 2, method: 'tools/list', params: {} });

    expect(status).toBe(400);
    expect(body).toEqual({
      jsonrpc: '2.0',
      error: { code: -32600, message: 'Missing Mcp-Session-Id header' },
      id: 2,
    });
  });

  it('rejects requests with an unknown session ID', async () => {
    const app = createApp();
    await initializeSession(app);

    const { status, body } = await mcpRequest(
      app,
      { jsonrpc: '2.0', id: 2, method: 'tools/list', params: {} },
      'invalid-session-id'
    );

    expect(status).toBe(404);
    expect(body).toEqual({
      jsonrpc: '2.0',
      error: { code: -32600, message: 'Session not found' },
      id: 2,
    });
  });

  it('rejects GET without a session ID header', async () => {
    const app = createApp();

    const response = await request(app).get('/mcp').set('Accept', 'text/event-stream');

    expect(response.status).toBe(400);
    expect(response.body.error).toEqual({ code: -32600, message: 'Missing Mcp-Session-Id header' });
    expect(response.body.id).toBeNull();
  });

  it('rejects DELETE for an unknown session', async () => {
    const app = createApp();

    const response = await request(app).delete('/mcp').set('Mcp-Session-Id', 'invalid-session-id');

    expect(response.status).toBe(404);
    expect(response.body.error).toEqual({ code: -32600, message: 'Session not found' });
  });

  it('allows session termination via DELETE', async () => {
    const app = createApp();
    const { sessionId } = await initializeSession(app);

    const deleteResponse = await request(app).delete('/mcp').set('Mcp-Session-Id', sessionId);

    expect(deleteResponse.status).toBe(200);

    const { status } = await mcpRequest(app, { jsonrpc: '2.0', id: 2, method: 'tools/list', params: {} }, sessionId);
    expect(status).toBe(404);

    const debugResponse = await request(app).get('/debug/sessions');
    expect(debugResponse.body.sessionCount).toBe(0);
  });
});
