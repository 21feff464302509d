#!/usr/bin/env node
// .env first, so OTEL_ENABLED and the connection string can come from it
import 'dotenv/config';
// OTEL must be initialized BEFORE any other imports
// This side-effect import self-initializes OTEL synchronously
import './telemetry/otel-init.js';
import { loadServerConfig } from './config.js';

async function startStdio() {
  const { createToolsServer } = await import('./core/server-factory.js');
  const { StdioServerTransport } = await import('@modelcontextprotocol/sdk/server/stdio.js');

  const server = createToolsServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);

  // stdout carries JSON-RPC, so status goes to stderr
  console.error('[Tools Server] Listening on stdio');
}

// Dynamic import to ensure Express/HTTP are loaded AFTER OTEL patches them
async function startHttp(port: number) {
  const { createApp } = await import('./app.js');
  const { app, sessionManager } = createApp();

  const httpServer = app.listen(port, () => {
    console.log(`[Tools Server] Listening on http://localhost:${port}`);
    console.log(`[Tools Server] Health check: http://localhost:${port}/health`);
    console.log(`[Tools Server] MCP endpoint: http://localhost:${port}/mcp`);
  });

  const shutdown = (signal: NodeJS.Signals) => {
    console.log(`[Tools Server] Received ${signal}, closing ${sessionManager.sessionCount} session(s)`);
    sessionManager
      .closeAll()
      .catch((error: unknown) => {
        console.error('[Tools Server] Error closing sessions:', error);
      })
      .finally(() => {
        httpServer.close(() => process.exit(0));
      });
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

async function main() {
  const { port, transport } = loadServerConfig();

  if (transport === 'stdio') {
    await startStdio();
  } else {
    await startHttp(port);
  }
}

main().catch((err) => {
  console.error('[Tools Server] Failed to start server:', err);
  process.exit(1);
});
