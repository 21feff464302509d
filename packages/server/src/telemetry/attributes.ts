/**
 * Span attribute names used by the utility tools server.
 * Following OpenTelemetry naming conventions.
 */
export const MCP_ATTRIBUTES = {
  // Session attributes
  SESSION_ID: 'mcp.session.id',
  CLIENT_NAME: 'mcp.client.name',
  CLIENT_VERSION: 'mcp.client.version',

  // Message attributes
  MESSAGE_TYPE: 'mcp.message.type',
  MESSAGE_METHOD: 'mcp.message.method',
  MESSAGE_ID: 'mcp.message.id',

  // Tool attributes
  TOOL_NAME: 'mcp.tool.name',
  TOOL_STATUS: 'mcp.tool.status',
  TOOL_FALLBACK: 'mcp.tool.fallback',

  // Upstream API attributes
  UPSTREAM_HOST: 'upstream.host',
  UPSTREAM_STATUS_CODE: 'upstream.status_code',
  UPSTREAM_TIMEOUT_MS: 'upstream.timeout_ms',
} as const;

export type McpAttributeName = (typeof MCP_ATTRIBUTES)[keyof typeof MCP_ATTRIBUTES];
