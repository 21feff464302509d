// Re-exports for clean imports
export { withSpan, addSpanEvent, setSpanAttributes, TRACER_NAME } from './span-utils.js';
export { MCP_ATTRIBUTES } from './attributes.js';
export type { McpAttributeName } from './attributes.js';
export { initOtel, registerShutdownHandler } from './otel-init.js';
