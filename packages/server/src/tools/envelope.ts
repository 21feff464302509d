import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { describeError } from '../http/errors.js';
import { MCP_ATTRIBUTES, withSpan } from '../telemetry/index.js';

export type EnvelopeFields = Record<string, unknown>;

export type SuccessEnvelope<T extends EnvelopeFields> = T & { status: 'success' };

export type ErrorEnvelope = { status: 'error'; error: string };

/**
 * Uniform result of every tool: the tool-specific fields on success,
 * a single message on failure.
 */
export type ToolEnvelope<T extends EnvelopeFields> = SuccessEnvelope<T> | ErrorEnvelope;

export function success<T extends EnvelopeFields>(fields: T): SuccessEnvelope<T> {
  return { ...fields, status: 'success' };
}

export function failure(error: string): ErrorEnvelope {
  return { error, status: 'error' };
}

export function isSuccess<T extends EnvelopeFields>(envelope: ToolEnvelope<T>): envelope is SuccessEnvelope<T> {
  return envelope.status === 'success';
}

export function toCallToolResult(envelope: ToolEnvelope<EnvelopeFields>): CallToolResult {
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(envelope, null, 2) }],
    structuredContent: envelope,
    ...(envelope.status === 'error' ? { isError: true } : {}),
  };
}

/**
 * Runs a tool inside a span and turns its envelope into an MCP tool result.
 * Anything the tool throws becomes an error envelope here; nothing reaches the SDK.
 */
export async function respond<T extends EnvelopeFields>(
  toolName: string,
  run: () => Promise<ToolEnvelope<T>>
): Promise<CallToolResult> {
  return withSpan(`tool ${toolName}`, { [MCP_ATTRIBUTES.TOOL_NAME]: toolName }, async (span) => {
    let envelope: ToolEnvelope<T>;
    try {
      envelope = await run();
    } catch (error) {
      console.error(`[Tool] ${toolName} failed:`, error);
      envelope = failure(`Unexpected error: ${describeError(error)}`);
    }
    span.setAttribute(MCP_ATTRIBUTES.TOOL_STATUS, envelope.status);
    return toCallToolResult(envelope);
  });
}
