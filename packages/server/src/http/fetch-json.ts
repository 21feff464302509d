import type { z } from 'zod';
import { MCP_ATTRIBUTES, withSpan } from '../telemetry/index.js';
import { NetworkError, UpstreamHttpError, UpstreamPayloadError } from './errors.js';

export interface FetchJsonOptions {
  /** Abort the request (including the body read) after this many milliseconds. */
  timeoutMs: number;
}

/**
 * Reads an error response body, preferring JSON.
 * Some upstreams (ExchangeRate-API) describe failures in a JSON body sent with a 4xx status.
 */
export async function parseErrorBody(response: Response): Promise<unknown> {
  const bodyText = await response.text().catch(() => '');
  try {
    return JSON.parse(bodyText);
  } catch {
    return bodyText;
  }
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

function networkFailureMessage(error: unknown, host: string, timeoutMs: number): string {
  if (isTimeout(error)) {
    return `Request to ${host} timed out after ${timeoutMs}ms`;
  }
  if (error instanceof Error) {
    // undici reports "fetch failed" and puts the system error on `cause`
    const cause = error.cause;
    if (cause instanceof Error) {
      const code = 'code' in cause && typeof cause.code === 'string' ? cause.code : undefined;
      return `${error.message} (${code ?? cause.message}) for ${host}`;
    }
    return `${error.message} for ${host}`;
  }
  return `${String(error)} for ${host}`;
}

/**
 * Single GET returning the parsed JSON body. No retries.
 *
 * The URL is never included in error messages: two of the upstreams carry
 * the API key in the query string or the path.
 */
export async function fetchJson(url: URL, options: FetchJsonOptions): Promise<unknown> {
  const host = url.host;

  return withSpan(
    `GET ${host}`,
    {
      [MCP_ATTRIBUTES.UPSTREAM_HOST]: host,
      [MCP_ATTRIBUTES.UPSTREAM_TIMEOUT_MS]: options.timeoutMs,
    },
    async (span) => {
      const signal = AbortSignal.timeout(options.timeoutMs);

      let response: Response;
      try {
        response = await fetch(url, { headers: { Accept: 'application/json' }, signal });
      } catch (error) {
        throw new NetworkError(networkFailureMessage(error, host, options.timeoutMs), host, { cause: error });
      }

      span.setAttribute(MCP_ATTRIBUTES.UPSTREAM_STATUS_CODE, response.status);

      if (!response.ok) {
        throw new UpstreamHttpError(response.status, response.statusText, host, await parseErrorBody(response));
      }

      try {
        return await response.json();
      } catch (error) {
        if (isTimeout(error)) {
          throw new NetworkError(networkFailureMessage(error, host, options.timeoutMs), host, { cause: error });
        }
        throw new UpstreamPayloadError(`Invalid JSON in response from ${host}`, host, { cause: error });
      }
    }
  );
}

/**
 * Validates an upstream payload against a zod schema.
 */
export function parsePayload<T extends z.ZodTypeAny>(schema: T, payload: unknown, host: string): z.infer<T> {
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new UpstreamPayloadError(
      `Unexpected response shape from ${host}${where}: ${issue?.message ?? 'invalid payload'}`,
      host,
      { cause: parsed.error }
    );
  }
  return parsed.data;
}
