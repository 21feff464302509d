/**
 * Errors raised by {@link fetchJson}. Tool handlers map each class to a
 * distinct envelope message so callers can tell "try again" apart from
 * "fix your input".
 */

/** The request never produced a response: DNS, refused connection, abort or timeout. */
export class NetworkError extends Error {
  readonly host: string;

  constructor(message: string, host: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NetworkError';
    this.host = host;
  }
}

/** The upstream answered with a non-2xx status. */
export class UpstreamHttpError extends Error {
  readonly status: number;
  readonly statusText: string;
  readonly host: string;
  /** Parsed JSON body when the upstream sent one, otherwise the raw text. */
  readonly body: unknown;

  constructor(status: number, statusText: string, host: string, body: unknown) {
    super(`${status} ${statusText || 'Error'} from ${host}`);
    this.name = 'UpstreamHttpError';
    this.status = status;
    this.statusText = statusText;
    this.host = host;
    this.body = body;
  }
}

/** The upstream answered 2xx but the body was not the JSON we expect. */
export class UpstreamPayloadError extends Error {
  readonly host: string;

  constructor(message: string, host: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'UpstreamPayloadError';
    this.host = host;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
