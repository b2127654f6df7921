/**
 * Transport layer
 *
 * The Connection never calls the network directly; it hands fully prepared
 * requests to a Transport. `FetchTransport` uses the global fetch of Node.js,
 * tests plug in an in-process fake.
 */

import type { HttpMethod } from './contracts';

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
  timeoutMs: number;
}

export interface TransportResponse {
  status: number;
  headers: Record<string, string>;
  text: string;
}

export interface Transport {
  send(request: TransportRequest): Promise<TransportResponse>;
}

export type TransportErrorKind = 'timeout' | 'reset' | 'refused' | 'network';

/**
 * Raised by transports when no HTTP response was received at all
 */
export class TransportError extends Error {
  constructor(
    public readonly kind: TransportErrorKind,
    message: string,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'TransportError';
  }
}

function readErrorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return undefined;
  }
  const { code } = error;
  return typeof code === 'string' ? code : undefined;
}

/**
 * Map a fetch rejection onto a transport error kind
 */
export function classifyFetchError(error: unknown): TransportErrorKind {
  if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
    return 'timeout';
  }
  const cause = error instanceof Error ? error.cause : undefined;
  const code = readErrorCode(cause) ?? readErrorCode(error);
  switch (code) {
    case 'ECONNRESET':
    case 'EPIPE':
    case 'UND_ERR_SOCKET':
      return 'reset';
    case 'ECONNREFUSED':
      return 'refused';
    case 'ETIMEDOUT':
    case 'UND_ERR_CONNECT_TIMEOUT':
    case 'UND_ERR_HEADERS_TIMEOUT':
      return 'timeout';
    default:
      return 'network';
  }
}

export class FetchTransport implements Transport {
  async send(request: TransportRequest): Promise<TransportResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), request.timeoutMs);

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
      });
      const text = await response.text();
      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key] = value;
      });
      return { status: response.status, headers, text };
    } catch (error) {
      const kind = classifyFetchError(error);
      const message = error instanceof Error ? error.message : String(error);
      throw new TransportError(kind, `${request.method} ${request.url} failed (${kind}): ${message}`, error);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
