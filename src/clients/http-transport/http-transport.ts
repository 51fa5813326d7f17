/**
 * HTTP Transport
 *
 * Sends one JSON request body to the provider and hands back the parsed
 * JSON response. Classification of provider errors (rate limit or other)
 * is left to the dispatcher; this layer only raises when no usable
 * response was obtained.
 *
 * There is no per-call deadline: a call takes as long as the remote takes.
 */

import { createServiceLogger, log } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import type { RequestPayload } from '../../shared/types/index.js';
import { isRecord } from '../../utils/guards.js';

/**
 * One outbound call
 */
export interface OutboundRequest {
  url: string;
  headers: Record<string, string>;
  payload: RequestPayload;
}

/**
 * Outbound-call transport consumed by the dispatcher
 */
export interface RequestTransport {
  /**
   * Issue the call and resolve with the response body
   *
   * @throws TransportError (or any error) when no response was obtained
   */
  send(request: OutboundRequest): Promise<unknown>;
}

/**
 * Error thrown when a call produced no usable response
 *
 * Preserves the HTTP status code when one was received.
 */
export class TransportError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TransportError';
  }
}

export interface HttpTransportDependencies {
  /**
   * Fetch implementation
   * @default globalThis.fetch
   */
  fetch?: typeof fetch;
}

/**
 * Response bodies that carry a provider error object are returned, whatever
 * the status, so the dispatcher can tell rate limits from other API errors.
 */
function hasErrorField(body: unknown): boolean {
  return isRecord(body) && body.error !== undefined && body.error !== null;
}

export class HttpTransport implements RequestTransport {
  private readonly fetchFn: typeof fetch;
  private readonly logger: ServiceLogger;

  constructor(dependencies: HttpTransportDependencies = {}) {
    this.fetchFn = dependencies.fetch ?? globalThis.fetch;
    this.logger = createServiceLogger('HttpTransport');
  }

  async send(request: OutboundRequest): Promise<unknown> {
    const { url, headers, payload } = request;
    const target = new URL(url);
    log.externalApiCall(this.logger, target.host, target.pathname);

    let response: Response;
    let text: string;
    try {
      response = await this.fetchFn(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          ...headers,
        },
        body: JSON.stringify(payload),
      });
      text = await response.text();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new TransportError(`Request to ${url} failed: ${reason}`, undefined, {
        cause: error,
      });
    }

    const status = response.status;
    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (error) {
      throw new TransportError(
        `HTTP ${status} ${response.statusText}: response body is not JSON`,
        status,
        { cause: error }
      );
    }

    if (!response.ok && !hasErrorField(body)) {
      throw new TransportError(
        `HTTP ${status} ${response.statusText}${text ? `: ${text}` : ''}`,
        status
      );
    }

    this.logger.debug({ status, ok: response.ok }, 'Response received');
    return body;
  }
}
