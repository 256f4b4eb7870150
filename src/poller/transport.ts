/**
 * HTTP transport for activation requests, on the global `fetch`.
 *
 * Any HTTP response, whatever its status, counts as success: the platform
 * answered and the caller gets the code. Only a request that produced no
 * response (DNS failure, refused connection, timeout) is a failure, and
 * those are retried up to `automaticRetries` times first.
 */

import { createLogger } from '../shared/logger.js';
import type {
  ActivationRequest,
  Transport,
  TransportFailure,
  TransportResult,
} from './types.js';

const log = createLogger('transport');

export interface FetchTransportOptions {
  /** Abort a single attempt after this many milliseconds. */
  requestTimeoutMs: number;
  /** Extra attempts after a request fails without a response. */
  automaticRetries: number;
}

/** Encode basic-auth credentials into an Authorization header value. */
export function basicAuthHeader(user: string, pass: string): string {
  return `Basic ${Buffer.from(`${user}:${pass}`, 'utf-8').toString('base64')}`;
}

/** Append the request's query parameters to its URL. */
export function requestUrl(request: ActivationRequest): string {
  const url = new URL(request.url);
  for (const [key, value] of Object.entries(request.query)) {
    url.searchParams.set(key, String(value));
  }
  return url.toString();
}

/** Describe a thrown value the way failure events report it. */
export function describeFailure(err: unknown): TransportFailure {
  if (err instanceof Error) {
    const cause = err.cause instanceof Error ? ` (${err.cause.message})` : '';
    return {
      error: `${err.name}: ${err.message}${cause}`,
      backtrace: err.stack ? err.stack.split('\n').slice(1).map((line) => line.trim()) : null,
    };
  }
  return { error: String(err), backtrace: null };
}

export class FetchTransport implements Transport {
  constructor(private readonly options: FetchTransportOptions) {}

  async execute(request: ActivationRequest): Promise<TransportResult> {
    let url: string;
    try {
      url = requestUrl(request);
    } catch (err) {
      return { ok: false, failure: describeFailure(err) };
    }

    const init: RequestInit = {
      method: request.method.toUpperCase(),
      headers: {
        Accept: 'application/json',
        Authorization: basicAuthHeader(request.auth.user, request.auth.pass),
      },
    };

    let lastError: unknown;
    for (let attempt = 0; attempt <= this.options.automaticRetries; attempt++) {
      try {
        const response = await fetch(url, {
          ...init,
          signal: AbortSignal.timeout(this.options.requestTimeoutMs),
        });
        const body = await response.text();
        const headers: Record<string, string> = {};
        response.headers.forEach((value, key) => {
          headers[key] = value;
        });
        return {
          ok: true,
          response: {
            body,
            code: response.status,
            headers,
            message: response.statusText,
            timesRetried: attempt,
          },
        };
      } catch (err) {
        lastError = err;
        if (attempt < this.options.automaticRetries) {
          const message = err instanceof Error ? err.message : String(err);
          log.debug(`Request failed, retrying (${attempt + 1}/${this.options.automaticRetries})`, {
            url: request.url,
            error: message,
          });
        }
      }
    }

    return { ok: false, failure: describeFailure(lastError) };
  }
}
