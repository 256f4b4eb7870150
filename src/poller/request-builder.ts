/**
 * Builds the activations list request for one poll cycle.
 *
 * Pure: the same connection and watermark always give the same request.
 */

import {
  REDACTED_SECRET,
  type ActivationRequest,
  type ConnectionConfig,
  type RequestSpec,
  type StructuredRequest,
} from './types.js';

/**
 * Turn a configured host into a base URL. Bare hosts get `https://`;
 * hosts that already carry a scheme are kept as they are.
 */
export function resolveBaseUrl(host: string): string {
  const trimmed = host.trim().replace(/\/+$/, '');
  return /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
}

/** URL of the activations list endpoint for a namespace. */
export function activationsUrl(host: string, namespace: string): string {
  return `${resolveBaseUrl(host)}/api/v1/namespaces/${encodeURIComponent(namespace)}/activations`;
}

/**
 * Build the request for activations recorded since `since` (ms since epoch).
 * `limit: 0` asks for every match without a server-side page cap.
 */
export function buildActivationsRequest(
  connection: ConnectionConfig,
  since: number,
): ActivationRequest {
  return {
    method: 'get',
    url: activationsUrl(connection.host, connection.namespace),
    auth: { user: connection.principal, pass: connection.secret },
    query: { docs: true, limit: 0, skip: 0, since },
  };
}

/**
 * Flatten a request into one mapping for metadata and logging: all option
 * fields plus `method` and `url`, whatever shape the request has.
 */
export function structureRequest(request: RequestSpec): StructuredRequest {
  const { method, url, ...options } = request;
  return { ...options, method: String(method), url };
}

/**
 * Copy of a request safe to put in events and logs: the basic-auth password
 * is replaced by a fixed mask, everything else is kept.
 */
export function redactRequest(request: ActivationRequest): ActivationRequest {
  return { ...request, auth: { user: request.auth.user, pass: REDACTED_SECRET } };
}
