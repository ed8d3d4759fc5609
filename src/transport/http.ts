/**
 * Minimal HTTP helper shared by the introspector, the token endpoint and the
 * metadata-server strategy. All requests go through an injectable fetch.
 */

import { TIMEOUTS } from '../constants.js';
import { USER_AGENT } from '../version.js';

/**
 * The subset of the global fetch used here; tests pass a vi.fn().
 */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpRequest {
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  /** Form fields, sent as application/x-www-form-urlencoded */
  form?: Record<string, string>;
  timeoutMs?: number;
}

export interface HttpResponse {
  status: number;
  ok: boolean;
  headers: Headers;
  /** Parsed JSON body, or undefined when the body is empty or not JSON */
  body: unknown;
  /** Raw body text */
  text: string;
}

/**
 * Thrown when the transport itself fails (DNS, refused connection, timeout).
 */
export class TransportFailure extends Error {
  readonly timedOut: boolean;

  constructor(message: string, timedOut: boolean, cause?: unknown) {
    super(message, { cause });
    this.name = 'TransportFailure';
    this.timedOut = timedOut;
  }
}

/**
 * Reject plain HTTP except for loopback and the metadata server, which is
 * only ever reachable over HTTP on the link-local network.
 */
export function validateSecureUrl(url: string, allowedHttpHosts: readonly string[] = []): void {
  const parsed = new URL(url);

  const isLocalhost =
    parsed.hostname === 'localhost' ||
    parsed.hostname === '127.0.0.1' ||
    parsed.hostname === '[::1]';

  if (parsed.protocol !== 'https:' && !isLocalhost && !allowedHttpHosts.includes(parsed.host)) {
    throw new Error(`Insecure URL rejected: ${url}. Token traffic must use HTTPS.`);
  }
}

/**
 * Resolve the fetch to use, preferring the injected one.
 */
export function resolveFetch(fetchImpl?: FetchLike): FetchLike {
  return fetchImpl ?? ((input, init) => globalThis.fetch(input, init));
}

/**
 * Perform a request and read the body as JSON when possible.
 * Non-2xx responses are returned, not thrown; transport failures throw
 * TransportFailure.
 */
export async function fetchJson(
  fetchImpl: FetchLike,
  url: string,
  request: HttpRequest = {}
): Promise<HttpResponse> {
  const timeoutMs = request.timeoutMs ?? TIMEOUTS.DEFAULT;
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  const headers: Record<string, string> = {
    Accept: 'application/json',
    'User-Agent': USER_AGENT,
    ...request.headers,
  };
  let body: string | undefined;
  if (request.form) {
    headers['Content-Type'] = 'application/x-www-form-urlencoded';
    body = new URLSearchParams(request.form).toString();
  }

  try {
    const response = await fetchImpl(url, {
      method: request.method ?? (body === undefined ? 'GET' : 'POST'),
      headers,
      body,
      signal: controller.signal,
    });
    const text = await response.text();
    return {
      status: response.status,
      ok: response.ok,
      headers: response.headers,
      body: parseJsonSafe(text),
      text,
    };
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw new TransportFailure(`Request timeout after ${timeoutMs}ms`, true, error);
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new TransportFailure(`Request to ${new URL(url).host} failed: ${message}`, false, error);
  } finally {
    clearTimeout(timeoutId);
  }
}

function parseJsonSafe(text: string): unknown {
  if (!text) {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Read an OAuth-style error description from a JSON error body.
 */
export function describeErrorBody(response: HttpResponse): { error?: string; description: string } {
  const body = response.body;
  if (typeof body === 'object' && body !== null) {
    const error = 'error' in body && typeof body.error === 'string' ? body.error : undefined;
    const description =
      'error_description' in body && typeof body.error_description === 'string'
        ? body.error_description
        : undefined;
    if (error || description) {
      return { error, description: [error, description].filter(Boolean).join(': ') };
    }
  }
  return { description: `HTTP ${response.status}` };
}
