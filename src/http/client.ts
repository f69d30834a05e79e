/**
 * HTTP transport abstraction. The transcript facade only ever talks to
 * an HttpClient, so the proxying strategy can be swapped freely.
 */

import { TransportError } from '../errors';
import { createLogger } from '../lib/logger';
import { createProxiedFetch, type ProxyConfig } from './proxy';

export interface FetchInit {
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

/** The part of a fetch Response the transports read */
export interface FetchResponse {
  status: number;
  ok: boolean;
  text(): Promise<string>;
}

export type FetchFn = (input: string, init: FetchInit) => Promise<FetchResponse>;

export interface HttpResponse {
  status: number;
  ok: boolean;
  /** The URL that was requested (not a proxy endpoint) */
  url: string;
  text: string;
}

export interface HttpClient {
  /** Mutable; changes apply to subsequent requests */
  headers: Record<string, string>;
  /** Cookie name to value */
  cookies: Map<string, string>;
  get(url: string, params?: Record<string, string>): Promise<HttpResponse>;
}

export interface FetchHttpClientOptions {
  timeoutMs?: number;
  headers?: Record<string, string>;
  /** Route requests through this proxy; ignored when `fetchFn` is given */
  proxy?: ProxyConfig;
  fetchFn?: FetchFn;
}

export const DEFAULT_DIRECT_TIMEOUT_MS = 30_000;

const log = createLogger('http');

/**
 * Append query parameters to a URL that may already carry some
 */
export function appendQuery(url: string, params?: Record<string, string>): string {
  if (!params || !Object.keys(params).length) return url;
  const query = new URLSearchParams(params).toString();
  return `${url}${url.includes('?') ? '&' : '?'}${query}`;
}

/**
 * Case-insensitive header lookup
 */
export function hasHeader(headers: Record<string, string>, name: string): boolean {
  const lower = name.toLowerCase();
  return Object.keys(headers).some((key) => key.toLowerCase() === lower);
}

export function describeFetchError(error: unknown, timeoutMs: number): string {
  if (error instanceof Error && error.name === 'TimeoutError') {
    return `timed out after ${timeoutMs}ms`;
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Sends requests straight to the target with the global fetch
 */
export class FetchHttpClient implements HttpClient {
  headers: Record<string, string>;
  cookies = new Map<string, string>();
  readonly timeoutMs: number;
  readonly proxy?: ProxyConfig;
  private readonly fetchFn: FetchFn;

  constructor(options: FetchHttpClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_DIRECT_TIMEOUT_MS;
    this.headers = { ...options.headers };
    this.proxy = options.proxy;
    this.fetchFn =
      options.fetchFn ??
      (options.proxy ? createProxiedFetch(options.proxy) : (input, init) => fetch(input, init));
  }

  async get(url: string, params?: Record<string, string>): Promise<HttpResponse> {
    const target = appendQuery(url, params);
    const headers: Record<string, string> = { ...this.headers };
    if (this.cookies.size) {
      headers.Cookie = Array.from(this.cookies, ([name, value]) => `${name}=${value}`).join('; ');
    }

    log.debug(`GET ${target}`);

    let response: FetchResponse;
    try {
      response = await this.fetchFn(target, {
        headers,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new TransportError(
        target,
        `Request to ${target} failed: ${describeFetchError(error, this.timeoutMs)}`,
        error
      );
    }

    return {
      status: response.status,
      ok: response.ok,
      url: target,
      text: await response.text(),
    };
  }
}
