/**
 * ScrapeOps proxy transport
 *
 * Every request is wrapped into a GET against the ScrapeOps proxy endpoint,
 * which fetches the target URL from its own pool of residential IPs.
 *
 * @example
 * ```typescript
 * const client = new ScrapeOpsClient({ apiKey: 'YOUR_API_KEY', timeoutMs: 180_000 });
 * client.headers['Referer'] = 'https://www.youtube.com/';
 *
 * const api = new TranscriptApi({ httpClient: client });
 * const transcript = await api.fetch('dQw4w9WgXcQ');
 * ```
 */

import { InvalidClientConfigError, TransportError } from '../errors';
import { createLogger } from '../lib/logger';
import {
  appendQuery,
  describeFetchError,
  hasHeader,
  type FetchFn,
  type FetchResponse,
  type HttpClient,
  type HttpResponse,
} from './client';

export const SCRAPEOPS_ENDPOINT = 'https://proxy.scrapeops.io/v1/';
export const DEFAULT_SCRAPEOPS_TIMEOUT_MS = 120_000;

const YOUTUBE_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';
const YOUTUBE_ACCEPT_LANGUAGE = 'en-US,en;q=0.9';

export interface ScrapeOpsClientOptions {
  apiKey: string;
  /** Default: 120 000 ms */
  timeoutMs?: number;
  headers?: Record<string, string>;
  /** Exit country of the proxy (default: us) */
  country?: string;
  endpoint?: string;
  fetchFn?: FetchFn;
}

const log = createLogger('scrapeops');

function isYouTubeUrl(url: string): boolean {
  return url.includes('youtube.com') || url.includes('youtu.be');
}

/**
 * Pull the page out of a ScrapeOps JSON envelope, or return the body untouched
 */
export function unwrapProxyBody(body: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    log.debug('Proxy response is not JSON, using it as raw content');
    return body;
  }

  if (typeof parsed === 'object' && parsed !== null && 'html' in parsed) {
    const { html } = parsed;
    if (typeof html === 'string') return html;
  }

  log.warn("No 'html' field in ScrapeOps JSON response, using raw content");
  return body;
}

export class ScrapeOpsClient implements HttpClient {
  readonly apiKey: string;
  readonly timeoutMs: number;
  readonly country: string;
  readonly endpoint: string;
  headers: Record<string, string>;
  cookies = new Map<string, string>();
  private readonly fetchFn: FetchFn;

  constructor(options: ScrapeOpsClientOptions) {
    const apiKey = options.apiKey.trim();
    if (!apiKey) {
      throw new InvalidClientConfigError('A ScrapeOps API key is required');
    }

    const timeoutMs = options.timeoutMs ?? DEFAULT_SCRAPEOPS_TIMEOUT_MS;
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new InvalidClientConfigError(`Timeout must be a positive number, got ${timeoutMs}`);
    }

    this.apiKey = apiKey;
    this.timeoutMs = timeoutMs;
    this.country = options.country ?? 'us';
    this.endpoint = options.endpoint ?? SCRAPEOPS_ENDPOINT;
    this.headers = { ...options.headers };
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
  }

  /**
   * Build the full proxy request URL for a target
   */
  buildProxyUrl(url: string, params?: Record<string, string>): string {
    const target = appendQuery(url, params);
    const youtube = isYouTubeUrl(target);

    const proxyParams = new URLSearchParams({
      api_key: this.apiKey,
      url: target,
      optimize_request: 'true',
      render_js: 'false',
      keep_headers: 'true',
      country: this.country,
    });

    if (youtube) {
      proxyParams.set('premium', 'true');
      proxyParams.set('browser_type', 'chrome');
    }

    if (Object.keys(this.headers).length) {
      const headers = { ...this.headers };
      if (youtube && !hasHeader(headers, 'User-Agent')) {
        headers['User-Agent'] = YOUTUBE_USER_AGENT;
      }
      if (youtube && !hasHeader(headers, 'Accept-Language')) {
        headers['Accept-Language'] = YOUTUBE_ACCEPT_LANGUAGE;
      }
      proxyParams.set('headers', JSON.stringify(headers));
    }

    if (this.cookies.size) {
      proxyParams.set('cookies', JSON.stringify(Object.fromEntries(this.cookies)));
    }

    return `${this.endpoint}?${proxyParams.toString()}`;
  }

  async get(url: string, params?: Record<string, string>): Promise<HttpResponse> {
    const target = appendQuery(url, params);
    log.debug(`GET ${target} through ScrapeOps`);

    let response: FetchResponse;
    try {
      response = await this.fetchFn(this.buildProxyUrl(url, params), {
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const reason = describeFetchError(error, this.timeoutMs);
      log.error(`ScrapeOps request failed: ${reason}`, { url: target });
      throw new TransportError(target, `ScrapeOps request for ${target} failed: ${reason}`, error);
    }

    const body = await response.text();
    log.debug(`ScrapeOps responded with status ${response.status}`);

    if (response.status !== 200) {
      log.error(`ScrapeOps returned error status ${response.status}`, { url: target });
      return { status: response.status, ok: false, url: target, text: body };
    }

    return { status: 200, ok: true, url: target, text: unwrapProxyBody(body) };
  }
}
