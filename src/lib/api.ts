/**
 * Transcript facade
 *
 * Composes an HttpClient (direct or proxied) with optional cookie
 * authentication and exposes transcript listing and retrieval.
 */

import {
  ConsentCookieError,
  InvalidVideoIdError,
  PoTokenRequiredError,
  RequestBlockedError,
  TranscriptsDisabledError,
  YouTubeDataUnparsableError,
  assertResponseOk,
} from '../errors';
import { FetchHttpClient, hasHeader, type HttpClient, type HttpResponse } from '../http/client';
import { loadCookieJar } from '../http/cookies';
import type { ProxyConfig } from '../http/proxy';
import { ScrapeOpsClient } from '../http/scrapeops';
import type { FetchOptions, FetchedTranscript, TranscriptSource } from '../types';
import { createLogger } from './logger';
import { assertPlayable, extractPlayerResponse, readCaptions } from './playerResponse';
import { type Transcript, TranscriptList } from './transcripts';
import { extractVideoId, watchUrl } from './videoId';

export interface TranscriptApiOptions {
  /** Takes precedence over `scrapeopsApiKey` */
  httpClient?: HttpClient;
  /** Build a ScrapeOpsClient with this key */
  scrapeopsApiKey?: string;
  /** Timeout for the client built from the options above */
  timeoutMs?: number;
  /** Extra headers for the client built from the options above */
  headers?: Record<string, string>;
  /** Outbound proxy for the direct client. Unused with `httpClient` or ScrapeOps. */
  proxy?: ProxyConfig;
  /** Netscape cookies.txt, read on every list/fetch call */
  cookiePath?: string;
}

const DEFAULT_LANGUAGES = ['en'];
const CONSENT_FORM = 'action="https://consent.youtube.com/s"';
const CONSENT_VALUE = /name="v" value="(.*?)"/;
const RECAPTCHA = 'class="g-recaptcha"';
const PO_TOKEN_MARKER = '&exp=xpe';

const log = createLogger('api');

export class TranscriptApi implements TranscriptSource {
  readonly httpClient: HttpClient;
  readonly cookiePath?: string;

  constructor(options: TranscriptApiOptions = {}) {
    if (options.proxy && (options.httpClient || options.scrapeopsApiKey !== undefined)) {
      log.warn('Proxy settings are ignored: requests use the configured client');
    }

    if (options.httpClient) {
      this.httpClient = options.httpClient;
    } else if (options.scrapeopsApiKey !== undefined) {
      this.httpClient = new ScrapeOpsClient({
        apiKey: options.scrapeopsApiKey,
        timeoutMs: options.timeoutMs,
        headers: options.headers,
      });
    } else {
      this.httpClient = new FetchHttpClient({
        timeoutMs: options.timeoutMs,
        headers: options.headers,
        proxy: options.proxy,
      });
    }

    if (!hasHeader(this.httpClient.headers, 'Accept-Language')) {
      this.httpClient.headers['Accept-Language'] = 'en-US';
    }

    this.cookiePath = options.cookiePath;
  }

  /**
   * List every transcript available for a video
   *
   * @param video - Video ID or YouTube URL
   */
  async list(video: string): Promise<TranscriptList> {
    const videoId = extractVideoId(video);
    if (!videoId) {
      throw new InvalidVideoIdError(video);
    }

    if (this.cookiePath) {
      const jar = await loadCookieJar(this.cookiePath);
      for (const [name, value] of jar) {
        this.httpClient.cookies.set(name, value);
      }
    }

    const html = await this.fetchWatchPage(videoId);
    const player = extractPlayerResponse(html);
    if (!player) {
      if (html.includes(RECAPTCHA)) throw new RequestBlockedError(videoId);
      throw new YouTubeDataUnparsableError(videoId);
    }

    assertPlayable(videoId, player.playabilityStatus);

    const captions = readCaptions(player);
    if (!captions || !captions.tracks.length) {
      throw new TranscriptsDisabledError(videoId);
    }
    if (captions.tracks.some((track) => track.url.includes(PO_TOKEN_MARKER))) {
      throw new PoTokenRequiredError(videoId);
    }

    log.debug(`Found ${captions.tracks.length} caption tracks`, { videoId });
    return TranscriptList.fromCaptions(this.httpClient, videoId, captions);
  }

  /**
   * Fetch the snippets of the best matching transcript
   *
   * @param video - Video ID or YouTube URL
   */
  async fetch(video: string, options: FetchOptions = {}): Promise<FetchedTranscript> {
    const list = await this.list(video);
    const transcript = selectTranscript(list, options);
    const target = options.translateTo ? transcript.translate(options.translateTo) : transcript;
    return target.fetch(options.preserveFormatting);
  }

  private async fetchWatchPage(videoId: string): Promise<string> {
    const first = await this.getPage(videoId);
    if (!first.text.includes(CONSENT_FORM)) return first.text;

    const consent = first.text.match(CONSENT_VALUE);
    if (!consent) throw new ConsentCookieError(videoId);

    log.debug('Answering the cookie consent page', { videoId });
    this.httpClient.cookies.set('CONSENT', `YES+${consent[1]}`);

    const second = await this.getPage(videoId);
    if (second.text.includes(CONSENT_FORM)) throw new ConsentCookieError(videoId);
    return second.text;
  }

  private async getPage(videoId: string): Promise<HttpResponse> {
    const response = await this.httpClient.get(watchUrl(videoId));
    assertResponseOk(response, videoId);
    return response;
  }
}

/**
 * Pick the transcript to fetch according to language priority and the
 * manual/generated exclusions
 */
export function selectTranscript(list: TranscriptList, options: FetchOptions = {}): Transcript {
  const languages = options.languages?.length ? options.languages : DEFAULT_LANGUAGES;
  if (options.excludeManuallyCreated) return list.findGeneratedTranscript(languages);
  if (options.excludeGenerated) return list.findManuallyCreatedTranscript(languages);
  return list.findTranscript(languages);
}

/**
 * Fetch a transcript in one call
 *
 * @example
 * ```typescript
 * const transcript = await fetchTranscript('dQw4w9WgXcQ', {
 *   scrapeopsApiKey: process.env.SCRAPEOPS_API_KEY,
 *   languages: ['de', 'en'],
 * });
 * ```
 */
export async function fetchTranscript(
  video: string,
  options: FetchOptions & TranscriptApiOptions = {}
): Promise<FetchedTranscript> {
  const { httpClient, scrapeopsApiKey, timeoutMs, headers, proxy, cookiePath, ...fetchOptions } =
    options;
  const api = new TranscriptApi({ httpClient, scrapeopsApiKey, timeoutMs, headers, proxy, cookiePath });
  return api.fetch(video, fetchOptions);
}
