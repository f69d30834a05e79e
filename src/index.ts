/**
 * yt-transcript-relay - YouTube transcripts through pluggable HTTP transports
 *
 * @example
 * ```typescript
 * import { ScrapeOpsClient, TranscriptApi } from 'yt-transcript-relay';
 *
 * // Route every request through ScrapeOps
 * const client = new ScrapeOpsClient({ apiKey: 'YOUR_API_KEY', timeoutMs: 180_000 });
 * const api = new TranscriptApi({ httpClient: client, cookiePath: './cookies.txt' });
 *
 * const transcript = await api.fetch('dQw4w9WgXcQ', { languages: ['de', 'en'] });
 * for (const snippet of transcript.snippets) {
 *   console.log(`[${snippet.start.toFixed(2)}s] ${snippet.text}`);
 * }
 *
 * // Or let the facade build the client from credentials
 * const quick = new TranscriptApi({ scrapeopsApiKey: 'YOUR_API_KEY' });
 * ```
 */

// Facade
export { TranscriptApi, fetchTranscript, selectTranscript } from './lib/api';
export type { TranscriptApiOptions } from './lib/api';
export { Transcript, TranscriptList } from './lib/transcripts';
export { extractVideoId } from './lib/videoId';

// Transports
export { FetchHttpClient, appendQuery } from './http/client';
export type {
  FetchFn,
  FetchInit,
  FetchResponse,
  HttpClient,
  HttpResponse,
  FetchHttpClientOptions,
} from './http/client';
export { createProxiedFetch, genericProxy, webshareProxy } from './http/proxy';
export type { ProxyConfig, ProxyFetch } from './http/proxy';
export { ScrapeOpsClient, SCRAPEOPS_ENDPOINT } from './http/scrapeops';
export type { ScrapeOpsClientOptions } from './http/scrapeops';
export { loadCookieJar, parseNetscapeCookies } from './http/cookies';

// Bulk processor
export { processVideos, streamVideos } from './lib/processor';

// Loaders
export { fromVideoIds, loadVideoList, mergeVideoSources, loadProcessedIds } from './loaders';

// Output formatters
export {
  writeJsonl,
  appendJsonl,
  writeCsv,
  formatSrt,
  formatVtt,
  formatText,
  formatJson,
  formatPretty,
  getFormatter,
} from './outputs';

export { setLogLevel } from './lib/logger';
export type { LogLevel } from './lib/logger';

export * from './errors';

// Types
export type {
  BulkOptions,
  FetchedTranscript,
  FetchOptions,
  OutputFormat,
  OutputOptions,
  TranscriptResult,
  TranscriptSnippet,
  TranscriptSource,
  TranslationLanguage,
  VideoMeta,
} from './types';
