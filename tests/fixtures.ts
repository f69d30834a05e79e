/**
 * Shared test fixtures: a watch page, caption XML and an in-process HttpClient
 */

import { appendQuery, type HttpClient, type HttpResponse } from '../src/http/client';
import type { FetchedTranscript } from '../src/types';

export const VIDEO_ID = 'dQw4w9WgXcQ';

export const EN_TRACK_URL = `https://www.youtube.com/api/timedtext?v=${VIDEO_ID}&lang=en`;
export const DE_TRACK_URL = `https://www.youtube.com/api/timedtext?v=${VIDEO_ID}&lang=de`;
export const EN_ASR_TRACK_URL = `https://www.youtube.com/api/timedtext?v=${VIDEO_ID}&lang=en&kind=asr`;

export function makePlayerResponse(overrides: Record<string, unknown> = {}) {
  return {
    playabilityStatus: { status: 'OK' },
    videoDetails: { videoId: VIDEO_ID, title: 'Test Video Title' },
    captions: {
      playerCaptionsTracklistRenderer: {
        captionTracks: [
          {
            baseUrl: `${EN_TRACK_URL}&fmt=srv3`,
            name: { simpleText: 'English' },
            languageCode: 'en',
            isTranslatable: true,
          },
          {
            baseUrl: DE_TRACK_URL,
            name: { runs: [{ text: 'German' }] },
            languageCode: 'de',
            isTranslatable: false,
          },
          {
            baseUrl: EN_ASR_TRACK_URL,
            name: { simpleText: 'English (auto-generated)' },
            languageCode: 'en',
            kind: 'asr',
            isTranslatable: true,
          },
        ],
        translationLanguages: [
          { languageCode: 'fr', languageName: { simpleText: 'French' } },
          { languageCode: 'es', languageName: { runs: [{ text: 'Spanish' }] } },
        ],
      },
    },
    ...overrides,
  };
}

export function makeWatchPageHtml(playerResponse: unknown = makePlayerResponse()): string {
  return `<!DOCTYPE html><html><head></head><body>
<script>var ytInitialPlayerResponse = ${JSON.stringify(playerResponse)};var meta = {"a":1};</script>
</body></html>`;
}

export const TIMED_TEXT_XML = `<?xml version="1.0" encoding="utf-8" ?><transcript>
<text start="0.0" dur="1.54">Hey there</text>
<text start="1.54" dur="4.16">It&amp;#39;s a test &amp;amp; demo</text>
<text start="5.7" dur="2.0">&lt;font color=&quot;#E5E5E5&quot;&gt;formatted&lt;/font&gt; &lt;i&gt;text&lt;/i&gt;</text>
<text start="7.7" dur="1.0"></text>
</transcript>`;

export const PARSED_SNIPPETS = [
  { text: 'Hey there', start: 0, duration: 1.54 },
  { text: "It's a test & demo", start: 1.54, duration: 4.16 },
  { text: 'formatted text', start: 5.7, duration: 2 },
];

type Route = (url: string) => { status?: number; text: string };

/**
 * HttpClient that answers from a routing function and records requests
 */
export class FakeHttpClient implements HttpClient {
  headers: Record<string, string> = {};
  cookies = new Map<string, string>();
  readonly requests: Array<{ url: string; cookies: Record<string, string> }> = [];

  constructor(private readonly route: Route) {}

  async get(url: string, params?: Record<string, string>): Promise<HttpResponse> {
    const target = appendQuery(url, params);
    this.requests.push({ url: target, cookies: Object.fromEntries(this.cookies) });
    const { status = 200, text } = this.route(target);
    return { status, ok: status >= 200 && status < 300, url: target, text };
  }
}

/**
 * Route watch pages and caption tracks the way YouTube would
 */
export function youtubeRoute(
  options: { page?: string; pageStatus?: number; xml?: string; xmlStatus?: number } = {}
): Route {
  return (url) => {
    if (url.startsWith('https://www.youtube.com/watch')) {
      return { status: options.pageStatus, text: options.page ?? makeWatchPageHtml() };
    }
    if (url.includes('/api/timedtext')) {
      return { status: options.xmlStatus, text: options.xml ?? TIMED_TEXT_XML };
    }
    return { status: 404, text: 'not found' };
  };
}

export function makeTranscript(videoId: string, texts: string[] = ['hello']): FetchedTranscript {
  return {
    videoId,
    language: 'English',
    languageCode: 'en',
    isGenerated: false,
    snippets: texts.map((text, i) => ({ text, start: i, duration: 1 })),
  };
}
