/**
 * Shared types for yt-transcript-relay
 */

import type { TranscriptErrorCode } from './errors';

/** A single timed caption unit. Times are fractional seconds. */
export interface TranscriptSnippet {
  readonly text: string;
  readonly start: number;
  readonly duration: number;
}

export interface FetchedTranscript {
  videoId: string;
  language: string;
  languageCode: string;
  isGenerated: boolean;
  /** In order of appearance in the video */
  snippets: TranscriptSnippet[];
}

export interface TranslationLanguage {
  language: string;
  languageCode: string;
}

export interface FetchOptions {
  /** Language codes in descending priority. `'*'` matches any track. */
  languages?: string[];
  /** Keep formatting tags such as `<i>` and `<b>` in snippet text */
  preserveFormatting?: boolean;
  excludeGenerated?: boolean;
  excludeManuallyCreated?: boolean;
  /** Translate the selected track to this language code */
  translateTo?: string;
}

export interface VideoMeta {
  videoId: string;
  url?: string;
  source: 'manual' | 'file';
}

export interface TranscriptResult {
  meta: VideoMeta;
  transcript: FetchedTranscript | null;
  error?: string;
  errorCode?: TranscriptErrorCode;
}

/** Anything that can turn a video ID into a transcript */
export interface TranscriptSource {
  fetch(video: string, options?: FetchOptions): Promise<FetchedTranscript>;
}

export interface BulkOptions extends FetchOptions {
  /** Number of concurrent requests (default: 4) */
  concurrency?: number;
  /** Pause after this many requests (default: 10) */
  pauseAfter?: number;
  /** Pause duration in ms (default: 5000) */
  pauseDuration?: number;
  /** Video IDs to skip, e.g. from a previous run */
  skipIds?: Set<string>;
  onProgress?: (completed: number, total: number, result: TranscriptResult) => void;
  /** Defaults to a direct `TranscriptApi` */
  api?: TranscriptSource;
}

export type OutputFormat = 'text' | 'json' | 'srt' | 'vtt' | 'pretty';

export interface OutputOptions {
  path: string;
  /** Append to an existing file instead of overwriting it */
  append?: boolean;
}
