/**
 * Error taxonomy. Every failure the library raises extends TranscriptApiError
 * and carries a machine-readable code.
 */

import type { HttpResponse } from './http/client';

export type TranscriptErrorCode =
  | 'INVALID_CLIENT_CONFIG'
  | 'TRANSPORT_FAILED'
  | 'COOKIE_PATH_INVALID'
  | 'COOKIES_INVALID'
  | 'UNKNOWN_FORMAT'
  | 'INVALID_VIDEO_ID'
  | 'VIDEO_UNAVAILABLE'
  | 'VIDEO_UNPLAYABLE'
  | 'AGE_RESTRICTED'
  | 'REQUEST_BLOCKED'
  | 'TOO_MANY_REQUESTS'
  | 'YOUTUBE_REQUEST_FAILED'
  | 'DATA_UNPARSABLE'
  | 'CONSENT_COOKIE_FAILED'
  | 'PO_TOKEN_REQUIRED'
  | 'TRANSCRIPTS_DISABLED'
  | 'NO_TRANSCRIPT_FOUND'
  | 'NOT_TRANSLATABLE'
  | 'TRANSLATION_LANGUAGE_NOT_AVAILABLE';

export class TranscriptApiError extends Error {
  readonly code: TranscriptErrorCode;

  constructor(code: TranscriptErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export function isTranscriptApiError(error: unknown): error is TranscriptApiError {
  return error instanceof TranscriptApiError;
}

export class InvalidClientConfigError extends TranscriptApiError {
  constructor(message: string) {
    super('INVALID_CLIENT_CONFIG', message);
  }
}

export class TransportError extends TranscriptApiError {
  readonly url: string;

  constructor(url: string, message: string, cause?: unknown) {
    super('TRANSPORT_FAILED', message, { cause });
    this.url = url;
  }
}

export class CookiePathInvalidError extends TranscriptApiError {
  constructor(readonly path: string) {
    super('COOKIE_PATH_INVALID', `Can't load the provided cookie file: ${path}`);
  }
}

export class CookiesInvalidError extends TranscriptApiError {
  constructor(readonly path: string) {
    super(
      'COOKIES_INVALID',
      `The cookies provided in ${path} are not valid YouTube cookies (they may have expired)`
    );
  }
}

export class UnknownFormatError extends TranscriptApiError {
  constructor(format: string, available: readonly string[]) {
    super(
      'UNKNOWN_FORMAT',
      `The format '${format}' is not supported. Choose one of: ${available.join(', ')}`
    );
  }
}

/**
 * Base for everything that stops a transcript of one specific video
 * from being retrieved.
 */
export class CouldNotRetrieveTranscriptError extends TranscriptApiError {
  readonly videoId: string;

  constructor(code: TranscriptErrorCode, videoId: string, cause: string) {
    super(code, `Could not retrieve a transcript for the video ${videoId}: ${cause}`);
    this.videoId = videoId;
  }
}

export class InvalidVideoIdError extends CouldNotRetrieveTranscriptError {
  constructor(input: string) {
    super(
      'INVALID_VIDEO_ID',
      input,
      'this is not a valid video ID or YouTube URL. Pass the 11-character ID, e.g. "dQw4w9WgXcQ"'
    );
  }
}

export class VideoUnavailableError extends CouldNotRetrieveTranscriptError {
  constructor(videoId: string) {
    super('VIDEO_UNAVAILABLE', videoId, 'the video is no longer available');
  }
}

export class VideoUnplayableError extends CouldNotRetrieveTranscriptError {
  constructor(
    videoId: string,
    readonly reason: string | undefined,
    readonly subReasons: string[]
  ) {
    const details = subReasons.length
      ? `\nAdditional details:\n${subReasons.map((s) => ` - ${s}`).join('\n')}`
      : '';
    super(
      'VIDEO_UNPLAYABLE',
      videoId,
      `the video is unplayable (${reason ?? 'no reason specified'})${details}`
    );
  }
}

export class AgeRestrictedError extends CouldNotRetrieveTranscriptError {
  constructor(videoId: string) {
    super(
      'AGE_RESTRICTED',
      videoId,
      'the video is age-restricted. Authenticate by passing a cookies.txt file exported from a signed-in browser'
    );
  }
}

export class RequestBlockedError extends CouldNotRetrieveTranscriptError {
  constructor(videoId: string, detail = 'YouTube is blocking requests from this IP') {
    super(
      'REQUEST_BLOCKED',
      videoId,
      `${detail}. Check the proxy API key and the limits of your plan, or route requests through a proxy`
    );
  }
}

export class TooManyRequestsError extends CouldNotRetrieveTranscriptError {
  constructor(videoId: string) {
    super(
      'TOO_MANY_REQUESTS',
      videoId,
      'the request was rate limited (HTTP 429). Add delays between requests or check the limits of your proxy plan'
    );
  }
}

export class YouTubeRequestFailedError extends CouldNotRetrieveTranscriptError {
  constructor(
    videoId: string,
    readonly status: number
  ) {
    super('YOUTUBE_REQUEST_FAILED', videoId, `the request to YouTube failed with HTTP ${status}`);
  }
}

export class YouTubeDataUnparsableError extends CouldNotRetrieveTranscriptError {
  constructor(videoId: string) {
    super('DATA_UNPARSABLE', videoId, 'the data returned by YouTube could not be parsed');
  }
}

export class ConsentCookieError extends CouldNotRetrieveTranscriptError {
  constructor(videoId: string) {
    super('CONSENT_COOKIE_FAILED', videoId, 'failed to automatically give consent to saving cookies');
  }
}

export class PoTokenRequiredError extends CouldNotRetrieveTranscriptError {
  constructor(videoId: string) {
    super('PO_TOKEN_REQUIRED', videoId, 'the requested caption track requires a PO token');
  }
}

export class TranscriptsDisabledError extends CouldNotRetrieveTranscriptError {
  constructor(videoId: string) {
    super('TRANSCRIPTS_DISABLED', videoId, 'subtitles are disabled for this video');
  }
}

export class NoTranscriptFoundError extends CouldNotRetrieveTranscriptError {
  constructor(
    videoId: string,
    readonly requestedLanguages: string[],
    available: string
  ) {
    super(
      'NO_TRANSCRIPT_FOUND',
      videoId,
      `no transcript was found for any of the requested language codes: ${requestedLanguages.join(', ')}\n\n${available}`
    );
  }
}

export class NotTranslatableError extends CouldNotRetrieveTranscriptError {
  constructor(videoId: string) {
    super('NOT_TRANSLATABLE', videoId, 'the requested language is not translatable');
  }
}

export class TranslationLanguageNotAvailableError extends CouldNotRetrieveTranscriptError {
  constructor(videoId: string, languageCode: string) {
    super(
      'TRANSLATION_LANGUAGE_NOT_AVAILABLE',
      videoId,
      `the requested translation language '${languageCode}' is not available`
    );
  }
}

/**
 * Map a non-OK YouTube response onto the matching error
 */
export function assertResponseOk(response: HttpResponse, videoId: string): void {
  if (response.ok) return;

  switch (response.status) {
    case 429:
      throw new TooManyRequestsError(videoId);
    case 401:
    case 403:
      throw new RequestBlockedError(videoId, `the request was refused with HTTP ${response.status}`);
    default:
      throw new YouTubeRequestFailedError(videoId, response.status);
  }
}
