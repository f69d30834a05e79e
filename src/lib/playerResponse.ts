/**
 * Watch-page parsing: player response extraction, playability checks and
 * caption track discovery
 */

import {
  AgeRestrictedError,
  RequestBlockedError,
  VideoUnavailableError,
  VideoUnplayableError,
} from '../errors';
import type { TranslationLanguage } from '../types';

interface TextRuns {
  simpleText?: string;
  runs?: Array<{ text?: string }>;
}

export interface RawCaptionTrack {
  baseUrl: string;
  name?: TextRuns;
  languageCode: string;
  kind?: string;
  isTranslatable?: boolean;
}

export interface PlayabilityStatus {
  status?: string;
  reason?: string;
  errorScreen?: {
    playerErrorMessageRenderer?: {
      subreason?: TextRuns;
    };
  };
}

export interface PlayerResponse {
  playabilityStatus?: PlayabilityStatus;
  videoDetails?: { videoId?: string; title?: string };
  captions?: {
    playerCaptionsTracklistRenderer?: {
      captionTracks?: RawCaptionTrack[];
      translationLanguages?: Array<{ languageCode: string; languageName?: TextRuns }>;
    };
  };
}

export interface CaptionTrack {
  url: string;
  language: string;
  languageCode: string;
  isGenerated: boolean;
  isTranslatable: boolean;
}

export interface CaptionInfo {
  tracks: CaptionTrack[];
  translationLanguages: TranslationLanguage[];
}

const PLAYER_RESPONSE_MARKER = 'ytInitialPlayerResponse = ';
const VIDEO_UNAVAILABLE_REASON = 'This video is unavailable';

export function readText(value?: TextRuns): string {
  if (!value) return '';
  if (value.simpleText !== undefined) return value.simpleText;
  return (value.runs ?? []).map((run) => run.text ?? '').join('');
}

/**
 * Find the end of the JSON object starting at `start`, skipping braces
 * that appear inside string literals. Returns -1 if unbalanced.
 */
function findObjectEnd(text: string, start: number): number {
  let depth = 0;
  let inString = false;

  for (let i = start; i < text.length; i++) {
    const char = text[i];

    if (inString) {
      if (char === '\\') i++;
      else if (char === '"') inString = false;
      continue;
    }

    if (char === '"') inString = true;
    else if (char === '{') depth++;
    else if (char === '}') {
      depth--;
      if (depth === 0) return i + 1;
    }
  }

  return -1;
}

/**
 * Extract the `ytInitialPlayerResponse` object embedded in a watch page
 */
export function extractPlayerResponse(html: string): PlayerResponse | null {
  const marker = html.indexOf(PLAYER_RESPONSE_MARKER);
  if (marker === -1) return null;

  const start = html.indexOf('{', marker + PLAYER_RESPONSE_MARKER.length);
  if (start === -1) return null;

  const end = findObjectEnd(html, start);
  if (end === -1) return null;

  try {
    const parsed: unknown = JSON.parse(html.slice(start, end));
    return typeof parsed === 'object' && parsed !== null ? (parsed as PlayerResponse) : null;
  } catch {
    return null;
  }
}

/**
 * Throw the matching error when the video cannot be played
 */
export function assertPlayable(videoId: string, playability?: PlayabilityStatus): void {
  const status = playability?.status;
  if (status === undefined || status === 'OK') return;

  const reason = playability?.reason;

  if (status === 'LOGIN_REQUIRED' && reason) {
    if (/not a bot/i.test(reason)) throw new RequestBlockedError(videoId);
    if (/inappropriate/i.test(reason)) throw new AgeRestrictedError(videoId);
  }

  if (status === 'ERROR' && reason === VIDEO_UNAVAILABLE_REASON) {
    throw new VideoUnavailableError(videoId);
  }

  const subreason = playability?.errorScreen?.playerErrorMessageRenderer?.subreason;
  const subReasons = subreason?.runs
    ? subreason.runs.map((run) => run.text ?? '').filter(Boolean)
    : subreason?.simpleText
      ? [subreason.simpleText]
      : [];

  throw new VideoUnplayableError(videoId, reason, subReasons);
}

/**
 * Caption tracks and translation targets of a player response, or null
 * when the video has no caption renderer
 */
export function readCaptions(player: PlayerResponse): CaptionInfo | null {
  const renderer = player.captions?.playerCaptionsTracklistRenderer;
  if (!renderer?.captionTracks) return null;

  const translationLanguages = (renderer.translationLanguages ?? []).map((lang) => ({
    language: readText(lang.languageName),
    languageCode: lang.languageCode,
  }));

  const tracks = renderer.captionTracks.map((track) => ({
    url: track.baseUrl.replace('&fmt=srv3', ''),
    language: readText(track.name),
    languageCode: track.languageCode,
    isGenerated: track.kind === 'asr',
    isTranslatable: Boolean(track.isTranslatable),
  }));

  return { tracks, translationLanguages };
}
