/**
 * Transcript formatters: plain text, JSON, SRT, WebVTT and an
 * inspect-style pretty print
 */

import { inspect } from 'node:util';
import { UnknownFormatError } from '../errors';
import type { FetchedTranscript, OutputFormat, TranscriptSnippet } from '../types';

export interface Formatter {
  formatTranscript(transcript: FetchedTranscript): string;
  formatTranscripts(transcripts: FetchedTranscript[]): string;
}

const pad = (n: number, width = 2) => String(n).padStart(width, '0');

function splitTime(seconds: number) {
  const totalMs = Math.round(seconds * 1000);
  return {
    hours: Math.floor(totalMs / 3_600_000),
    minutes: Math.floor(totalMs / 60_000) % 60,
    seconds: Math.floor(totalMs / 1000) % 60,
    millis: totalMs % 1000,
  };
}

/**
 * `[mm:ss]`, or `[h:mm:ss]` from the first hour on
 */
export function formatClock(seconds: number): string {
  const whole = Math.floor(seconds);
  const h = Math.floor(whole / 3600);
  const m = Math.floor(whole / 60) % 60;
  const s = whole % 60;
  return h > 0 ? `${h}:${pad(m)}:${pad(s)}` : `${pad(m)}:${pad(s)}`;
}

function cueTimestamp(seconds: number, separator: ',' | '.'): string {
  const t = splitTime(seconds);
  return `${pad(t.hours)}:${pad(t.minutes)}:${pad(t.seconds)}${separator}${pad(t.millis, 3)}`;
}

/**
 * Cue end times: start + duration, cut short where the next cue starts earlier
 */
function cueRanges(snippets: TranscriptSnippet[]): Array<[number, number]> {
  return snippets.map((snippet, i): [number, number] => {
    const end = snippet.start + snippet.duration;
    const next = snippets[i + 1];
    return [snippet.start, next && next.start < end ? next.start : end];
  });
}

export function formatText(transcript: FetchedTranscript, timestamps = false): string {
  return transcript.snippets
    .map((s) => (timestamps ? `[${formatClock(s.start)}] ${s.text}` : s.text))
    .join('\n');
}

export function formatJson(transcript: FetchedTranscript, indent = 2): string {
  return JSON.stringify(transcript, null, indent);
}

export function formatSrt(transcript: FetchedTranscript): string {
  const ranges = cueRanges(transcript.snippets);
  const cues = transcript.snippets.map((snippet, i) => {
    const [start, end] = ranges[i];
    return `${i + 1}\n${cueTimestamp(start, ',')} --> ${cueTimestamp(end, ',')}\n${snippet.text}`;
  });
  return `${cues.join('\n\n')}\n`;
}

export function formatVtt(transcript: FetchedTranscript): string {
  const ranges = cueRanges(transcript.snippets);
  const cues = transcript.snippets.map((snippet, i) => {
    const [start, end] = ranges[i];
    return `${cueTimestamp(start, '.')} --> ${cueTimestamp(end, '.')}\n${snippet.text}`;
  });
  return `WEBVTT\n\n${cues.join('\n\n')}\n`;
}

export function formatPretty(value: FetchedTranscript | FetchedTranscript[]): string {
  return inspect(value, { depth: null, colors: false });
}

const TRANSCRIPT_SEPARATOR = '\n\n\n';

function textBased(format: (t: FetchedTranscript) => string): Formatter {
  return {
    formatTranscript: format,
    formatTranscripts: (transcripts) => transcripts.map(format).join(TRANSCRIPT_SEPARATOR),
  };
}

/**
 * Build the formatter table. `timestamps` only affects `text`.
 */
export function createFormatters(options: { timestamps?: boolean } = {}): Record<OutputFormat, Formatter> {
  return {
    text: textBased((t) => formatText(t, options.timestamps)),
    srt: textBased(formatSrt),
    vtt: textBased(formatVtt),
    json: {
      formatTranscript: (t) => formatJson(t),
      formatTranscripts: (ts) => JSON.stringify(ts, null, 2),
    },
    pretty: {
      formatTranscript: (t) => formatPretty(t),
      formatTranscripts: (ts) => formatPretty(ts),
    },
  };
}

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'json', 'srt', 'vtt', 'pretty'];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

export function getFormatter(name: string, options: { timestamps?: boolean } = {}): Formatter {
  if (!isOutputFormat(name)) {
    throw new UnknownFormatError(name, OUTPUT_FORMATS);
  }
  return createFormatters(options)[name];
}
