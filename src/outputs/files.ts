/**
 * Writers for bulk results
 */

import { appendTextFile, fileExists, writeTextFile } from '../lib/fs';
import type { OutputOptions, TranscriptResult } from '../types';

const CSV_COLUMNS = [
  'video_id',
  'url',
  'language',
  'language_code',
  'is_generated',
  'snippet_count',
  'text',
  'error',
] as const;

export function escapeCsv(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function toCsvRow(result: TranscriptResult): string {
  const t = result.transcript;
  const values = [
    result.meta.videoId,
    result.meta.url ?? '',
    t?.language ?? '',
    t?.languageCode ?? '',
    t ? String(t.isGenerated) : '',
    t ? String(t.snippets.length) : '',
    t ? t.snippets.map((s) => s.text).join(' ') : '',
    result.error ?? '',
  ];
  return values.map(escapeCsv).join(',');
}

export async function writeJsonl(results: TranscriptResult[], path: string): Promise<void> {
  const body = results.map((r) => `${JSON.stringify(r)}\n`).join('');
  await writeTextFile(path, body);
}

/**
 * Append a single result; used while streaming so a crash keeps earlier work
 */
export async function appendJsonl(result: TranscriptResult, path: string): Promise<void> {
  await appendTextFile(path, `${JSON.stringify(result)}\n`);
}

/**
 * Write results as CSV. In append mode the header is only written
 * when the file does not exist yet.
 */
export async function writeCsv(results: TranscriptResult[], options: OutputOptions): Promise<void> {
  const rows = results.map(toCsvRow);

  if (options.append && (await fileExists(options.path))) {
    if (rows.length) await appendTextFile(options.path, `${rows.join('\n')}\n`);
    return;
  }

  await writeTextFile(options.path, `${[CSV_COLUMNS.join(','), ...rows].join('\n')}\n`);
}
