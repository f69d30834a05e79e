/**
 * Input sources for bulk runs
 */

import { readLines, readTextFile } from '../lib/fs';
import { extractVideoId, watchUrl } from '../lib/videoId';
import type { VideoMeta } from '../types';

/**
 * Create metadata entries from video IDs or URLs, dropping anything
 * that isn't one
 */
export function fromVideoIds(
  inputs: string[],
  source: VideoMeta['source'] = 'manual'
): VideoMeta[] {
  const results: VideoMeta[] = [];

  for (const input of inputs) {
    const videoId = extractVideoId(input);
    if (!videoId) continue;

    results.push({
      videoId,
      url: input.startsWith('http') ? input : watchUrl(videoId),
      source,
    });
  }

  return results;
}

/**
 * Load a file with one video ID or URL per line (`#` starts a comment)
 */
export async function loadVideoList(filePath: string): Promise<VideoMeta[]> {
  return fromVideoIds(await readLines(filePath), 'file');
}

/**
 * Merge multiple sources, deduplicating by video ID.
 * Earlier sources win.
 */
export function mergeVideoSources(...sources: VideoMeta[][]): VideoMeta[] {
  const seen = new Map<string, VideoMeta>();

  for (const source of sources) {
    for (const meta of source) {
      if (!seen.has(meta.videoId)) {
        seen.set(meta.videoId, meta);
      }
    }
  }

  return Array.from(seen.values());
}

function readProcessedId(record: unknown): string | undefined {
  if (typeof record !== 'object' || record === null) return undefined;

  if ('meta' in record && typeof record.meta === 'object' && record.meta !== null) {
    const meta = record.meta;
    if ('videoId' in meta && typeof meta.videoId === 'string') return meta.videoId;
  }
  if ('videoId' in record && typeof record.videoId === 'string') return record.videoId;

  return undefined;
}

/**
 * Load processed video IDs from an existing JSONL file
 */
export async function loadProcessedIds(jsonlPath: string): Promise<Set<string>> {
  const ids = new Set<string>();

  let text: string;
  try {
    text = await readTextFile(jsonlPath);
  } catch {
    // Nothing processed yet
    return ids;
  }

  for (const line of text.split('\n')) {
    if (!line.trim()) continue;
    try {
      const id = readProcessedId(JSON.parse(line));
      if (id) ids.add(id);
    } catch {
      // Skip malformed lines
    }
  }

  return ids;
}
