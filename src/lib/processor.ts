/**
 * Bulk transcript processor with concurrency control and
 * pauses between batches
 */

import pLimit from 'p-limit';
import { isTranscriptApiError } from '../errors';
import type {
  BulkOptions,
  FetchOptions,
  TranscriptResult,
  TranscriptSource,
  VideoMeta,
} from '../types';
import { TranscriptApi } from './api';

const DEFAULT_CONCURRENCY = 4;
const DEFAULT_PAUSE_AFTER = 10;
const DEFAULT_PAUSE_DURATION = 5000;

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

async function processOne(
  api: TranscriptSource,
  meta: VideoMeta,
  fetchOptions: FetchOptions
): Promise<TranscriptResult> {
  try {
    const transcript = await api.fetch(meta.videoId, fetchOptions);
    return { meta, transcript };
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    return {
      meta,
      transcript: null,
      error: message,
      errorCode: isTranscriptApiError(error) ? error.code : undefined,
    };
  }
}

/**
 * Yield results in input order while up to `concurrency` fetches run
 * at once. Sleeps `pauseDuration` ms after every `pauseAfter` videos.
 */
export async function* streamVideos(
  videos: VideoMeta[],
  options: BulkOptions = {}
): AsyncGenerator<TranscriptResult> {
  const {
    concurrency = DEFAULT_CONCURRENCY,
    pauseAfter = DEFAULT_PAUSE_AFTER,
    pauseDuration = DEFAULT_PAUSE_DURATION,
    skipIds = new Set<string>(),
    onProgress,
    api = new TranscriptApi(),
    ...fetchOptions
  } = options;

  const toProcess = videos.filter((v) => !skipIds.has(v.videoId));
  if (!toProcess.length) {
    return;
  }

  const limit = pLimit(concurrency);
  const batchSize = Math.max(1, pauseAfter);
  let completed = 0;

  for (let offset = 0; offset < toProcess.length; offset += batchSize) {
    const batch = toProcess.slice(offset, offset + batchSize);

    // processOne never rejects
    const pending = batch.map((meta) => limit(() => processOne(api, meta, fetchOptions)));

    for (const task of pending) {
      const result = await task;
      completed++;
      onProgress?.(completed, toProcess.length, result);
      yield result;
    }

    // Pause between batches (except after the last one)
    if (offset + batchSize < toProcess.length && pauseDuration > 0) {
      await sleep(pauseDuration);
    }
  }
}

/**
 * Process multiple videos in parallel and collect every result
 */
export async function processVideos(
  videos: VideoMeta[],
  options: BulkOptions = {}
): Promise<TranscriptResult[]> {
  const results: TranscriptResult[] = [];
  for await (const result of streamVideos(videos, options)) {
    results.push(result);
  }
  return results;
}
