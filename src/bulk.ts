/**
 * The `bulk` command: gather inputs, stream results to JSONL (and CSV)
 * and report progress line by line
 */

import { loadProcessedIds, loadVideoList, fromVideoIds, mergeVideoSources } from './loaders';
import { dim, green, red } from './lib/logger';
import { streamVideos } from './lib/processor';
import { appendJsonl, writeCsv } from './outputs';
import type { TranscriptResult, TranscriptSource, VideoMeta } from './types';

export interface BulkRunOptions {
  /** Comma-separated IDs or URLs */
  videos?: string;
  /** File with one ID or URL per line */
  file?: string;
  outJsonl: string;
  outCsv?: string;
  concurrency: number;
  pauseAfter: number;
  pauseDuration: number;
  languages: string[];
  /** Skip videos already present in `outJsonl` */
  resume?: boolean;
  write: (text: string) => void;
  writeError: (text: string) => void;
}

export interface BulkSummary {
  noInput: boolean;
  skipped: number;
  succeeded: number;
  failed: number;
}

export async function runBulk(api: TranscriptSource, options: BulkRunOptions): Promise<BulkSummary> {
  const { write, writeError } = options;
  const summary: BulkSummary = { noInput: false, skipped: 0, succeeded: 0, failed: 0 };
  const sources: VideoMeta[][] = [];

  if (options.videos) {
    const ids = options.videos
      .split(',')
      .map((s) => s.trim())
      .filter(Boolean);
    sources.push(fromVideoIds(ids));
    write(`  Added ${ids.length} videos from --videos`);
  }

  if (options.file) {
    try {
      const fromFile = await loadVideoList(options.file);
      sources.push(fromFile);
      write(`  Added ${fromFile.length} videos from ${options.file}`);
    } catch (error) {
      writeError(red(`Failed to load file: ${error instanceof Error ? error.message : error}`));
    }
  }

  if (!sources.length) {
    return { ...summary, noInput: true };
  }

  const allVideos = mergeVideoSources(...sources);
  write(`\n${green(String(allVideos.length))} unique videos to process`);

  let skipIds = new Set<string>();
  if (options.resume) {
    skipIds = await loadProcessedIds(options.outJsonl);
    if (skipIds.size > 0) {
      write(dim(`Resuming: ${skipIds.size} already processed, skipping...`));
    }
  }

  const toProcess = allVideos.filter((v) => !skipIds.has(v.videoId));
  summary.skipped = allVideos.length - toProcess.length;
  if (!toProcess.length) {
    write(green('All videos already processed!'));
    return summary;
  }

  write(`Processing ${toProcess.length} videos...\n`);

  const csvResults: TranscriptResult[] = [];

  for await (const result of streamVideos(toProcess, {
    api,
    concurrency: options.concurrency,
    pauseAfter: options.pauseAfter,
    pauseDuration: options.pauseDuration,
    languages: options.languages,
  })) {
    const status = result.transcript ? green('OK') : red('FAIL');
    const detail = result.transcript
      ? `${result.transcript.languageCode}, ${result.transcript.snippets.length} snippets`
      : (result.error ?? '');
    write(`[${result.meta.videoId}] ${status} ${dim(detail)}`);

    if (result.transcript) {
      summary.succeeded++;
    } else {
      summary.failed++;
    }

    await appendJsonl(result, options.outJsonl);

    if (options.outCsv) {
      csvResults.push(result);
    }
  }

  if (options.outCsv && csvResults.length) {
    await writeCsv(csvResults, { path: options.outCsv, append: options.resume });
    write(dim(`\nCSV written to ${options.outCsv}`));
  }

  write(`\n${green('Done!')} ${summary.succeeded} succeeded, ${summary.failed} failed`);
  return summary;
}
