/**
 * Caption tracks of a video and the logic to pick, translate and fetch them
 */

import {
  assertResponseOk,
  NoTranscriptFoundError,
  NotTranslatableError,
  TranslationLanguageNotAvailableError,
} from '../errors';
import type { HttpClient } from '../http/client';
import type { FetchedTranscript, TranslationLanguage } from '../types';
import { createLogger } from './logger';
import type { CaptionInfo } from './playerResponse';
import { parseTimedText } from './timedtext';

const ANY_LANGUAGE = '*';

const log = createLogger('transcripts');

export class Transcript {
  constructor(
    private readonly httpClient: HttpClient,
    readonly videoId: string,
    readonly url: string,
    readonly language: string,
    readonly languageCode: string,
    readonly isGenerated: boolean,
    readonly translationLanguages: TranslationLanguage[]
  ) {}

  get isTranslatable(): boolean {
    return this.translationLanguages.length > 0;
  }

  async fetch(preserveFormatting = false): Promise<FetchedTranscript> {
    const response = await this.httpClient.get(this.url);
    assertResponseOk(response, this.videoId);

    const snippets = parseTimedText(response.text, preserveFormatting);
    log.debug(`Fetched ${snippets.length} snippets`, {
      videoId: this.videoId,
      languageCode: this.languageCode,
    });

    return {
      videoId: this.videoId,
      language: this.language,
      languageCode: this.languageCode,
      isGenerated: this.isGenerated,
      snippets,
    };
  }

  translate(languageCode: string): Transcript {
    if (!this.isTranslatable) {
      throw new NotTranslatableError(this.videoId);
    }

    const target = this.translationLanguages.find((lang) => lang.languageCode === languageCode);
    if (!target) {
      throw new TranslationLanguageNotAvailableError(this.videoId, languageCode);
    }

    return new Transcript(
      this.httpClient,
      this.videoId,
      `${this.url}&tlang=${encodeURIComponent(languageCode)}`,
      target.language,
      languageCode,
      true,
      []
    );
  }

  toString(): string {
    return `${this.languageCode} ("${this.language}")${this.isTranslatable ? '[TRANSLATABLE]' : ''}`;
  }
}

export class TranscriptList implements Iterable<Transcript> {
  constructor(
    readonly videoId: string,
    readonly manuallyCreated: Transcript[],
    readonly generated: Transcript[],
    readonly translationLanguages: TranslationLanguage[]
  ) {}

  static fromCaptions(httpClient: HttpClient, videoId: string, captions: CaptionInfo): TranscriptList {
    const manual: Transcript[] = [];
    const generated: Transcript[] = [];

    for (const track of captions.tracks) {
      const transcript = new Transcript(
        httpClient,
        videoId,
        track.url,
        track.language,
        track.languageCode,
        track.isGenerated,
        track.isTranslatable ? captions.translationLanguages : []
      );
      (track.isGenerated ? generated : manual).push(transcript);
    }

    return new TranscriptList(videoId, manual, generated, captions.translationLanguages);
  }

  *[Symbol.iterator](): Iterator<Transcript> {
    yield* this.manuallyCreated;
    yield* this.generated;
  }

  /**
   * Find a transcript for the first language code that has one, preferring
   * manually created tracks over generated ones for the same code
   */
  findTranscript(languageCodes: string[]): Transcript {
    return this.find(languageCodes, [this.manuallyCreated, this.generated]);
  }

  findManuallyCreatedTranscript(languageCodes: string[]): Transcript {
    return this.find(languageCodes, [this.manuallyCreated]);
  }

  findGeneratedTranscript(languageCodes: string[]): Transcript {
    return this.find(languageCodes, [this.generated]);
  }

  private find(languageCodes: string[], pools: Transcript[][]): Transcript {
    for (const code of languageCodes) {
      for (const pool of pools) {
        const match =
          code === ANY_LANGUAGE ? pool[0] : pool.find((t) => t.languageCode === code);
        if (match) return match;
      }
    }
    throw new NoTranscriptFoundError(this.videoId, languageCodes, this.describe());
  }

  /**
   * Human-readable listing of every available track
   */
  describe(): string {
    const section = (items: readonly { toString(): string }[]) =>
      items.length ? items.map((item) => ` - ${item.toString()}`).join('\n') : 'None';

    const translations = this.translationLanguages.map(
      (lang) => `${lang.languageCode} ("${lang.language}")`
    );

    return [
      `For this video (${this.videoId}) transcripts are available in the following languages:`,
      '',
      '(MANUALLY CREATED)',
      section(this.manuallyCreated),
      '',
      '(GENERATED)',
      section(this.generated),
      '',
      '(TRANSLATION LANGUAGES)',
      section(translations),
    ].join('\n');
  }
}
