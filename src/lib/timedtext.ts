/**
 * Parser for YouTube's timedtext caption XML
 */

import type { TranscriptSnippet } from '../types';

const FORMATTING_TAGS = ['strong', 'em', 'b', 'i', 'mark', 'small', 'del', 'ins', 'sub', 'sup'];

const ALL_TAGS = /<[^>]*>/gi;
const NON_FORMATTING_TAGS = new RegExp(
  `<\\/?(?!\\/?(?:${FORMATTING_TAGS.join('|')})\\b)[^>]*>`,
  'gi'
);

const TEXT_ELEMENT = /<text\b([^>]*?)(?:\/>|>([\s\S]*?)<\/text>)/g;
const ATTRIBUTE = /([\w-]+)="([^"]*)"/g;

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

export function decodeEntities(s: string): string {
  return s.replace(/&(#x[\da-f]+|#\d+|[a-z]+);/gi, (entity, body: string) => {
    if (body[0] === '#') {
      const code =
        body[1] === 'x' || body[1] === 'X'
          ? Number.parseInt(body.slice(2), 16)
          : Number.parseInt(body.slice(1), 10);
      return Number.isFinite(code) && code <= 0x10ffff ? String.fromCodePoint(code) : entity;
    }
    return NAMED_ENTITIES[body.toLowerCase()] ?? entity;
  });
}

function readAttributes(raw: string): Map<string, string> {
  const attributes = new Map<string, string>();
  for (const match of raw.matchAll(ATTRIBUTE)) {
    attributes.set(match[1], match[2]);
  }
  return attributes;
}

/**
 * Parse `<text start dur>` elements into snippets, in document order.
 * Entities are decoded for the XML layer and again for the HTML markup
 * YouTube embeds in captions.
 */
export function parseTimedText(xml: string, preserveFormatting = false): TranscriptSnippet[] {
  const tagPattern = preserveFormatting ? NON_FORMATTING_TAGS : ALL_TAGS;
  const snippets: TranscriptSnippet[] = [];

  for (const match of xml.matchAll(TEXT_ELEMENT)) {
    const body = match[2];
    if (!body) continue;

    const attributes = readAttributes(match[1]);
    const start = Number.parseFloat(attributes.get('start') ?? '0');
    const duration = Number.parseFloat(attributes.get('dur') ?? '0');

    snippets.push({
      text: decodeEntities(decodeEntities(body)).replace(tagPattern, ''),
      start: Number.isFinite(start) ? start : 0,
      duration: Number.isFinite(duration) ? duration : 0,
    });
  }

  return snippets;
}
