/**
 * Turns CLI option values into TranscriptApi options
 */

import { InvalidClientConfigError } from './errors';
import { genericProxy, webshareProxy, type ProxyConfig } from './http/proxy';
import type { TranscriptApiOptions } from './lib/api';

export const DEFAULT_TIMEOUT_SECONDS = 120;
export const API_KEY_ENV = 'SCRAPEOPS_API_KEY';
export const DEFAULT_CONCURRENCY = 4;
export const DEFAULT_PAUSE_AFTER = 10;
export const DEFAULT_PAUSE_MS = 5000;

export interface ClientCliOptions {
  scrapeopsApiKey?: string;
  /** Seconds, as typed on the command line */
  timeout?: string;
  header?: string[];
  cookies?: string;
  httpProxy?: string;
  httpsProxy?: string;
  webshareProxyUsername?: string;
  webshareProxyPassword?: string;
}

export interface BulkCliOptions {
  concurrency?: string;
  pauseAfter?: string;
  pauseMs?: string;
}

export interface BulkLimits {
  concurrency: number;
  pauseAfter: number;
  pauseDuration: number;
}

/**
 * Parse a timeout in seconds (fractions allowed) into milliseconds
 */
export function parseTimeoutSeconds(value: string): number {
  const seconds = Number(value);
  if (!value.trim() || !Number.isFinite(seconds) || seconds <= 0) {
    throw new InvalidClientConfigError(`Timeout must be a positive number of seconds, got '${value}'`);
  }
  return Math.round(seconds * 1000);
}

function parseWholeNumber(value: string, label: string, min: number): number {
  const parsed = Number(value);
  if (!value.trim() || !Number.isInteger(parsed) || parsed < min) {
    throw new InvalidClientConfigError(`${label} must be a whole number >= ${min}, got '${value}'`);
  }
  return parsed;
}

export function parseConcurrency(value: string): number {
  return parseWholeNumber(value, 'Concurrency', 1);
}

export function parsePauseAfter(value: string): number {
  return parseWholeNumber(value, 'Pause-after', 1);
}

export function parsePauseMs(value: string): number {
  return parseWholeNumber(value, 'Pause duration', 0);
}

export function toBulkLimits(options: BulkCliOptions): BulkLimits {
  return {
    concurrency: parseConcurrency(options.concurrency ?? String(DEFAULT_CONCURRENCY)),
    pauseAfter: parsePauseAfter(options.pauseAfter ?? String(DEFAULT_PAUSE_AFTER)),
    pauseDuration: parsePauseMs(options.pauseMs ?? String(DEFAULT_PAUSE_MS)),
  };
}

/**
 * Webshare credentials win over a generic proxy pair
 */
export function parseProxy(options: ClientCliOptions): ProxyConfig | undefined {
  if (options.webshareProxyUsername || options.webshareProxyPassword) {
    return webshareProxy(options.webshareProxyUsername, options.webshareProxyPassword);
  }
  if (options.httpProxy || options.httpsProxy) {
    return genericProxy(options.httpProxy, options.httpsProxy);
  }
  return undefined;
}

/**
 * Parse `Name: value` pairs. Later duplicates override earlier ones.
 */
export function parseHeaders(list: string[] = []): Record<string, string> {
  const headers: Record<string, string> = {};

  for (const entry of list) {
    const colon = entry.indexOf(':');
    const name = colon === -1 ? '' : entry.slice(0, colon).trim();
    if (!name) {
      throw new InvalidClientConfigError(`Invalid header '${entry}', expected 'Name: value'`);
    }
    headers[name] = entry.slice(colon + 1).trim();
  }

  return headers;
}

/**
 * Flatten `--languages de,en fr` into ['de', 'en', 'fr']
 */
export function parseLanguages(values: string[] = []): string[] {
  return values
    .flatMap((value) => value.split(','))
    .map((code) => code.trim())
    .filter(Boolean);
}

export function toApiOptions(options: ClientCliOptions): TranscriptApiOptions {
  return {
    scrapeopsApiKey: options.scrapeopsApiKey,
    timeoutMs: parseTimeoutSeconds(options.timeout ?? String(DEFAULT_TIMEOUT_SECONDS)),
    headers: parseHeaders(options.header),
    proxy: parseProxy(options),
    cookiePath: options.cookies,
  };
}
