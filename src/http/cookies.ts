/**
 * Load YouTube cookies from a Netscape/Mozilla `cookies.txt` export
 */

import { CookiePathInvalidError, CookiesInvalidError } from '../errors';
import { readTextFile } from '../lib/fs';
import { createLogger } from '../lib/logger';

const HTTP_ONLY_PREFIX = '#HttpOnly_';

const log = createLogger('cookies');

export interface NetscapeCookie {
  domain: string;
  includeSubdomains: boolean;
  path: string;
  secure: boolean;
  /** Unix seconds; 0 for a session cookie */
  expires: number;
  name: string;
  value: string;
  httpOnly: boolean;
}

/**
 * Parse the cookie lines of a Netscape cookie file. Lines that do not have
 * the seven TAB-separated fields are skipped.
 */
export function parseNetscapeCookies(text: string): NetscapeCookie[] {
  const cookies: NetscapeCookie[] = [];

  // Trailing TABs are significant (an empty value), so lines are not trimmed
  for (let line of text.split(/\r?\n/)) {
    let httpOnly = false;

    if (line.startsWith(HTTP_ONLY_PREFIX)) {
      line = line.slice(HTTP_ONLY_PREFIX.length);
      httpOnly = true;
    } else if (!line.trim() || line.startsWith('#')) {
      continue;
    }

    const fields = line.split('\t');
    if (fields.length !== 7) continue;

    const [domain, includeSubdomains, path, secure, expires, name, value] = fields;
    const expiresAt = Number(expires);
    if (!name || !Number.isFinite(expiresAt)) continue;

    cookies.push({
      domain,
      includeSubdomains: includeSubdomains.toUpperCase() === 'TRUE',
      path,
      secure: secure.toUpperCase() === 'TRUE',
      expires: expiresAt,
      name,
      value,
      httpOnly,
    });
  }

  return cookies;
}

export function isYouTubeCookieDomain(domain: string): boolean {
  const host = domain.replace(/^\./, '').toLowerCase();
  return host === 'youtube.com' || host.endsWith('.youtube.com');
}

/**
 * Load the unexpired YouTube cookies of a cookie file as a name/value map
 */
export async function loadCookieJar(
  path: string,
  now: Date = new Date()
): Promise<Map<string, string>> {
  let text: string;
  try {
    text = await readTextFile(path);
  } catch {
    throw new CookiePathInvalidError(path);
  }

  const nowSeconds = Math.floor(now.getTime() / 1000);
  const jar = new Map<string, string>();

  for (const cookie of parseNetscapeCookies(text)) {
    if (!isYouTubeCookieDomain(cookie.domain)) continue;
    if (cookie.expires !== 0 && cookie.expires < nowSeconds) continue;
    jar.set(cookie.name, cookie.value);
  }

  if (!jar.size) {
    throw new CookiesInvalidError(path);
  }

  log.debug(`Loaded ${jar.size} cookies from ${path}`);
  return jar;
}
