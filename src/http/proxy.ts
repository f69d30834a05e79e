/**
 * Outbound proxies for the direct transport: a generic HTTP/HTTPS proxy
 * pair, or Webshare's rotating residential endpoint
 */

import { fetch as undiciFetch, ProxyAgent } from 'undici';
import { InvalidClientConfigError } from '../errors';
import type { FetchFn, FetchInit, FetchResponse } from './client';

export interface ProxyConfig {
  /** Proxy for `http:` targets */
  httpUrl?: string;
  /** Proxy for `https:` targets */
  httpsUrl?: string;
}

export type ProxyFetch = (input: string, init: FetchInit, proxyUrl: string) => Promise<FetchResponse>;

export const WEBSHARE_DOMAIN = 'p.webshare.io';
export const WEBSHARE_PORT = 80;

function assertProxyUrl(value: string): void {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new InvalidClientConfigError(`Invalid proxy URL '${value}'`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new InvalidClientConfigError(`Invalid proxy URL '${value}', expected http:// or https://`);
  }
}

/**
 * A proxy pair. When only one URL is given it serves both schemes.
 */
export function genericProxy(httpUrl?: string, httpsUrl?: string): ProxyConfig {
  if (!httpUrl && !httpsUrl) {
    throw new InvalidClientConfigError('A proxy needs at least an HTTP or an HTTPS URL');
  }
  if (httpUrl) assertProxyUrl(httpUrl);
  if (httpsUrl) assertProxyUrl(httpsUrl);
  return { httpUrl: httpUrl || undefined, httpsUrl: httpsUrl || undefined };
}

/**
 * Webshare's rotating residential proxy for a username/password pair
 */
export function webshareProxy(username?: string, password?: string): ProxyConfig {
  if (!username || !password) {
    throw new InvalidClientConfigError('Webshare proxies need both a username and a password');
  }
  const user = username.endsWith('-rotate') ? username : `${username}-rotate`;
  const url = `http://${encodeURIComponent(user)}:${encodeURIComponent(password)}@${WEBSHARE_DOMAIN}:${WEBSHARE_PORT}/`;
  return { httpUrl: url, httpsUrl: url };
}

/**
 * Proxy URL to use for a target, falling back to the other scheme's proxy
 */
export function proxyUrlFor(config: ProxyConfig, target: string): string | undefined {
  return target.startsWith('http:')
    ? (config.httpUrl ?? config.httpsUrl)
    : (config.httpsUrl ?? config.httpUrl);
}

/**
 * Fetch through an undici ProxyAgent, one agent per proxy URL
 */
export function createUndiciProxyFetch(): ProxyFetch {
  const agents = new Map<string, ProxyAgent>();

  return (input, init, proxyUrl) => {
    let agent = agents.get(proxyUrl);
    if (!agent) {
      agent = new ProxyAgent(proxyUrl);
      agents.set(proxyUrl, agent);
    }
    return undiciFetch(input, { ...init, dispatcher: agent });
  };
}

/**
 * A FetchFn that routes every request through the configured proxy
 */
export function createProxiedFetch(
  config: ProxyConfig,
  proxyFetch: ProxyFetch = createUndiciProxyFetch()
): FetchFn {
  return (input, init) => {
    const proxyUrl = proxyUrlFor(config, input);
    return proxyUrl ? proxyFetch(input, init, proxyUrl) : fetch(input, init);
  };
}
