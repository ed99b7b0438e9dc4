import { FetchConnectionError, FetchParseError, FetchStatusError } from './errors.js';
import type { ThreadPayload } from './types.js';

const DEFAULT_TIMEOUT_MS = 10_000;
const DEFAULT_USER_AGENT = 'Mozilla/5.0';
const JSON_SUFFIX = '.json';

export type FetchThreadOptions = {
  userAgent?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
};

export type ThreadClient = {
  fetchThread(url: string, options?: FetchThreadOptions): Promise<ThreadPayload>;
};

const isRedditHost = (hostname: string): boolean =>
  hostname === 'reddit.com' || hostname.endsWith('.reddit.com');

export const isValidRedditUrl = (value: string): boolean => {
  let url: URL;

  try {
    url = new URL(value.trim());
  } catch {
    return false;
  }

  if (url.protocol !== 'https:' && url.protocol !== 'http:') {
    return false;
  }

  return isRedditHost(url.hostname.toLowerCase()) && url.pathname.includes('/comments/');
};

/**
 * Turns a thread permalink into its JSON listing URL, e.g.
 * `https://www.reddit.com/r/a/comments/x1/t/?sort=top` becomes
 * `https://www.reddit.com/r/a/comments/x1/t.json`.
 */
export const toThreadJsonUrl = (value: string): string => {
  const url = new URL(value.trim());
  url.search = '';
  url.hash = '';

  const pathname = url.pathname.replace(/\/+$/, '');
  url.pathname = pathname.endsWith(JSON_SUFFIX) ? pathname : `${pathname}${JSON_SUFFIX}`;

  return url.toString();
};

export const fetchThreadJson = async (
  url: string,
  options: FetchThreadOptions = {}
): Promise<ThreadPayload> => {
  const fetchImpl = options.fetchImpl ?? fetch;
  const headers = new Headers({
    Accept: 'application/json',
    'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT
  });
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs ?? DEFAULT_TIMEOUT_MS);

  let raw: string;

  try {
    const response = await fetchImpl(url, { headers, signal: controller.signal });

    if (!response.ok) {
      throw new FetchStatusError(url, response.status);
    }

    raw = await response.text();
  } catch (error) {
    if (error instanceof FetchStatusError) {
      throw error;
    }

    // An abort from the timeout surfaces here as well.
    throw new FetchConnectionError(url, error instanceof Error ? error : undefined);
  } finally {
    clearTimeout(timeoutId);
  }

  try {
    const payload: ThreadPayload = JSON.parse(raw);
    return payload;
  } catch (error) {
    throw new FetchParseError(url, error instanceof Error ? error : undefined);
  }
};

export const defaultThreadClient: ThreadClient = {
  fetchThread: fetchThreadJson
};
