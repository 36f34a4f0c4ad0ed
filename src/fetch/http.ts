import { FetchError, errorMessage } from '../errors.js';

export const DEFAULT_TIMEOUT_MS = 15_000;

export const HTML_ACCEPT = 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8';
export const FEED_ACCEPT = 'application/rss+xml, application/atom+xml, application/xml, text/xml, */*';

// some publishers reject requests that do not look like a browser
export function browserHeaders(url: string, accept: string): Record<string, string> {
  return {
    'User-Agent':
      'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
    Accept: accept,
    'Accept-Language': 'it-IT,it;q=0.9,en-US;q=0.8,en;q=0.7',
    'Cache-Control': 'max-age=0',
    Referer: `${new URL(url).origin}/`,
  };
}

export type FetchOptions = {
  timeoutMs?: number;
  accept?: string;
};

function isTimeout(err: unknown): boolean {
  const name = typeof err === 'object' && err !== null && 'name' in err ? err.name : undefined;
  return name === 'TimeoutError' || name === 'AbortError';
}

function toFetchError(err: unknown, url: string, timeoutMs: number): FetchError {
  if (err instanceof FetchError) return err;
  if (isTimeout(err)) return new FetchError('timeout', url, `Timed out after ${timeoutMs}ms`, undefined, { cause: err });
  return new FetchError('network', url, errorMessage(err), undefined, { cause: err });
}

/**
 * GET a text resource. The timeout covers the body as well as the headers.
 * No retries: every failure surfaces as a FetchError.
 */
export async function fetchText(url: string, { timeoutMs = DEFAULT_TIMEOUT_MS, accept = HTML_ACCEPT }: FetchOptions = {}): Promise<string> {
  try {
    const res = await fetch(url, {
      method: 'GET',
      redirect: 'follow',
      headers: browserHeaders(url, accept),
      signal: AbortSignal.timeout(timeoutMs),
    });
    if (!res.ok) throw new FetchError('http', url, `HTTP ${res.status}`, res.status);
    return await res.text();
  } catch (err) {
    throw toFetchError(err, url, timeoutMs);
  }
}
