import { ContentFetchError } from './errors';

export interface FetchPageOptions {
  timeoutMs: number;
  userAgent: string;
}

/**
 * Download an article page as text. Raises ContentFetchError on a non-2xx
 * status, a network failure or when the timeout elapses.
 */
export async function fetchPage(url: string, options: FetchPageOptions): Promise<string> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options.timeoutMs);

  try {
    const response = await fetch(url, {
      signal: controller.signal,
      headers: {
        'User-Agent': options.userAgent,
        Accept: 'text/html,application/xhtml+xml'
      }
    });

    if (!response.ok) {
      throw new ContentFetchError(`HTTP error! status: ${response.status} for ${url}`, response.status);
    }

    return await response.text();
  } catch (error) {
    if (error instanceof ContentFetchError) throw error;
    const message =
      error instanceof Error ? (error.name === 'AbortError' ? 'Request timeout' : error.message) : 'Unknown error';
    throw new ContentFetchError(`${message} for ${url}`, null, { cause: error });
  } finally {
    clearTimeout(timeout);
  }
}
