import { DEFAULT_REQUEST_TIMEOUT_MS } from '../constants';

export class HttpRequestError extends Error {
  constructor(
    public message: string,
    public status: number,
    public cause?: Error,
    public body?: string,
  ) {
    super(message);
    if (cause) {
      this.cause = cause;
    }
  }
}

export interface IHttpClient {
  getLines(url: URL): Promise<string[]>;
}

export function splitLines(text: string): string[] {
  const lines = text.split(/\r?\n/);
  if (lines.length && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

function isAbortError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'name' in error && error.name === 'AbortError';
}

export default class FetchHttpClient implements IHttpClient {
  constructor(private readonly timeout: number = DEFAULT_REQUEST_TIMEOUT_MS) {}

  async getLines(url: URL): Promise<string[]> {
    const response = await this.rawGet(url);
    return splitLines(await response.text());
  }

  async rawGet(url: URL): Promise<Response> {
    // Canonical implementation of abortable fetch for interrupting when request takes longer than desired.
    // https://developer.chrome.com/blog/abortable-fetch/#reacting_to_an_aborted_fetch
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);
    try {
      const response = await fetch(url.toString(), { signal: controller.signal });
      if (!response?.ok) {
        const body = typeof response?.text === 'function' ? await response.text() : undefined;
        throw new HttpRequestError('Failed to fetch data', response?.status, undefined, body);
      }
      return response;
    } catch (error) {
      if (error instanceof HttpRequestError) {
        throw error;
      }
      const cause = error instanceof Error ? error : undefined;
      if (isAbortError(error)) {
        throw new HttpRequestError('Request timed out', 408, cause);
      }
      throw new HttpRequestError('Network error', 0, cause);
    } finally {
      // Clear timeout when response is received within the budget.
      clearTimeout(timeoutId);
    }
  }
}
