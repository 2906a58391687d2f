import { FetchError } from '../errors.js';
import type { Config } from '../types.js';
import { errorMessage } from '../utils/logger.js';

export interface PageFetcher {
  fetchPage(url: string): Promise<string>;
}

export class HttpPageFetcher implements PageFetcher {
  private headers: Record<string, string>;
  private timeoutMs: number;

  constructor(source: Config['source']) {
    this.headers = {
      'User-Agent': source.userAgent,
      'Accept-Language': source.acceptLanguage,
    };
    this.timeoutMs = source.requestTimeoutMs;
  }

  async fetchPage(url: string): Promise<string> {
    let response: Response;
    try {
      response = await fetch(url, {
        headers: this.headers,
        redirect: 'follow',
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new FetchError(url, `Request failed: ${errorMessage(error)}`);
    }

    if (!response.ok) {
      throw new FetchError(url, `Failed to fetch page: ${response.status} ${response.statusText}`, response.status);
    }

    return response.text();
  }
}
