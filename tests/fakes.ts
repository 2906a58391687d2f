import type { MessageSink } from '../src/services/alerter.js';
import type { PageFetcher } from '../src/services/page-fetcher.js';
import type { Config } from '../src/types.js';

export class FakeFetcher implements PageFetcher {
  readonly requested: string[] = [];

  constructor(private pages: Record<string, string | Error>) {}

  async fetchPage(url: string): Promise<string> {
    this.requested.push(url);
    const page = this.pages[url];
    if (page === undefined) throw new Error(`No page for ${url}`);
    if (page instanceof Error) throw page;
    return page;
  }
}

export class FakeSink implements MessageSink {
  readonly delivered: Array<{ recipient: string; text: string }> = [];
  private failures: Set<number>;
  private attempts = 0;

  /** `failOn` holds zero-based attempt numbers that should be rejected. */
  constructor(failOn: number[] = []) {
    this.failures = new Set(failOn);
  }

  async deliver(recipient: string, text: string): Promise<void> {
    const attempt = this.attempts++;
    if (this.failures.has(attempt)) {
      throw new Error('Rate limited');
    }
    this.delivered.push({ recipient, text });
  }
}

export function resultCard(title: string, price: string, mrp?: string): string {
  return `
    <div data-component-type="s-search-result">
      <h2><a href="/dp/${title.replace(/\s+/g, '-')}">${title}</a></h2>
      <span class="a-price"><span class="a-offscreen">${price}</span></span>
      ${mrp ? `<span class="a-price a-text-price"><span class="a-offscreen">${mrp}</span></span>` : ''}
    </div>`;
}

export function resultsPage(...cards: string[]): string {
  return `<html><body>${cards.join('\n')}</body></html>`;
}

export function createConfig(overrides: Partial<Config> = {}): Config {
  return {
    discord: { token: 'test-token', alertChannelId: 'channel-1' },
    source: {
      baseUrl: 'https://shop.test',
      userAgent: 'test-agent',
      acceptLanguage: 'en-IN',
      requestTimeoutMs: 1000,
    },
    categories: [
      { name: 'mobiles', sourceUrl: 'https://shop.test/s?k=mobiles' },
      { name: 'home', sourceUrl: 'https://shop.test/s?k=home' },
      { name: 'watches', sourceUrl: 'https://shop.test/s?k=watches' },
    ],
    run: {
      priceBand: { min: 150, max: 1000 },
      megaDiscountBand: { min: 80, max: 95 },
      maxItemsPerCategory: 12,
      pollIntervalMinutes: 1,
      affiliateTag: 'tagA',
    },
    logLevel: 'error',
    ...overrides,
  };
}
