import type { AlertMessage, CategoryTarget, RunConfig } from '../types.js';
import { createLogger, errorMessage } from '../utils/logger.js';
import { composeAlert } from './alert-composer.js';
import { classifyListing } from './deal-classifier.js';
import { extractListings } from './listing-extractor.js';
import type { PageFetcher } from './page-fetcher.js';

const log = createLogger('Pipeline');

export interface CategoryResult {
  messages: AlertMessage[];
  listingsFound: number;
  fetchFailed: boolean;
}

export class CategoryPipeline {
  private fetcher: PageFetcher;
  private config: RunConfig;
  private baseUrl: string;
  private clock: () => Date;

  constructor(fetcher: PageFetcher, config: RunConfig, baseUrl: string, clock: () => Date = () => new Date()) {
    this.fetcher = fetcher;
    this.config = config;
    this.baseUrl = baseUrl;
    this.clock = clock;
  }

  async run(target: CategoryTarget): Promise<AlertMessage[]> {
    const result = await this.process(target);
    return result.messages;
  }

  /**
   * Fetch, extract, classify and compose for one category. A failed fetch
   * yields no messages; nothing is retried within the pass.
   */
  async process(target: CategoryTarget): Promise<CategoryResult> {
    let html: string;
    try {
      html = await this.fetcher.fetchPage(target.sourceUrl);
    } catch (error) {
      log.warn(`Failed to fetch ${target.name} (${target.sourceUrl}): ${errorMessage(error)}`);
      return { messages: [], listingsFound: 0, fetchFailed: true };
    }

    const candidates = extractListings(html, {
      maxItems: this.config.maxItemsPerCategory,
      baseUrl: this.baseUrl,
    });

    const now = this.clock();
    const messages: AlertMessage[] = candidates
      .map((candidate) => classifyListing(candidate, this.config))
      .filter((listing) => listing.qualifies)
      .map((listing) => ({
        text: composeAlert(listing, target.name, this.config, now),
        category: target.name,
        listing,
      }));

    log.info(`${target.name}: ${candidates.length} listings, ${messages.length} qualifying`);
    return { messages, listingsFound: candidates.length, fetchFailed: false };
  }
}
