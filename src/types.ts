export interface CategoryTarget {
  name: string;
  sourceUrl: string;
}

export interface ListingCandidate {
  title: string;
  link: string;
  price: number;
  mrp: number | null;
}

export interface ClassifiedListing extends ListingCandidate {
  isMegaDeal: boolean;
  discountPercent: number | null;
  qualifies: boolean;
}

export interface AlertMessage {
  text: string;
  category: string;
  listing: ClassifiedListing;
}

export interface Band {
  min: number;
  max: number;
}

export interface RunConfig {
  priceBand: Band;
  megaDiscountBand: Band;
  maxItemsPerCategory: number;
  pollIntervalMinutes: number;
  affiliateTag: string;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Config {
  discord: {
    token: string;
    alertChannelId: string;
  };
  source: {
    baseUrl: string;
    userAgent: string;
    acceptLanguage: string;
    requestTimeoutMs: number;
  };
  categories: readonly CategoryTarget[];
  run: RunConfig;
  logLevel: LogLevel;
}

export interface PassSummary {
  categoriesChecked: number;
  categoriesFailed: number;
  listingsFound: number;
  alertsComposed: number;
  alertsSent: number;
  alertsFailed: number;
  startedAt: string;
  finishedAt: string;
}
