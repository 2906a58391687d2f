import type { ListingCandidate } from '../types.js';
import { createLogger } from '../utils/logger.js';
import { loadMarkup, type MarkupNode } from './markup.js';
import { normalizePrice, parseDecimal } from './price-normalizer.js';

const log = createLogger('Extractor');

export const SELECTORS = {
  card: 'div[data-component-type="s-search-result"]',
  heading: 'h2',
  link: 'a',
  offscreenPrice: 'span.a-offscreen',
  priceWhole: 'span.a-price-whole',
  priceFraction: 'span.a-price-fraction',
  strikethroughPrice: 'span.a-text-price',
} as const;

export interface ExtractOptions {
  maxItems: number;
  baseUrl: string;
}

export type CardResult =
  | { ok: true; candidate: ListingCandidate }
  | { ok: false; reason: string };

/**
 * Pulls up to `maxItems` listings out of a search results page, in document
 * order. Cards that do not match the expected structure are skipped.
 */
export function extractListings(html: string, options: ExtractOptions): ListingCandidate[] {
  const candidates: ListingCandidate[] = [];
  if (options.maxItems <= 0) return candidates;

  const cards = loadMarkup(html).findAll(SELECTORS.card);

  for (const [index, card] of cards.entries()) {
    if (candidates.length >= options.maxItems) break;

    const result = parseCard(card, options.baseUrl);
    if (result.ok) {
      candidates.push(result.candidate);
    } else {
      log.debug(`Skipped card ${index}: ${result.reason}`);
    }
  }

  return candidates;
}

export function parseCard(card: MarkupNode, baseUrl: string): CardResult {
  const heading = card.find(SELECTORS.heading);
  if (!heading) return { ok: false, reason: 'no heading' };

  const anchor = heading.find(SELECTORS.link);
  if (!anchor) return { ok: false, reason: 'no link in heading' };

  const title = heading.text();
  if (!title) return { ok: false, reason: 'empty title' };

  const price = parseListingPrice(card);
  if (price === null) return { ok: false, reason: 'no price' };

  return {
    ok: true,
    candidate: {
      title,
      link: resolveLink(anchor.attr('href') ?? '', baseUrl),
      price,
      mrp: parseListingMrp(card),
    },
  };
}

export function parseListingPrice(card: MarkupNode): number | null {
  const offscreen = card.find(SELECTORS.offscreenPrice);
  if (offscreen) {
    const price = normalizePrice(offscreen.text());
    if (price !== null) return price;
  }

  const whole = card.find(SELECTORS.priceWhole);
  const wholeText = whole?.text().replace(/,/g, '').replace(/\.$/, '') ?? '';
  if (!wholeText) return null;

  const fractionText = card.find(SELECTORS.priceFraction)?.text() ?? '';
  return parseDecimal(fractionText ? `${wholeText}.${fractionText}` : wholeText);
}

export function parseListingMrp(card: MarkupNode): number | null {
  const strike = card.find(SELECTORS.strikethroughPrice);
  const offscreen = strike?.find(SELECTORS.offscreenPrice);
  return offscreen ? normalizePrice(offscreen.text()) : null;
}

export function resolveLink(href: string, baseUrl: string): string {
  if (href.startsWith('http')) return href;
  const base = baseUrl.replace(/\/+$/, '');
  const path = href.replace(/^\/+/, '');
  return `${base}/${path}`;
}
