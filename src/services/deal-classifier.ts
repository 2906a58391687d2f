import type { Band, ClassifiedListing, ListingCandidate, RunConfig } from '../types.js';

export function withinBand(value: number, band: Band): boolean {
  return value >= band.min && value <= band.max;
}

export function discountPercent(price: number, mrp: number | null): number | null {
  if (mrp === null || mrp <= 0) return null;
  return ((mrp - price) * 100) / mrp;
}

/**
 * A listing qualifies when its price sits inside the price band, or when its
 * discount off MRP falls inside the mega-deal band regardless of price.
 */
export function classifyListing(
  candidate: ListingCandidate,
  config: Pick<RunConfig, 'priceBand' | 'megaDiscountBand'>,
): ClassifiedListing {
  const discount = discountPercent(candidate.price, candidate.mrp);
  const isMegaDeal = discount !== null && withinBand(discount, config.megaDiscountBand);

  return {
    ...candidate,
    isMegaDeal,
    discountPercent: discount,
    qualifies: withinBand(candidate.price, config.priceBand) || isMegaDeal,
  };
}
