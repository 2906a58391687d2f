import { describe, it, expect } from 'vitest';
import { classifyListing, discountPercent, withinBand } from '../../src/services/deal-classifier.js';
import type { ListingCandidate } from '../../src/types.js';

const config = {
  priceBand: { min: 150, max: 1000 },
  megaDiscountBand: { min: 80, max: 95 },
};

function createCandidate(overrides: Partial<ListingCandidate> = {}): ListingCandidate {
  return {
    title: 'Test Product',
    link: 'https://shop.test/dp/TEST1',
    price: 500,
    mrp: null,
    ...overrides,
  };
}

describe('classifyListing', () => {
  it('treats the lower mega-deal bound as inclusive', () => {
    const listing = classifyListing(createCandidate({ price: 200, mrp: 1000 }), config);

    expect(listing.discountPercent).toBe(80);
    expect(listing.isMegaDeal).toBe(true);
  });

  it('treats the upper mega-deal bound as inclusive', () => {
    const listing = classifyListing(createCandidate({ price: 50, mrp: 1000 }), config);

    expect(listing.discountPercent).toBe(95);
    expect(listing.isMegaDeal).toBe(true);
  });

  it('does not flag discounts above the mega-deal band', () => {
    const listing = classifyListing(createCandidate({ price: 40, mrp: 1000 }), config);

    expect(listing.discountPercent).toBe(96);
    expect(listing.isMegaDeal).toBe(false);
    expect(listing.qualifies).toBe(false);
  });

  it('qualifies on price band alone', () => {
    const lower = classifyListing(createCandidate({ price: 150 }), config);
    const upper = classifyListing(createCandidate({ price: 1000 }), config);

    expect(lower.qualifies).toBe(true);
    expect(upper.qualifies).toBe(true);
    expect(lower.isMegaDeal).toBe(false);
  });

  it('qualifies a mega deal outside the price band', () => {
    const listing = classifyListing(createCandidate({ price: 5000, mrp: 40000 }), config);

    expect(listing.discountPercent).toBe(87.5);
    expect(listing.isMegaDeal).toBe(true);
    expect(listing.qualifies).toBe(true);
  });

  it('rejects listings outside the band without a mega discount', () => {
    const cheap = classifyListing(createCandidate({ price: 99 }), config);
    const pricey = classifyListing(createCandidate({ price: 1500, mrp: 2000 }), config);

    expect(cheap.qualifies).toBe(false);
    expect(pricey.qualifies).toBe(false);
    expect(pricey.discountPercent).toBe(25);
  });

  it('leaves the discount unset without a usable MRP', () => {
    expect(classifyListing(createCandidate({ mrp: null }), config).discountPercent).toBeNull();
    expect(classifyListing(createCandidate({ mrp: 0 }), config).discountPercent).toBeNull();
  });

  it('keeps the candidate fields', () => {
    const candidate = createCandidate({ title: 'Phone X', price: 899 });
    const listing = classifyListing(candidate, config);

    expect(listing).toMatchObject(candidate);
  });
});

describe('discountPercent', () => {
  it('is null for a missing or non-positive MRP', () => {
    expect(discountPercent(100, null)).toBeNull();
    expect(discountPercent(100, -10)).toBeNull();
  });

  it('goes negative when the price exceeds MRP', () => {
    expect(discountPercent(1200, 1000)).toBe(-20);
  });
});

describe('withinBand', () => {
  it('includes both ends', () => {
    expect(withinBand(80, { min: 80, max: 95 })).toBe(true);
    expect(withinBand(95, { min: 80, max: 95 })).toBe(true);
    expect(withinBand(95.1, { min: 80, max: 95 })).toBe(false);
  });
});
