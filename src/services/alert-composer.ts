import type { ClassifiedListing, RunConfig } from '../types.js';

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'] as const;

const MEGA_HEADER = '🚨🚨 MEGA DEAL ALERT 🚨🚨';
const MEGA_CTA = 'CTA: Hurry! Limited stock!';
const STANDARD_CTA = 'CTA: Grab it before it’s gone!';

export const STARTUP_NOTICE = '🤖 Bot started. Monitoring categories…';

export function affiliateLink(url: string, tag: string): string {
  const separator = url.includes('?') ? '&' : '?';
  return `${url}${separator}tag=${tag}`;
}

/** `05-Mar-2026 09:07`, local time. */
export function formatTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  const month = MONTHS[date.getMonth()] ?? '';
  return `${pad(date.getDate())}-${month}-${date.getFullYear()} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

const rupees = (value: number) => `₹${value}`;

/** Nearest integer, ties to the even neighbour (498.5 → 498, 499.5 → 500). */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

export function composeAlert(
  listing: ClassifiedListing,
  categoryName: string,
  config: Pick<RunConfig, 'affiliateTag'>,
  now: Date = new Date(),
): string {
  const timestamp = formatTimestamp(now);
  const link = affiliateLink(listing.link, config.affiliateTag);
  const price = roundHalfEven(listing.price);

  if (listing.isMegaDeal && listing.mrp !== null) {
    return [
      MEGA_HEADER,
      `Category: ${categoryName}`,
      `Title: ${listing.title}`,
      `MRP: ${rupees(Math.trunc(listing.mrp))}`,
      `Offer Price: ${rupees(price)}`,
      `Discount: ${(listing.discountPercent ?? 0).toFixed(1)}% OFF`,
      `Time: ${timestamp}`,
      MEGA_CTA,
      `Link: ${link}`,
    ].join('\n');
  }

  const mrpSuffix = listing.mrp ? ` (MRP: ${rupees(Math.trunc(listing.mrp))})` : '';
  return [
    `📢 ${categoryName.toUpperCase()} Deal (${timestamp})`,
    `Title: ${listing.title}`,
    `Price: ${rupees(price)}${mrpSuffix}`,
    STANDARD_CTA,
    `Link: ${link}`,
  ].join('\n');
}
