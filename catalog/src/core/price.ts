/**
 * Price bucketing for the priceBucket facet.
 *
 * A bucket covers 100,000 units and is labelled "<n>00k" where n is the
 * floor of price / 100,000: 250000 -> "200k", 50000 -> "000k",
 * 1250000 -> "1200k".
 */

export const PRICE_BUCKET_SIZE = 100_000;

const BUCKET_LABEL = /^(\d+)00k$/;

export function priceBucketIndex(price: number): number {
  return Math.floor(price / PRICE_BUCKET_SIZE);
}

export function priceBucketLabel(price: number): string {
  return `${priceBucketIndex(price)}00k`;
}

/**
 * Render a numeric price range as a range label, e.g. (200000, 550000) -> "200k-500k"
 */
export function priceRangeLabel(minPrice: number, maxPrice: number): string {
  return `${priceBucketLabel(minPrice)}-${priceBucketLabel(maxPrice)}`;
}

export function parseBucketLabel(label: string): number | undefined {
  const match = BUCKET_LABEL.exec(label.trim());
  return match ? Number(match[1]) : undefined;
}

export interface BucketRange {
  lo: number;
  hi: number;
}

/**
 * Parse "200k" or "200k-500k" into inclusive bucket indices.
 * Returns undefined for anything else, including lo > hi.
 */
export function parsePriceRange(label: string): BucketRange | undefined {
  const parts = label.split("-");
  if (parts.length === 1) {
    const bucket = parseBucketLabel(parts[0]);
    return bucket === undefined ? undefined : { lo: bucket, hi: bucket };
  }
  if (parts.length !== 2) return undefined;

  const lo = parseBucketLabel(parts[0]);
  const hi = parseBucketLabel(parts[1]);
  if (lo === undefined || hi === undefined || lo > hi) return undefined;
  return { lo, hi };
}
