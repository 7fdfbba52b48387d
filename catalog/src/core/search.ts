import { Listing, SearchCriteria } from "./dto";
import { FacetIndexPort, ListingStorePort } from "./ports";
import { parseBucketLabel, parsePriceRange } from "./price";

/**
 * Newest first; equal timestamps fall back to id order so results are stable.
 */
export function byRecency(a: Listing, b: Listing): number {
  if (a.createdAt !== b.createdAt) {
    return a.createdAt < b.createdAt ? 1 : -1;
  }
  if (a.id === b.id) return 0;
  return a.id < b.id ? -1 : 1;
}

export function hasCriteria(criteria: SearchCriteria): boolean {
  return (
    criteria.location !== undefined ||
    criteria.propertyType !== undefined ||
    criteria.priceRange !== undefined
  );
}

/**
 * Faceted search over the secondary index.
 *
 * Candidates from every supplied criterion are unioned, then re-checked
 * against the store since the availability facet is derived state.
 */
export class SearchEngine {
  constructor(
    private store: ListingStorePort,
    private index: FacetIndexPort
  ) {}

  search(criteria: SearchCriteria): Listing[] {
    const candidates = this.candidates(criteria);

    const results: Listing[] = [];
    for (const id of candidates) {
      const listing = this.store.get(id);
      if (listing && listing.status === "available") {
        results.push(listing);
      }
    }

    return results.sort(byRecency);
  }

  /**
   * Union of index entries for the supplied criteria. Empty when none are supplied.
   */
  candidates(criteria: SearchCriteria): Set<string> {
    const ids = new Set<string>();
    const add = (entries: Iterable<string>) => {
      for (const id of entries) ids.add(id);
    };

    if (criteria.location !== undefined) {
      add(this.index.lookup("location", criteria.location));
    }
    if (criteria.propertyType !== undefined) {
      add(this.index.lookup("propertyType", criteria.propertyType));
    }
    if (criteria.priceRange !== undefined) {
      for (const bucket of this.bucketsInRange(criteria.priceRange)) {
        add(this.index.lookup("priceBucket", bucket));
      }
    }

    return ids;
  }

  private bucketsInRange(label: string): string[] {
    const range = parsePriceRange(label);
    if (!range) return [];

    return this.index.values("priceBucket").filter((bucket) => {
      const n = parseBucketLabel(bucket);
      return n !== undefined && n >= range.lo && n <= range.hi;
    });
  }
}
