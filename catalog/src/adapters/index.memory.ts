import {
  AVAILABLE_MARKER,
  Facet,
  ListingAttributes,
} from "../core/dto";
import { InvalidTransitionError } from "../core/errors";
import { FacetIndexPort } from "../core/ports";
import { priceBucketLabel } from "../core/price";

const FACETS: readonly Facet[] = [
  "location",
  "propertyType",
  "priceBucket",
  "availability",
];

const EMPTY: ReadonlySet<string> = new Set();

/**
 * Secondary index: facet -> facet value -> listing ids.
 *
 * Entries are sets, so an id appears at most once per value. Location,
 * propertyType and priceBucket entries are written once at creation; only
 * the availability entry moves afterwards.
 */
export class MemoryFacetIndex implements FacetIndexPort {
  private entries = new Map<Facet, Map<string, Set<string>>>(
    FACETS.map((facet) => [facet, new Map<string, Set<string>>()])
  );

  indexOnCreate(id: string, attributes: ListingAttributes): void {
    this.insert("priceBucket", priceBucketLabel(attributes.price), id);
    this.insert("location", attributes.location, id);
    this.insert("propertyType", attributes.propertyType, id);
    this.insert("availability", AVAILABLE_MARKER, id);
  }

  markSold(id: string): void {
    const available = this.bucket("availability", AVAILABLE_MARKER);
    if (!available?.has(id)) {
      throw new InvalidTransitionError(
        `Listing ${id} is not indexed as available`
      );
    }
    available.delete(id);
  }

  markAvailable(id: string): void {
    if (this.has("availability", AVAILABLE_MARKER, id)) {
      throw new InvalidTransitionError(
        `Listing ${id} is already indexed as available`
      );
    }
    this.insert("availability", AVAILABLE_MARKER, id);
  }

  lookup(facet: Facet, value: string): ReadonlySet<string> {
    return this.bucket(facet, value) ?? EMPTY;
  }

  values(facet: Facet): string[] {
    const values: string[] = [];
    for (const [value, ids] of this.facet(facet)) {
      if (ids.size > 0) values.push(value);
    }
    return values;
  }

  has(facet: Facet, value: string, id: string): boolean {
    return this.bucket(facet, value)?.has(id) ?? false;
  }

  private facet(facet: Facet): Map<string, Set<string>> {
    let values = this.entries.get(facet);
    if (!values) {
      values = new Map();
      this.entries.set(facet, values);
    }
    return values;
  }

  private bucket(facet: Facet, value: string): Set<string> | undefined {
    return this.facet(facet).get(value);
  }

  private insert(facet: Facet, value: string, id: string): void {
    const values = this.facet(facet);
    const ids = values.get(value);
    if (ids) {
      ids.add(id);
    } else {
      values.set(value, new Set([id]));
    }
  }
}
