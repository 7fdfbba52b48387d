import { CatalogEvent } from "@listing-catalog/shared-utils";
import { Facet, Listing, ListingAttributes, ListingStatus } from "./dto";

// Canonical listing records
export interface ListingStorePort {
  create(ownerId: string, attributes: ListingAttributes): Listing;
  get(id: string): Listing | undefined;
  require(id: string): Listing;
  setStatus(id: string, status: ListingStatus): Listing;
  all(): Listing[];
  size(): number;
}

// Per-user ownership and shortlist relations
export interface DirectoryPort {
  recordOwnership(userId: string, listingId: string): void;
  /** false when the listing is already in the user's portfolio */
  recordShortlist(userId: string, listingId: string): boolean;
  owned(userId: string): string[];
  shortlisted(userId: string): string[];
  /** owned and shortlisted ids together, in the order they were recorded */
  listFor(userId: string): string[];
}

// Denormalized facet index over the listing store
export interface FacetIndexPort {
  indexOnCreate(id: string, attributes: ListingAttributes): void;
  markSold(id: string): void;
  markAvailable(id: string): void;
  lookup(facet: Facet, value: string): ReadonlySet<string>;
  values(facet: Facet): string[];
  has(facet: Facet, value: string, id: string): boolean;
}

// Outbound domain events
export interface EventPublisherPort {
  publish(event: CatalogEvent): Promise<void>;
}

export interface Clock {
  now(): Date;
}

export type IdGenerator = () => string;
