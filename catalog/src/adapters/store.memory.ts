import { randomUUID } from "crypto";
import { Listing, ListingAttributes, ListingStatus } from "../core/dto";
import { NotFoundError } from "../core/errors";
import { Clock, IdGenerator, ListingStorePort } from "../core/ports";

export const systemClock: Clock = { now: () => new Date() };

export interface MemoryStoreOptions {
  clock?: Clock;
  generateId?: IdGenerator;
}

/**
 * Canonical listing records, keyed by id. Every record is frozen, attributes
 * and amenities included, so callers cannot edit the store through a read.
 *
 * createdAt is kept strictly increasing: a clock reading at or before the
 * previous creation is bumped one millisecond past it.
 */
export class MemoryListingStore implements ListingStorePort {
  private listings = new Map<string, Listing>();
  private lastCreatedMs = Number.NEGATIVE_INFINITY;
  private clock: Clock;
  private generateId: IdGenerator;

  constructor(options: MemoryStoreOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.generateId = options.generateId ?? randomUUID;
  }

  create(ownerId: string, attributes: ListingAttributes): Listing {
    let id = this.generateId();
    while (this.listings.has(id)) {
      id = this.generateId();
    }

    const createdMs = Math.max(
      this.clock.now().getTime(),
      this.lastCreatedMs + 1
    );
    this.lastCreatedMs = createdMs;

    const listing: Listing = {
      id,
      ownerId,
      attributes: Object.freeze({
        ...attributes,
        amenities: Object.freeze([...attributes.amenities]),
      }),
      status: "available",
      createdAt: new Date(createdMs).toISOString(),
    };
    Object.freeze(listing);

    this.listings.set(id, listing);
    return listing;
  }

  get(id: string): Listing | undefined {
    return this.listings.get(id);
  }

  require(id: string): Listing {
    const listing = this.listings.get(id);
    if (!listing) {
      throw new NotFoundError(id);
    }
    return listing;
  }

  setStatus(id: string, status: ListingStatus): Listing {
    // Records are frozen and replaced, so listings handed out earlier keep
    // the status they were read with.
    const updated: Listing = { ...this.require(id), status };
    Object.freeze(updated);
    this.listings.set(id, updated);
    return updated;
  }

  all(): Listing[] {
    return Array.from(this.listings.values());
  }

  size(): number {
    return this.listings.size;
  }
}
