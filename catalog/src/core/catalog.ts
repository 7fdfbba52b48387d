/**
 * Catalog service: the only entry point that mutates listings.
 *
 * Each mutating call validates and writes store, directory and index in one
 * synchronous block, so nothing else on the event loop can observe or race a
 * half-applied change. Events are published after the write without being
 * awaited; a failed publish is logged and does not undo the write.
 */

import { randomUUID } from "crypto";
import { CatalogEvent, Logger } from "@listing-catalog/shared-utils";
import {
  Listing,
  ListingAttributes,
  ListingStatus,
  Page,
  SearchCriteria,
} from "./dto";
import { ConflictError, UnauthorizedError } from "./errors";
import { paginate } from "./paginate";
import {
  Clock,
  DirectoryPort,
  EventPublisherPort,
  FacetIndexPort,
  IdGenerator,
  ListingStorePort,
} from "./ports";
import { priceBucketLabel } from "./price";
import { byRecency, SearchEngine } from "./search";
import { applyTransition } from "./transitions";

export interface CatalogDependencies {
  store: ListingStorePort;
  directory: DirectoryPort;
  index: FacetIndexPort;
  logger: Logger;
  events?: EventPublisherPort;
  clock?: Clock;
  generateEventId?: IdGenerator;
}

export class CatalogService {
  private engine: SearchEngine;
  private clock: Clock;
  private generateEventId: IdGenerator;

  constructor(private deps: CatalogDependencies) {
    this.engine = new SearchEngine(deps.store, deps.index);
    this.clock = deps.clock ?? { now: () => new Date() };
    this.generateEventId = deps.generateEventId ?? randomUUID;
  }

  async create(
    ownerId: string,
    attributes: ListingAttributes
  ): Promise<Listing> {
    const { store, directory, index, logger } = this.deps;

    const listing = store.create(ownerId, attributes);
    directory.recordOwnership(ownerId, listing.id);
    index.indexOnCreate(listing.id, listing.attributes);

    logger.info(`Created listing ${listing.id}`, {
      ownerId,
      location: attributes.location,
      propertyType: attributes.propertyType,
    });

    void this.emit({
      type: "listing_created",
      id: this.generateEventId(),
      timestamp: this.timestamp(),
      data: {
        listingId: listing.id,
        ownerId,
        location: listing.attributes.location,
        propertyType: listing.attributes.propertyType,
        priceBucket: priceBucketLabel(listing.attributes.price),
        createdAt: listing.createdAt,
      },
    });

    return listing;
  }

  get(id: string): Listing {
    return this.deps.store.require(id);
  }

  /**
   * Change availability. Only the owner may do this, and only across a legal
   * transition; on any failure the listing and index are left untouched.
   */
  async setStatus(
    id: string,
    status: ListingStatus,
    actingUserId: string
  ): Promise<Listing> {
    const { store, index, logger } = this.deps;

    const current = store.require(id);
    if (current.ownerId !== actingUserId) {
      logger.warn(`Rejected status change on ${id} by ${actingUserId}`);
      throw new UnauthorizedError(id, actingUserId);
    }

    applyTransition(index, id, current.status, status);
    const updated = store.setStatus(id, status);

    logger.info(`Listing ${id}: ${current.status} -> ${status}`);

    void this.emit({
      type: "listing_status_changed",
      id: this.generateEventId(),
      timestamp: this.timestamp(),
      data: {
        listingId: id,
        actorId: actingUserId,
        from: current.status,
        to: status,
      },
    });

    return updated;
  }

  search(criteria: SearchCriteria): Listing[] {
    return this.engine.search(criteria);
  }

  searchPage(
    criteria: SearchCriteria,
    page: number,
    limit: number
  ): Page<Listing> {
    return paginate(this.engine.search(criteria), page, limit);
  }

  async shortlist(userId: string, id: string): Promise<void> {
    const { store, directory, logger } = this.deps;

    const listing = store.require(id);
    if (listing.status === "sold") {
      throw new ConflictError(`Listing ${id} is sold and cannot be shortlisted`);
    }
    if (!directory.recordShortlist(userId, id)) {
      logger.debug(`Listing ${id} already in portfolio of ${userId}`);
      throw new ConflictError(`Listing ${id} is already in your portfolio`);
    }

    void this.emit({
      type: "listing_shortlisted",
      id: this.generateEventId(),
      timestamp: this.timestamp(),
      data: { listingId: id, userId },
    });
  }

  /** Shortlisted listings that are still available, newest first */
  listShortlisted(userId: string): Listing[] {
    return this.resolve(this.deps.directory.shortlisted(userId)).filter(
      (listing) => listing.status === "available"
    );
  }

  /** Listings the user created, any status, newest first */
  listOwned(userId: string): Listing[] {
    return this.resolve(this.deps.directory.owned(userId));
  }

  /**
   * Owned and shortlisted listings together, any status, newest first.
   * Kept for clients that read both relations as one list.
   */
  listPortfolio(userId: string): Listing[] {
    return this.resolve(this.deps.directory.listFor(userId));
  }

  size(): number {
    return this.deps.store.size();
  }

  private resolve(ids: string[]): Listing[] {
    const listings: Listing[] = [];
    for (const id of ids) {
      const listing = this.deps.store.get(id);
      if (listing) listings.push(listing);
    }
    return listings.sort(byRecency);
  }

  private timestamp(): string {
    return this.clock.now().toISOString();
  }

  private async emit(event: CatalogEvent): Promise<void> {
    if (!this.deps.events) return;

    try {
      await this.deps.events.publish(event);
    } catch (error) {
      this.deps.logger.error(`Failed to publish ${event.type}:`, error);
    }
  }
}
