/**
 * Event types published by the catalog services
 */
export type EventType =
  | "listing_created"
  | "listing_status_changed"
  | "listing_shortlisted";

/**
 * Base event interface that all events must implement
 */
export interface BaseEvent {
  type: EventType;
  id: string;
  timestamp: string;
  version?: string;
}

export type EventHandler<T extends BaseEvent = BaseEvent> = (
  event: T
) => Promise<void>;

export type AvailabilityStatus = "available" | "sold";

export interface ListingCreatedEvent extends BaseEvent {
  type: "listing_created";
  data: {
    listingId: string;
    ownerId: string;
    location: string;
    propertyType: string;
    priceBucket: string;
    createdAt: string;
  };
}

export interface ListingStatusChangedEvent extends BaseEvent {
  type: "listing_status_changed";
  data: {
    listingId: string;
    actorId: string;
    from: AvailabilityStatus;
    to: AvailabilityStatus;
  };
}

export interface ListingShortlistedEvent extends BaseEvent {
  type: "listing_shortlisted";
  data: {
    listingId: string;
    userId: string;
  };
}

export type CatalogEvent =
  | ListingCreatedEvent
  | ListingStatusChangedEvent
  | ListingShortlistedEvent;

/**
 * Standard bus port interface
 */
export interface BusPort {
  subscribe<T extends BaseEvent>(
    topic: T["type"],
    handler: EventHandler<T>
  ): Promise<void>;

  publish<T extends BaseEvent>(event: T): Promise<void>;

  /**
   * Close the bus connection and cleanup resources
   */
  close?(): Promise<void>;
}

export interface BusConfig {
  redisUrl: string;
  serviceName: string;
  retryAttempts?: number;
}
