import { createLogger, MemoryBus } from "@listing-catalog/shared-utils";
import { BusAdapter } from "../src/adapters/bus.adapter";
import { MemoryDirectory } from "../src/adapters/directory.memory";
import { MemoryFacetIndex } from "../src/adapters/index.memory";
import { MemoryListingStore } from "../src/adapters/store.memory";
import { CatalogService } from "../src/core/catalog";
import { ListingAttributes } from "../src/core/dto";
import { Clock, EventPublisherPort, IdGenerator } from "../src/core/ports";

export const silentLogger = createLogger("test", "silent");

export function sequentialIds(prefix: string = "listing"): IdGenerator {
  let n = 0;
  return () => `${prefix}-${++n}`;
}

/**
 * Clock that advances by stepMs after every reading
 */
export function steppingClock(
  startIso: string = "2024-01-15T08:00:00.000Z",
  stepMs: number = 1000
): Clock {
  let current = Date.parse(startIso);
  return {
    now: () => {
      const reading = new Date(current);
      current += stepMs;
      return reading;
    },
  };
}

export function fixedClock(iso: string): Clock {
  return { now: () => new Date(iso) };
}

export function attrs(
  overrides: Partial<ListingAttributes> = {}
): ListingAttributes {
  return {
    location: "Austin",
    price: 250000,
    propertyType: "condo",
    description: "Two bedroom unit near downtown",
    amenities: ["parking", "gym"],
    ...overrides,
  };
}

export interface CatalogHarnessOptions {
  clock?: Clock;
  events?: EventPublisherPort;
}

export function buildCatalog(options: CatalogHarnessOptions = {}) {
  const store = new MemoryListingStore({
    clock: options.clock ?? steppingClock(),
    generateId: sequentialIds(),
  });
  const directory = new MemoryDirectory();
  const index = new MemoryFacetIndex();
  const bus = new MemoryBus("test-bus", silentLogger);

  const catalog = new CatalogService({
    store,
    directory,
    index,
    logger: silentLogger,
    events: options.events ?? new BusAdapter(bus),
    clock: fixedClock("2024-02-01T00:00:00.000Z"),
    generateEventId: sequentialIds("event"),
  });

  return { store, directory, index, bus, catalog };
}
