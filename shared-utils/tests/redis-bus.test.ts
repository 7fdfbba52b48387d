import { beforeEach, describe, expect, it, vi } from "vitest";
import { RedisBus } from "../src/bus/redis-bus";
import type { ListingCreatedEvent } from "../src";

const redis = vi.hoisted(() => {
  type Listener = (...args: string[]) => void;

  class FakeRedis {
    static instances: FakeRedis[] = [];
    private listeners = new Map<string, Listener[]>();
    subscribe = vi.fn(async (_channel: string) => 1);
    publish = vi.fn(async (_channel: string, _message: string) => 1);
    quit = vi.fn(async () => "OK");

    constructor(public url: string) {
      FakeRedis.instances.push(this);
    }

    on(event: string, listener: Listener): this {
      this.listeners.set(event, [...(this.listeners.get(event) ?? []), listener]);
      return this;
    }

    emit(event: string, ...args: string[]): void {
      for (const listener of this.listeners.get(event) ?? []) {
        listener(...args);
      }
    }
  }

  return { FakeRedis };
});

vi.mock("ioredis", () => ({ default: redis.FakeRedis }));

const created: ListingCreatedEvent = {
  type: "listing_created",
  id: "evt-1",
  timestamp: "2024-01-15T08:00:00.000Z",
  data: {
    listingId: "listing-1",
    ownerId: "user-1",
    location: "Austin",
    propertyType: "condo",
    priceBucket: "200k",
    createdAt: "2024-01-15T08:00:00.000Z",
  },
};

function spyLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("RedisBus", () => {
  let logger: ReturnType<typeof spyLogger>;
  let bus: RedisBus;

  function connection(position: "subscriber" | "publisher") {
    const fake = redis.FakeRedis.instances[position === "subscriber" ? 0 : 1];
    if (!fake) throw new Error(`no ${position} connection`);
    return fake;
  }

  beforeEach(() => {
    redis.FakeRedis.instances.length = 0;
    logger = spyLogger();
    bus = new RedisBus(
      { redisUrl: "redis://localhost:6379", serviceName: "catalog" },
      logger
    );
  });

  it("should open separate subscriber and publisher connections", () => {
    expect(redis.FakeRedis.instances.map((fake) => fake.url)).toEqual([
      "redis://localhost:6379",
      "redis://localhost:6379",
    ]);
  });

  it("should publish events as JSON on their topic", async () => {
    await bus.publish(created);

    expect(connection("publisher").publish).toHaveBeenCalledWith(
      "listing_created",
      JSON.stringify(created)
    );
  });

  it("should subscribe to a channel once per topic", async () => {
    await bus.subscribe("listing_created", async () => {});
    await bus.subscribe("listing_created", async () => {});

    expect(connection("subscriber").subscribe).toHaveBeenCalledTimes(1);
    expect(connection("subscriber").subscribe).toHaveBeenCalledWith(
      "listing_created"
    );
  });

  it("should dispatch incoming events to every handler", async () => {
    const first = vi.fn(async () => {});
    const second = vi.fn(async () => {});
    await bus.subscribe("listing_created", first);
    await bus.subscribe("listing_created", second);

    connection("subscriber").emit(
      "message",
      "listing_created",
      JSON.stringify(created)
    );

    await vi.waitFor(() => {
      expect(first).toHaveBeenCalledWith(created);
      expect(second).toHaveBeenCalledWith(created);
    });
  });

  it("should keep dispatching after a handler fails", async () => {
    const failing = vi.fn(async () => {
      throw new Error("handler exploded");
    });
    const healthy = vi.fn(async () => {});
    await bus.subscribe("listing_created", failing);
    await bus.subscribe("listing_created", healthy);

    connection("subscriber").emit(
      "message",
      "listing_created",
      JSON.stringify(created)
    );

    await vi.waitFor(() => {
      expect(healthy).toHaveBeenCalledWith(created);
      expect(logger.error).toHaveBeenCalledWith(
        "Handler error for listing_created (evt-1):",
        expect.any(Error)
      );
    });
  });

  it("should drop messages that are not JSON", async () => {
    const handler = vi.fn(async () => {});
    await bus.subscribe("listing_created", handler);

    connection("subscriber").emit("message", "listing_created", "{not json");

    await vi.waitFor(() => {
      expect(logger.error).toHaveBeenCalledWith(
        "Malformed JSON on listing_created:",
        expect.any(SyntaxError)
      );
    });
    expect(handler).not.toHaveBeenCalled();
  });

  it("should drop events without a valid envelope", async () => {
    const handler = vi.fn(async () => {});
    await bus.subscribe("listing_created", handler);

    connection("subscriber").emit(
      "message",
      "listing_created",
      JSON.stringify({ type: "listing_created", id: 7, timestamp: "now" })
    );
    connection("subscriber").emit(
      "message",
      "listing_created",
      JSON.stringify({ ...created, type: "listing_deleted" })
    );

    await vi.waitFor(() => {
      expect(logger.warn).toHaveBeenCalledTimes(2);
    });
    expect(logger.warn).toHaveBeenCalledWith(
      "Ignoring malformed event on listing_created"
    );
    expect(handler).not.toHaveBeenCalled();
  });

  it("should ignore unknown channels", async () => {
    connection("subscriber").emit("message", "orders", JSON.stringify(created));

    await vi.waitFor(() => {
      expect(logger.warn).toHaveBeenCalledWith(
        "Ignoring message on unknown channel orders"
      );
    });
  });

  it("should track the subscriber connection state", () => {
    expect(bus.isHealthy()).toBe(false);

    connection("subscriber").emit("connect");
    expect(bus.isHealthy()).toBe(true);

    connection("subscriber").emit("close");
    expect(bus.isHealthy()).toBe(false);
  });

  it("should quit both connections on close", async () => {
    await bus.close();

    expect(connection("subscriber").quit).toHaveBeenCalledTimes(1);
    expect(connection("publisher").quit).toHaveBeenCalledTimes(1);
  });
});
