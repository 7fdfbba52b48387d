import Redis from "ioredis";
import { ConsoleLogger, Logger } from "../logger";
import {
  BaseEvent,
  BusConfig,
  BusPort,
  EventHandler,
  EventType,
} from "./types";

const EVENT_TYPES: readonly EventType[] = [
  "listing_created",
  "listing_status_changed",
  "listing_shortlisted",
];

function isEventType(value: unknown): value is EventType {
  return EVENT_TYPES.some((type) => type === value);
}

function isBaseEvent(value: unknown): value is BaseEvent {
  if (typeof value !== "object" || value === null) return false;
  if (!("type" in value) || !("id" in value) || !("timestamp" in value)) {
    return false;
  }
  return (
    isEventType(value.type) &&
    typeof value.id === "string" &&
    typeof value.timestamp === "string"
  );
}

/**
 * Redis pub/sub bus. One connection publishes, a second one subscribes, since
 * a subscribed ioredis connection cannot issue other commands.
 */
export class RedisBus implements BusPort {
  private subscriber: Redis;
  private publisher: Redis;
  private handlers = new Map<EventType, EventHandler[]>();
  private isConnected = false;
  private logger: Logger;

  constructor(config: BusConfig, logger?: Logger) {
    this.logger = logger ?? new ConsoleLogger(config.serviceName);
    const retryAttempts = config.retryAttempts ?? 3;

    this.subscriber = new Redis(config.redisUrl, {
      enableReadyCheck: false,
      maxRetriesPerRequest: retryAttempts,
      lazyConnect: true,
    });

    this.publisher = new Redis(config.redisUrl, {
      enableReadyCheck: false,
      maxRetriesPerRequest: retryAttempts,
      lazyConnect: true,
    });

    this.setupEventHandlers();
  }

  private setupEventHandlers(): void {
    this.subscriber.on("connect", () => {
      this.logger.info("Redis subscriber connected");
      this.isConnected = true;
    });

    this.publisher.on("connect", () => {
      this.logger.info("Redis publisher connected");
    });

    this.subscriber.on("error", (error: Error) => {
      this.logger.error("Redis subscriber error:", error);
      this.isConnected = false;
    });

    this.publisher.on("error", (error: Error) => {
      this.logger.error("Redis publisher error:", error);
    });

    this.subscriber.on("close", () => {
      this.logger.info("Redis subscriber connection closed");
      this.isConnected = false;
    });

    this.subscriber.on("message", (channel: string, message: string) => {
      this.handleMessage(channel, message).catch((error: unknown) => {
        this.logger.error(`Failed to dispatch message on ${channel}:`, error);
      });
    });
  }

  async subscribe<T extends BaseEvent>(
    topic: T["type"],
    handler: EventHandler<T>
  ): Promise<void> {
    const existing = this.handlers.get(topic);
    if (existing) {
      existing.push(handler as EventHandler);
      return;
    }

    this.handlers.set(topic, [handler as EventHandler]);
    await this.subscriber.subscribe(topic);
    this.logger.info(`Subscribed to topic: ${topic}`);
  }

  async publish<T extends BaseEvent>(event: T): Promise<void> {
    try {
      await this.publisher.publish(event.type, JSON.stringify(event));
      this.logger.debug(`Published event: ${event.type} (${event.id})`);
    } catch (error) {
      this.logger.error("Failed to publish event:", error);
      throw error;
    }
  }

  private async handleMessage(channel: string, message: string): Promise<void> {
    if (!isEventType(channel)) {
      this.logger.warn(`Ignoring message on unknown channel ${channel}`);
      return;
    }

    let event: unknown;
    try {
      event = JSON.parse(message);
    } catch (error) {
      this.logger.error(`Malformed JSON on ${channel}:`, error);
      return;
    }

    if (!isBaseEvent(event)) {
      this.logger.warn(`Ignoring malformed event on ${channel}`);
      return;
    }

    const received = event;
    const handlers = this.handlers.get(channel) ?? [];
    this.logger.debug(`Received event: ${channel} (${received.id})`);

    await Promise.all(
      handlers.map(async (handler) => {
        try {
          await handler(received);
        } catch (error) {
          this.logger.error(
            `Handler error for ${channel} (${received.id}):`,
            error
          );
        }
      })
    );
  }

  async close(): Promise<void> {
    this.logger.info("Closing Redis bus connections...");
    await Promise.all([this.subscriber.quit(), this.publisher.quit()]);
    this.logger.info("Redis bus connections closed");
  }

  isHealthy(): boolean {
    return this.isConnected;
  }
}

export function createRedisBus(config: BusConfig, logger?: Logger): RedisBus {
  return new RedisBus(config, logger);
}
