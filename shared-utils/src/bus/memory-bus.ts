import { ConsoleLogger, Logger } from "../logger";
import { BaseEvent, BusPort, EventHandler, EventType } from "./types";

/**
 * In-memory bus for tests and local development.
 * Handlers run in the publishing call; a failing handler is logged and the
 * remaining handlers still run.
 */
export class MemoryBus implements BusPort {
  private handlers = new Map<EventType, EventHandler[]>();
  private publishedEvents: BaseEvent[] = [];
  private logger: Logger;

  constructor(serviceName: string = "memory-bus", logger?: Logger) {
    this.logger = logger ?? new ConsoleLogger(serviceName);
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
    this.logger.debug(`Subscribed to topic: ${topic}`);
  }

  async publish<T extends BaseEvent>(event: T): Promise<void> {
    this.logger.debug(`Publishing event: ${event.type} (${event.id})`);

    this.publishedEvents.push(event);

    const handlers = this.handlers.get(event.type) ?? [];

    await Promise.all(
      handlers.map(async (handler) => {
        try {
          await handler(event);
        } catch (error) {
          this.logger.error(
            `Handler error for ${event.type} (${event.id}):`,
            error
          );
        }
      })
    );
  }

  async close(): Promise<void> {
    this.logger.debug("Closing memory bus (clearing handlers)");
    this.handlers.clear();
    this.publishedEvents = [];
  }

  getPublishedEvents(): BaseEvent[] {
    return [...this.publishedEvents];
  }

  clearHistory(): void {
    this.publishedEvents = [];
  }

  getStatus() {
    return {
      subscribedTopics: Array.from(this.handlers.keys()),
      handlerCount: Array.from(this.handlers.values()).reduce(
        (sum, handlers) => sum + handlers.length,
        0
      ),
      publishedEventCount: this.publishedEvents.length,
    };
  }
}

export function createMemoryBus(
  serviceName?: string,
  logger?: Logger
): MemoryBus {
  return new MemoryBus(serviceName, logger);
}
