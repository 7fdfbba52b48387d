import { BusPort, CatalogEvent, VERSION } from "@listing-catalog/shared-utils";
import { EventPublisherPort } from "../core/ports";

/**
 * Bridges the shared bus to the catalog's event publisher port
 */
export class BusAdapter implements EventPublisherPort {
  constructor(private sharedBus: BusPort) {}

  async publish(event: CatalogEvent): Promise<void> {
    return this.sharedBus.publish({ ...event, version: VERSION });
  }

  async close(): Promise<void> {
    if (this.sharedBus.close) {
      return this.sharedBus.close();
    }
  }
}
