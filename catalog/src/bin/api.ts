#!/usr/bin/env node

/**
 * Catalog HTTP server
 */

import { createBus, createLogger } from "@listing-catalog/shared-utils";
import { BusAdapter } from "../adapters/bus.adapter";
import { MemoryDirectory } from "../adapters/directory.memory";
import { MemoryFacetIndex } from "../adapters/index.memory";
import { MemoryListingStore } from "../adapters/store.memory";
import { cfg, validateConfig } from "../config/env";
import { CatalogService } from "../core/catalog";
import { createApp } from "../http/app";

async function startServer(): Promise<void> {
  const logger = createLogger("catalog", cfg.logLevel);

  validateConfig(cfg);
  logger.info(`Starting in ${cfg.mode} mode with ${cfg.busAdapter} bus`);

  const bus = new BusAdapter(
    createBus({
      type: cfg.busAdapter === "REDIS" ? "redis" : "memory",
      serviceName: "catalog",
      redisUrl: cfg.redisUrl,
      logger: logger.child("bus"),
    })
  );

  const catalog = new CatalogService({
    store: new MemoryListingStore(),
    directory: new MemoryDirectory(),
    index: new MemoryFacetIndex(),
    events: bus,
    logger,
  });

  const app = createApp(catalog, logger.child("http"), {
    corsOrigins: cfg.corsOrigins,
    exposeErrors: cfg.isDevelopment,
    defaultPageSize: cfg.defaultPageSize,
    maxPageSize: cfg.maxPageSize,
  });

  const server = app.listen(cfg.port, () => {
    logger.info(`Catalog API listening on http://localhost:${cfg.port}`);
  });

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down...`);
    server.close((error) => {
      if (error) {
        logger.error("Error closing HTTP server:", error);
      }
      void bus
        .close()
        .catch((closeError: unknown) => {
          logger.error("Error closing bus:", closeError);
        })
        .finally(() => process.exit(error ? 1 : 0));
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

if (require.main === module) {
  startServer().catch((error: unknown) => {
    console.error("[catalog] Fatal error during startup:", error);
    process.exit(1);
  });
}
