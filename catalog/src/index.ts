export { BusAdapter } from "./adapters/bus.adapter";
export { MemoryDirectory } from "./adapters/directory.memory";
export { MemoryFacetIndex } from "./adapters/index.memory";
export { MemoryListingStore, systemClock } from "./adapters/store.memory";
export { CatalogService } from "./core/catalog";
export type { CatalogDependencies } from "./core/catalog";
export * from "./core/dto";
export * from "./core/errors";
export { paginate } from "./core/paginate";
export type * from "./core/ports";
export { priceBucketLabel, priceRangeLabel } from "./core/price";
export { SearchEngine } from "./core/search";
export { createApp } from "./http/app";
