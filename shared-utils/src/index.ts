export * from "./bus";
export * from "./config";
export * from "./logger";

export const VERSION = "1.0.0";
