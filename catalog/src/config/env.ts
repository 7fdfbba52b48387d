import * as dotenv from "dotenv";
import {
  isLogLevel,
  LogLevel,
  parseEnvArray,
  parseEnvEnum,
  parseEnvNumber,
} from "@listing-catalog/shared-utils";

dotenv.config();

type Env = Record<string, string | undefined>;

export interface CatalogConfig {
  mode: string;
  isDevelopment: boolean;
  port: number;
  logLevel: LogLevel;
  busAdapter: "MEMORY" | "REDIS";
  redisUrl: string;
  corsOrigins: string[];
  defaultPageSize: number;
  maxPageSize: number;
}

export function loadConfig(env: Env = process.env): CatalogConfig {
  const mode = env.MODE ?? env.NODE_ENV ?? "development";
  const logLevel = env.LOG_LEVEL ?? "info";

  return {
    mode,
    isDevelopment: mode === "development" || mode === "dev",
    port: parseEnvNumber("PORT", 8080, env),
    logLevel: isLogLevel(logLevel) ? logLevel : "info",
    busAdapter: parseEnvEnum("BUS_ADAPTER", ["MEMORY", "REDIS"], "MEMORY", env),
    redisUrl: env.REDIS_URL ?? "redis://localhost:6379",
    corsOrigins: parseEnvArray("CORS_ORIGINS", ["http://localhost:3000"], env),
    defaultPageSize: parseEnvNumber("DEFAULT_PAGE_SIZE", 10, env),
    maxPageSize: parseEnvNumber("MAX_PAGE_SIZE", 100, env),
  };
}

export function validateConfig(config: CatalogConfig): void {
  if (!Number.isInteger(config.port) || config.port < 0 || config.port > 65535) {
    throw new Error(`PORT must be an integer between 0 and 65535`);
  }

  if (!Number.isInteger(config.maxPageSize) || config.maxPageSize < 1) {
    throw new Error("MAX_PAGE_SIZE must be a positive integer");
  }

  if (
    !Number.isInteger(config.defaultPageSize) ||
    config.defaultPageSize < 1 ||
    config.defaultPageSize > config.maxPageSize
  ) {
    throw new Error(
      "DEFAULT_PAGE_SIZE must be a positive integer no larger than MAX_PAGE_SIZE"
    );
  }

  if (config.busAdapter === "REDIS" && !config.redisUrl) {
    throw new Error("REDIS_URL is required when using the REDIS bus adapter");
  }
}

export const cfg: CatalogConfig = loadConfig();
