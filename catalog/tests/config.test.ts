import { describe, expect, it } from "vitest";
import { loadConfig, validateConfig } from "../src/config/env";

describe("Catalog config", () => {
  it("should fall back to defaults", () => {
    expect(loadConfig({})).toEqual({
      mode: "development",
      isDevelopment: true,
      port: 8080,
      logLevel: "info",
      busAdapter: "MEMORY",
      redisUrl: "redis://localhost:6379",
      corsOrigins: ["http://localhost:3000"],
      defaultPageSize: 10,
      maxPageSize: 100,
    });
  });

  it("should read overrides from the environment", () => {
    const config = loadConfig({
      MODE: "production",
      PORT: "9090",
      LOG_LEVEL: "warn",
      BUS_ADAPTER: "redis",
      CORS_ORIGINS: "https://a.test, https://b.test",
      DEFAULT_PAGE_SIZE: "20",
    });

    expect(config.isDevelopment).toBe(false);
    expect(config.port).toBe(9090);
    expect(config.logLevel).toBe("warn");
    expect(config.busAdapter).toBe("REDIS");
    expect(config.corsOrigins).toEqual(["https://a.test", "https://b.test"]);
    expect(config.defaultPageSize).toBe(20);
  });

  it("should ignore unknown log levels", () => {
    expect(loadConfig({ LOG_LEVEL: "verbose" }).logLevel).toBe("info");
  });

  it("should reject malformed values", () => {
    expect(() => loadConfig({ PORT: "eighty" })).toThrow(
      "Invalid number in PORT: eighty"
    );
    expect(() => loadConfig({ BUS_ADAPTER: "kafka" })).toThrow(
      "Invalid value for BUS_ADAPTER: kafka (expected one of MEMORY, REDIS)"
    );
  });

  it("should reject a default page size above the maximum", () => {
    const config = loadConfig({ DEFAULT_PAGE_SIZE: "50", MAX_PAGE_SIZE: "25" });

    expect(() => validateConfig(config)).toThrow(
      "DEFAULT_PAGE_SIZE must be a positive integer no larger than MAX_PAGE_SIZE"
    );
  });

  it("should accept the defaults", () => {
    expect(() => validateConfig(loadConfig({}))).not.toThrow();
  });
});
