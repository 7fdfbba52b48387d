import { describe, expect, it } from "vitest";
import {
  parseEnvArray,
  parseEnvEnum,
  parseEnvNumber,
  validateRequiredEnv,
} from "../src";

describe("Config helpers", () => {
  it("should split comma lists and drop blanks", () => {
    expect(parseEnvArray("ORIGINS", [], { ORIGINS: " a, b ,,c " })).toEqual([
      "a",
      "b",
      "c",
    ]);
    expect(parseEnvArray("ORIGINS", ["fallback"], {})).toEqual(["fallback"]);
  });

  it("should parse numbers with a default", () => {
    expect(parseEnvNumber("PORT", 8080, { PORT: "9000" })).toBe(9000);
    expect(parseEnvNumber("PORT", 8080, { PORT: " " })).toBe(8080);
    expect(parseEnvNumber("PORT", 8080, {})).toBe(8080);
    expect(() => parseEnvNumber("PORT", 8080, { PORT: "x" })).toThrow(
      "Invalid number in PORT: x"
    );
  });

  it("should match enum values case-insensitively", () => {
    const allowed = ["MEMORY", "REDIS"] as const;

    expect(parseEnvEnum("BUS", allowed, "MEMORY", { BUS: "redis" })).toBe(
      "REDIS"
    );
    expect(parseEnvEnum("BUS", allowed, "MEMORY", {})).toBe("MEMORY");
    expect(() => parseEnvEnum("BUS", allowed, "MEMORY", { BUS: "sqs" })).toThrow(
      "Invalid value for BUS: sqs (expected one of MEMORY, REDIS)"
    );
  });

  it("should list every missing required variable", () => {
    expect(() =>
      validateRequiredEnv(["A", "B", "C"], { B: "set" })
    ).toThrow("Missing required environment variables: A, C");
  });
});
