/**
 * Shared configuration utilities for services
 */

type Env = Record<string, string | undefined>;

/**
 * Parse comma-separated environment variable into array
 */
export function parseEnvArray(
  envVar: string,
  defaultValue: string[] = [],
  env: Env = process.env
): string[] {
  const value = env[envVar];
  if (!value) return defaultValue;

  return value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}

/**
 * Parse a numeric environment variable, rejecting anything that is not a number
 */
export function parseEnvNumber(
  envVar: string,
  defaultValue: number,
  env: Env = process.env
): number {
  const value = env[envVar];
  if (value === undefined || value.trim() === "") return defaultValue;

  const num = Number(value);
  if (Number.isNaN(num)) {
    throw new Error(`Invalid number in ${envVar}: ${value}`);
  }
  return num;
}

/**
 * Parse an environment variable that must be one of a fixed set of values.
 * Matching is case-insensitive against the allowed values.
 */
export function parseEnvEnum<T extends string>(
  envVar: string,
  allowed: readonly T[],
  defaultValue: T,
  env: Env = process.env
): T {
  const value = env[envVar];
  if (!value) return defaultValue;

  const match = allowed.find(
    (option) => option.toLowerCase() === value.trim().toLowerCase()
  );
  if (match === undefined) {
    throw new Error(
      `Invalid value for ${envVar}: ${value} (expected one of ${allowed.join(", ")})`
    );
  }
  return match;
}

/**
 * Validate required environment variables
 */
export function validateRequiredEnv(
  requiredVars: string[],
  env: Env = process.env
): void {
  const missing = requiredVars.filter((varName) => !env[varName]);

  if (missing.length > 0) {
    throw new Error(
      `Missing required environment variables: ${missing.join(", ")}`
    );
  }
}
