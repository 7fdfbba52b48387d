/**
 * Logger shared by every service
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * Console logger that prefixes every line with the service name
 */
export class ConsoleLogger implements Logger {
  private threshold: number;

  constructor(private serviceName: string, level: LogLevel = "info") {
    this.threshold = LEVEL_ORDER[level];
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.enabled("debug")) {
      console.debug(`[${this.serviceName}] ${message}`, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.enabled("info")) {
      console.log(`[${this.serviceName}] ${message}`, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.enabled("warn")) {
      console.warn(`[${this.serviceName}] ${message}`, ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.enabled("error")) {
      console.error(`[${this.serviceName}] ${message}`, ...args);
    }
  }

  /**
   * Child logger for a sub-component, e.g. "catalog:http"
   */
  child(component: string): ConsoleLogger {
    const child = new ConsoleLogger(`${this.serviceName}:${component}`);
    child.threshold = this.threshold;
    return child;
  }

  private enabled(level: Exclude<LogLevel, "silent">): boolean {
    return LEVEL_ORDER[level] >= this.threshold;
  }
}

export function createLogger(
  serviceName: string,
  level: LogLevel = "info"
): ConsoleLogger {
  return new ConsoleLogger(serviceName, level);
}
