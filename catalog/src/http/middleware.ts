/**
 * Express middleware and response helpers for the catalog API.
 *
 * Covers acting-user identification, request validation, request logging,
 * and mapping catalog errors to HTTP statuses.
 */

import { Logger } from "@listing-catalog/shared-utils";
import { NextFunction, Request, Response } from "express";
import { z } from "zod";
import { CatalogErrorKind, isCatalogError } from "../core/errors";

export const USER_HEADER = "X-User-Id";

export interface APIResponse<T> {
  success: boolean;
  data?: T;
  error?: string;
  details?: unknown;
  timestamp: string;
}

const STATUS_BY_KIND: Record<CatalogErrorKind, number> = {
  NOT_FOUND: 404,
  UNAUTHORIZED: 403,
  INVALID_TRANSITION: 409,
  CONFLICT: 409,
};

export class CatalogMiddleware {
  constructor(private logger: Logger, private exposeErrors: boolean) {}

  // ===== Acting user =====

  /**
   * Acting user from the X-User-Id header. Sends 401 and returns undefined
   * when the header is missing.
   */
  requireUser(req: Request, res: Response): string | undefined {
    const userId = req.get(USER_HEADER)?.trim();
    if (!userId) {
      this.sendError(res, 401, `${USER_HEADER} header is required`);
      return undefined;
    }
    return userId;
  }

  // ===== Validation =====

  /**
   * Parse a request part with a schema. Sends 400 and returns undefined on failure.
   */
  parse<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    value: unknown,
    res: Response
  ): T | undefined {
    const result = schema.safeParse(value);
    if (result.success) {
      return result.data;
    }

    this.sendError(res, 400, "Validation error", {
      errors: result.error.errors.map((e) => ({
        path: e.path.join("."),
        message: e.message,
      })),
    });
    return undefined;
  }

  // ===== Logging =====

  requestLogger() {
    return (req: Request, res: Response, next: NextFunction) => {
      const startTime = Date.now();

      res.on("finish", () => {
        const logData = {
          method: req.method,
          url: req.originalUrl,
          statusCode: res.statusCode,
          duration: Date.now() - startTime,
          userId: req.get(USER_HEADER),
        };

        if (res.statusCode >= 500) {
          this.logger.error("HTTP request failed", logData);
        } else if (res.statusCode >= 400) {
          this.logger.warn("HTTP request rejected", logData);
        } else {
          this.logger.info("HTTP request", logData);
        }
      });

      next();
    };
  }

  // ===== Errors =====

  handleError(res: Response, error: unknown, defaultMessage: string): void {
    if (isCatalogError(error)) {
      this.sendError(res, STATUS_BY_KIND[error.kind], error.message, {
        kind: error.kind,
      });
      return;
    }

    this.logger.error(defaultMessage, error);
    const message =
      this.exposeErrors && error instanceof Error
        ? error.message
        : "Internal server error";
    this.sendError(res, 500, message);
  }

  errorHandler() {
    return (error: Error, req: Request, res: Response, _next: NextFunction) => {
      // body-parser marks its own failures (malformed JSON) with a 4xx status
      const status = "status" in error ? error.status : undefined;
      if (typeof status === "number" && status >= 400 && status < 500) {
        this.sendError(res, status, "Malformed request body");
        return;
      }
      this.logger.error(`Unhandled error on ${req.method} ${req.url}:`, error);
      this.sendError(res, 500, "Internal server error");
    };
  }

  notFoundHandler() {
    return (req: Request, res: Response) => {
      this.sendError(res, 404, `Route ${req.method} ${req.path} not found`);
    };
  }

  // ===== Response helpers =====

  sendSuccess<T>(res: Response, data: T, statusCode: number = 200): void {
    const response: APIResponse<T> = {
      success: true,
      data,
      timestamp: new Date().toISOString(),
    };
    res.status(statusCode).json(response);
  }

  sendError(
    res: Response,
    statusCode: number,
    message: string,
    details?: unknown
  ): void {
    const response: APIResponse<never> = {
      success: false,
      error: message,
      timestamp: new Date().toISOString(),
    };
    if (details !== undefined) {
      response.details = details;
    }
    res.status(statusCode).json(response);
  }
}
