import { Logger } from "@listing-catalog/shared-utils";
import cors from "cors";
import express, { Express } from "express";
import helmet from "helmet";
import { CatalogService } from "../core/catalog";
import { CatalogMiddleware, USER_HEADER } from "./middleware";
import { CatalogRoutes, PaginationLimits } from "./routes";

export interface AppOptions extends PaginationLimits {
  corsOrigins: string[];
  exposeErrors: boolean;
}

/**
 * Build the express app. Listening is left to the caller.
 */
export function createApp(
  catalog: CatalogService,
  logger: Logger,
  options: AppOptions
): Express {
  const middleware = new CatalogMiddleware(logger, options.exposeErrors);
  const routes = new CatalogRoutes(catalog, middleware, logger, options);

  const app = express();

  app.use(helmet());
  app.use(
    cors({
      origin: options.corsOrigins,
      methods: ["GET", "POST", "PATCH", "OPTIONS"],
      allowedHeaders: ["Content-Type", USER_HEADER],
    })
  );
  app.use(express.json({ limit: "100kb" }));
  app.use(middleware.requestLogger());

  app.get("/health", (_req, res) => {
    res.json({
      status: "healthy",
      listings: catalog.size(),
      timestamp: new Date().toISOString(),
    });
  });

  app.use("/api/v1", routes.getRouter());

  app.use(middleware.notFoundHandler());
  app.use(middleware.errorHandler());

  return app;
}
