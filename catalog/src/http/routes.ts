/**
 * Catalog HTTP routes. Handlers validate input, resolve the acting user and
 * delegate to CatalogService; pagination of search results happens here.
 */

import { Logger } from "@listing-catalog/shared-utils";
import { Request, Response, Router } from "express";
import { z } from "zod";
import { CatalogService } from "../core/catalog";
import { Listing, SearchCriteria } from "../core/dto";
import { priceRangeLabel } from "../core/price";
import { CatalogMiddleware } from "./middleware";

export interface PaginationLimits {
  defaultPageSize: number;
  maxPageSize: number;
}

const nonEmpty = z.string().trim().min(1);

export function createSchemas(limits: PaginationLimits) {
  return {
    createProperty: z.object({
      location: nonEmpty,
      price: z.number().finite().min(0),
      propertyType: nonEmpty,
      description: z.string().default(""),
      amenities: z.array(z.string()).default([]),
    }),

    search: z
      .object({
        location: nonEmpty.optional(),
        propertyType: nonEmpty.optional(),
        minPrice: z.coerce.number().finite().min(0).optional(),
        maxPrice: z.coerce.number().finite().min(0).optional(),
        page: z.coerce.number().int().min(1).default(1),
        limit: z.coerce
          .number()
          .int()
          .min(1)
          .max(limits.maxPageSize)
          .default(limits.defaultPageSize),
      })
      .refine(
        (data) =>
          data.minPrice === undefined ||
          data.maxPrice === undefined ||
          data.minPrice <= data.maxPrice,
        { message: "minPrice cannot be greater than maxPrice" }
      ),

    statusChange: z.object({
      status: z.enum(["available", "sold"]),
    }),

    listingId: z.object({ id: nonEmpty }),

    userId: z.object({ userId: nonEmpty }),
  };
}

type Schemas = ReturnType<typeof createSchemas>;
type SearchQuery = z.infer<Schemas["search"]>;

/**
 * A price criterion needs both bounds; a single bound is ignored.
 */
export function toCriteria(query: SearchQuery): SearchCriteria {
  const criteria: SearchCriteria = {};
  if (query.location !== undefined) criteria.location = query.location;
  if (query.propertyType !== undefined) {
    criteria.propertyType = query.propertyType;
  }
  if (query.minPrice !== undefined && query.maxPrice !== undefined) {
    criteria.priceRange = priceRangeLabel(query.minPrice, query.maxPrice);
  }
  return criteria;
}

export class CatalogRoutes {
  private router: Router;
  private schemas: Schemas;

  constructor(
    private catalog: CatalogService,
    private middleware: CatalogMiddleware,
    private logger: Logger,
    limits: PaginationLimits
  ) {
    this.router = Router();
    this.schemas = createSchemas(limits);
    this.setupRoutes();
  }

  getRouter(): Router {
    return this.router;
  }

  private setupRoutes(): void {
    // ===== Property Routes =====
    this.router.post("/properties", this.handleCreate.bind(this));
    this.router.get("/properties/search", this.handleSearch.bind(this));
    this.router.get("/properties/:id", this.handleGet.bind(this));
    this.router.patch("/properties/:id/status", this.handleSetStatus.bind(this));
    this.router.post(
      "/properties/:id/shortlist",
      this.handleShortlist.bind(this)
    );

    // ===== User Routes =====
    this.router.get("/users/:userId/properties", this.handleOwned.bind(this));
    this.router.get(
      "/users/:userId/shortlist",
      this.handleShortlisted.bind(this)
    );
    this.router.get(
      "/users/:userId/portfolio",
      this.handlePortfolio.bind(this)
    );
  }

  // ===== Route Handlers =====

  private async handleCreate(req: Request, res: Response): Promise<void> {
    const userId = this.middleware.requireUser(req, res);
    if (userId === undefined) return;
    const body = this.middleware.parse(
      this.schemas.createProperty,
      req.body,
      res
    );
    if (!body) return;

    try {
      const listing = await this.catalog.create(userId, body);
      this.middleware.sendSuccess(res, { propertyId: listing.id }, 201);
    } catch (error) {
      this.middleware.handleError(res, error, "Create property failed");
    }
  }

  private handleSearch(req: Request, res: Response): void {
    const query = this.middleware.parse(this.schemas.search, req.query, res);
    if (!query) return;

    try {
      const criteria = toCriteria(query);
      this.logger.debug("Search", { criteria, page: query.page });
      const page = this.catalog.searchPage(criteria, query.page, query.limit);
      this.middleware.sendSuccess(res, page);
    } catch (error) {
      this.middleware.handleError(res, error, "Property search failed");
    }
  }

  private handleGet(req: Request, res: Response): void {
    const params = this.middleware.parse(
      this.schemas.listingId,
      req.params,
      res
    );
    if (!params) return;

    try {
      this.middleware.sendSuccess(res, this.catalog.get(params.id));
    } catch (error) {
      this.middleware.handleError(res, error, "Property lookup failed");
    }
  }

  private async handleSetStatus(req: Request, res: Response): Promise<void> {
    const userId = this.middleware.requireUser(req, res);
    if (userId === undefined) return;
    const params = this.middleware.parse(
      this.schemas.listingId,
      req.params,
      res
    );
    if (!params) return;
    const body = this.middleware.parse(
      this.schemas.statusChange,
      req.body,
      res
    );
    if (!body) return;

    try {
      const listing = await this.catalog.setStatus(
        params.id,
        body.status,
        userId
      );
      this.middleware.sendSuccess(res, listing);
    } catch (error) {
      this.middleware.handleError(res, error, "Status change failed");
    }
  }

  private async handleShortlist(req: Request, res: Response): Promise<void> {
    const userId = this.middleware.requireUser(req, res);
    if (userId === undefined) return;
    const params = this.middleware.parse(
      this.schemas.listingId,
      req.params,
      res
    );
    if (!params) return;

    try {
      await this.catalog.shortlist(userId, params.id);
      this.middleware.sendSuccess(res, { propertyId: params.id }, 201);
    } catch (error) {
      this.middleware.handleError(res, error, "Shortlist failed");
    }
  }

  private handleOwned(req: Request, res: Response): void {
    this.sendUserListings(req, res, (userId) =>
      this.catalog.listOwned(userId)
    );
  }

  private handleShortlisted(req: Request, res: Response): void {
    this.sendUserListings(req, res, (userId) =>
      this.catalog.listShortlisted(userId)
    );
  }

  private handlePortfolio(req: Request, res: Response): void {
    this.sendUserListings(req, res, (userId) =>
      this.catalog.listPortfolio(userId)
    );
  }

  private sendUserListings(
    req: Request,
    res: Response,
    read: (userId: string) => Listing[]
  ): void {
    const params = this.middleware.parse(this.schemas.userId, req.params, res);
    if (!params) return;

    try {
      this.middleware.sendSuccess(res, read(params.userId));
    } catch (error) {
      this.middleware.handleError(res, error, "User listings lookup failed");
    }
  }
}
