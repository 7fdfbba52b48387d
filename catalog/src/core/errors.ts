export type CatalogErrorKind =
  | "NOT_FOUND"
  | "UNAUTHORIZED"
  | "INVALID_TRANSITION"
  | "CONFLICT";

/**
 * Base class for every failure the catalog reports to its callers.
 * None of them leave partial state behind.
 */
export class CatalogError extends Error {
  constructor(readonly kind: CatalogErrorKind, message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class NotFoundError extends CatalogError {
  constructor(listingId: string) {
    super("NOT_FOUND", `Listing ${listingId} not found`);
  }
}

export class UnauthorizedError extends CatalogError {
  constructor(listingId: string, userId: string) {
    super("UNAUTHORIZED", `User ${userId} does not own listing ${listingId}`);
  }
}

export class InvalidTransitionError extends CatalogError {
  constructor(message: string) {
    super("INVALID_TRANSITION", message);
  }
}

export class ConflictError extends CatalogError {
  constructor(message: string) {
    super("CONFLICT", message);
  }
}

export function isCatalogError(error: unknown): error is CatalogError {
  return error instanceof CatalogError;
}
