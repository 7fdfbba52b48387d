import { Page } from "./dto";

/**
 * Slice [(page-1)*limit, page*limit) out of an already sorted list.
 * Pages past the end are empty.
 */
export function paginate<T>(items: T[], page: number, limit: number): Page<T> {
  if (!Number.isInteger(page) || page < 1) {
    throw new RangeError(`page must be a positive integer, got ${page}`);
  }
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`limit must be a positive integer, got ${limit}`);
  }

  const start = (page - 1) * limit;
  return {
    items: items.slice(start, start + limit),
    page,
    limit,
    total: items.length,
  };
}
