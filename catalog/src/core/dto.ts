export type ISO = string;
export type Money = number;

export type ListingStatus = "available" | "sold";

/**
 * Attributes supplied when a listing is created. Only location, price and
 * propertyType are indexed.
 */
export interface ListingAttributes {
  readonly location: string;
  readonly price: Money;
  readonly propertyType: string;
  readonly description: string;
  readonly amenities: readonly string[];
}

/**
 * Stored listing. Records handed out by the store are frozen; status only
 * changes through CatalogService.setStatus.
 */
export interface Listing {
  readonly id: string;
  readonly ownerId: string;
  readonly attributes: ListingAttributes;
  readonly status: ListingStatus;
  readonly createdAt: ISO;
}

/**
 * Indexed dimensions. "availability" holds a single key, AVAILABLE_MARKER.
 */
export type Facet = "location" | "propertyType" | "priceBucket" | "availability";

export const AVAILABLE_MARKER = "available";

/**
 * Search criteria; listings matching ANY supplied criterion are candidates.
 *
 * priceRange is a bucket label ("200k") or an inclusive bucket range
 * ("200k-500k"), see priceRangeLabel.
 */
export interface SearchCriteria {
  location?: string;
  propertyType?: string;
  priceRange?: string;
}

export interface Page<T> {
  items: T[];
  page: number;
  limit: number;
  total: number;
}
