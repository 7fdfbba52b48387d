import { ListingStatus } from "./dto";
import { InvalidTransitionError } from "./errors";
import { FacetIndexPort } from "./ports";

type Transition = `${ListingStatus}->${ListingStatus}`;

const LEGAL_TRANSITIONS: ReadonlySet<Transition> = new Set<Transition>([
  "available->sold",
  "sold->available",
]);

export function isLegalTransition(
  from: ListingStatus,
  to: ListingStatus
): boolean {
  return LEGAL_TRANSITIONS.has(`${from}->${to}`);
}

export function assertTransition(
  listingId: string,
  from: ListingStatus,
  to: ListingStatus
): void {
  if (!isLegalTransition(from, to)) {
    throw new InvalidTransitionError(
      `Listing ${listingId} cannot move from ${from} to ${to}`
    );
  }
}

/**
 * Validate a status change and apply its effect on the availability facet.
 *
 * This is the only place the availability facet changes after creation.
 * Ownership is checked by the caller. The index throws InvalidTransitionError
 * when its state disagrees with `from`, in which case nothing has changed.
 */
export function applyTransition(
  index: FacetIndexPort,
  listingId: string,
  from: ListingStatus,
  to: ListingStatus
): void {
  assertTransition(listingId, from, to);

  if (to === "sold") {
    index.markSold(listingId);
  } else {
    index.markAvailable(listingId);
  }
}
