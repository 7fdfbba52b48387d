import { DirectoryPort } from "../core/ports";

/**
 * Ownership and shortlist relations, kept apart. listFor() merges them into
 * the single per-user portfolio sequence older clients read back.
 */
export class MemoryDirectory implements DirectoryPort {
  private owns = new Map<string, Set<string>>();
  private shortlists = new Map<string, Set<string>>();
  // Insertion order across both relations, for listFor()
  private portfolios = new Map<string, string[]>();

  recordOwnership(userId: string, listingId: string): void {
    const owned = this.relation(this.owns, userId);
    if (owned.has(listingId)) return;
    owned.add(listingId);
    this.appendPortfolio(userId, listingId);
  }

  recordShortlist(userId: string, listingId: string): boolean {
    if (this.inPortfolio(userId, listingId)) {
      return false;
    }
    this.relation(this.shortlists, userId).add(listingId);
    this.appendPortfolio(userId, listingId);
    return true;
  }

  owned(userId: string): string[] {
    return Array.from(this.owns.get(userId) ?? []);
  }

  shortlisted(userId: string): string[] {
    return Array.from(this.shortlists.get(userId) ?? []);
  }

  listFor(userId: string): string[] {
    return [...(this.portfolios.get(userId) ?? [])];
  }

  private inPortfolio(userId: string, listingId: string): boolean {
    return (
      (this.owns.get(userId)?.has(listingId) ?? false) ||
      (this.shortlists.get(userId)?.has(listingId) ?? false)
    );
  }

  private relation(
    relations: Map<string, Set<string>>,
    userId: string
  ): Set<string> {
    let ids = relations.get(userId);
    if (!ids) {
      ids = new Set();
      relations.set(userId, ids);
    }
    return ids;
  }

  private appendPortfolio(userId: string, listingId: string): void {
    const portfolio = this.portfolios.get(userId);
    if (portfolio) {
      portfolio.push(listingId);
    } else {
      this.portfolios.set(userId, [listingId]);
    }
  }
}
