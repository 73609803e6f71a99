import { ConcurrentUpdateError, DuplicateKeyError } from "@autoscout/shared-utils";
import {
  DedupKey,
  dedupKeyOf,
  ISO,
  ListingRecord,
  PriceHistoryEntry,
} from "../core/dto";
import { ListingsRepo } from "../core/ports";

export class MemoryListingsRepo implements ListingsRepo {
  private listings = new Map<string, ListingRecord>();
  private idsByKey = new Map<string, string>();
  private priceHistory: PriceHistoryEntry[] = [];

  constructor(initialListings: ListingRecord[] = []) {
    for (const l of initialListings) {
      this.listings.set(l.id, { ...l });
      this.idsByKey.set(dedupKeyOf(l), l.id);
    }
  }

  async findByKey(key: DedupKey): Promise<ListingRecord | null> {
    const id = this.idsByKey.get(dedupKeyOf(key));
    return id ? this.copy(id) : null;
  }

  async getById(id: string): Promise<ListingRecord | null> {
    return this.copy(id);
  }

  async insert(listing: ListingRecord): Promise<ListingRecord> {
    const key = dedupKeyOf(listing);
    if (this.idsByKey.has(key)) throw new DuplicateKeyError("listing", key);

    this.listings.set(listing.id, { ...listing });
    this.idsByKey.set(key, listing.id);
    return { ...listing };
  }

  async update(
    listing: ListingRecord,
    expectedVersion: number,
    priceChange?: PriceHistoryEntry
  ): Promise<ListingRecord> {
    const stored = this.listings.get(listing.id);
    if (!stored || stored.version !== expectedVersion) {
      throw new ConcurrentUpdateError("listing", listing.id, expectedVersion);
    }

    this.listings.set(listing.id, { ...listing });
    if (priceChange) this.priceHistory.push({ ...priceChange });
    return { ...listing };
  }

  async listPriceHistory(listingId: string): Promise<PriceHistoryEntry[]> {
    return this.priceHistory
      .filter((e) => e.listingId === listingId)
      .sort((a, b) => a.observedAt.localeCompare(b.observedAt))
      .map((e) => ({ ...e }));
  }

  async listStaleActive(
    sources: string[],
    seenBefore: ISO
  ): Promise<ListingRecord[]> {
    return Array.from(this.listings.values())
      .filter(
        (l) =>
          l.isActive &&
          sources.includes(l.sourceWebsite) &&
          l.lastSeenAt < seenBefore
      )
      .map((l) => ({ ...l }));
  }

  async markInactive(ids: string[], at: ISO): Promise<number> {
    let count = 0;
    for (const id of ids) {
      const l = this.listings.get(id);
      if (l?.isActive) {
        this.listings.set(id, {
          ...l,
          isActive: false,
          lastUpdatedAt: at,
          version: l.version + 1,
        });
        count++;
      }
    }
    return count;
  }

  async listRecent(since: ISO, limit: number): Promise<ListingRecord[]> {
    return Array.from(this.listings.values())
      .filter((l) => l.lastSeenAt >= since)
      .sort((a, b) => b.lastSeenAt.localeCompare(a.lastSeenAt))
      .slice(0, limit)
      .map((l) => ({ ...l }));
  }

  // Helper methods for testing
  getAllListings(): ListingRecord[] {
    return Array.from(this.listings.values()).map((l) => ({ ...l }));
  }

  getAllPriceHistory(): PriceHistoryEntry[] {
    return this.priceHistory.map((e) => ({ ...e }));
  }

  clear(): void {
    this.listings.clear();
    this.idsByKey.clear();
    this.priceHistory = [];
  }

  size(): number {
    return this.listings.size;
  }

  private copy(id: string): ListingRecord | null {
    const l = this.listings.get(id);
    return l ? { ...l } : null;
  }
}
