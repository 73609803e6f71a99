import { DedupKey, ISO, ListingRecord, PriceHistoryEntry } from "./dto";

// Persistence for listings + their price history
export interface ListingsRepo {
  findByKey(key: DedupKey): Promise<ListingRecord | null>;
  getById(id: string): Promise<ListingRecord | null>;

  /** Throws DuplicateKeyError when the dedup key is already taken */
  insert(listing: ListingRecord): Promise<ListingRecord>;

  /**
   * Writes `listing` (carrying version expectedVersion + 1) only if the
   * stored version still equals expectedVersion, appending `priceChange`
   * in the same transaction. Throws ConcurrentUpdateError otherwise.
   */
  update(
    listing: ListingRecord,
    expectedVersion: number,
    priceChange?: PriceHistoryEntry
  ): Promise<ListingRecord>;

  listPriceHistory(listingId: string): Promise<PriceHistoryEntry[]>;

  /** Active listings of the given sources last seen strictly before `seenBefore` */
  listStaleActive(sources: string[], seenBefore: ISO): Promise<ListingRecord[]>;
  markInactive(ids: string[], at: ISO): Promise<number>;

  /** Recent listings for alert dry runs, newest first */
  listRecent(since: ISO, limit: number): Promise<ListingRecord[]>;
}
