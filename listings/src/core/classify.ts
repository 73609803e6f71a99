import { ChangeKind, ListingRecord, ScrapedListing } from "./dto";
import { contentHash } from "./hash";

export function classify(
  incoming: ScrapedListing,
  existing: ListingRecord | null
): ChangeKind {
  if (!existing) return "NEW";

  // content drift is stored as a full refresh and re-matched like a price move
  if (contentHash(incoming) !== existing.contentHash) return "PRICE_UPDATE";

  if (
    incoming.price !== existing.price ||
    incoming.currency !== existing.currency
  ) {
    return "PRICE_UPDATE";
  }

  return "UNCHANGED_DUPLICATE";
}
