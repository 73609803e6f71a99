export type ISO = string;

export interface GeoPoint {
  lat: number;
  lng: number;
}

/**
 * A listing as handed over by the normalizer, before it is stored
 */
export interface ScrapedListing {
  sourceWebsite: string;
  externalId: string; // source's own id, or the listing URL
  listingUrl?: string;
  make: string;
  model: string;
  year?: number;
  price: number; // whole currency units
  currency: string; // ISO 4217, e.g. "EUR"
  mileage?: number;
  fuelType?: string;
  transmission?: string;
  bodyType?: string;
  condition?: string;
  enginePowerKw?: number;
  city?: string;
  region?: string;
  location?: GeoPoint;
}

export interface ListingRecord extends ScrapedListing {
  id: string;
  firstSeenAt: ISO;
  lastUpdatedAt: ISO;
  lastSeenAt: ISO;
  contentHash: string;
  isActive: boolean;
  version: number;
}

export type ChangeKind = "NEW" | "PRICE_UPDATE" | "UNCHANGED_DUPLICATE";

export interface PriceHistoryEntry {
  id: string;
  listingId: string;
  oldPrice: number;
  newPrice: number;
  changePct: number;
  observedAt: ISO;
}

export interface IngestOutcome {
  kind: ChangeKind;
  listing: ListingRecord;
  /** Stored state before this sighting; absent for NEW */
  previous?: ListingRecord;
  priceChange?: PriceHistoryEntry;
  reactivated: boolean;
}

export interface DedupKey {
  sourceWebsite: string;
  externalId: string;
}

export function dedupKeyOf(l: DedupKey): string {
  return `${l.sourceWebsite}|${l.externalId}`;
}
