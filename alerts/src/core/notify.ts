import {
  Alert,
  DigestEntry,
  DigestItem,
  ISO,
  ListingSnapshot,
  MatchResult,
  Notification,
  PRIORITY_DIGEST,
  PRIORITY_MATCH,
} from "./dto";

export function formatPrice(price: number, currency: string): string {
  try {
    return new Intl.NumberFormat("en-US", {
      style: "currency",
      currency,
      minimumFractionDigits: 0,
      maximumFractionDigits: 0,
    }).format(price);
  } catch {
    // unknown ISO code
    return `${price.toLocaleString("en-US")} ${currency}`;
  }
}

export function matchTitle(l: ListingSnapshot): string {
  return `New ${l.make} ${l.model} matches your alert`;
}

export function matchMessage(l: ListingSnapshot): string {
  const year = l.year ? ` (${l.year})` : "";
  const city = l.city ? ` in ${l.city}` : "";
  return `${l.make} ${l.model}${year} - ${formatPrice(l.price, l.currency)}${city}`;
}

export type NotificationSeed = {
  id: string;
  now: ISO;
  maxRetries: number;
};

export function buildMatchNotification(
  alert: Alert,
  match: MatchResult,
  generation: number,
  seed: NotificationSeed
): Notification {
  return {
    id: seed.id,
    alertId: alert.id,
    userId: alert.userId,
    listingId: match.listingId,
    generation,
    type: "alert_match",
    status: "pending",
    title: matchTitle(match.listing),
    message: matchMessage(match.listing),
    content: {
      listing: match.listing,
      criteria: alert.criteria,
      matchedCriteria: match.matchedCriteria,
    },
    priority: PRIORITY_MATCH,
    isRead: false,
    createdAt: seed.now,
    retryCount: 0,
    maxRetries: seed.maxRetries,
  };
}

function toEntry(item: DigestItem): DigestEntry {
  const l = item.listing;
  return {
    listingId: item.listingId,
    make: l.make,
    model: l.model,
    year: l.year,
    price: l.price,
    currency: l.currency,
    city: l.city,
    listingUrl: l.listingUrl,
  };
}

const DIGEST_PREVIEW = 3;

export function buildDigestNotification(
  alert: Alert,
  periodKey: string,
  items: DigestItem[],
  seed: NotificationSeed
): Notification {
  const entries = items.map(toEntry);
  const preview = entries
    .slice(0, DIGEST_PREVIEW)
    .map((e) => `${e.make} ${e.model} - ${formatPrice(e.price, e.currency)}`);
  const more = entries.length - preview.length;
  const noun = entries.length === 1 ? "match" : "matches";

  return {
    id: seed.id,
    alertId: alert.id,
    userId: alert.userId,
    listingId: null,
    generation: 0,
    type: "digest",
    status: "pending",
    title: `${entries.length} new ${noun} for "${alert.name}"`,
    message: preview.join("; ") + (more > 0 ? `; and ${more} more` : ""),
    content: { criteria: alert.criteria, items: entries, periodKey },
    priority: PRIORITY_DIGEST,
    isRead: false,
    createdAt: seed.now,
    retryCount: 0,
    maxRetries: seed.maxRetries,
  };
}
