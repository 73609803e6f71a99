import crypto from "crypto";
import { ISO, ListingRecord, PriceHistoryEntry } from "./dto";
import { ListingsRepo } from "./ports";

export function priceChangePct(oldPrice: number, newPrice: number): number {
  if (oldPrice === 0) return 0;
  return Math.round(((newPrice - oldPrice) / oldPrice) * 10000) / 100;
}

export function buildPriceChange(
  listingId: string,
  oldPrice: number,
  newPrice: number,
  observedAt: ISO
): PriceHistoryEntry {
  return {
    id: crypto.randomUUID(),
    listingId,
    oldPrice,
    newPrice,
    changePct: priceChangePct(oldPrice, newPrice),
    observedAt,
  };
}

export type PriceTrend = "down" | "up" | "stable";

export interface PriceSummary {
  firstPrice: number;
  currentPrice: number;
  totalChange: number;
  totalChangePct: number;
  trend: PriceTrend;
  largestDropPct: number;
  changes: number;
}

const TREND_THRESHOLD_PCT = 2;

/**
 * Summarizes a listing's history for the price-history endpoint. Entries
 * must be oldest first, as returned by the tracker.
 */
export function summarizePriceHistory(
  entries: PriceHistoryEntry[]
): PriceSummary | null {
  if (entries.length === 0) return null;

  const firstPrice = entries[0].oldPrice;
  const currentPrice = entries[entries.length - 1].newPrice;
  const totalChange = currentPrice - firstPrice;
  const totalChangePct = priceChangePct(firstPrice, currentPrice);

  let trend: PriceTrend = "stable";
  if (totalChangePct < -TREND_THRESHOLD_PCT) trend = "down";
  else if (totalChangePct > TREND_THRESHOLD_PCT) trend = "up";

  return {
    firstPrice,
    currentPrice,
    totalChange,
    totalChangePct,
    trend,
    largestDropPct: Math.min(0, ...entries.map((e) => e.changePct)),
    changes: entries.length,
  };
}

export class PriceHistoryTracker {
  constructor(private repo: Pick<ListingsRepo, "listPriceHistory">) {}

  /**
   * The entry to append when a stored listing is seen at a new price.
   * The repository writes it in the same transaction as the listing.
   */
  detect(
    previous: ListingRecord,
    newPrice: number,
    observedAt: ISO
  ): PriceHistoryEntry | undefined {
    if (previous.price === newPrice) return undefined;
    return buildPriceChange(previous.id, previous.price, newPrice, observedAt);
  }

  /** Oldest first; `since` keeps only changes observed from then on */
  async history(listingId: string, since?: ISO): Promise<PriceHistoryEntry[]> {
    const entries = await this.repo.listPriceHistory(listingId);
    return since === undefined ? entries : entries.filter((e) => e.observedAt >= since);
  }

}
