import crypto from "crypto";
import { isConflictError, Logger, withRetry } from "@autoscout/shared-utils";
import { classify } from "./classify";
import { dedupKeyOf, IngestOutcome, ISO, ListingRecord, ScrapedListing } from "./dto";
import { contentHash } from "./hash";
import { PriceHistoryTracker } from "./price-history";
import { ListingsRepo } from "./ports";

export interface DeduplicationOptions {
  /** Attempts per listing when a concurrent writer wins the race */
  maxConflictRetries: number;
  logger: Logger;
  newId?: () => string;
}

export interface SweepRequest {
  /** Only listings of these sources are swept; other sources were not scraped */
  sources: string[];
  passStartedAt: ISO;
  graceMs: number;
  now: ISO;
}

export class DeduplicationEngine {
  private tracker: PriceHistoryTracker;
  private newId: () => string;

  constructor(private repo: ListingsRepo, private opts: DeduplicationOptions) {
    this.tracker = new PriceHistoryTracker(repo);
    this.newId = opts.newId ?? (() => crypto.randomUUID());
  }

  /**
   * Classifies one sighting against the stored state and persists it.
   * Conflicts are retried with freshly read state; the last conflict is
   * rethrown for the caller to log and skip.
   */
  async ingest(incoming: ScrapedListing, seenAt: ISO): Promise<IngestOutcome> {
    return withRetry(() => this.ingestOnce(incoming, seenAt), {
      attempts: this.opts.maxConflictRetries,
      retryOn: isConflictError,
      onRetry: (error, attempt) =>
        this.opts.logger.warn(
          `Conflict on ${dedupKeyOf(incoming)} (attempt ${attempt}), re-reading`,
          error
        ),
    });
  }

  private async ingestOnce(
    incoming: ScrapedListing,
    seenAt: ISO
  ): Promise<IngestOutcome> {
    const existing = await this.repo.findByKey(incoming);
    const kind = classify(incoming, existing);

    if (!existing) {
      const listing = await this.repo.insert({
        ...incoming,
        id: this.newId(),
        firstSeenAt: seenAt,
        lastUpdatedAt: seenAt,
        lastSeenAt: seenAt,
        contentHash: contentHash(incoming),
        isActive: true,
        version: 1,
      });
      return { kind, listing, reactivated: false };
    }

    const reactivated = !existing.isActive;

    if (kind === "UNCHANGED_DUPLICATE") {
      const listing = await this.repo.update(
        { ...existing, lastSeenAt: seenAt, isActive: true, version: existing.version + 1 },
        existing.version
      );
      return { kind, listing, previous: existing, reactivated };
    }

    const priceChange = this.tracker.detect(existing, incoming.price, seenAt);
    const refreshed: ListingRecord = {
      ...incoming,
      id: existing.id,
      firstSeenAt: existing.firstSeenAt,
      lastUpdatedAt: seenAt,
      lastSeenAt: seenAt,
      contentHash: contentHash(incoming),
      isActive: true,
      version: existing.version + 1,
    };
    const listing = await this.repo.update(refreshed, existing.version, priceChange);

    if (priceChange) {
      this.opts.logger.info(
        `Price change on ${listing.id}: ${priceChange.oldPrice} -> ${priceChange.newPrice} (${priceChange.changePct}%)`
      );
    }
    return { kind, listing, previous: existing, priceChange, reactivated };
  }

  /**
   * Soft-deletes listings that dropped out of their source. Runs after a
   * complete pass; listings touched by the pass have lastSeenAt >= passStartedAt.
   */
  async sweepInactive(req: SweepRequest): Promise<string[]> {
    if (req.sources.length === 0) return [];

    const graceCutoff = new Date(Date.parse(req.now) - req.graceMs).toISOString();
    const seenBefore = graceCutoff < req.passStartedAt ? graceCutoff : req.passStartedAt;

    const stale = await this.repo.listStaleActive(req.sources, seenBefore);
    if (stale.length === 0) return [];

    const ids = stale.map((l) => l.id);
    await this.repo.markInactive(ids, req.now);
    this.opts.logger.info(
      `Marked ${ids.length} listing(s) inactive (not seen since ${seenBefore})`
    );
    return ids;
  }
}
