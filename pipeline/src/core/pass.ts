import crypto from "crypto";
import {
  emptyReport,
  LinearScanEvaluator,
  mergeReports,
  ThrottleReport,
  Throttler,
  type AlertsRepo,
} from "@autoscout/alerts";
import {
  dedupKeyOf,
  DeduplicationEngine,
  IngestOutcome,
  MalformedListingError,
  parseScrapedListing,
  ScrapedListing,
} from "@autoscout/listings";
import {
  BusPort,
  isConflictError,
  Logger,
  PassCompletedEvent,
  StoreUnavailableError,
} from "@autoscout/shared-utils";
import pLimit from "p-limit";

export type PassDeps = {
  alerts: AlertsRepo;
  dedup: DeduplicationEngine;
  throttler: Throttler;
  bus: BusPort;
  logger: Logger;
  now?: () => string;
  newId?: () => string;
};

export type PassOptions = {
  concurrency: number;
  sweepGraceMs: number;
};

export type PassReport = {
  passId: string;
  status: "completed" | "failed";
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  received: number;
  created: number;
  priceUpdates: number;
  unchanged: number;
  reactivated: number;
  rejected: number; // malformed or repeated within the pass
  skipped: number; // lost the race after every retry
  notifications: number;
  suppressed: number;
  duplicates: number;
  queued: number;
  digests: number;
  deactivated: number;
  error?: string;
};

type Counters = Omit<PassReport, "passId" | "status" | "startedAt" | "finishedAt" | "durationMs" | "error">;

function zeroCounters(received: number): Counters {
  return {
    received,
    created: 0,
    priceUpdates: 0,
    unchanged: 0,
    reactivated: 0,
    rejected: 0,
    skipped: 0,
    notifications: 0,
    suppressed: 0,
    duplicates: 0,
    queued: 0,
    digests: 0,
    deactivated: 0,
  };
}

function addThrottle(c: Counters, r: ThrottleReport): void {
  c.notifications += r.notifications.length;
  c.suppressed += r.suppressed.length;
  c.duplicates += r.duplicates;
  c.queued += r.queued.length;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * One pass over a scrape batch: validate, dedupe, match, throttle, then
 * sweep and flush digests. A store outage stops the pass; records already
 * in flight finish their own write.
 */
export async function runPass(
  deps: PassDeps,
  batch: unknown[],
  opts: PassOptions
): Promise<PassReport> {
  const now = deps.now ?? (() => new Date().toISOString());
  const passId = (deps.newId ?? (() => crypto.randomUUID()))();
  const startedAt = now();
  const startMs = Date.now();
  const log = deps.logger;

  const counters = zeroCounters(batch.length);
  const throttled = emptyReport();
  const seenKeys = new Set<string>();
  const sources = new Set<string>();
  let outage: StoreUnavailableError | undefined;

  log.info(`Pass ${passId} started with ${batch.length} record(s)`);

  const finish = async (status: PassReport["status"]): Promise<PassReport> => {
    const report: PassReport = {
      passId,
      status,
      startedAt,
      finishedAt: now(),
      durationMs: Date.now() - startMs,
      ...counters,
      error: outage?.message,
    };
    await publishCompleted(deps, report);
    if (status === "failed") log.error(`Pass ${passId} aborted: ${report.error}`, report);
    else log.info(`Pass ${passId} complete`, report);
    return report;
  };

  let evaluator: LinearScanEvaluator;
  try {
    evaluator = new LinearScanEvaluator(await deps.alerts.listActiveAlerts());
  } catch (error) {
    if (!(error instanceof StoreUnavailableError)) throw error;
    outage = error;
    return finish("failed");
  }

  const limit = pLimit(Math.max(1, opts.concurrency));

  const count = (outcome: IngestOutcome) => {
    if (outcome.kind === "NEW") counters.created++;
    else if (outcome.kind === "PRICE_UPDATE") counters.priceUpdates++;
    else counters.unchanged++;
    if (outcome.reactivated) counters.reactivated++;
  };

  const processOne = async (raw: unknown): Promise<void> => {
    if (outage) return;

    let listing: ScrapedListing;
    try {
      listing = parseScrapedListing(raw);
    } catch (error) {
      if (!(error instanceof MalformedListingError)) throw error;
      counters.rejected++;
      log.warn(error.message, raw);
      return;
    }

    // checked and claimed before the first await
    const key = dedupKeyOf(listing);
    if (seenKeys.has(key)) {
      counters.rejected++;
      log.warn(`Repeated key ${key} within pass, keeping the first record`);
      return;
    }
    seenKeys.add(key);
    sources.add(listing.sourceWebsite);

    try {
      const outcome = await deps.dedup.ingest(listing, now());
      count(outcome);
      if (outcome.kind === "UNCHANGED_DUPLICATE") return;

      const matches = evaluator.evaluate(outcome.listing, outcome.previous);
      if (matches.length === 0) return;
      mergeReports(throttled, await deps.throttler.process(matches, now()));
    } catch (error) {
      if (error instanceof StoreUnavailableError) {
        // queued records see the outage and return without touching the store
        if (!outage) outage = error;
      } else if (isConflictError(error)) {
        counters.skipped++;
        log.warn(`Skipping ${key} after repeated conflicts`, error.message);
      } else {
        counters.skipped++;
        log.error(`Failed to process ${key}`, error);
      }
    }
  };

  await Promise.all(batch.map((raw) => limit(() => processOne(raw))));
  addThrottle(counters, throttled);

  if (outage) return finish("failed");

  try {
    const deactivated = await deps.dedup.sweepInactive({
      sources: Array.from(sources),
      passStartedAt: startedAt,
      graceMs: opts.sweepGraceMs,
      now: now(),
    });
    counters.deactivated = deactivated.length;

    const digests = await deps.throttler.flushDigests(now());
    counters.digests = digests.notifications.length;
    counters.suppressed += digests.suppressed.length;
  } catch (error) {
    if (!(error instanceof StoreUnavailableError)) throw error;
    outage = error;
    return finish("failed");
  }

  return finish("completed");
}

async function publishCompleted(deps: PassDeps, report: PassReport): Promise<void> {
  const event: PassCompletedEvent = {
    type: "pass_completed",
    id: crypto.randomUUID(),
    timestamp: report.finishedAt,
    version: "1",
    data: {
      passId: report.passId,
      status: report.status,
      received: report.received,
      created: report.created,
      priceUpdates: report.priceUpdates,
      notifications: report.notifications + report.digests,
      suppressed: report.suppressed,
      durationMs: report.durationMs,
    },
  };
  try {
    await deps.bus.publish(event);
  } catch (error) {
    deps.logger.error(`Publishing pass_completed failed: ${errorMessage(error)}`);
  }
}
