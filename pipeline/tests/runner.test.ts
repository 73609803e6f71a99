import {
  BusDelivery,
  MemoryAlertsRepo,
  Throttler,
} from "@autoscout/alerts";
import { DeduplicationEngine, MemoryListingsRepo } from "@autoscout/listings";
import { MemoryBus, silentLogger } from "@autoscout/shared-utils";
import { describe, expect, it } from "vitest";
import { MemoryListingSource } from "../src/adapters/source.memory";
import { ListingSource } from "../src/core/ports";
import { PassRunner } from "../src/core/runner";

const T0 = "2024-03-04T10:00:00.000Z";

function record(externalId: string) {
  return {
    sourceWebsite: "autoscout24",
    externalId,
    make: "Skoda",
    model: "Octavia",
    year: 2018,
    price: 12900,
    currency: "EUR",
  };
}

function runnerWith(source: ListingSource) {
  const bus = new MemoryBus("test", silentLogger);
  const alerts = new MemoryAlertsRepo();
  return new PassRunner(
    {
      source,
      alerts,
      dedup: new DeduplicationEngine(new MemoryListingsRepo(), {
        maxConflictRetries: 3,
        logger: silentLogger,
      }),
      throttler: new Throttler({
        repo: alerts,
        delivery: new BusDelivery(bus),
        logger: silentLogger,
        maxRetries: 3,
      }),
      bus,
      logger: silentLogger,
      now: () => T0,
    },
    { concurrency: 2, sweepGraceMs: 48 * 3_600_000 }
  );
}

describe("PassRunner", () => {
  it("should fetch a batch and run a pass over it", async () => {
    const runner = runnerWith(new MemoryListingSource([[record("a"), record("b")]]));

    const report = await runner.trigger();

    expect(report).toMatchObject({ status: "completed", received: 2, created: 2 });
    expect(runner.isRunning()).toBe(false);
  });

  it("should drop a trigger that arrives while a pass is running", async () => {
    const source = new MemoryListingSource([[record("a"), record("b")], [record("c")]]);
    const runner = runnerWith(source);

    const [first, second] = await Promise.all([runner.trigger(), runner.trigger()]);

    expect(first).toMatchObject({ received: 2, created: 2 });
    expect(second).toBeNull();
    // the dropped trigger left the second batch queued
    expect(source.pending()).toBe(1);

    const third = await runner.trigger();
    expect(third).toMatchObject({ received: 1, created: 1 });
  });

  it("should release the guard when the source fails", async () => {
    const failing: ListingSource = {
      name: "broken",
      fetchBatch: () => Promise.reject(new Error("scrape output unreadable")),
    };
    const runner = runnerWith(failing);

    await expect(runner.trigger()).rejects.toThrow("scrape output unreadable");
    expect(runner.isRunning()).toBe(false);
  });
});
