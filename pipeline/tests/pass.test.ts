import {
  Alert,
  BusDelivery,
  MemoryAlertsRepo,
  Throttler,
} from "@autoscout/alerts";
import {
  DeduplicationEngine,
  dedupKeyOf,
  ListingRecord,
  MemoryListingsRepo,
} from "@autoscout/listings";
import {
  DuplicateKeyError,
  MemoryBus,
  silentLogger,
  StoreUnavailableError,
} from "@autoscout/shared-utils";
import { beforeEach, describe, expect, it } from "vitest";
import { PassDeps, PassOptions, runPass } from "../src/core/pass";

const T0 = "2024-03-04T10:00:00.000Z";
const DAY = 86_400_000;
const at = (offsetMs: number) => new Date(Date.parse(T0) + offsetMs).toISOString();

const options: PassOptions = { concurrency: 1, sweepGraceMs: 2 * DAY };

function alertOf(overrides: Partial<Alert> = {}): Alert {
  return {
    id: "alert-1",
    userId: "user-123",
    name: "BMW under 25k",
    criteria: { make: "BMW", price: { max: 25000 } },
    isActive: true,
    frequency: "immediate",
    maxNotificationsPerDay: 5,
    triggerCount: 0,
    createdAt: "2024-03-01T00:00:00.000Z",
    updatedAt: "2024-03-01T00:00:00.000Z",
    ...overrides,
  };
}

function scraped(externalId: string, overrides: Record<string, unknown> = {}) {
  return {
    sourceWebsite: "autoscout24",
    externalId,
    make: "BMW",
    model: "320d",
    year: 2019,
    price: 23000,
    currency: "EUR",
    mileage: 61000,
    city: "Munich",
    ...overrides,
  };
}

class UnreachableListingsRepo extends MemoryListingsRepo {
  async findByKey(): Promise<ListingRecord | null> {
    throw new StoreUnavailableError("listing store unavailable: connection refused");
  }
}

class UnreachableAlertsRepo extends MemoryAlertsRepo {
  async listActiveAlerts(): Promise<Alert[]> {
    throw new StoreUnavailableError("alert store unavailable: connection refused");
  }
}

class ContendedListingsRepo extends MemoryListingsRepo {
  async insert(listing: ListingRecord): Promise<ListingRecord> {
    throw new DuplicateKeyError("listing", dedupKeyOf(listing));
  }
}

describe("runPass", () => {
  let listings: MemoryListingsRepo;
  let alerts: MemoryAlertsRepo;
  let bus: MemoryBus;
  let clock: string;
  let seq: number;
  const newId = () => `id-${++seq}`;

  function depsFor(
    alertsRepo: MemoryAlertsRepo = alerts,
    listingsRepo: MemoryListingsRepo = listings
  ): PassDeps {
    return {
      alerts: alertsRepo,
      dedup: new DeduplicationEngine(listingsRepo, {
        maxConflictRetries: 3,
        logger: silentLogger,
        newId,
      }),
      throttler: new Throttler({
        repo: alertsRepo,
        delivery: new BusDelivery(bus),
        logger: silentLogger,
        maxRetries: 3,
        newId,
      }),
      bus,
      logger: silentLogger,
      now: () => clock,
      newId: () => "pass-1",
    };
  }

  function setup(alertList: Alert[]) {
    listings = new MemoryListingsRepo();
    alerts = new MemoryAlertsRepo(alertList);
    bus = new MemoryBus("test", silentLogger);
    clock = T0;
    seq = 0;
  }

  function publishedOfType(type: string) {
    return bus.getPublishedEvents().filter((e) => e.type === type);
  }

  describe("matching and delivery", () => {
    beforeEach(() => setup([alertOf()]));

    it("should store a new listing and notify the matching alert", async () => {
      const report = await runPass(depsFor(), [scraped("as-1")], options);

      expect(report).toMatchObject({
        passId: "pass-1",
        status: "completed",
        startedAt: T0,
        finishedAt: T0,
        received: 1,
        created: 1,
        notifications: 1,
        suppressed: 0,
      });

      const [notification] = alerts.getAllNotifications();
      expect(notification).toMatchObject({
        alertId: "alert-1",
        userId: "user-123",
        type: "alert_match",
        status: "pending",
        priority: 2,
        title: "New BMW 320d matches your alert",
        message: "BMW 320d (2019) - €23,000 in Munich",
      });

      const created = publishedOfType("notification_created");
      expect(created).toHaveLength(1);
      expect(created[0].data).toMatchObject({ notificationId: notification.id, userId: "user-123" });
    });

    it("should leave a listing that matches nothing stored but silent", async () => {
      const report = await runPass(depsFor(), [scraped("as-1", { make: "Audi", model: "A4" })], options);

      expect(report).toMatchObject({ created: 1, notifications: 0 });
      expect(listings.size()).toBe(1);
      expect(publishedOfType("notification_created")).toHaveLength(0);
    });

    it("should publish a pass_completed summary", async () => {
      await runPass(depsFor(), [scraped("as-1"), scraped("as-2", { price: 30000 })], options);

      const [completed] = publishedOfType("pass_completed");
      expect(completed.data).toMatchObject({
        passId: "pass-1",
        status: "completed",
        received: 2,
        created: 2,
        priceUpdates: 0,
        notifications: 1,
        suppressed: 0,
      });
    });
  });

  describe("daily cap", () => {
    it("should deliver five of six matches and suppress the sixth", async () => {
      setup([alertOf()]);
      const batch = ["as-1", "as-2", "as-3", "as-4", "as-5", "as-6"].map((id) => scraped(id));

      const report = await runPass(depsFor(), batch, { ...options, concurrency: 4 });

      expect(report).toMatchObject({ created: 6, notifications: 5, suppressed: 1 });
      expect(alerts.getAllNotifications()).toHaveLength(5);
      expect(await alerts.listSuppressed("alert-1")).toHaveLength(1);
      expect(await alerts.getAlert("alert-1")).toMatchObject({
        triggerCount: 5,
        lastTriggeredAt: T0,
      });
    });
  });

  describe("rejected records", () => {
    beforeEach(() => setup([alertOf()]));

    it("should reject malformed records and keep going", async () => {
      const report = await runPass(
        depsFor(),
        [{ make: "BMW" }, scraped("as-1", { price: -5 }), scraped("as-2")],
        options
      );

      expect(report).toMatchObject({ received: 3, rejected: 2, created: 1, notifications: 1 });
    });

    it("should keep only the first record of a key repeated in the batch", async () => {
      const report = await runPass(
        depsFor(),
        [scraped("as-1"), scraped("as-1", { price: 21000 })],
        options
      );

      expect(report).toMatchObject({ received: 2, rejected: 1, created: 1, priceUpdates: 0 });
      const [stored] = listings.getAllListings();
      expect(stored.price).toBe(23000);
    });
  });

  describe("re-sightings", () => {
    beforeEach(() => setup([alertOf()]));

    it("should notify when a price drop brings a listing into range", async () => {
      await runPass(depsFor(), [scraped("as-1", { price: 27000 })], options);
      expect(alerts.getAllNotifications()).toHaveLength(0);

      clock = at(DAY);
      const report = await runPass(depsFor(), [scraped("as-1", { price: 23000 })], options);

      expect(report).toMatchObject({ created: 0, priceUpdates: 1, notifications: 1 });
      const [entry] = listings.getAllPriceHistory();
      expect(entry).toMatchObject({ oldPrice: 27000, newPrice: 23000, changePct: -14.81 });
    });

    it("should not notify again when an already matching listing gets cheaper", async () => {
      await runPass(depsFor(), [scraped("as-1", { price: 24000 })], options);

      clock = at(DAY);
      const report = await runPass(depsFor(), [scraped("as-1", { price: 23000 })], options);

      expect(report).toMatchObject({ priceUpdates: 1, notifications: 0, duplicates: 1 });
      expect(alerts.getAllNotifications()).toHaveLength(1);
    });

    it("should count an identical re-sighting as unchanged", async () => {
      await runPass(depsFor(), [scraped("as-1")], options);

      clock = at(DAY);
      const report = await runPass(depsFor(), [scraped("as-1")], options);

      expect(report).toMatchObject({ unchanged: 1, created: 0, notifications: 0, duplicates: 0 });
      const [stored] = listings.getAllListings();
      expect(stored.lastSeenAt).toBe(at(DAY));
      expect(stored.firstSeenAt).toBe(T0);
    });
  });

  describe("sweep", () => {
    it("should deactivate listings of scraped sources that dropped out", async () => {
      setup([]);
      await runPass(
        depsFor(),
        [
          scraped("as-1"),
          scraped("as-2"),
          scraped("m-1", { sourceWebsite: "mobile.de" }),
        ],
        options
      );

      clock = at(3 * DAY);
      const report = await runPass(depsFor(), [scraped("as-1")], options);

      expect(report.deactivated).toBe(1);
      const byExternalId = new Map(listings.getAllListings().map((l) => [l.externalId, l]));
      expect(byExternalId.get("as-1")?.isActive).toBe(true);
      expect(byExternalId.get("as-2")?.isActive).toBe(false);
      // mobile.de was not part of the second scrape
      expect(byExternalId.get("m-1")?.isActive).toBe(true);
    });

    it("should spare listings still inside the grace period", async () => {
      setup([]);
      await runPass(depsFor(), [scraped("as-1"), scraped("as-2")], options);

      clock = at(DAY);
      const report = await runPass(depsFor(), [scraped("as-1")], options);

      expect(report.deactivated).toBe(0);
    });
  });

  describe("digests", () => {
    it("should queue matches of a daily alert and flush them the next day", async () => {
      setup([alertOf({ frequency: "daily" })]);

      const first = await runPass(depsFor(), [scraped("as-1")], options);
      expect(first).toMatchObject({ queued: 1, notifications: 0, digests: 0 });

      clock = at(DAY);
      const second = await runPass(depsFor(), [], options);

      expect(second).toMatchObject({ received: 0, digests: 1 });
      const [digest] = alerts.getAllNotifications();
      expect(digest).toMatchObject({
        type: "digest",
        priority: 1,
        title: '1 new match for "BMW under 25k"',
        message: "BMW 320d - €23,000",
      });

      const completed = publishedOfType("pass_completed");
      expect(completed[1].data).toMatchObject({ notifications: 1 });
    });
  });

  describe("failures", () => {
    it("should skip a listing that keeps losing the race", async () => {
      setup([alertOf()]);
      const contended = new ContendedListingsRepo();

      const report = await runPass(depsFor(alerts, contended), [scraped("as-1"), scraped("as-2")], options);

      expect(report).toMatchObject({ status: "completed", skipped: 2, created: 0 });
    });

    it("should abort the pass when the listing store is unreachable", async () => {
      setup([alertOf()]);
      const report = await runPass(
        depsFor(alerts, new UnreachableListingsRepo()),
        [scraped("as-1"), scraped("as-2"), scraped("as-3")],
        options
      );

      expect(report).toMatchObject({
        status: "failed",
        error: "listing store unavailable: connection refused",
        created: 0,
        skipped: 0,
        deactivated: 0,
      });
      const [completed] = publishedOfType("pass_completed");
      expect(completed.data).toMatchObject({ status: "failed", received: 3 });
    });

    it("should fail before touching listings when alerts cannot be loaded", async () => {
      setup([]);
      const report = await runPass(
        depsFor(new UnreachableAlertsRepo()),
        [scraped("as-1")],
        options
      );

      expect(report).toMatchObject({
        status: "failed",
        error: "alert store unavailable: connection refused",
        created: 0,
      });
      expect(listings.size()).toBe(0);
    });
  });
});
