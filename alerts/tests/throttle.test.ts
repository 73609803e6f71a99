import { silentLogger } from "@autoscout/shared-utils";
import { beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import { MemoryAlertsRepo } from "../src/adapters/repo.memory";
import { Alert, ListingSnapshot, MatchResult, Notification } from "../src/core/dto";
import { dailyPeriodKey, weeklyPeriodKey } from "../src/core/period";
import { Throttler } from "../src/core/throttle";

const T0 = "2024-03-04T10:00:00.000Z";

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

function listingOf(id: string, overrides: Partial<ListingSnapshot> = {}): ListingSnapshot {
  return {
    id,
    sourceWebsite: "autoscout24",
    make: "BMW",
    model: "320d",
    year: 2019,
    price: 23000,
    currency: "EUR",
    city: "Munich",
    ...overrides,
  };
}

function matchOf(listing: ListingSnapshot, newlySatisfied = true, alertId = "alert-1"): MatchResult {
  return {
    alertId,
    listingId: listing.id,
    matchedCriteria: ["make", "price"],
    newlySatisfied,
    listing,
  };
}

describe("Throttler", () => {
  let repo: MemoryAlertsRepo;
  let deliver: Mock<[Notification], Promise<void>>;
  let throttler: Throttler;

  function build(alert: Alert) {
    repo = new MemoryAlertsRepo([alert]);
    deliver = vi.fn().mockResolvedValue(undefined);
    let n = 0;
    throttler = new Throttler({
      repo,
      delivery: { deliver },
      logger: silentLogger,
      maxRetries: 3,
      newId: () => `id-${++n}`,
    });
  }

  describe("immediate alerts", () => {
    beforeEach(() => build(alertOf()));

    it("should persist a pending notification and hand it off", async () => {
      const report = await throttler.process([matchOf(listingOf("listing-1"))], T0);

      expect(report.notifications).toHaveLength(1);
      const [n] = report.notifications;
      expect(n).toMatchObject({
        id: "id-1",
        alertId: "alert-1",
        listingId: "listing-1",
        generation: 1,
        status: "pending",
        title: "New BMW 320d matches your alert",
        message: "BMW 320d (2019) - €23,000 in Munich",
        priority: 2,
        maxRetries: 3,
      });
      expect(deliver).toHaveBeenCalledTimes(1);

      const alert = await repo.getAlert("alert-1");
      expect(alert?.triggerCount).toBe(1);
      expect(alert?.lastTriggeredAt).toBe(T0);
    });

    it("should cap 6 matches at 5 notifications and suppress 1", async () => {
      const matches = [1, 2, 3, 4, 5, 6].map((i) => matchOf(listingOf(`listing-${i}`)));

      const report = await throttler.process(matches, T0);

      expect(report.notifications).toHaveLength(5);
      expect(report.suppressed).toHaveLength(1);
      expect(report.suppressed[0]).toMatchObject({
        alertId: "alert-1",
        listingId: "listing-6",
        reason: "daily_cap",
        countInWindow: 5,
      });
      expect(repo.getAllNotifications()).toHaveLength(5);
      expect(await repo.listSuppressed("alert-1")).toHaveLength(1);
      expect((await repo.getAlert("alert-1"))?.triggerCount).toBe(5);
    });

    it("should allow notifications again once the rolling window moves on", async () => {
      const first = [1, 2, 3, 4, 5].map((i) => matchOf(listingOf(`listing-${i}`)));
      await throttler.process(first, T0);

      const almostDayLater = "2024-03-05T09:59:00.000Z";
      const capped = await throttler.process([matchOf(listingOf("listing-6"))], almostDayLater);
      expect(capped.suppressed).toHaveLength(1);

      const dayLater = "2024-03-05T10:00:01.000Z";
      const allowed = await throttler.process([matchOf(listingOf("listing-7"))], dayLater);
      expect(allowed.notifications).toHaveLength(1);
    });

    it("should not notify the same pair twice", async () => {
      await throttler.process([matchOf(listingOf("listing-1"))], T0);
      const again = await throttler.process(
        [matchOf(listingOf("listing-1", { price: 22000 }), false)],
        "2024-03-04T11:00:00.000Z"
      );

      expect(again.notifications).toHaveLength(0);
      expect(again.duplicates).toBe(1);
      expect(repo.getAllNotifications()).toHaveLength(1);
    });

    it("should notify again with the next generation when newly satisfied", async () => {
      await throttler.process([matchOf(listingOf("listing-1"))], T0);
      const again = await throttler.process(
        [matchOf(listingOf("listing-1", { price: 21000 }), true)],
        "2024-03-04T11:00:00.000Z"
      );

      expect(again.notifications).toHaveLength(1);
      expect(again.notifications[0].generation).toBe(2);
      expect(await repo.lastGeneration("alert-1", "listing-1")).toBe(2);
    });

    it("should keep the notification pending when the hand-off fails", async () => {
      deliver.mockRejectedValueOnce(new Error("bus down"));
      const error = vi.fn();
      const logged = new Throttler({
        repo,
        delivery: { deliver },
        logger: { ...silentLogger, error },
        maxRetries: 3,
        newId: () => "id-x",
      });

      const report = await logged.process([matchOf(listingOf("listing-1"))], T0);

      expect(report.notifications).toHaveLength(1);
      expect((await repo.getNotification("id-x"))?.status).toBe("pending");
      expect(error).toHaveBeenCalledTimes(1);
    });

    it("should drop matches for alerts that no longer exist", async () => {
      const report = await throttler.process([matchOf(listingOf("listing-1"), true, "alert-gone")], T0);

      expect(report).toEqual({ notifications: [], suppressed: [], duplicates: 0, queued: [] });
    });
  });

  describe("digest alerts", () => {
    beforeEach(() => build(alertOf({ frequency: "daily", name: "Daily BMW" })));

    it("should queue matches instead of notifying", async () => {
      const report = await throttler.process([matchOf(listingOf("listing-1"))], T0);

      expect(report.notifications).toHaveLength(0);
      expect(report.queued).toHaveLength(1);
      expect(report.queued[0].periodKey).toBe("2024-03-04");
      expect(deliver).not.toHaveBeenCalled();
    });

    it("should not queue the same pair twice", async () => {
      await throttler.process([matchOf(listingOf("listing-1"))], T0);
      const again = await throttler.process([matchOf(listingOf("listing-1"), false)], T0);

      expect(again.duplicates).toBe(1);
      expect(repo.getAllDigestItems()).toHaveLength(1);
    });

    it("should flush one summary per elapsed period", async () => {
      await throttler.process(
        [
          matchOf(listingOf("listing-1")),
          matchOf(listingOf("listing-2", { model: "118i", price: 15000 })),
        ],
        T0
      );

      const sameDay = await throttler.flushDigests("2024-03-04T23:00:00.000Z");
      expect(sameDay.notifications).toHaveLength(0);

      const nextDay = await throttler.flushDigests("2024-03-05T06:00:00.000Z");
      expect(nextDay.notifications).toHaveLength(1);
      expect(nextDay.notifications[0]).toMatchObject({
        type: "digest",
        listingId: null,
        title: '2 new matches for "Daily BMW"',
        message: "BMW 320d - €23,000; BMW 118i - €15,000",
        priority: 1,
      });
      expect(deliver).toHaveBeenCalledTimes(1);
      expect(repo.getAllDigestItems().every((i) => i.status === "sent")).toBe(true);

      const again = await throttler.flushDigests("2024-03-05T07:00:00.000Z");
      expect(again.notifications).toHaveLength(0);
    });

    it("should drop queued items once the alert is paused", async () => {
      await throttler.process([matchOf(listingOf("listing-1"))], T0);
      await repo.saveAlert(alertOf({ frequency: "daily", name: "Daily BMW", isActive: false }));

      const report = await throttler.flushDigests("2024-03-05T06:00:00.000Z");

      expect(report.notifications).toHaveLength(0);
      expect(deliver).not.toHaveBeenCalled();
      expect(repo.getAllDigestItems().map((i) => i.status)).toEqual(["dropped"]);
      expect(await repo.listPendingDigestItems()).toHaveLength(0);
    });

    it("should flush right away once the alert switches to immediate", async () => {
      await throttler.process([matchOf(listingOf("listing-1"))], T0);
      await repo.saveAlert(alertOf({ frequency: "immediate", name: "Daily BMW" }));

      const report = await throttler.flushDigests("2024-03-04T11:00:00.000Z");

      expect(report.notifications).toHaveLength(1);
      expect(report.notifications[0].title).toBe('1 new match for "Daily BMW"');
      expect(deliver).toHaveBeenCalledTimes(1);
      expect(await repo.listPendingDigestItems()).toHaveLength(0);
    });
  });
});

describe("period keys", () => {
  it("should use the UTC day", () => {
    expect(dailyPeriodKey("2024-03-04T23:30:00.000-02:00")).toBe("2024-03-05");
  });

  it("should use ISO weeks starting Monday", () => {
    expect(weeklyPeriodKey("2024-03-03T23:59:59.000Z")).toBe("2024-W09");
    expect(weeklyPeriodKey("2024-03-04T00:00:00.000Z")).toBe("2024-W10");
    expect(weeklyPeriodKey("2021-01-01T12:00:00.000Z")).toBe("2020-W53");
  });
});
