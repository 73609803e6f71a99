import { silentLogger } from "@autoscout/shared-utils";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { MemoryAlertsRepo } from "../src/adapters/repo.memory";
import { Notification } from "../src/core/dto";
import {
  InvalidStatusTransitionError,
  NotificationNotFoundError,
  NotificationStatusTracker,
  transition,
} from "../src/core/status";

const pending: Notification = {
  id: "n-1",
  alertId: "alert-1",
  userId: "user-123",
  listingId: "listing-1",
  generation: 1,
  type: "alert_match",
  status: "pending",
  title: "New BMW 320d matches your alert",
  message: "BMW 320d - €23,000",
  content: {},
  priority: 2,
  isRead: false,
  createdAt: "2024-03-04T10:00:00.000Z",
  retryCount: 0,
  maxRetries: 2,
};

const at = (minute: number) => `2024-03-04T10:${String(minute).padStart(2, "0")}:00.000Z`;

describe("transition", () => {
  it("should walk pending -> sent -> delivered", () => {
    const sent = transition(pending, { notificationId: "n-1", status: "sent", occurredAt: at(1) });
    const delivered = transition(sent, { notificationId: "n-1", status: "delivered", occurredAt: at(2) });

    expect(sent.sentAt).toBe(at(1));
    expect(delivered.status).toBe("delivered");
    expect(delivered.deliveredAt).toBe(at(2));
  });

  it("should count failures and allow retries until exhausted", () => {
    const failed1 = transition(pending, {
      notificationId: "n-1",
      status: "failed",
      errorMessage: "push token expired",
      occurredAt: at(1),
    });
    expect(failed1).toMatchObject({ status: "failed", retryCount: 1, errorMessage: "push token expired" });

    const retried = transition(failed1, { notificationId: "n-1", status: "sent", occurredAt: at(2) });
    expect(retried.status).toBe("sent");
    expect(retried.errorMessage).toBeUndefined();

    const failed2 = transition(retried, { notificationId: "n-1", status: "failed", occurredAt: at(3) });
    expect(failed2.retryCount).toBe(2);
    expect(failed2.errorMessage).toBe("delivery failed");

    expect(() =>
      transition(failed2, { notificationId: "n-1", status: "sent", occurredAt: at(4) })
    ).toThrow(InvalidStatusTransitionError);
  });

  it("should count repeated failure reports until the notification is terminal", () => {
    const notification = { ...pending, maxRetries: 3 };
    const fail = (n: Notification, minute: number) =>
      transition(n, { notificationId: "n-1", status: "failed", occurredAt: at(minute) });

    const first = fail(notification, 1);
    const second = fail(first, 2);
    const third = fail(second, 3);

    expect([first.retryCount, second.retryCount, third.retryCount]).toEqual([1, 2, 3]);
    expect(third.status).toBe("failed");
    expect(() => fail(third, 4)).toThrow("Notification n-1 cannot go from failed to failed");
  });

  it("should take the reported retry count when it is ahead", () => {
    const failed = transition(pending, {
      notificationId: "n-1",
      status: "failed",
      retryCount: 2,
      occurredAt: at(1),
    });
    expect(failed.retryCount).toBe(2);

    const behind = transition({ ...pending, maxRetries: 5, status: "failed", retryCount: 3 }, {
      notificationId: "n-1",
      status: "failed",
      retryCount: 1,
      occurredAt: at(2),
    });
    expect(behind.retryCount).toBe(4);
  });

  it("should reject delivered before sent", () => {
    expect(() =>
      transition(pending, { notificationId: "n-1", status: "delivered", occurredAt: at(1) })
    ).toThrow("Notification n-1 cannot go from pending to delivered");
  });

  it("should treat a repeated report as a no-op", () => {
    const sent = transition(pending, { notificationId: "n-1", status: "sent", occurredAt: at(1) });
    expect(transition(sent, { notificationId: "n-1", status: "sent", occurredAt: at(5) })).toBe(sent);
  });
});

describe("NotificationStatusTracker", () => {
  let repo: MemoryAlertsRepo;

  beforeEach(async () => {
    repo = new MemoryAlertsRepo();
    await repo.commitNotification(pending, {
      cap: 5,
      windowStart: "2024-03-03T10:00:00.000Z",
      now: pending.createdAt,
    });
  });

  it("should persist applied updates", async () => {
    const tracker = new NotificationStatusTracker(repo, silentLogger);
    await tracker.apply({ notificationId: "n-1", status: "sent", occurredAt: at(1) });

    expect((await repo.getNotification("n-1"))?.status).toBe("sent");
  });

  it("should warn once retries are exhausted", async () => {
    const warn = vi.fn();
    const tracker = new NotificationStatusTracker(repo, { ...silentLogger, warn });

    await tracker.apply({ notificationId: "n-1", status: "failed", occurredAt: at(1) });
    expect(warn).not.toHaveBeenCalled();
    await tracker.apply({ notificationId: "n-1", status: "sent", occurredAt: at(2) });
    await tracker.apply({ notificationId: "n-1", status: "failed", occurredAt: at(3) });

    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("should record back-to-back failure reports", async () => {
    const warn = vi.fn();
    const tracker = new NotificationStatusTracker(repo, { ...silentLogger, warn });

    await tracker.apply({ notificationId: "n-1", status: "failed", occurredAt: at(1) });
    const saved = await tracker.apply({ notificationId: "n-1", status: "failed", occurredAt: at(2) });

    expect(saved).toMatchObject({ status: "failed", retryCount: 2 });
    expect((await repo.getNotification("n-1"))?.retryCount).toBe(2);
    expect(warn).toHaveBeenCalledTimes(1);
    await expect(
      tracker.apply({ notificationId: "n-1", status: "failed", occurredAt: at(3) })
    ).rejects.toBeInstanceOf(InvalidStatusTransitionError);
  });

  it("should fail for unknown notifications", async () => {
    const tracker = new NotificationStatusTracker(repo, silentLogger);

    await expect(
      tracker.apply({ notificationId: "missing", status: "sent", occurredAt: at(1) })
    ).rejects.toBeInstanceOf(NotificationNotFoundError);
  });

  it("should mark notifications read", async () => {
    const tracker = new NotificationStatusTracker(repo, silentLogger);
    const read = await tracker.markRead("n-1", true);

    expect(read.isRead).toBe(true);
    expect((await repo.getNotification("n-1"))?.isRead).toBe(true);
  });
});
