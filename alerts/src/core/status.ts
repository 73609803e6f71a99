import { Logger } from "@autoscout/shared-utils";
import { Notification, NotificationStatus, StatusUpdate } from "./dto";
import { AlertsRepo } from "./ports";

export class NotificationNotFoundError extends Error {
  constructor(readonly notificationId: string) {
    super(`Notification ${notificationId} not found`);
    this.name = "NotificationNotFoundError";
  }
}

export class InvalidStatusTransitionError extends Error {
  constructor(
    readonly notificationId: string,
    readonly from: NotificationStatus,
    readonly to: NotificationStatus
  ) {
    super(`Notification ${notificationId} cannot go from ${from} to ${to}`);
    this.name = "InvalidStatusTransitionError";
  }
}

export function canRetry(n: Notification): boolean {
  return n.status === "failed" && n.retryCount < n.maxRetries;
}

/**
 * Pure transition. Repeated sent/delivered reports are no-ops; a repeated
 * failed report is a retry that failed again and counts while retries remain.
 * A reported retryCount wins when it is ahead of ours.
 */
export function transition(n: Notification, u: StatusUpdate): Notification {
  if (u.status === n.status && u.status !== "failed") return n;

  switch (`${n.status}->${u.status}`) {
    case "pending->sent":
    case "failed->sent":
      if (n.status === "failed" && !canRetry(n)) break;
      return { ...n, status: "sent", sentAt: u.occurredAt, errorMessage: undefined };
    case "sent->delivered":
      return { ...n, status: "delivered", deliveredAt: u.occurredAt };
    case "pending->failed":
    case "sent->failed":
    case "failed->failed":
      if (n.status === "failed" && !canRetry(n)) break;
      return {
        ...n,
        status: "failed",
        retryCount: Math.max(u.retryCount ?? 0, n.retryCount + 1),
        errorMessage: u.errorMessage ?? "delivery failed",
      };
  }

  throw new InvalidStatusTransitionError(n.id, n.status, u.status);
}

export class NotificationStatusTracker {
  constructor(private repo: AlertsRepo, private logger: Logger) {}

  async apply(update: StatusUpdate): Promise<Notification> {
    const current = await this.load(update.notificationId);
    const next = transition(current, update);
    if (next === current) return current;

    const saved = await this.repo.updateNotification(next);
    if (saved.status === "failed" && !canRetry(saved)) {
      this.logger.warn(
        `Notification ${saved.id} failed for good after ${saved.retryCount} attempt(s): ${saved.errorMessage}`
      );
    }
    return saved;
  }

  async markRead(notificationId: string, isRead: boolean): Promise<Notification> {
    const current = await this.load(notificationId);
    if (current.isRead === isRead) return current;
    return this.repo.updateNotification({ ...current, isRead });
  }

  private async load(id: string): Promise<Notification> {
    const n = await this.repo.getNotification(id);
    if (!n) throw new NotificationNotFoundError(id);
    return n;
  }
}
