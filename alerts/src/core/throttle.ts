import crypto from "crypto";
import { Logger } from "@autoscout/shared-utils";
import {
  Alert,
  DigestItem,
  ISO,
  MatchResult,
  Notification,
  SuppressedMatch,
} from "./dto";
import { buildDigestNotification, buildMatchNotification } from "./notify";
import { DigestFrequency, periodKeyFor, rollingWindowStart } from "./period";
import { AlertsRepo, CapWindow, CommitResult, DeliveryPort } from "./ports";

export type ThrottleReport = {
  notifications: Notification[];
  suppressed: SuppressedMatch[];
  duplicates: number;
  queued: DigestItem[];
};

export type ThrottlerDeps = {
  repo: AlertsRepo;
  delivery: DeliveryPort;
  logger: Logger;
  maxRetries: number;
  newId?: () => string;
};

export function emptyReport(): ThrottleReport {
  return { notifications: [], suppressed: [], duplicates: 0, queued: [] };
}

export function mergeReports(into: ThrottleReport, from: ThrottleReport): ThrottleReport {
  into.notifications.push(...from.notifications);
  into.suppressed.push(...from.suppressed);
  into.duplicates += from.duplicates;
  into.queued.push(...from.queued);
  return into;
}

export class Throttler {
  private newId: () => string;

  constructor(private deps: ThrottlerDeps) {
    this.newId = deps.newId ?? (() => crypto.randomUUID());
  }

  /**
   * Turns matches into notifications (immediate alerts) or digest items
   * (daily/weekly alerts). Matches are handled one by one so the daily
   * cap is applied in arrival order.
   */
  async process(matches: MatchResult[], now: ISO): Promise<ThrottleReport> {
    const report = emptyReport();

    for (const match of matches) {
      const alert = await this.deps.repo.getAlert(match.alertId);
      if (!alert || !alert.isActive) {
        this.deps.logger.debug(`Alert ${match.alertId} gone or paused, dropping match`);
        continue;
      }

      const last = await this.deps.repo.lastGeneration(alert.id, match.listingId);
      if (last > 0 && !match.newlySatisfied) {
        report.duplicates++;
        continue;
      }
      const generation = last + 1;

      if (alert.frequency === "immediate") {
        await this.notifyNow(alert, match, generation, now, report);
      } else {
        await this.queue(alert, alert.frequency, match, generation, now, report);
      }
    }

    return report;
  }

  /**
   * Emits one summary per alert per elapsed period. Items of the
   * current period stay queued unless the alert has since switched to
   * immediate; items of paused or deleted alerts are dropped.
   */
  async flushDigests(now: ISO): Promise<ThrottleReport> {
    const report = emptyReport();
    const pending = await this.deps.repo.listPendingDigestItems();

    const groups = new Map<string, DigestItem[]>();
    for (const item of pending) {
      const key = `${item.alertId}|${item.periodKey}`;
      const group = groups.get(key);
      if (group) group.push(item);
      else groups.set(key, [item]);
    }

    for (const items of groups.values()) {
      const { alertId, periodKey } = items[0];
      const alert = await this.deps.repo.getAlert(alertId);
      if (!alert || !alert.isActive) {
        this.deps.logger.debug(
          `Alert ${alertId} gone or paused, dropping ${items.length} digest item(s) for ${periodKey}`
        );
        await this.deps.repo.dropDigestItems(items);
        continue;
      }
      if (alert.frequency !== "immediate" && periodKey === periodKeyFor(alert.frequency, now)) {
        continue;
      }

      const notification = buildDigestNotification(alert, periodKey, items, {
        id: this.newId(),
        now,
        maxRetries: this.deps.maxRetries,
      });
      const result = await this.deps.repo.commitDigest(
        notification,
        items,
        this.capWindow(alert, now)
      );

      if (result.status === "inserted") {
        report.notifications.push(result.notification);
        await this.handOff(result.notification);
      } else if (result.status === "capped") {
        for (const item of items) {
          report.suppressed.push(
            await this.suppress(alert, item.listingId, result.countInWindow, now)
          );
        }
      } else {
        report.duplicates++;
      }
    }

    return report;
  }

  private async notifyNow(
    alert: Alert,
    match: MatchResult,
    generation: number,
    now: ISO,
    report: ThrottleReport
  ): Promise<void> {
    const notification = buildMatchNotification(alert, match, generation, {
      id: this.newId(),
      now,
      maxRetries: this.deps.maxRetries,
    });
    const result: CommitResult = await this.deps.repo.commitNotification(
      notification,
      this.capWindow(alert, now)
    );

    switch (result.status) {
      case "inserted":
        report.notifications.push(result.notification);
        await this.handOff(result.notification);
        break;
      case "capped":
        report.suppressed.push(
          await this.suppress(alert, match.listingId, result.countInWindow, now)
        );
        break;
      case "duplicate":
        report.duplicates++;
        break;
    }
  }

  private async queue(
    alert: Alert,
    frequency: DigestFrequency,
    match: MatchResult,
    generation: number,
    now: ISO,
    report: ThrottleReport
  ): Promise<void> {
    const item: DigestItem = {
      alertId: alert.id,
      listingId: match.listingId,
      generation,
      periodKey: periodKeyFor(frequency, now),
      matchedAt: now,
      listing: match.listing,
      matchedCriteria: match.matchedCriteria,
      status: "pending",
      notificationId: null,
    };

    if (await this.deps.repo.queueDigestItem(item)) report.queued.push(item);
    else report.duplicates++;
  }

  private async suppress(
    alert: Alert,
    listingId: string,
    countInWindow: number,
    now: ISO
  ): Promise<SuppressedMatch> {
    const suppressed: SuppressedMatch = {
      id: this.newId(),
      alertId: alert.id,
      listingId,
      reason: "daily_cap",
      countInWindow,
      suppressedAt: now,
    };
    await this.deps.repo.recordSuppressed(suppressed);
    this.deps.logger.warn(
      `Daily cap ${alert.maxNotificationsPerDay} reached for alert ${alert.id}, suppressed listing ${listingId}`
    );
    return suppressed;
  }

  // A failed hand-off leaves the notification pending for redelivery
  private async handOff(n: Notification): Promise<void> {
    try {
      await this.deps.delivery.deliver(n);
    } catch (error) {
      this.deps.logger.error(`Hand-off of notification ${n.id} failed`, error);
    }
  }

  private capWindow(alert: Alert, now: ISO): CapWindow {
    return {
      cap: alert.maxNotificationsPerDay,
      windowStart: rollingWindowStart(now),
      now,
    };
  }
}
