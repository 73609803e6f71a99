import {
  Alert,
  DigestItem,
  Notification,
  SuppressedMatch,
} from "../core/dto";
import { AlertsRepo, CapWindow, CommitResult } from "../core/ports";

const pairKey = (alertId: string, listingId: string) => `${alertId}|${listingId}`;

export class MemoryAlertsRepo implements AlertsRepo {
  private alerts = new Map<string, Alert>();
  private notifications: Notification[] = [];
  private digestItems: DigestItem[] = [];
  private suppressed: SuppressedMatch[] = [];

  constructor(initialAlerts: Alert[] = []) {
    for (const a of initialAlerts) this.alerts.set(a.id, { ...a });
  }

  async listAlerts(userId?: string): Promise<Alert[]> {
    return Array.from(this.alerts.values())
      .filter((a) => userId === undefined || a.userId === userId)
      .sort((a, b) => a.id.localeCompare(b.id))
      .map((a) => ({ ...a }));
  }

  async listActiveAlerts(): Promise<Alert[]> {
    return Array.from(this.alerts.values())
      .filter((a) => a.isActive)
      .map((a) => ({ ...a }));
  }

  async getAlert(id: string): Promise<Alert | null> {
    const a = this.alerts.get(id);
    return a ? { ...a } : null;
  }

  async saveAlert(alert: Alert): Promise<Alert> {
    this.alerts.set(alert.id, { ...alert });
    return { ...alert };
  }

  async deleteAlert(id: string): Promise<boolean> {
    if (!this.alerts.delete(id)) return false;
    this.notifications = this.notifications.map((n) =>
      n.alertId === id ? { ...n, alertId: null } : n
    );
    this.digestItems = this.digestItems.filter((i) => i.alertId !== id);
    return true;
  }

  async lastGeneration(alertId: string, listingId: string): Promise<number> {
    const key = pairKey(alertId, listingId);
    let last = 0;
    for (const n of this.notifications) {
      if (n.alertId && n.listingId && pairKey(n.alertId, n.listingId) === key) {
        last = Math.max(last, n.generation);
      }
    }
    for (const i of this.digestItems) {
      if (pairKey(i.alertId, i.listingId) === key) last = Math.max(last, i.generation);
    }
    return last;
  }

  // No await between the checks and the writes, so this runs as one step
  async commitNotification(n: Notification, window: CapWindow): Promise<CommitResult> {
    const taken = this.notifications.some(
      (x) =>
        x.alertId === n.alertId &&
        x.listingId === n.listingId &&
        x.generation === n.generation
    );
    if (taken) return { status: "duplicate" };

    const capped = this.checkCap(n, window);
    if (capped) return capped;

    this.insert(n, window.now);
    return { status: "inserted", notification: { ...n } };
  }

  async queueDigestItem(item: DigestItem): Promise<boolean> {
    const taken = this.digestItems.some(
      (i) =>
        i.alertId === item.alertId &&
        i.listingId === item.listingId &&
        i.generation === item.generation
    );
    if (taken) return false;
    this.digestItems.push({ ...item });
    return true;
  }

  async listPendingDigestItems(): Promise<DigestItem[]> {
    return this.digestItems
      .filter((i) => i.status === "pending")
      .sort((a, b) => a.matchedAt.localeCompare(b.matchedAt))
      .map((i) => ({ ...i }));
  }

  async commitDigest(
    n: Notification,
    items: DigestItem[],
    window: CapWindow
  ): Promise<CommitResult> {
    const alreadySent = this.notifications.some(
      (x) =>
        x.type === "digest" &&
        x.alertId === n.alertId &&
        x.content.periodKey === n.content.periodKey
    );
    if (alreadySent) return { status: "duplicate" };

    const capped = this.checkCap(n, window);
    if (capped) {
      this.markItems(items, "suppressed", null);
      return capped;
    }

    this.insert(n, window.now);
    this.markItems(items, "sent", n.id);
    return { status: "inserted", notification: { ...n } };
  }

  async dropDigestItems(items: DigestItem[]): Promise<void> {
    this.markItems(items, "dropped", null);
  }

  async recordSuppressed(s: SuppressedMatch): Promise<void> {
    this.suppressed.push({ ...s });
  }

  async listSuppressed(alertId: string): Promise<SuppressedMatch[]> {
    return this.suppressed.filter((s) => s.alertId === alertId).map((s) => ({ ...s }));
  }

  async getNotification(id: string): Promise<Notification | null> {
    const n = this.notifications.find((x) => x.id === id);
    return n ? { ...n } : null;
  }

  async updateNotification(n: Notification): Promise<Notification> {
    const idx = this.notifications.findIndex((x) => x.id === n.id);
    if (idx === -1) throw new Error(`Notification ${n.id} not found`);
    this.notifications[idx] = { ...n };
    return { ...n };
  }

  async listNotificationsForAlert(alertId: string, limit = 50): Promise<Notification[]> {
    return this.notifications
      .filter((n) => n.alertId === alertId)
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt))
      .slice(0, limit)
      .map((n) => ({ ...n }));
  }

  private checkCap(n: Notification, window: CapWindow): CommitResult | null {
    const countInWindow = this.notifications.filter(
      (x) => x.alertId === n.alertId && x.createdAt > window.windowStart
    ).length;
    return countInWindow >= window.cap ? { status: "capped", countInWindow } : null;
  }

  private insert(n: Notification, now: string): void {
    this.notifications.push({ ...n });
    if (!n.alertId) return;
    const alert = this.alerts.get(n.alertId);
    if (alert) {
      this.alerts.set(alert.id, {
        ...alert,
        triggerCount: alert.triggerCount + 1,
        lastTriggeredAt: now,
      });
    }
  }

  private markItems(
    items: DigestItem[],
    status: DigestItem["status"],
    notificationId: string | null
  ): void {
    const keys = new Set(items.map((i) => `${pairKey(i.alertId, i.listingId)}|${i.generation}`));
    this.digestItems = this.digestItems.map((i) =>
      keys.has(`${pairKey(i.alertId, i.listingId)}|${i.generation}`)
        ? { ...i, status, notificationId }
        : i
    );
  }

  // Helper methods for testing
  getAllNotifications(): Notification[] {
    return this.notifications.map((n) => ({ ...n }));
  }

  getAllDigestItems(): DigestItem[] {
    return this.digestItems.map((i) => ({ ...i }));
  }

  clear(): void {
    this.alerts.clear();
    this.notifications = [];
    this.digestItems = [];
    this.suppressed = [];
  }
}
