import {
  Alert,
  DigestItem,
  ISO,
  ListingSnapshot,
  Notification,
  SuppressedMatch,
} from "./dto";

// Daily cap evaluated inside the same atomic write as the insert
export type CapWindow = {
  cap: number;
  windowStart: ISO; // rolling 24h: now - 24h
  now: ISO;
};

export type CommitResult =
  | { status: "inserted"; notification: Notification }
  | { status: "capped"; countInWindow: number }
  | { status: "duplicate" };

// Repo for alerts, notifications and digest queue
export interface AlertsRepo {
  /** Sorted by id; every alert, or one user's */
  listAlerts(userId?: string): Promise<Alert[]>;
  listActiveAlerts(): Promise<Alert[]>;
  getAlert(id: string): Promise<Alert | null>;
  saveAlert(alert: Alert): Promise<Alert>;
  /** Notifications outlive the alert with alertId set to null */
  deleteAlert(id: string): Promise<boolean>;

  /** Highest generation handled for the pair, across notifications and digest items; 0 if none */
  lastGeneration(alertId: string, listingId: string): Promise<number>;

  /**
   * Atomically: report a duplicate when (alert, listing, generation)
   * exists, count the alert's notifications created since windowStart,
   * refuse when the count reached cap, insert, then bump the alert's
   * triggerCount and lastTriggeredAt.
   */
  commitNotification(n: Notification, window: CapWindow): Promise<CommitResult>;

  /** False when the (alert, listing, generation) item is already queued */
  queueDigestItem(item: DigestItem): Promise<boolean>;
  listPendingDigestItems(): Promise<DigestItem[]>;

  /**
   * Same cap rules as commitNotification for a digest summary. Inserted:
   * the items are marked sent and linked. Capped: the items are marked
   * suppressed.
   */
  commitDigest(n: Notification, items: DigestItem[], window: CapWindow): Promise<CommitResult>;
  /** Takes pending items out of the queue without a summary */
  dropDigestItems(items: DigestItem[]): Promise<void>;

  recordSuppressed(s: SuppressedMatch): Promise<void>;
  listSuppressed(alertId: string): Promise<SuppressedMatch[]>;

  getNotification(id: string): Promise<Notification | null>;
  updateNotification(n: Notification): Promise<Notification>;
  listNotificationsForAlert(alertId: string, limit?: number): Promise<Notification[]>;
}

// Hand-off to whatever delivers notifications (push, email, in-app)
export interface DeliveryPort {
  deliver(n: Notification): Promise<void>;
}

// Historical listing window for dry runs
export interface RecentListingsPort {
  listRecent(since: ISO, limit: number): Promise<ListingSnapshot[]>;
}
