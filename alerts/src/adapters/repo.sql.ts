import { translateStoreError } from "@autoscout/shared-utils";
import { Pool, PoolClient, QueryResultRow } from "pg";
import {
  Alert,
  AlertCriteria,
  AlertFrequency,
  CriterionName,
  DigestItem,
  DigestItemStatus,
  ListingSnapshot,
  Notification,
  NotificationContent,
  NotificationStatus,
  NotificationType,
  SuppressedMatch,
} from "../core/dto";
import { AlertsRepo, CapWindow, CommitResult } from "../core/ports";

interface AlertRow extends QueryResultRow {
  id: string;
  user_id: string;
  name: string;
  criteria_json: AlertCriteria;
  is_active: boolean;
  frequency: AlertFrequency;
  max_notifications_per_day: number;
  last_triggered_at: Date | null;
  trigger_count: number;
  created_at: Date;
  updated_at: Date;
}

interface NotificationRow extends QueryResultRow {
  id: string;
  alert_id: string | null;
  user_id: string;
  listing_id: string | null;
  generation: number;
  type: NotificationType;
  status: NotificationStatus;
  title: string;
  message: string;
  content_json: NotificationContent;
  priority: number;
  is_read: boolean;
  created_at: Date;
  sent_at: Date | null;
  delivered_at: Date | null;
  retry_count: number;
  max_retries: number;
  error_message: string | null;
}

interface DigestItemRow extends QueryResultRow {
  alert_id: string;
  listing_id: string;
  generation: number;
  period_key: string;
  matched_at: Date;
  listing_json: ListingSnapshot;
  matched_criteria: CriterionName[];
  status: DigestItemStatus;
  notification_id: string | null;
}

interface SuppressedRow extends QueryResultRow {
  id: string;
  alert_id: string;
  listing_id: string;
  count_in_window: number;
  suppressed_at: Date;
}

const NOTIFICATION_COLUMNS = `id, alert_id, user_id, listing_id, generation, type, status,
  title, message, content_json, priority, is_read, created_at, sent_at, delivered_at,
  retry_count, max_retries, error_message`;

export class PostgresAlertsRepo implements AlertsRepo {
  constructor(private pool: Pool) {}

  async listActiveAlerts(): Promise<Alert[]> {
    return this.run("alerts", async () => {
      const result = await this.pool.query<AlertRow>(
        "SELECT * FROM alerts WHERE is_active = true ORDER BY id"
      );
      return result.rows.map((row) => this.mapRowToAlert(row));
    });
  }

  async listAlerts(userId?: string): Promise<Alert[]> {
    return this.run(userId ?? "alerts", async () => {
      const result =
        userId === undefined
          ? await this.pool.query<AlertRow>("SELECT * FROM alerts ORDER BY id")
          : await this.pool.query<AlertRow>(
              "SELECT * FROM alerts WHERE user_id = $1 ORDER BY id",
              [userId]
            );
      return result.rows.map((row) => this.mapRowToAlert(row));
    });
  }

  async getAlert(id: string): Promise<Alert | null> {
    return this.run(id, async () => {
      const result = await this.pool.query<AlertRow>("SELECT * FROM alerts WHERE id = $1", [id]);
      return result.rows.length > 0 ? this.mapRowToAlert(result.rows[0]) : null;
    });
  }

  async saveAlert(a: Alert): Promise<Alert> {
    return this.run(a.id, async () => {
      const result = await this.pool.query<AlertRow>(
        `
        INSERT INTO alerts (id, user_id, name, criteria_json, is_active, frequency,
          max_notifications_per_day, last_triggered_at, trigger_count, created_at, updated_at)
        VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
        ON CONFLICT (id) DO UPDATE SET
          name = EXCLUDED.name,
          criteria_json = EXCLUDED.criteria_json,
          is_active = EXCLUDED.is_active,
          frequency = EXCLUDED.frequency,
          max_notifications_per_day = EXCLUDED.max_notifications_per_day,
          updated_at = EXCLUDED.updated_at
        RETURNING *
      `,
        [
          a.id,
          a.userId,
          a.name,
          JSON.stringify(a.criteria),
          a.isActive,
          a.frequency,
          a.maxNotificationsPerDay,
          a.lastTriggeredAt ?? null,
          a.triggerCount,
          a.createdAt,
          a.updatedAt,
        ]
      );
      return this.mapRowToAlert(result.rows[0]);
    });
  }

  async deleteAlert(id: string): Promise<boolean> {
    return this.run(id, async () => {
      // notifications keep their rows through ON DELETE SET NULL
      const result = await this.pool.query("DELETE FROM alerts WHERE id = $1", [id]);
      return (result.rowCount ?? 0) > 0;
    });
  }

  async lastGeneration(alertId: string, listingId: string): Promise<number> {
    return this.run(`${alertId}|${listingId}`, async () => {
      const result = await this.pool.query<{ last: number }>(
        `
        SELECT GREATEST(
          (SELECT COALESCE(MAX(generation), 0) FROM notifications WHERE alert_id = $1 AND listing_id = $2),
          (SELECT COALESCE(MAX(generation), 0) FROM digest_items WHERE alert_id = $1 AND listing_id = $2)
        )::INTEGER AS last
      `,
        [alertId, listingId]
      );
      return result.rows[0]?.last ?? 0;
    });
  }

  async commitNotification(n: Notification, window: CapWindow): Promise<CommitResult> {
    const exists = async (client: PoolClient) => {
      const result = await client.query(
        "SELECT 1 FROM notifications WHERE alert_id = $1 AND listing_id = $2 AND generation = $3",
        [n.alertId, n.listingId, n.generation]
      );
      return result.rows.length > 0;
    };

    return this.inCapTransaction(n, window, exists, async (client) => {
      const inserted = await this.insertNotification(client, n);
      return inserted ? null : { status: "duplicate" };
    });
  }

  async queueDigestItem(item: DigestItem): Promise<boolean> {
    return this.run(`${item.alertId}|${item.listingId}`, async () => {
      const result = await this.pool.query(
        `
        INSERT INTO digest_items (alert_id, listing_id, generation, period_key, matched_at,
          listing_json, matched_criteria, status, notification_id)
        VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
        ON CONFLICT (alert_id, listing_id, generation) DO NOTHING
      `,
        [
          item.alertId,
          item.listingId,
          item.generation,
          item.periodKey,
          item.matchedAt,
          JSON.stringify(item.listing),
          item.matchedCriteria,
          item.status,
          item.notificationId,
        ]
      );
      return (result.rowCount ?? 0) > 0;
    });
  }

  async listPendingDigestItems(): Promise<DigestItem[]> {
    return this.run("digest", async () => {
      const result = await this.pool.query<DigestItemRow>(
        "SELECT * FROM digest_items WHERE status = 'pending' ORDER BY matched_at"
      );
      return result.rows.map((row) => this.mapRowToDigestItem(row));
    });
  }

  async commitDigest(
    n: Notification,
    items: DigestItem[],
    window: CapWindow
  ): Promise<CommitResult> {
    const exists = async (client: PoolClient) => {
      const result = await client.query(
        "SELECT 1 FROM notifications WHERE alert_id = $1 AND period_key = $2",
        [n.alertId, n.content.periodKey ?? null]
      );
      return result.rows.length > 0;
    };

    const result = await this.inCapTransaction(n, window, exists, async (client) => {
      const inserted = await this.insertNotification(client, n);
      if (!inserted) return { status: "duplicate" };
      await this.markItems(client, items, "sent", n.id);
      return null;
    });

    if (result.status === "capped") {
      await this.run("digest", async () => {
        const client = await this.pool.connect();
        try {
          await this.markItems(client, items, "suppressed", null);
        } finally {
          client.release();
        }
      });
    }
    return result;
  }

  async dropDigestItems(items: DigestItem[]): Promise<void> {
    await this.run("digest", async () => {
      const client = await this.pool.connect();
      try {
        await this.markItems(client, items, "dropped", null);
      } finally {
        client.release();
      }
    });
  }

  async recordSuppressed(s: SuppressedMatch): Promise<void> {
    await this.run(s.id, async () => {
      await this.pool.query(
        `
        INSERT INTO suppressed_matches (id, alert_id, listing_id, reason, count_in_window, suppressed_at)
        VALUES ($1, $2, $3, $4, $5, $6)
      `,
        [s.id, s.alertId, s.listingId, s.reason, s.countInWindow, s.suppressedAt]
      );
    });
  }

  async listSuppressed(alertId: string): Promise<SuppressedMatch[]> {
    return this.run(alertId, async () => {
      const result = await this.pool.query<SuppressedRow>(
        "SELECT * FROM suppressed_matches WHERE alert_id = $1 ORDER BY suppressed_at",
        [alertId]
      );
      return result.rows.map((row) => ({
        id: row.id,
        alertId: row.alert_id,
        listingId: row.listing_id,
        reason: "daily_cap" as const,
        countInWindow: row.count_in_window,
        suppressedAt: row.suppressed_at.toISOString(),
      }));
    });
  }

  async getNotification(id: string): Promise<Notification | null> {
    return this.run(id, async () => {
      const result = await this.pool.query<NotificationRow>(
        `SELECT ${NOTIFICATION_COLUMNS} FROM notifications WHERE id = $1`,
        [id]
      );
      return result.rows.length > 0 ? this.mapRowToNotification(result.rows[0]) : null;
    });
  }

  async updateNotification(n: Notification): Promise<Notification> {
    return this.run(n.id, async () => {
      const result = await this.pool.query<NotificationRow>(
        `
        UPDATE notifications SET
          status = $2, is_read = $3, sent_at = $4, delivered_at = $5,
          retry_count = $6, error_message = $7
        WHERE id = $1
        RETURNING ${NOTIFICATION_COLUMNS}
      `,
        [
          n.id,
          n.status,
          n.isRead,
          n.sentAt ?? null,
          n.deliveredAt ?? null,
          n.retryCount,
          n.errorMessage ?? null,
        ]
      );
      if (result.rows.length === 0) throw new Error(`Notification ${n.id} not found`);
      return this.mapRowToNotification(result.rows[0]);
    });
  }

  async listNotificationsForAlert(alertId: string, limit = 50): Promise<Notification[]> {
    return this.run(alertId, async () => {
      const result = await this.pool.query<NotificationRow>(
        `SELECT ${NOTIFICATION_COLUMNS} FROM notifications
         WHERE alert_id = $1 ORDER BY created_at DESC LIMIT $2`,
        [alertId, limit]
      );
      return result.rows.map((row) => this.mapRowToNotification(row));
    });
  }

  /**
   * Locks the alert row so concurrent commits for one alert serialize,
   * reports a duplicate when `exists` finds the row, then applies the
   * rolling-window cap before `write`. `write` returns null on success
   * or a result that rolls the transaction back.
   */
  private async inCapTransaction(
    n: Notification,
    window: CapWindow,
    exists: (client: PoolClient) => Promise<boolean>,
    write: (client: PoolClient) => Promise<CommitResult | null>
  ): Promise<CommitResult> {
    return this.run(n.id, async () => {
      const client = await this.pool.connect();
      try {
        await client.query("BEGIN");
        await client.query("SELECT id FROM alerts WHERE id = $1 FOR UPDATE", [n.alertId]);

        if (await exists(client)) {
          await client.query("ROLLBACK");
          return { status: "duplicate" };
        }

        const count = await client.query<{ count: number }>(
          "SELECT COUNT(*)::INTEGER AS count FROM notifications WHERE alert_id = $1 AND created_at > $2",
          [n.alertId, window.windowStart]
        );
        const countInWindow = count.rows[0]?.count ?? 0;
        if (countInWindow >= window.cap) {
          await client.query("ROLLBACK");
          return { status: "capped", countInWindow };
        }

        const refused = await write(client);
        if (refused) {
          await client.query("ROLLBACK");
          return refused;
        }

        await client.query(
          "UPDATE alerts SET trigger_count = trigger_count + 1, last_triggered_at = $2 WHERE id = $1",
          [n.alertId, window.now]
        );
        await client.query("COMMIT");
        return { status: "inserted", notification: n };
      } catch (error) {
        await client.query("ROLLBACK").catch(() => undefined);
        throw error;
      } finally {
        client.release();
      }
    });
  }

  private async insertNotification(client: PoolClient, n: Notification): Promise<boolean> {
    const result = await client.query(
      `
      INSERT INTO notifications (${NOTIFICATION_COLUMNS}, period_key)
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17, $18, $19)
      ON CONFLICT DO NOTHING
    `,
      [
        n.id,
        n.alertId,
        n.userId,
        n.listingId,
        n.generation,
        n.type,
        n.status,
        n.title,
        n.message,
        JSON.stringify(n.content),
        n.priority,
        n.isRead,
        n.createdAt,
        n.sentAt ?? null,
        n.deliveredAt ?? null,
        n.retryCount,
        n.maxRetries,
        n.errorMessage ?? null,
        n.content.periodKey ?? null,
      ]
    );
    return (result.rowCount ?? 0) > 0;
  }

  private async markItems(
    client: PoolClient,
    items: DigestItem[],
    status: DigestItemStatus,
    notificationId: string | null
  ): Promise<void> {
    for (const i of items) {
      await client.query(
        `UPDATE digest_items SET status = $4, notification_id = $5
         WHERE alert_id = $1 AND listing_id = $2 AND generation = $3`,
        [i.alertId, i.listingId, i.generation, status, notificationId]
      );
    }
  }

  private async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw translateStoreError(error, "alerts", key);
    }
  }

  private mapRowToAlert(row: AlertRow): Alert {
    return {
      id: row.id,
      userId: row.user_id,
      name: row.name,
      criteria: row.criteria_json,
      isActive: row.is_active,
      frequency: row.frequency,
      maxNotificationsPerDay: row.max_notifications_per_day,
      lastTriggeredAt: row.last_triggered_at?.toISOString(),
      triggerCount: row.trigger_count,
      createdAt: row.created_at.toISOString(),
      updatedAt: row.updated_at.toISOString(),
    };
  }

  private mapRowToNotification(row: NotificationRow): Notification {
    return {
      id: row.id,
      alertId: row.alert_id,
      userId: row.user_id,
      listingId: row.listing_id,
      generation: row.generation,
      type: row.type,
      status: row.status,
      title: row.title,
      message: row.message,
      content: row.content_json,
      priority: row.priority,
      isRead: row.is_read,
      createdAt: row.created_at.toISOString(),
      sentAt: row.sent_at?.toISOString(),
      deliveredAt: row.delivered_at?.toISOString(),
      retryCount: row.retry_count,
      maxRetries: row.max_retries,
      errorMessage: row.error_message ?? undefined,
    };
  }

  private mapRowToDigestItem(row: DigestItemRow): DigestItem {
    return {
      alertId: row.alert_id,
      listingId: row.listing_id,
      generation: row.generation,
      periodKey: row.period_key,
      matchedAt: row.matched_at.toISOString(),
      listing: row.listing_json,
      matchedCriteria: row.matched_criteria,
      status: row.status,
      notificationId: row.notification_id,
    };
  }
}
