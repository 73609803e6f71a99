import { createBus, createLogger } from "@autoscout/shared-utils";
import { MemoryListingsRepo, PostgresListingsRepo, type ListingsRepo } from "@autoscout/listings";
import { Pool } from "pg";
import { MemoryAlertsRepo } from "../adapters/repo.memory";
import { PostgresAlertsRepo } from "../adapters/repo.sql";
import { cfg } from "../config/env";
import { AlertTester } from "../core/alert-test";
import { AlertsRepo } from "../core/ports";
import { NotificationStatusTracker } from "../core/status";
import { createServer } from "../http/server";

async function main() {
  const logger = createLogger("alerts");
  logger.info(`Starting alerts service in ${cfg.mode} mode`);

  const bus = createBus({
    type: cfg.busAdapter,
    serviceName: "alerts",
    redisUrl: cfg.redisUrl,
  });

  let repo: AlertsRepo;
  let listings: ListingsRepo;
  let pool: Pool | undefined;
  if (cfg.mode === "dev") {
    repo = new MemoryAlertsRepo();
    listings = new MemoryListingsRepo();
  } else {
    pool = new Pool({
      host: cfg.db.host,
      port: cfg.db.port,
      user: cfg.db.user,
      password: cfg.db.password,
      database: cfg.db.name,
    });
    repo = new PostgresAlertsRepo(pool);
    listings = new PostgresListingsRepo(pool);
  }

  const tracker = new NotificationStatusTracker(repo, logger.child("status"));
  const tester = new AlertTester(listings, {
    windowDays: cfg.testWindowDays,
    limit: cfg.testWindowLimit,
  });

  // delivery reports arriving over the bus
  await bus.subscribe("notification_status_changed", async (evt) => {
    try {
      await tracker.apply({
        notificationId: evt.data.notificationId,
        status: evt.data.status,
        errorMessage: evt.data.errorMessage,
        retryCount: evt.data.retryCount,
        occurredAt: evt.data.occurredAt,
      });
    } catch (error) {
      logger.warn(`Rejected status report for ${evt.data.notificationId}`, error);
    }
  });

  const healthCheck = async () => {
    if (!pool) return true;
    try {
      await pool.query("SELECT 1");
      return true;
    } catch {
      return false;
    }
  };

  const app = createServer({
    repo,
    listings,
    tester,
    tracker,
    logger: logger.child("http"),
    healthCheck,
  });
  const server = app.listen(cfg.port, () =>
    logger.info(`Alerts API on http://localhost:${cfg.port}`)
  );

  process.on("SIGINT", () => {
    logger.info("Shutting down alerts service...");
    server.close();
    void Promise.all([bus.close?.(), pool?.end()])
      .catch((error) => logger.error("Shutdown failed", error))
      .finally(() => process.exit(0));
  });
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
