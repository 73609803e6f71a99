import {
  BusDelivery,
  MemoryAlertsRepo,
  PostgresAlertsRepo,
  Throttler,
  type AlertsRepo,
} from "@autoscout/alerts";
import {
  DeduplicationEngine,
  MemoryListingsRepo,
  PostgresListingsRepo,
  type ListingsRepo,
} from "@autoscout/listings";
import { createBus, createLogger } from "@autoscout/shared-utils";
import cron from "node-cron";
import { Pool } from "pg";
import { devAlerts } from "../adapters/dev-seed";
import { FileListingSource } from "../adapters/source.file";
import { cfg } from "../config/env";
import { PassRunner } from "../core/runner";

async function main() {
  const logger = createLogger("pipeline");
  logger.info(`Starting pipeline in ${cfg.mode} mode (schedule: ${cfg.passCron})`);

  if (!cron.validate(cfg.passCron)) {
    throw new Error(`PASS_CRON is not a valid cron expression: ${cfg.passCron}`);
  }

  const bus = createBus({
    type: cfg.busAdapter,
    serviceName: "pipeline",
    redisUrl: cfg.redisUrl,
  });

  let listings: ListingsRepo;
  let alerts: AlertsRepo;
  let pool: Pool | undefined;
  if (cfg.mode === "dev") {
    listings = new MemoryListingsRepo();
    alerts = new MemoryAlertsRepo(devAlerts(new Date().toISOString()));
  } else {
    pool = new Pool({
      host: cfg.db.host,
      port: cfg.db.port,
      user: cfg.db.user,
      password: cfg.db.password,
      database: cfg.db.name,
    });
    listings = new PostgresListingsRepo(pool);
    alerts = new PostgresAlertsRepo(pool);
  }

  const runner = new PassRunner(
    {
      source: new FileListingSource(cfg.scrapeInput, logger.child("source")),
      alerts,
      dedup: new DeduplicationEngine(listings, {
        maxConflictRetries: cfg.maxConflictRetries,
        logger: logger.child("dedupe"),
      }),
      throttler: new Throttler({
        repo: alerts,
        delivery: new BusDelivery(bus),
        logger: logger.child("throttle"),
        maxRetries: cfg.notificationMaxRetries,
      }),
      bus,
      logger: logger.child("pass"),
    },
    {
      concurrency: cfg.passConcurrency,
      sweepGraceMs: cfg.sweepGraceHours * 3_600_000,
    }
  );

  const triggerPass = () => {
    runner.trigger().catch((error) => logger.error("Pass crashed", error));
  };

  const task = cron.schedule(cfg.passCron, triggerPass);

  if (cfg.runOnStart) {
    logger.info("RUN_ON_START=true, running a pass now");
    triggerPass();
  }

  process.on("SIGINT", () => {
    logger.info("Shutting down pipeline...");
    task.stop();
    void Promise.all([bus.close?.(), pool?.end()])
      .catch((error) => logger.error("Shutdown failed", error))
      .finally(() => process.exit(0));
  });
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
