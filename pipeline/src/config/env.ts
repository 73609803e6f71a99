import * as dotenv from "dotenv";
import {
  createDatabaseConfig,
  createServiceConfig,
  parseBusAdapter,
  parseEnvNumber,
  redisUrl,
} from "@autoscout/shared-utils";

dotenv.config();

const service = createServiceConfig();

export const cfg = {
  mode: service.mode,
  logLevel: service.logLevel,
  busAdapter: parseBusAdapter(),
  redisUrl: redisUrl(),
  db: createDatabaseConfig("autoscout"),
  passCron: process.env.PASS_CRON ?? "*/30 * * * *",
  passConcurrency: parseEnvNumber("PASS_CONCURRENCY", 4),
  sweepGraceHours: parseEnvNumber("SWEEP_GRACE_HOURS", 48),
  maxConflictRetries: parseEnvNumber("MAX_CONFLICT_RETRIES", 3),
  notificationMaxRetries: parseEnvNumber("NOTIFICATION_MAX_RETRIES", 3),
  scrapeInput: process.env.SCRAPE_INPUT ?? "./data/scrape-output.json",
  runOnStart: process.env.RUN_ON_START === "true",
} as const;
