import * as dotenv from "dotenv";
import {
  createDatabaseConfig,
  createServiceConfig,
  parseBusAdapter,
  parseEnvNumber,
  redisUrl,
} from "@autoscout/shared-utils";

dotenv.config();

const service = createServiceConfig(8082);

export const cfg = {
  mode: service.mode,
  logLevel: service.logLevel,
  port: service.port ?? 8082,
  busAdapter: parseBusAdapter(),
  redisUrl: redisUrl(),
  db: createDatabaseConfig("autoscout"),
  testWindowDays: parseEnvNumber("TEST_WINDOW_DAYS", 7),
  testWindowLimit: parseEnvNumber("TEST_WINDOW_LIMIT", 500),
} as const;
