import { LogLevel, parseLogLevel } from "../logger";

type Env = Record<string, string | undefined>;

export interface DatabaseConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  name: string;
}

export interface ServiceConfig {
  mode: string;
  logLevel: LogLevel;
  port?: number;
}

export type BusAdapter = "memory" | "redis";

// DB_* variables; user, password and database name default to the service's own
export function createDatabaseConfig(service: string, env: Env = process.env): DatabaseConfig {
  return {
    host: env.DB_HOST ?? "localhost",
    port: parseEnvNumber("DB_PORT", 5432, env),
    user: env.DB_USER ?? service,
    password: env.DB_PASSWORD ?? service,
    name: env.DB_NAME ?? `${service}_dev`,
  };
}

export function createServiceConfig(defaultPort?: number, env: Env = process.env): ServiceConfig {
  return {
    mode: env.MODE ?? env.NODE_ENV ?? "dev",
    logLevel: parseLogLevel(env.LOG_LEVEL),
    port: defaultPort === undefined ? undefined : parseEnvNumber("PORT", defaultPort, env),
  };
}

export function redisUrl(env: Env = process.env): string {
  return env.REDIS_URL ?? "redis://localhost:6379";
}

/**
 * BUS_ADAPTER; anything but "redis" runs on the in-process bus
 */
export function parseBusAdapter(env: Env = process.env): BusAdapter {
  return env.BUS_ADAPTER?.trim().toLowerCase() === "redis" ? "redis" : "memory";
}

/**
 * Unset or blank gives the default; anything non-numeric throws
 */
export function parseEnvNumber(name: string, defaultValue: number, env: Env = process.env): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return defaultValue;

  const value = Number(raw);
  if (Number.isNaN(value)) throw new Error(`Invalid number in ${name}: ${raw}`);
  return value;
}
