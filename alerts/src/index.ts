export * from "./core/dto";
export * from "./core/rules";
export * from "./core/geo";
export * from "./core/match";
export * from "./core/criteria";
export * from "./core/alert-test";
export * from "./core/notify";
export * from "./core/period";
export * from "./core/throttle";
export * from "./core/status";
export type {
  AlertsRepo,
  CapWindow,
  CommitResult,
  DeliveryPort,
  RecentListingsPort,
} from "./core/ports";
export { MemoryAlertsRepo } from "./adapters/repo.memory";
export { PostgresAlertsRepo } from "./adapters/repo.sql";
export { BusDelivery, toCreatedEvent } from "./adapters/delivery.bus";
export { createServer } from "./http/server";
