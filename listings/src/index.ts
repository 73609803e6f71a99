export * from "./core/dto";
export * from "./core/errors";
export * from "./core/validate";
export * from "./core/hash";
export * from "./core/classify";
export * from "./core/price-history";
export * from "./core/dedupe";
export type { ListingsRepo } from "./core/ports";
export { MemoryListingsRepo } from "./adapters/repo.memory";
export { PostgresListingsRepo } from "./adapters/repo.sql";
