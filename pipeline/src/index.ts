export * from "./core/pass";
export * from "./core/runner";
export type { ListingSource } from "./core/ports";
export { FileListingSource } from "./adapters/source.file";
export { MemoryListingSource } from "./adapters/source.memory";
