import { ListingSource } from "../core/ports";

// Hands out queued batches in order; empty once drained
export class MemoryListingSource implements ListingSource {
  readonly name = "memory";
  private batches: unknown[][];

  constructor(batches: unknown[][] = []) {
    this.batches = batches.map((b) => [...b]);
  }

  push(batch: unknown[]): void {
    this.batches.push([...batch]);
  }

  async fetchBatch(): Promise<unknown[]> {
    return this.batches.shift() ?? [];
  }

  pending(): number {
    return this.batches.length;
  }
}
