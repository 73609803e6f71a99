import { readFile } from "fs/promises";
import { Logger } from "@autoscout/shared-utils";
import { ListingSource } from "../core/ports";

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function isListingsEnvelope(value: unknown): value is { listings: unknown[] } {
  if (typeof value !== "object" || value === null) return false;
  return Array.isArray(Reflect.get(value, "listings"));
}

/**
 * Reads the normalizer's output: a JSON array of listings, or an object
 * with a `listings` array. A missing file is an empty batch.
 */
export class FileListingSource implements ListingSource {
  readonly name = "file";

  constructor(private path: string, private logger: Logger) {}

  async fetchBatch(): Promise<unknown[]> {
    let text: string;
    try {
      text = await readFile(this.path, "utf-8");
    } catch (error) {
      if (!isMissingFile(error)) throw error;
      this.logger.warn(`No scrape output at ${this.path}, nothing to ingest`);
      return [];
    }

    const parsed: unknown = JSON.parse(text);
    if (Array.isArray(parsed)) return parsed;
    if (isListingsEnvelope(parsed)) return parsed.listings;
    throw new Error(`${this.path} holds neither a listing array nor { listings: [] }`);
  }
}
