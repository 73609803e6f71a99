import crypto from "crypto";
import { ScrapedListing } from "./dto";

export const MILEAGE_BUCKET_SIZE = 5000;

function norm(value: string | undefined): string {
  return (value ?? "").trim().toLowerCase().replace(/\s+/g, " ");
}

export function mileageBucket(mileage: number | undefined): string {
  if (mileage === undefined) return "";
  return String(Math.floor(mileage / MILEAGE_BUCKET_SIZE));
}

/**
 * Hash of the fields that identify the vehicle itself. Price is left out
 * so that a price-only change reads as an update of the same listing.
 */
export function contentHash(l: ScrapedListing): string {
  const key = [
    norm(l.make),
    norm(l.model),
    l.year ?? "",
    mileageBucket(l.mileage),
    norm(l.bodyType),
  ].join("|");
  return crypto.createHash("sha256").update(key).digest("hex");
}
