import type { ZodIssue } from "zod";

/**
 * A scraped record that cannot be stored. The pass logs it with its
 * payload and moves on to the next record.
 */
export class MalformedListingError extends Error {
  constructor(readonly issues: ZodIssue[], readonly payload: unknown) {
    super(
      `Malformed listing: ${issues
        .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
        .join("; ")}`
    );
    this.name = "MalformedListingError";
  }
}
