import { describe, expect, it } from "vitest";
import {
  DuplicateKeyError,
  StoreUnavailableError,
  translateStoreError,
} from "../src/errors";

function pgError(code: string, message = "driver error"): Error {
  return Object.assign(new Error(message), { code });
}

describe("translateStoreError", () => {
  it("should map unique violations to DuplicateKeyError", () => {
    const error = translateStoreError(pgError("23505"), "listing", "autoscout24|as-1");

    expect(error).toBeInstanceOf(DuplicateKeyError);
    expect(error).toHaveProperty("message", "listing with key autoscout24|as-1 already exists");
  });

  it("should map connection failures to StoreUnavailableError", () => {
    for (const code of ["ECONNREFUSED", "08006", "57P01"]) {
      expect(translateStoreError(pgError(code), "listing", "k")).toBeInstanceOf(
        StoreUnavailableError
      );
    }
  });

  it("should leave other errors untouched", () => {
    const original = pgError("22P02");
    expect(translateStoreError(original, "listing", "k")).toBe(original);

    const plain = new Error("no code");
    expect(translateStoreError(plain, "listing", "k")).toBe(plain);
  });
});
