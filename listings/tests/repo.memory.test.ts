import { ConcurrentUpdateError, DuplicateKeyError } from "@autoscout/shared-utils";
import { beforeEach, describe, expect, it } from "vitest";
import { MemoryListingsRepo } from "../src/adapters/repo.memory";
import { ListingRecord } from "../src/core/dto";

describe("MemoryListingsRepo", () => {
  let repo: MemoryListingsRepo;

  const sampleListing: ListingRecord = {
    id: "listing-1",
    sourceWebsite: "autoscout24",
    externalId: "as-1001",
    make: "Volkswagen",
    model: "Golf",
    year: 2018,
    price: 14500,
    currency: "EUR",
    firstSeenAt: "2024-03-01T08:00:00.000Z",
    lastUpdatedAt: "2024-03-01T08:00:00.000Z",
    lastSeenAt: "2024-03-01T08:00:00.000Z",
    contentHash: "hash",
    isActive: true,
    version: 1,
  };

  beforeEach(() => {
    repo = new MemoryListingsRepo([sampleListing]);
  });

  describe("findByKey", () => {
    it("should find a listing by source and external id", async () => {
      const found = await repo.findByKey({
        sourceWebsite: "autoscout24",
        externalId: "as-1001",
      });
      expect(found?.id).toBe("listing-1");
    });

    it("should return null for an unknown key", async () => {
      const found = await repo.findByKey({
        sourceWebsite: "mobile.de",
        externalId: "as-1001",
      });
      expect(found).toBeNull();
    });

    it("should return copies", async () => {
      const found = await repo.getById("listing-1");
      if (found) found.price = 1;
      expect((await repo.getById("listing-1"))?.price).toBe(14500);
    });
  });

  describe("insert", () => {
    it("should reject a taken dedup key", async () => {
      await expect(
        repo.insert({ ...sampleListing, id: "listing-2" })
      ).rejects.toBeInstanceOf(DuplicateKeyError);
    });
  });

  describe("update", () => {
    it("should reject a stale version", async () => {
      await expect(
        repo.update({ ...sampleListing, version: 3 }, 2)
      ).rejects.toBeInstanceOf(ConcurrentUpdateError);
    });

    it("should write the new version", async () => {
      await repo.update({ ...sampleListing, price: 14000, version: 2 }, 1);
      expect((await repo.getById("listing-1"))?.version).toBe(2);
    });
  });

  describe("markInactive", () => {
    it("should count only listings that were active", async () => {
      expect(await repo.markInactive(["listing-1", "missing"], "2024-03-05T08:00:00.000Z")).toBe(1);
      expect(await repo.markInactive(["listing-1"], "2024-03-06T08:00:00.000Z")).toBe(0);

      const stored = await repo.getById("listing-1");
      expect(stored?.isActive).toBe(false);
      expect(stored?.version).toBe(2);
    });
  });

  describe("listRecent", () => {
    it("should return listings seen since the cutoff, newest first", async () => {
      await repo.insert({
        ...sampleListing,
        id: "listing-2",
        externalId: "as-1002",
        lastSeenAt: "2024-03-03T08:00:00.000Z",
      });

      const recent = await repo.listRecent("2024-03-01T00:00:00.000Z", 10);
      expect(recent.map((l) => l.id)).toEqual(["listing-2", "listing-1"]);

      const limited = await repo.listRecent("2024-03-02T00:00:00.000Z", 10);
      expect(limited.map((l) => l.id)).toEqual(["listing-2"]);
    });
  });
});
