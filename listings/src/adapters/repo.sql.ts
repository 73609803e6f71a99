import { ConcurrentUpdateError, translateStoreError } from "@autoscout/shared-utils";
import { Pool, PoolClient, QueryResultRow } from "pg";
import {
  DedupKey,
  dedupKeyOf,
  ISO,
  ListingRecord,
  PriceHistoryEntry,
} from "../core/dto";
import { ListingsRepo } from "../core/ports";

interface ListingRow extends QueryResultRow {
  id: string;
  source_website: string;
  external_id: string;
  listing_url: string | null;
  make: string;
  model: string;
  year: number | null;
  price: number;
  currency: string;
  mileage: number | null;
  fuel_type: string | null;
  transmission: string | null;
  body_type: string | null;
  condition: string | null;
  engine_power_kw: string | null; // NUMERIC comes back as text
  city: string | null;
  region: string | null;
  lat: number | null;
  lng: number | null;
  first_seen_at: Date;
  last_updated_at: Date;
  last_seen_at: Date;
  content_hash: string;
  is_active: boolean;
  version: number;
}

interface PriceHistoryRow extends QueryResultRow {
  id: string;
  listing_id: string;
  old_price: number;
  new_price: number;
  change_pct: string;
  observed_at: Date;
}

const LISTING_COLUMNS = `id, source_website, external_id, listing_url, make, model, year,
  price, currency, mileage, fuel_type, transmission, body_type, condition,
  engine_power_kw, city, region, lat, lng, first_seen_at, last_updated_at,
  last_seen_at, content_hash, is_active, version`;

export class PostgresListingsRepo implements ListingsRepo {
  constructor(private pool: Pool) {}

  async findByKey(key: DedupKey): Promise<ListingRecord | null> {
    return this.run(dedupKeyOf(key), async () => {
      const result = await this.pool.query<ListingRow>(
        `SELECT ${LISTING_COLUMNS} FROM listings WHERE source_website = $1 AND external_id = $2`,
        [key.sourceWebsite, key.externalId]
      );
      return result.rows.length > 0 ? this.rowToListing(result.rows[0]) : null;
    });
  }

  async getById(id: string): Promise<ListingRecord | null> {
    return this.run(id, async () => {
      const result = await this.pool.query<ListingRow>(
        `SELECT ${LISTING_COLUMNS} FROM listings WHERE id = $1`,
        [id]
      );
      return result.rows.length > 0 ? this.rowToListing(result.rows[0]) : null;
    });
  }

  async insert(listing: ListingRecord): Promise<ListingRecord> {
    return this.run(dedupKeyOf(listing), async () => {
      const result = await this.pool.query<ListingRow>(
        `INSERT INTO listings (${LISTING_COLUMNS})
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14,
                 $15, $16, $17, $18, $19, $20, $21, $22, $23, $24, $25)
         RETURNING ${LISTING_COLUMNS}`,
        this.listingParams(listing)
      );
      return this.rowToListing(result.rows[0]);
    });
  }

  async update(
    listing: ListingRecord,
    expectedVersion: number,
    priceChange?: PriceHistoryEntry
  ): Promise<ListingRecord> {
    return this.run(listing.id, async () => {
      const client = await this.pool.connect();
      try {
        await client.query("BEGIN");

        const result = await client.query<ListingRow>(
          `UPDATE listings SET
             listing_url = $4, make = $5, model = $6, year = $7, price = $8,
             currency = $9, mileage = $10, fuel_type = $11, transmission = $12,
             body_type = $13, condition = $14, engine_power_kw = $15, city = $16,
             region = $17, lat = $18, lng = $19, first_seen_at = $20,
             last_updated_at = $21, last_seen_at = $22, content_hash = $23,
             is_active = $24, version = $25
           WHERE id = $1 AND source_website = $2 AND external_id = $3
             AND version = $26
           RETURNING ${LISTING_COLUMNS}`,
          [...this.listingParams(listing), expectedVersion]
        );

        if (result.rowCount === 0) {
          await client.query("ROLLBACK");
          throw new ConcurrentUpdateError("listing", listing.id, expectedVersion);
        }

        if (priceChange) await this.insertPriceChange(client, priceChange);

        await client.query("COMMIT");
        return this.rowToListing(result.rows[0]);
      } catch (error) {
        if (!(error instanceof ConcurrentUpdateError)) {
          await client.query("ROLLBACK").catch(() => undefined);
        }
        throw error;
      } finally {
        client.release();
      }
    });
  }

  async listPriceHistory(listingId: string): Promise<PriceHistoryEntry[]> {
    return this.run(listingId, async () => {
      const result = await this.pool.query<PriceHistoryRow>(
        `SELECT id, listing_id, old_price, new_price, change_pct, observed_at
         FROM price_history WHERE listing_id = $1 ORDER BY observed_at ASC`,
        [listingId]
      );
      return result.rows.map((row) => ({
        id: row.id,
        listingId: row.listing_id,
        oldPrice: row.old_price,
        newPrice: row.new_price,
        changePct: Number(row.change_pct),
        observedAt: row.observed_at.toISOString(),
      }));
    });
  }

  async listStaleActive(
    sources: string[],
    seenBefore: ISO
  ): Promise<ListingRecord[]> {
    return this.run("sweep", async () => {
      const result = await this.pool.query<ListingRow>(
        `SELECT ${LISTING_COLUMNS} FROM listings
         WHERE is_active AND source_website = ANY($1) AND last_seen_at < $2`,
        [sources, seenBefore]
      );
      return result.rows.map((row) => this.rowToListing(row));
    });
  }

  async markInactive(ids: string[], at: ISO): Promise<number> {
    return this.run("sweep", async () => {
      const result = await this.pool.query(
        `UPDATE listings SET is_active = FALSE, last_updated_at = $2, version = version + 1
         WHERE id = ANY($1) AND is_active`,
        [ids, at]
      );
      return result.rowCount ?? 0;
    });
  }

  async listRecent(since: ISO, limit: number): Promise<ListingRecord[]> {
    return this.run("recent", async () => {
      const result = await this.pool.query<ListingRow>(
        `SELECT ${LISTING_COLUMNS} FROM listings
         WHERE last_seen_at >= $1 ORDER BY last_seen_at DESC LIMIT $2`,
        [since, limit]
      );
      return result.rows.map((row) => this.rowToListing(row));
    });
  }

  private async insertPriceChange(
    client: PoolClient,
    e: PriceHistoryEntry
  ): Promise<void> {
    await client.query(
      `INSERT INTO price_history (id, listing_id, old_price, new_price, change_pct, observed_at)
       VALUES ($1, $2, $3, $4, $5, $6)`,
      [e.id, e.listingId, e.oldPrice, e.newPrice, e.changePct, e.observedAt]
    );
  }

  private async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw translateStoreError(error, "listing", key);
    }
  }

  private listingParams(l: ListingRecord): unknown[] {
    return [
      l.id,
      l.sourceWebsite,
      l.externalId,
      l.listingUrl ?? null,
      l.make,
      l.model,
      l.year ?? null,
      l.price,
      l.currency,
      l.mileage ?? null,
      l.fuelType ?? null,
      l.transmission ?? null,
      l.bodyType ?? null,
      l.condition ?? null,
      l.enginePowerKw ?? null,
      l.city ?? null,
      l.region ?? null,
      l.location?.lat ?? null,
      l.location?.lng ?? null,
      l.firstSeenAt,
      l.lastUpdatedAt,
      l.lastSeenAt,
      l.contentHash,
      l.isActive,
      l.version,
    ];
  }

  private rowToListing(row: ListingRow): ListingRecord {
    return {
      id: row.id,
      sourceWebsite: row.source_website,
      externalId: row.external_id,
      listingUrl: row.listing_url ?? undefined,
      make: row.make,
      model: row.model,
      year: row.year ?? undefined,
      price: row.price,
      currency: row.currency,
      mileage: row.mileage ?? undefined,
      fuelType: row.fuel_type ?? undefined,
      transmission: row.transmission ?? undefined,
      bodyType: row.body_type ?? undefined,
      condition: row.condition ?? undefined,
      enginePowerKw:
        row.engine_power_kw === null ? undefined : Number(row.engine_power_kw),
      city: row.city ?? undefined,
      region: row.region ?? undefined,
      location:
        row.lat !== null && row.lng !== null
          ? { lat: row.lat, lng: row.lng }
          : undefined,
      firstSeenAt: row.first_seen_at.toISOString(),
      lastUpdatedAt: row.last_updated_at.toISOString(),
      lastSeenAt: row.last_seen_at.toISOString(),
      contentHash: row.content_hash,
      isActive: row.is_active,
      version: row.version,
    };
  }
}
