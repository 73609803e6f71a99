// Where a pass gets its raw records: the normalizer's output for one scrape
export interface ListingSource {
  readonly name: string;
  fetchBatch(): Promise<unknown[]>;
}
