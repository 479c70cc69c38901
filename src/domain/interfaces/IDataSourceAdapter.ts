import type { FundRecord } from '@domain/entities/FundRecord';

/**
 * Data Source Adapter Interface
 * Layer: Domain
 * Pattern: Adapter Pattern
 *
 * The Adapter Pattern is like a travel power adapter — it converts one plug
 * shape (raw upstream data) into another (our FundRecord) so they fit
 * together. The orchestrator doesn't care whether the raw data came from a
 * product-screener JSON, a GraphQL endpoint, or a scraped HTML page; it just
 * calls `run()` and gets normalized records back.
 *
 * The generic `TRaw` type parameter lets each adapter declare what shape of
 * raw data its `fetch()` returns and its `parse()` accepts:
 *   - the iShares adapter is IDataSourceAdapter<ISharesScreenerPayload>
 *   - the Alpha Architect adapter is IDataSourceAdapter<string> (HTML text)
 *
 * Contract every implementation keeps:
 *   - `fetch()` does the network I/O and throws TransportError on failure.
 *   - `parse()` is pure. Bad items are dropped and counted, never thrown.
 *   - `run()` returns a fresh, complete list each call (no diffs). Zero
 *     records is a legitimate "no data" answer, not an error.
 */
export interface ParseResult {
  records: FundRecord[];
  /** Items the source listed but that could not be normalized. */
  dropped: number;
  /** Non-fatal problems, e.g. "page 3 of 5 failed, kept pages 1-2". */
  warnings: string[];
}

export interface IDataSourceAdapter<TRaw = unknown> {
  /** Stable source name; doubles as the dataset collection key. */
  identity(): string;
  fetch(): Promise<TRaw>;
  parse(raw: TRaw): ParseResult;
  run(): Promise<ParseResult>;
}
