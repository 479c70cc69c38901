/**
 * Dataset Store Interface — The Data Lake Contract
 * Layer: Domain
 * Pattern: Repository Pattern
 *
 * This interface defines WHAT the orchestrator needs from persistence, without
 * saying HOW. The only implementation today (ChunkedFileStore) splits each
 * dataset into size-capped files under a root directory; tests may hand in an
 * in-memory double. Keys are always `(collection, kind)`; values are always a
 * full record list. There is no append and no partial update.
 *
 * Name validation is part of the contract: every method rejects a collection
 * or kind that fails sanitization with InvalidNameError, and that error is
 * allowed to propagate to the caller.
 */
import type { DatasetManifest, SerializationFormat } from '@domain/entities/DatasetManifest';

export interface IDatasetStore {
  /** Replace the dataset with `records`. Returns the manifest that was written. */
  save(
    collection: string,
    kind: string,
    records: readonly unknown[],
    format?: SerializationFormat,
  ): Promise<DatasetManifest>;

  /** Full dataset in stored order; `[]` when it was never written. */
  load(collection: string, kind: string): Promise<unknown[]>;

  /** Manifest only (no record bodies decoded); `null` when never written. */
  manifest(collection: string, kind: string): Promise<DatasetManifest | null>;

  /** Sanitized collection names that currently have a directory under the root. */
  listCollections(): Promise<string[]>;
}
