/**
 * Dataset Manifest — Segmentation + Freshness Metadata
 * Layer: Domain
 *
 * Every dataset `(collection, kind)` on disk has exactly one manifest,
 * `<kind>_metadata.json`, always JSON regardless of the segment format. It is
 * the only file the freshness check reads, and the only file `load()` trusts
 * for how many segments exist.
 *
 *   chunked = false → one segment `<kind>.<ext>`, named in `file`.
 *   chunked = true  → `chunkCount` segments `<kind>_part<N>.<ext>`, listed
 *                      in `chunks` in index order.
 *
 * The schema is used when reading a manifest back, so a hand-edited or
 * truncated manifest surfaces as a StorageIOError instead of NaN counts.
 */
import { z } from 'zod/v4';

export const SERIALIZATION_FORMATS = ['json', 'msgpack'] as const;
export type SerializationFormat = (typeof SERIALIZATION_FORMATS)[number];

export const segmentInfoSchema = z.object({
  file: z.string().min(1),
  count: z.number().int().nonnegative(),
  bytes: z.number().int().nonnegative(),
});

export type SegmentInfo = z.infer<typeof segmentInfoSchema>;

export const datasetManifestSchema = z.object({
  collection: z.string().min(1),
  kind: z.string().min(1),
  updatedAt: z.iso.datetime(),
  recordCount: z.number().int().nonnegative(),
  totalBytes: z.number().int().nonnegative(),
  format: z.enum(SERIALIZATION_FORMATS),
  chunked: z.boolean(),
  file: z.string().min(1).optional(),
  chunkCount: z.number().int().positive().optional(),
  chunks: z.array(segmentInfoSchema).optional(),
});

export type DatasetManifest = z.infer<typeof datasetManifestSchema>;
