/**
 * Chunked File Store — Size-Capped Flat-File Data Lake
 * Layer: Infrastructure
 * Pattern: Repository (implements IDatasetStore)
 *
 * Each dataset `(collection, kind)` lives in `<root>/<collection>/`:
 *
 *   <kind>.<ext>              one segment   (serialized size ≤ ceiling)
 *   <kind>_part<N>.<ext>      N = 0..k-1    (anything bigger)
 *   <kind>_metadata.json      the manifest, always JSON
 *
 * The ceiling exists because the lake is committed to a host with a per-file
 * size cap. Splitting is greedy: keep adding records to the current segment
 * while its exact serialized size stays within the ceiling, then start the
 * next one. A single record bigger than the ceiling still gets a segment of
 * its own; records are never split.
 *
 * Write protocol:
 *   1. every segment goes to a temp file and is renamed into place;
 *   2. the manifest is written last, also temp + rename;
 *   3. segment files of this kind that the new manifest does not reference
 *      (an older, longer part list, or the other format) are deleted.
 *
 * Renames alone cannot swap a multi-file dataset in one step, so `save`,
 * `load` and `manifest` on the same `(collection, kind)` run one at a time,
 * in call order. A load queued behind a save reads the complete new
 * generation; a load already running finishes on the old one before the
 * save touches a file. Two saves never interleave, so one save's stale-file
 * purge cannot delete segments another save's manifest names. The queue is
 * per store instance: one process, one ChunkedFileStore per data directory.
 *
 * Failures: name problems throw InvalidNameError before any I/O; anything
 * the filesystem throws is wrapped in StorageIOError with the path.
 */
import { randomUUID } from 'crypto';
import type { Dirent } from 'fs';
import { mkdir, readdir, readFile, rename, rm, writeFile } from 'fs/promises';
import path from 'path';

import {
  type DatasetManifest,
  datasetManifestSchema,
  type SegmentInfo,
  type SerializationFormat,
} from '@domain/entities/DatasetManifest';
import type { IDatasetStore } from '@domain/interfaces/IDatasetStore';
import { StorageIOError } from '@shared/errors/AppError';
import { MANIFEST_SUFFIX } from '@shared/constants';

import { codecFor, type SegmentCodec } from './codecs';
import { resolveWithin, sanitize } from './sanitize';

export interface ChunkedFileStoreOptions {
  rootDir: string;
  maxSegmentBytes: number;
  defaultFormat: SerializationFormat;
  /** Clock for `updatedAt`; tests pin it. */
  now?: () => Date;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export function segmentFileName(kind: string, extension: string, index?: number): string {
  return index === undefined ? `${kind}.${extension}` : `${kind}_part${index}.${extension}`;
}

/**
 * Greedy split: a record joins the current group unless that would push the
 * group's serialized size over `maxBytes`. An empty group always accepts.
 */
export function splitIntoSegments(
  records: readonly unknown[],
  codec: SegmentCodec,
  maxBytes: number,
): unknown[][] {
  const groups: unknown[][] = [];
  let current: unknown[] = [];
  let currentItemBytes = 0;

  for (const record of records) {
    const size = codec.itemSize(record);
    const projected = codec.arrayOverhead(current.length + 1) + currentItemBytes + size;

    if (current.length > 0 && projected > maxBytes) {
      groups.push(current);
      current = [];
      currentItemBytes = 0;
    }

    current.push(record);
    currentItemBytes += size;
  }

  if (current.length > 0) groups.push(current);
  return groups;
}

export class ChunkedFileStore implements IDatasetStore {
  private readonly rootDir: string;
  private readonly maxSegmentBytes: number;
  private readonly defaultFormat: SerializationFormat;
  private readonly now: () => Date;
  /** Tail of the operation queue per `collection/kind`. */
  private readonly queues = new Map<string, Promise<void>>();

  constructor(options: ChunkedFileStoreOptions) {
    this.rootDir = path.resolve(options.rootDir);
    this.maxSegmentBytes = options.maxSegmentBytes;
    this.defaultFormat = options.defaultFormat;
    this.now = options.now ?? (() => new Date());
  }

  async save(
    collection: string,
    kind: string,
    records: readonly unknown[],
    format: SerializationFormat = this.defaultFormat,
  ): Promise<DatasetManifest> {
    const safeCollection = sanitize(collection);
    const safeKind = sanitize(kind);
    return this.exclusive(safeCollection, safeKind, () =>
      this.write(safeCollection, safeKind, records, format),
    );
  }

  async load(collection: string, kind: string): Promise<unknown[]> {
    const safeCollection = sanitize(collection);
    const safeKind = sanitize(kind);
    return this.exclusive(safeCollection, safeKind, () => this.read(safeCollection, safeKind));
  }

  async manifest(collection: string, kind: string): Promise<DatasetManifest | null> {
    const safeCollection = sanitize(collection);
    const safeKind = sanitize(kind);
    return this.exclusive(safeCollection, safeKind, () =>
      this.readManifest(safeCollection, safeKind),
    );
  }

  async listCollections(): Promise<string[]> {
    let entries: Dirent[];
    try {
      entries = await readdir(this.rootDir, { withFileTypes: true });
    } catch (err) {
      if (isNotFound(err)) return [];
      throw new StorageIOError(`Failed to list ${this.rootDir}`, { path: this.rootDir, cause: err });
    }

    return entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .filter((name) => {
        try {
          return sanitize(name) === name;
        } catch {
          return false;
        }
      })
      .sort();
  }

  /** Runs `work` once every earlier operation on the same dataset has settled. */
  private exclusive<T>(collection: string, kind: string, work: () => Promise<T>): Promise<T> {
    const key = `${collection}/${kind}`;
    const previous = this.queues.get(key) ?? Promise.resolve();
    const run = previous.then(work);
    // The caller sees a rejection through `run`; the queue only waits for it to settle.
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.queues.set(key, tail);
    void tail.then(() => {
      if (this.queues.get(key) === tail) this.queues.delete(key);
    });
    return run;
  }

  private async write(
    safeCollection: string,
    safeKind: string,
    records: readonly unknown[],
    format: SerializationFormat,
  ): Promise<DatasetManifest> {
    const dir = resolveWithin(this.rootDir, safeCollection);
    const codec = codecFor(format);

    const serialized = codec.encode(records);
    const base = {
      collection: safeCollection,
      kind: safeKind,
      updatedAt: this.now().toISOString(),
      recordCount: records.length,
      totalBytes: serialized.byteLength,
      format,
    };

    await this.ensureDir(dir);

    let manifest: DatasetManifest;
    if (serialized.byteLength <= this.maxSegmentBytes) {
      const file = segmentFileName(safeKind, codec.extension);
      await this.writeAtomic(path.join(dir, file), serialized);
      manifest = { ...base, chunked: false, file };
    } else {
      const groups = splitIntoSegments(records, codec, this.maxSegmentBytes);
      const chunks: SegmentInfo[] = [];

      for (const [index, group] of groups.entries()) {
        const file = segmentFileName(safeKind, codec.extension, index);
        const bytes = codec.encode(group);
        await this.writeAtomic(path.join(dir, file), bytes);
        chunks.push({ file, count: group.length, bytes: bytes.byteLength });
      }

      manifest = { ...base, chunked: true, chunkCount: chunks.length, chunks };
    }

    const manifestPath = path.join(dir, `${safeKind}${MANIFEST_SUFFIX}`);
    await this.writeAtomic(manifestPath, Buffer.from(JSON.stringify(manifest, null, 2), 'utf-8'));
    await this.removeStaleSegments(dir, safeKind, manifest);

    return manifest;
  }

  private async read(safeCollection: string, safeKind: string): Promise<unknown[]> {
    const manifest = await this.readManifest(safeCollection, safeKind);
    if (!manifest) return [];

    const dir = resolveWithin(this.rootDir, safeCollection);
    const codec = codecFor(manifest.format);

    if (!manifest.chunked) {
      const items = await this.readSegment(
        path.join(dir, segmentFileName(safeKind, codec.extension)),
        codec,
      );
      return this.checkCount(manifest, items);
    }

    const chunkCount = manifest.chunkCount ?? manifest.chunks?.length ?? 0;
    const all: unknown[] = [];
    for (let index = 0; index < chunkCount; index++) {
      const file = path.join(dir, segmentFileName(safeKind, codec.extension, index));
      all.push(...(await this.readSegment(file, codec)));
    }
    return this.checkCount(manifest, all);
  }

  private async readManifest(
    safeCollection: string,
    safeKind: string,
  ): Promise<DatasetManifest | null> {
    const manifestPath = resolveWithin(this.rootDir, safeCollection, `${safeKind}${MANIFEST_SUFFIX}`);

    let text: string;
    try {
      text = await readFile(manifestPath, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) return null;
      throw new StorageIOError(`Failed to read manifest ${manifestPath}`, {
        path: manifestPath,
        cause: err,
      });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new StorageIOError(`Manifest is not valid JSON: ${manifestPath}`, {
        path: manifestPath,
        cause: err,
      });
    }

    const parsed = datasetManifestSchema.safeParse(raw);
    if (!parsed.success) {
      throw new StorageIOError(`Manifest has an unexpected shape: ${manifestPath}`, {
        path: manifestPath,
        cause: parsed.error,
      });
    }
    return parsed.data;
  }

  private async ensureDir(dir: string): Promise<void> {
    try {
      await mkdir(dir, { recursive: true });
    } catch (err) {
      throw new StorageIOError(`Failed to create ${dir}`, { path: dir, cause: err });
    }
  }

  private async writeAtomic(target: string, data: Uint8Array): Promise<void> {
    const tmp = `${target}.${randomUUID()}.tmp`;
    try {
      await writeFile(tmp, data);
      await rename(tmp, target);
    } catch (err) {
      await rm(tmp, { force: true });
      throw new StorageIOError(`Failed to write ${target}`, { path: target, cause: err });
    }
  }

  private async readSegment(file: string, codec: SegmentCodec): Promise<unknown[]> {
    let bytes: Buffer;
    try {
      bytes = await readFile(file);
    } catch (err) {
      throw new StorageIOError(`Failed to read segment ${file}`, { path: file, cause: err });
    }

    let decoded: unknown;
    try {
      decoded = codec.decode(bytes);
    } catch (err) {
      throw new StorageIOError(`Segment is not valid ${codec.format}: ${file}`, {
        path: file,
        cause: err,
      });
    }

    if (!Array.isArray(decoded)) {
      throw new StorageIOError(`Segment does not hold an array: ${file}`, { path: file });
    }
    return decoded;
  }

  private checkCount(manifest: DatasetManifest, items: unknown[]): unknown[] {
    if (items.length !== manifest.recordCount) {
      throw new StorageIOError(
        `Dataset ${manifest.collection}/${manifest.kind} holds ${items.length} records, manifest says ${manifest.recordCount}`,
      );
    }
    return items;
  }

  /** Deletes `<kind>.<ext>` / `<kind>_part<N>.<ext>` files the manifest does not name. */
  private async removeStaleSegments(
    dir: string,
    kind: string,
    manifest: DatasetManifest,
  ): Promise<void> {
    const keep = new Set(
      manifest.chunked ? (manifest.chunks ?? []).map((chunk) => chunk.file) : [manifest.file],
    );
    const escapedKind = kind.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    const segmentPattern = new RegExp(`^${escapedKind}(_part\\d+)?\\.(json|msgpack)$`);

    let files: string[];
    try {
      files = await readdir(dir);
    } catch (err) {
      throw new StorageIOError(`Failed to list ${dir}`, { path: dir, cause: err });
    }

    const stale = files.filter((file) => segmentPattern.test(file) && !keep.has(file));
    for (const file of stale) {
      const target = path.join(dir, file);
      try {
        await rm(target, { force: true });
      } catch (err) {
        throw new StorageIOError(`Failed to remove stale segment ${target}`, {
          path: target,
          cause: err,
        });
      }
    }
  }
}
