/**
 * Segment Codecs — JSON and MessagePack
 * Layer: Infrastructure (storage)
 *
 * A segment is one serialized array. Besides encode/decode, each codec can
 * tell the exact byte size of an array before building it:
 *
 *   size(array of n items) = arrayOverhead(n) + Σ itemSize(item)
 *
 * That identity is what lets the store split greedily without re-encoding
 * the growing group on every step, and still promise that a segment's real
 * size matches what the split predicted.
 *
 *   JSON (compact):  "[" + items joined by "," + "]"  → 2 + (n - 1) bytes
 *   MessagePack:     fixarray / array16 / array32 header → 1, 3 or 5 bytes
 */
import { decode as msgpackDecode, encode as msgpackEncode } from '@msgpack/msgpack';

import type { SerializationFormat } from '@domain/entities/DatasetManifest';
import { FILE_EXTENSIONS } from '@shared/constants';

export interface SegmentCodec {
  readonly format: SerializationFormat;
  readonly extension: string;
  encode(items: readonly unknown[]): Uint8Array;
  decode(bytes: Uint8Array): unknown;
  itemSize(item: unknown): number;
  arrayOverhead(count: number): number;
}

function stringifyItem(item: unknown): string {
  // JSON.stringify(undefined) is undefined, but inside an array it becomes null.
  return JSON.stringify(item) ?? 'null';
}

export const jsonCodec: SegmentCodec = {
  format: 'json',
  extension: FILE_EXTENSIONS.json,
  encode: (items) => Buffer.from(JSON.stringify(items), 'utf-8'),
  decode: (bytes) => JSON.parse(Buffer.from(bytes).toString('utf-8')),
  itemSize: (item) => Buffer.byteLength(stringifyItem(item), 'utf-8'),
  arrayOverhead: (count) => (count === 0 ? 2 : 2 + (count - 1)),
};

export const msgpackCodec: SegmentCodec = {
  format: 'msgpack',
  extension: FILE_EXTENSIONS.msgpack,
  encode: (items) => msgpackEncode(items),
  decode: (bytes) => msgpackDecode(bytes),
  itemSize: (item) => msgpackEncode(item).byteLength,
  arrayOverhead: (count) => {
    if (count <= 0x0f) return 1;
    if (count <= 0xffff) return 3;
    return 5;
  },
};

export function codecFor(format: SerializationFormat): SegmentCodec {
  return format === 'msgpack' ? msgpackCodec : jsonCodec;
}
