/**
 * flat-index.ts: Exact (brute-force) L2 vector index
 *
 * Stores N float32 vectors of one dimension D in a single contiguous buffer.
 * Handle i is the i-th vector added; it lines up with metadata entry i.
 *
 * Search compares the query with every stored vector, so results are exact and
 * deterministic. Distances are squared Euclidean.
 *
 * An index built together with its metadata carries the SHA-256 digest of that
 * metadata file, so a loader can tell whether the two files belong together.
 *
 * On-disk format (little-endian):
 *   bytes 0-3   magic "FL2I"
 *   bytes 4-7   uint32 format version (2)
 *   bytes 8-11  uint32 dimension
 *   bytes 12-15 uint32 vector count
 *   bytes 16-47 metadata digest (all zero when the index has none)
 *   then count × dimension float32 values
 */

import { readFile, writeFile } from 'node:fs/promises';

const MAGIC = 'FL2I';
const FORMAT_VERSION = 2;
const DIGEST_OFFSET = 16;
const DIGEST_BYTES = 32;
const HEADER_BYTES = DIGEST_OFFSET + DIGEST_BYTES;
const HEX_DIGEST = /^[0-9a-f]{64}$/;

export interface Neighbor {
  handle: number;
  distance: number;
}

export class FlatL2Index {
  private data: Float32Array;
  private count: number;

  /** Hex SHA-256 of the metadata file built alongside, or null */
  readonly metadataDigest: string | null;

  constructor(readonly dimension: number, metadataDigest: string | null = null) {
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new Error(`Invalid index dimension: ${dimension}`);
    }
    if (metadataDigest !== null && !HEX_DIGEST.test(metadataDigest)) {
      throw new Error('Metadata digest must be 64 lowercase hex characters');
    }
    this.data = new Float32Array(0);
    this.count = 0;
    this.metadataDigest = metadataDigest;
  }

  /** Build an index from vectors; dimension comes from the first one */
  static fromVectors(vectors: readonly ArrayLike<number>[], metadataDigest: string | null = null): FlatL2Index {
    const [first] = vectors;
    if (!first) throw new Error('Cannot build an index from zero vectors');
    const index = new FlatL2Index(first.length, metadataDigest);
    index.add(vectors);
    return index;
  }

  get size(): number {
    return this.count;
  }

  /** Append vectors; handles continue from the current size */
  add(vectors: readonly ArrayLike<number>[]): void {
    for (const v of vectors) {
      if (v.length !== this.dimension) {
        throw new Error(`Vector dimension ${v.length} does not match index dimension ${this.dimension}`);
      }
    }

    const next = new Float32Array((this.count + vectors.length) * this.dimension);
    next.set(this.data.subarray(0, this.count * this.dimension));
    vectors.forEach((v, i) => next.set(v, (this.count + i) * this.dimension));
    this.data = next;
    this.count += vectors.length;
  }

  /** Copy of the stored vector for a handle */
  vector(handle: number): Float32Array | null {
    if (!Number.isInteger(handle) || handle < 0 || handle >= this.count) return null;
    return this.data.slice(handle * this.dimension, (handle + 1) * this.dimension);
  }

  /**
   * The k nearest stored vectors, closest first.
   * Equal distances keep ascending handle order. Empty index or k <= 0 → [].
   */
  search(query: ArrayLike<number>, k: number): Neighbor[] {
    if (query.length !== this.dimension) {
      throw new Error(`Query dimension ${query.length} does not match index dimension ${this.dimension}`);
    }
    if (this.count === 0 || k <= 0) return [];

    // Query is rounded to float32 like the stored vectors
    const q = Float32Array.from(query);
    const all: Neighbor[] = [];
    for (let h = 0; h < this.count; h++) {
      const offset = h * this.dimension;
      let sum = 0;
      for (let d = 0; d < this.dimension; d++) {
        const diff = (this.data[offset + d] ?? 0) - (q[d] ?? 0);
        sum += diff * diff;
      }
      all.push({ handle: h, distance: sum });
    }

    all.sort((a, b) => a.distance - b.distance || a.handle - b.handle);
    return all.slice(0, Math.min(k, this.count));
  }

  serialize(): Buffer {
    const body = this.count * this.dimension * 4;
    const buf = Buffer.alloc(HEADER_BYTES + body);
    buf.write(MAGIC, 0, 'ascii');
    buf.writeUInt32LE(FORMAT_VERSION, 4);
    buf.writeUInt32LE(this.dimension, 8);
    buf.writeUInt32LE(this.count, 12);
    if (this.metadataDigest) buf.write(this.metadataDigest, DIGEST_OFFSET, DIGEST_BYTES, 'hex');
    for (let i = 0; i < this.count * this.dimension; i++) {
      buf.writeFloatLE(this.data[i] ?? 0, HEADER_BYTES + i * 4);
    }
    return buf;
  }

  static deserialize(buf: Buffer): FlatL2Index {
    if (buf.length < HEADER_BYTES || buf.toString('ascii', 0, 4) !== MAGIC) {
      throw new Error('Not a flat L2 index file');
    }
    const version = buf.readUInt32LE(4);
    if (version !== FORMAT_VERSION) throw new Error(`Unsupported index format version ${version}`);

    const dimension = buf.readUInt32LE(8);
    const count = buf.readUInt32LE(12);
    const expected = HEADER_BYTES + count * dimension * 4;
    if (buf.length !== expected) {
      throw new Error(`Truncated index file: expected ${expected} bytes, got ${buf.length}`);
    }

    const digest = buf.subarray(DIGEST_OFFSET, HEADER_BYTES);
    const index = new FlatL2Index(dimension, digest.every((b) => b === 0) ? null : digest.toString('hex'));
    const data = new Float32Array(count * dimension);
    for (let i = 0; i < data.length; i++) {
      data[i] = buf.readFloatLE(HEADER_BYTES + i * 4);
    }
    index.data = data;
    index.count = count;
    return index;
  }
}

export async function saveIndex(index: FlatL2Index, path: string): Promise<void> {
  await writeFile(path, index.serialize());
}

export async function loadIndex(path: string): Promise<FlatL2Index> {
  return FlatL2Index.deserialize(await readFile(path));
}
