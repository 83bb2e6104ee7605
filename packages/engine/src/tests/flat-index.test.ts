import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { FlatL2Index, saveIndex, loadIndex } from '../memory/flat-index.ts';
import { tempDir } from './helpers.ts';

describe('FlatL2Index', () => {
  it('returns the nearest vector with its squared L2 distance', () => {
    const index = FlatL2Index.fromVectors([[0, 0], [10, 10]]);
    expect(index.search([1, 1], 1)).toEqual([{ handle: 0, distance: 2 }]);
  });

  it('orders results closest first', () => {
    const index = FlatL2Index.fromVectors([[5, 0], [1, 0], [3, 0]]);
    expect(index.search([0, 0], 3)).toEqual([
      { handle: 1, distance: 1 },
      { handle: 2, distance: 9 },
      { handle: 0, distance: 25 },
    ]);
  });

  it('returns everything when k exceeds the size', () => {
    const index = FlatL2Index.fromVectors([[0, 1], [1, 0]]);
    expect(index.search([0, 0], 20)).toHaveLength(2);
  });

  it('returns [] for an empty index or k <= 0', () => {
    expect(new FlatL2Index(3).search([0, 0, 0], 5)).toEqual([]);
    expect(FlatL2Index.fromVectors([[1, 1, 1]]).search([0, 0, 0], 0)).toEqual([]);
  });

  it('breaks distance ties by handle', () => {
    const index = FlatL2Index.fromVectors([[1, 0], [-1, 0], [0, 1]]);
    expect(index.search([0, 0], 3).map((n) => n.handle)).toEqual([0, 1, 2]);
  });

  it('is deterministic across repeated searches', () => {
    const index = FlatL2Index.fromVectors([[0.3, 0.1], [0.2, 0.9], [0.7, 0.7], [0.1, 0.1]]);
    const first = index.search([0.25, 0.5], 3);
    const second = index.search([0.25, 0.5], 3);
    expect(second).toEqual(first);
    expect(first.every((n) => n.distance >= 0)).toBe(true);
  });

  it('rejects mismatched dimensions', () => {
    expect(() => FlatL2Index.fromVectors([[1, 2], [1, 2, 3]])).toThrow('does not match');
    expect(() => FlatL2Index.fromVectors([[1, 2]]).search([1, 2, 3], 1)).toThrow('Query dimension');
    expect(() => FlatL2Index.fromVectors([])).toThrow('zero vectors');
  });

  it('appends with continuing handles', () => {
    const index = new FlatL2Index(2);
    index.add([[0, 0]]);
    index.add([[4, 4], [2, 2]]);
    expect(index.size).toBe(3);
    expect(Array.from(index.vector(2) ?? [])).toEqual([2, 2]);
    expect(index.vector(3)).toBeNull();
  });
});

describe('serialization', () => {
  it('writes the header and float32 body', () => {
    const buf = FlatL2Index.fromVectors([[1.5, -2]]).serialize();
    expect(buf.toString('ascii', 0, 4)).toBe('FL2I');
    expect(buf.readUInt32LE(4)).toBe(2);
    expect(buf.readUInt32LE(8)).toBe(2);
    expect(buf.readUInt32LE(12)).toBe(1);
    expect(buf.subarray(16, 48).every((b) => b === 0)).toBe(true);
    expect(buf.readFloatLE(48)).toBe(1.5);
    expect(buf.readFloatLE(52)).toBe(-2);
    expect(buf.length).toBe(56);
  });

  it('carries the metadata digest through a save and load', async () => {
    const digest = 'ab'.repeat(32);
    const path = join(await tempDir(), 'stamped.index');
    await saveIndex(FlatL2Index.fromVectors([[1, 2]], digest), path);

    const loaded = await loadIndex(path);
    expect(loaded.metadataDigest).toBe(digest);
    expect(FlatL2Index.deserialize(FlatL2Index.fromVectors([[1, 2]]).serialize()).metadataDigest).toBeNull();
  });

  it('refuses malformed digests and older format versions', () => {
    expect(() => FlatL2Index.fromVectors([[1, 2]], 'not-hex')).toThrow('64 lowercase hex');
    const v1 = FlatL2Index.fromVectors([[1, 2]]).serialize();
    v1.writeUInt32LE(1, 4);
    expect(() => FlatL2Index.deserialize(v1)).toThrow('Unsupported index format version 1');
  });

  it('loads back to a query-equivalent index', async () => {
    const original = FlatL2Index.fromVectors([[0.1, 0.2, 0.3], [0.9, 0.8, 0.7], [0.33, 0.33, 0.33]]);
    const path = join(await tempDir(), 'test.index');
    await saveIndex(original, path);
    const loaded = await loadIndex(path);

    expect(loaded.dimension).toBe(3);
    expect(loaded.size).toBe(3);
    expect(loaded.serialize().equals(original.serialize())).toBe(true);
    expect(loaded.search([0.3, 0.3, 0.3], 3)).toEqual(original.search([0.3, 0.3, 0.3], 3));
  });

  it('rejects foreign or truncated files', () => {
    expect(() => FlatL2Index.deserialize(Buffer.from('not an index file'))).toThrow('Not a flat L2 index');
    const truncated = FlatL2Index.fromVectors([[1, 2]]).serialize().subarray(0, 52);
    expect(() => FlatL2Index.deserialize(truncated)).toThrow('Truncated');
  });
});
