import { describe, it, expect, vi, beforeEach } from 'vitest';

const mockEmbed = vi.fn();

// Mock the voyageai module before importing
vi.mock('voyageai', () => {
  return {
    VoyageAIClient: class {
      embed = mockEmbed;
      constructor(_opts: Record<string, unknown>) {}
    },
  };
});

import { createVoyageEmbedder, embedInBatches, embedQuery, type BatchEmbedOptions } from '../memory/embeddings.ts';
import { QueryEmbeddingError } from '../errors.ts';
import { fakeEmbedder, noSleep } from './helpers.ts';

const skip: BatchEmbedOptions = { batchSize: 2, failurePolicy: 'skip', maxRetries: 3, retryBaseMs: 10, sleep: noSleep };

describe('createVoyageEmbedder', () => {
  beforeEach(() => {
    mockEmbed.mockReset();
  });

  it('returns null without an API key', () => {
    expect(createVoyageEmbedder('', 'voyage-3')).toBeNull();
  });

  it('passes model and input type, and orders vectors by index', async () => {
    mockEmbed.mockResolvedValueOnce({
      data: [
        { embedding: [0.2, 0.2], index: 1 },
        { embedding: [0.1, 0.1], index: 0 },
      ],
    });

    const embedder = createVoyageEmbedder('test-key', 'voyage-3');
    const vectors = await embedder?.embed(['hello', 'world'], 'document');

    expect(mockEmbed).toHaveBeenCalledWith({ input: ['hello', 'world'], model: 'voyage-3', inputType: 'document' });
    expect(vectors).toEqual([[0.1, 0.1], [0.2, 0.2]]);
  });

  it('throws when an item has no embedding', async () => {
    mockEmbed.mockResolvedValueOnce({ data: [{ index: 0 }] });
    const embedder = createVoyageEmbedder('test-key', 'voyage-3');
    await expect(embedder?.embed(['hello'], 'query')).rejects.toThrow('no embedding');
  });
});

describe('embedInBatches', () => {
  it('embeds in fixed-size batches and preserves order', async () => {
    const embedder = fakeEmbedder((t) => [t.length, 0]);
    const result = await embedInBatches(['a', 'bb', 'ccc', 'dddd', 'eeeee'], embedder, skip);

    expect(embedder.calls.map((c) => c.texts)).toEqual([['a', 'bb'], ['ccc', 'dddd'], ['eeeee']]);
    expect(embedder.calls.every((c) => c.kind === 'document')).toBe(true);
    expect(result.vectors).toEqual([[1, 0], [2, 0], [3, 0], [4, 0], [5, 0]]);
    expect(result.positions).toEqual([0, 1, 2, 3, 4]);
    expect(result.batches).toBe(3);
    expect(result.skippedBatches).toBe(0);
  });

  it('skip policy drops a failed batch without retrying', async () => {
    const embedder = fakeEmbedder((t) => [t.length], [2]);
    const result = await embedInBatches(['a', 'bb', 'ccc', 'dddd', 'eeeee'], embedder, skip);

    expect(embedder.calls).toHaveLength(3);
    expect(result.positions).toEqual([0, 1, 4]);
    expect(result.vectors).toEqual([[1], [2], [5]]);
    expect(result.skippedBatches).toBe(1);
    expect(result.skippedTexts).toBe(2);
  });

  it('retry policy backs off exponentially and recovers', async () => {
    const sleep = vi.fn(noSleep);
    const embedder = fakeEmbedder((t) => [t.length], [1, 2]);
    const result = await embedInBatches(['a', 'bb'], embedder, {
      ...skip, failurePolicy: 'retry', maxRetries: 3, retryBaseMs: 100, sleep,
    });

    expect(embedder.calls).toHaveLength(3);
    expect(sleep.mock.calls.map((c) => c[0])).toEqual([100, 200]);
    expect(result.positions).toEqual([0, 1]);
    expect(result.skippedBatches).toBe(0);
  });

  it('retry policy drops the batch once retries run out', async () => {
    const embedder = fakeEmbedder((t) => [t.length], [1, 2, 3]);
    const result = await embedInBatches(['a', 'bb', 'ccc'], embedder, {
      ...skip, failurePolicy: 'retry', maxRetries: 2,
    });

    // batch 1 tried 3 times, batch 2 succeeds first time
    expect(embedder.calls).toHaveLength(4);
    expect(result.positions).toEqual([2]);
    expect(result.skippedBatches).toBe(1);
    expect(result.skippedTexts).toBe(2);
  });

  it('treats a short response as a failed batch', async () => {
    const embedder = {
      model: 'short',
      embed: async (texts: string[]) => texts.slice(1).map(() => [1]),
    };
    const result = await embedInBatches(['a', 'bb'], embedder, skip);
    expect(result.vectors).toEqual([]);
    expect(result.skippedBatches).toBe(1);
  });
});

describe('embedQuery', () => {
  it('embeds a single text as a query', async () => {
    const embedder = fakeEmbedder(() => [0.5, 0.5]);
    expect(await embedQuery('hello', embedder)).toEqual([0.5, 0.5]);
    expect(embedder.calls).toEqual([{ texts: ['hello'], kind: 'query' }]);
  });

  it('wraps failures in QueryEmbeddingError', async () => {
    const embedder = fakeEmbedder(() => [1], [1]);
    await expect(embedQuery('hello', embedder)).rejects.toBeInstanceOf(QueryEmbeddingError);
  });

  it('rejects an empty response', async () => {
    const embedder = { model: 'empty', embed: async () => [] };
    await expect(embedQuery('hello', embedder)).rejects.toThrow('empty response');
  });
});
