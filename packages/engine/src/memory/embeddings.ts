/**
 * embeddings.ts: Voyage AI embedding client
 *
 * Wraps Voyage AI's embed endpoint behind a small EmbeddingProvider interface
 * so the indexer and the query engine can be driven by a fake in tests.
 *
 * Indexing goes through embedInBatches(): fixed-size batches, one request at a
 * time. A failed batch is either dropped straight away ('skip') or retried with
 * exponential backoff and dropped once retries run out ('retry'). Either way the
 * result says which input positions actually got a vector.
 */

import { VoyageAIClient } from 'voyageai';
import { config } from '../config.ts';
import { logger, errMessage } from '../logger.ts';
import { QueryEmbeddingError } from '../errors.ts';

export type EmbedInputKind = 'document' | 'query';

export interface EmbeddingProvider {
  readonly model: string;
  /** One vector per text, same order. Throws on service failure. */
  embed(texts: string[], kind: EmbedInputKind): Promise<number[][]>;
}

export function createVoyageEmbedder(
  apiKey: string = config.voyageApiKey,
  model: string = config.embedModel,
): EmbeddingProvider | null {
  if (!apiKey) return null;
  const client = new VoyageAIClient({ apiKey });

  return {
    model,
    async embed(texts, kind) {
      const response = await client.embed({ input: texts, model, inputType: kind });
      const data = [...(response.data ?? [])].sort((a, b) => (a.index ?? 0) - (b.index ?? 0));
      return data.map((d, i) => {
        if (!d.embedding) throw new Error(`Voyage returned no embedding for input ${i}`);
        return d.embedding;
      });
    },
  };
}

export type BatchFailurePolicy = 'skip' | 'retry';

export interface BatchEmbedOptions {
  batchSize: number;
  failurePolicy: BatchFailurePolicy;
  maxRetries: number;
  retryBaseMs: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface BatchEmbedResult {
  vectors: number[][];
  /** positions[i] is the index into the input texts that vectors[i] belongs to */
  positions: number[];
  batches: number;
  skippedBatches: number;
  skippedTexts: number;
}

export function defaultBatchOptions(): BatchEmbedOptions {
  return {
    batchSize: config.embedBatchSize,
    failurePolicy: config.embedFailurePolicy,
    maxRetries: config.embedMaxRetries,
    retryBaseMs: config.embedRetryBaseMs,
  };
}

const wait = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

async function embedBatch(
  batch: string[],
  batchNumber: number,
  provider: EmbeddingProvider,
  options: BatchEmbedOptions,
): Promise<number[][] | null> {
  const sleep = options.sleep ?? wait;
  const attempts = options.failurePolicy === 'retry' ? options.maxRetries + 1 : 1;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      const vectors = await provider.embed(batch, 'document');
      if (vectors.length !== batch.length) {
        throw new Error(`expected ${batch.length} vectors, got ${vectors.length}`);
      }
      return vectors;
    } catch (err) {
      const last = attempt === attempts;
      logger.warn(
        { batch: batchNumber, attempt, attempts, err: errMessage(err) },
        last ? 'Embedding batch failed: skipping' : 'Embedding batch failed: retrying',
      );
      if (!last) {
        // Exponential backoff: base, 2×base, 4×base, ...
        await sleep(options.retryBaseMs * Math.pow(2, attempt - 1));
      }
    }
  }
  return null;
}

/**
 * Embed texts in order, batch by batch. Never throws for a service failure:
 * dropped batches show up in skippedBatches/skippedTexts and are absent from positions.
 */
export async function embedInBatches(
  texts: readonly string[],
  provider: EmbeddingProvider,
  options: BatchEmbedOptions = defaultBatchOptions(),
): Promise<BatchEmbedResult> {
  const size = Math.max(1, options.batchSize);
  const result: BatchEmbedResult = { vectors: [], positions: [], batches: 0, skippedBatches: 0, skippedTexts: 0 };

  for (let start = 0; start < texts.length; start += size) {
    const batch = texts.slice(start, start + size);
    const batchNumber = result.batches + 1;
    result.batches++;

    const vectors = await embedBatch(batch, batchNumber, provider, options);
    if (!vectors) {
      result.skippedBatches++;
      result.skippedTexts += batch.length;
      continue;
    }

    vectors.forEach((vector, offset) => {
      result.vectors.push(vector);
      result.positions.push(start + offset);
    });
    logger.info({ batch: batchNumber, size: batch.length }, 'Embedded batch');
  }

  return result;
}

/** Embed a single search query. Any failure surfaces as QueryEmbeddingError. */
export async function embedQuery(text: string, provider: EmbeddingProvider): Promise<number[]> {
  let vectors: number[][];
  try {
    vectors = await provider.embed([text], 'query');
  } catch (err) {
    throw new QueryEmbeddingError(`Query embedding failed: ${errMessage(err)}`);
  }

  const [vector] = vectors;
  if (!vector || vector.length === 0) {
    throw new QueryEmbeddingError('Query embedding failed: empty response');
  }
  return vector;
}
