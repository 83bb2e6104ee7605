/**
 * indexer.ts: Archive → embeddings → flat index + metadata
 *
 * Sanitize the records, embed the eligible texts batch by batch, and keep
 * exactly the records whose text got a vector, in the same order as the
 * vectors. The index is stamped with the digest of the metadata file, so a
 * pair left half-replaced by a crash between the two renames is refused at load.
 */

import { mkdir, rename } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { EligibleRecord, MessageRecord } from '@threadseek/shared';
import { sanitizeRecords, type ExclusionReason, type TokenCounter } from './records/sanitizer.ts';
import { loadRecords } from './records/loader.ts';
import { embedInBatches, defaultBatchOptions, type BatchEmbedOptions, type EmbeddingProvider } from './memory/embeddings.ts';
import { FlatL2Index, saveIndex } from './memory/flat-index.ts';
import { MetadataStore, saveMetadata } from './memory/metadata-store.ts';
import { IndexBuildError } from './errors.ts';
import { config } from './config.ts';
import { logger } from './logger.ts';

export interface BuildOptions {
  maxTokens: number;
  countTokens?: TokenCounter;
  batch: BatchEmbedOptions;
}

export interface BuildReport {
  sourceRecords: number;
  eligible: number;
  excluded: Record<ExclusionReason, number>;
  embedded: number;
  skippedBatches: number;
  skippedTexts: number;
  dimension: number;
}

export interface BuildResult {
  index: FlatL2Index;
  metadata: MetadataStore;
  report: BuildReport;
}

export function defaultBuildOptions(): BuildOptions {
  return { maxTokens: config.embedMaxTokens, batch: defaultBatchOptions() };
}

export async function buildIndex(
  records: readonly MessageRecord[],
  provider: EmbeddingProvider,
  options: BuildOptions = defaultBuildOptions(),
): Promise<BuildResult> {
  const sanitized = sanitizeRecords(records, { maxTokens: options.maxTokens, countTokens: options.countTokens });
  logger.info({ eligible: sanitized.records.length, excluded: sanitized.excluded }, 'Records ready for embedding');

  if (sanitized.records.length === 0) {
    throw new IndexBuildError('No eligible records to embed');
  }

  const embedded = await embedInBatches(sanitized.texts, provider, options.batch);
  if (embedded.vectors.length === 0) {
    throw new IndexBuildError(`No embeddings created (${embedded.skippedBatches} batches failed)`);
  }

  const kept: EligibleRecord[] = [];
  for (const position of embedded.positions) {
    const record = sanitized.records[position];
    if (!record) throw new IndexBuildError(`Embedding position ${position} has no record`);
    kept.push(record);
  }

  const metadata = new MetadataStore(kept);
  const index = FlatL2Index.fromVectors(embedded.vectors, metadata.digest());

  return {
    index,
    metadata,
    report: {
      sourceRecords: records.length,
      eligible: sanitized.records.length,
      excluded: sanitized.excluded,
      embedded: embedded.vectors.length,
      skippedBatches: embedded.skippedBatches,
      skippedTexts: embedded.skippedTexts,
      dimension: index.dimension,
    },
  };
}

/** Write index + metadata as a pair: both temp files complete before either rename */
export async function writeIndexArtifacts(
  result: Pick<BuildResult, 'index' | 'metadata'>,
  paths: { indexPath: string; metadataPath: string },
): Promise<void> {
  if (result.index.metadataDigest !== result.metadata.digest()) {
    throw new IndexBuildError('Index is not stamped with this metadata');
  }

  await mkdir(dirname(paths.indexPath), { recursive: true });
  await mkdir(dirname(paths.metadataPath), { recursive: true });

  const indexTmp = `${paths.indexPath}.tmp`;
  const metadataTmp = `${paths.metadataPath}.tmp`;
  await saveIndex(result.index, indexTmp);
  await saveMetadata(result.metadata, metadataTmp);

  await rename(indexTmp, paths.indexPath);
  await rename(metadataTmp, paths.metadataPath);
}

/** Full build from the records file on disk */
export async function runIndexBuild(
  paths: { recordsPath: string; indexPath: string; metadataPath: string },
  provider: EmbeddingProvider,
  options: BuildOptions = defaultBuildOptions(),
): Promise<BuildReport> {
  const { records } = await loadRecords(paths.recordsPath);
  const result = await buildIndex(records, provider, options);
  await writeIndexArtifacts(result, paths);

  logger.info({ ...result.report, indexPath: paths.indexPath, metadataPath: paths.metadataPath }, 'Index built');
  if (result.report.skippedBatches > 0) {
    logger.warn(
      { skippedBatches: result.report.skippedBatches, skippedTexts: result.report.skippedTexts },
      'Some batches were dropped: those messages are not searchable',
    );
  }
  return result.report;
}
