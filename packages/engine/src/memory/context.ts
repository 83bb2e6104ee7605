/**
 * context.ts: Loaded data for a query session
 *
 * Index, metadata, insight cache and archive are loaded together once and
 * passed explicitly to whatever serves queries. The pair index/metadata is only
 * accepted when it lines up: same count, and the index stamped with the digest
 * of this metadata. A rebuild means building a new context from both files,
 * never swapping one of them.
 */

import type { MessageRecord } from '@threadseek/shared';
import { FlatL2Index, loadIndex } from './flat-index.ts';
import { MetadataStore, loadMetadata } from './metadata-store.ts';
import { InsightCache } from './insights.ts';
import { loadRecords } from '../records/loader.ts';
import { logger, errMessage } from '../logger.ts';

export interface SearchContext {
  metadata: MetadataStore;
  /** null → search is refused */
  index: FlatL2Index | null;
  insights: InsightCache;
  /**
   * Records used to rebuild threads. The full source archive when it could be
   * read (so non-indexed messages still show up in context), else the metadata.
   */
  archive: readonly MessageRecord[];
}

export interface ContextPaths {
  indexPath: string;
  metadataPath: string;
  insightsPath: string;
  recordsPath?: string;
}

export function createSearchContext(parts: {
  metadata: MetadataStore;
  index: FlatL2Index | null;
  insights?: InsightCache;
  archive?: readonly MessageRecord[];
}): SearchContext {
  let index = parts.index;
  if (index && index.size !== parts.metadata.size) {
    logger.error(
      { vectors: index.size, records: parts.metadata.size },
      'Index and metadata are out of step: search disabled until the index is rebuilt',
    );
    index = null;
  } else if (index && index.metadataDigest !== null && index.metadataDigest !== parts.metadata.digest()) {
    logger.error(
      { indexDigest: index.metadataDigest, metadataDigest: parts.metadata.digest() },
      'Index and metadata come from different builds: search disabled until the index is rebuilt',
    );
    index = null;
  }

  return {
    metadata: parts.metadata,
    index,
    insights: parts.insights ?? new InsightCache(null),
    archive: parts.archive ?? parts.metadata.all(),
  };
}

export async function loadSearchContext(paths: ContextPaths): Promise<SearchContext> {
  const metadata = await loadMetadata(paths.metadataPath);

  let index: FlatL2Index | null = null;
  try {
    const loaded = await loadIndex(paths.indexPath);
    if (loaded.metadataDigest === null) throw new Error('Index file is not stamped with a metadata digest');
    index = loaded;
    logger.info({ path: paths.indexPath, vectors: index.size, dimension: index.dimension }, 'Index loaded');
  } catch (err) {
    logger.warn({ path: paths.indexPath, err: errMessage(err) }, 'Index unavailable: search disabled');
  }

  const insights = await InsightCache.load(paths.insightsPath);

  let archive: readonly MessageRecord[] | undefined;
  if (paths.recordsPath) {
    try {
      archive = (await loadRecords(paths.recordsPath)).records;
    } catch (err) {
      logger.warn({ err: errMessage(err) }, 'Archive unavailable: threads rebuilt from indexed records only');
    }
  }

  return createSearchContext({ metadata, index, insights, archive });
}
