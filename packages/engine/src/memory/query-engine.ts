/**
 * query-engine.ts: Free-text search over the indexed archive
 *
 *   1. Blank query → [] (nothing embedded, nothing searched)
 *   2. Embed the query (failure → QueryEmbeddingError, never partial results;
 *      a vector of another dimension than the index → SearchUnavailableError)
 *   3. Pull an oversized candidate set from the index
 *   4. Drop out-of-bounds handles, then role/date mismatches
 *   5. Truncate to maxResults, keeping ascending distance order
 *   6. Attach the hit's conversation thread and cached insight
 */

import type { ConversationContext, EligibleRecord, MessageRecord, RoleFilter, SearchHit, SearchOptions } from '@threadseek/shared';
import type { SearchContext } from './context.ts';
import type { EmbeddingProvider } from './embeddings.ts';
import type { Neighbor } from './flat-index.ts';
import { embedQuery } from './embeddings.ts';
import { reconstructConversation } from './conversations.ts';
import { recordDay } from '../records/loader.ts';
import { SearchUnavailableError } from '../errors.ts';
import { logger } from '../logger.ts';

export const DEFAULT_CANDIDATES = 20;
export const DEFAULT_MAX_RESULTS = 10;

export function matchesRole(role: string, filter: RoleFilter): boolean {
  return filter === 'any' || role === filter;
}

export function matchesDate(record: MessageRecord, date: string | undefined): boolean {
  if (!date) return true;
  return recordDay(record) === date;
}

interface ResolvedCandidate {
  neighbor: Neighbor;
  record: EligibleRecord;
}

/**
 * Resolve neighbors to records and apply filters. Order is never changed,
 * only entries removed. Handles outside the metadata are skipped.
 */
export function filterCandidates(
  neighbors: readonly Neighbor[],
  context: Pick<SearchContext, 'metadata'>,
  roleFilter: RoleFilter,
  date?: string,
): ResolvedCandidate[] {
  const kept: ResolvedCandidate[] = [];
  for (const neighbor of neighbors) {
    const record = context.metadata.at(neighbor.handle);
    if (!record) {
      logger.warn({ handle: neighbor.handle, records: context.metadata.size }, 'Index handle outside metadata: skipped');
      continue;
    }
    if (!matchesRole(record.role, roleFilter)) continue;
    if (!matchesDate(record, date)) continue;
    kept.push({ neighbor, record });
  }
  return kept;
}

/** Thread around a hit, with the hit located by message_id */
export function buildConversationContext(
  record: EligibleRecord,
  archive: readonly MessageRecord[],
): ConversationContext {
  const messages = reconstructConversation(record.conversation_id, archive);
  const hitIndex = record.message_id === undefined
    ? -1
    : messages.findIndex((m) => m.message_id === record.message_id);
  return { messages, hitIndex };
}

export async function searchMessages(
  context: SearchContext,
  provider: EmbeddingProvider,
  query: string,
  options: SearchOptions = {},
): Promise<SearchHit[]> {
  const trimmed = query.trim();
  if (!trimmed) return [];

  const index = context.index;
  if (!index) throw new SearchUnavailableError('No vector index loaded: build the index first');

  const roleFilter = options.roleFilter ?? 'any';
  const maxResults = Math.max(0, options.maxResults ?? DEFAULT_MAX_RESULTS);
  const candidateCount = Math.max(options.candidateCount ?? DEFAULT_CANDIDATES, maxResults);
  const withContext = options.withContext ?? true;

  const vector = await embedQuery(trimmed, provider);
  if (vector.length !== index.dimension) {
    throw new SearchUnavailableError(
      `Query embedding has ${vector.length} dimensions but the index has ${index.dimension}: ` +
        `the index was built with a different embedding model than ${provider.model}`,
    );
  }
  const neighbors = index.search(vector, candidateCount);

  const hits = filterCandidates(neighbors, context, roleFilter, options.date)
    .slice(0, maxResults)
    .map(({ neighbor, record }): SearchHit => ({
      handle: neighbor.handle,
      distance: neighbor.distance,
      record,
      context: withContext ? buildConversationContext(record, context.archive) : null,
      insight: context.insights.get(record.conversation_id),
    }));

  logger.info(
    { candidates: neighbors.length, hits: hits.length, roleFilter, date: options.date ?? null },
    'Search completed',
  );
  return hits;
}
