/**
 * insights.ts: Conversation summaries + keywords
 *
 * One-sentence summary and five keywords per conversation, cached in a single
 * JSON file keyed by conversation id.
 *
 *   - InsightCache        : load / get / set / atomic save
 *   - parseInsightResponse: strict SUMMARY:/KEYWORDS: line parser
 *   - populateInsights    : resumable batch run over every uncached conversation
 *   - getOrGenerateInsight: on-demand path used by the API
 *
 * Batch failures are cached as an explicit error marker so a run never retries
 * the same conversation forever; on-demand failures are thrown to the caller.
 */

import { readFile, rename, writeFile } from 'node:fs/promises';
import type { Insight, InsightMap, MessageRecord } from '@threadseek/shared';
import type { TextGenerator } from '../llm/client.ts';
import { conversationToText, reconstructConversation } from './conversations.ts';
import { InsightGenerationError } from '../errors.ts';
import { logger, errMessage } from '../logger.ts';

export const MAX_KEYWORDS = 5;
export const FAILED_SUMMARY = 'Error: Failed to generate';
export const NO_TEXT_SUMMARY = 'Error: No processable text';

export const INSIGHT_SYSTEM_PROMPT =
  'You are an expert at analyzing conversation transcripts. ' +
  'Your task is to provide a concise one-sentence summary of the entire conversation ' +
  'and then list exactly 5 distinct and most important keywords or keyphrases from it. ' +
  'Format your response strictly as follows, with each part on a new line:\n' +
  'SUMMARY: [Your one-sentence summary here]\n' +
  'KEYWORDS: [keyword1, keyword2, keyword3, keyword4, keyword5]';

function isInsight(value: unknown): value is Insight {
  if (typeof value !== 'object' || value === null) return false;
  const summary: unknown = Reflect.get(value, 'summary');
  const keywords: unknown = Reflect.get(value, 'keywords');
  return typeof summary === 'string'
    && Array.isArray(keywords)
    && keywords.every((k) => typeof k === 'string');
}

/** True for the markers cached when generation failed */
export function isFailureMarker(insight: Insight): boolean {
  return insight.summary === FAILED_SUMMARY || insight.summary === NO_TEXT_SUMMARY;
}

export class InsightCache {
  private readonly entries = new Map<string, Insight>();

  constructor(readonly path: string | null, initial: InsightMap = {}) {
    for (const [id, insight] of Object.entries(initial)) {
      this.entries.set(id, insight);
    }
  }

  /** Missing or corrupt file → empty cache (warning logged) */
  static async load(path: string): Promise<InsightCache> {
    let text: string;
    try {
      text = await readFile(path, 'utf8');
    } catch {
      return new InsightCache(path);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      logger.warn({ path, err: errMessage(err) }, 'Insight cache is corrupt: starting empty');
      return new InsightCache(path);
    }
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      logger.warn({ path }, 'Insight cache is not a JSON object: starting empty');
      return new InsightCache(path);
    }

    const valid: InsightMap = {};
    let dropped = 0;
    for (const [id, value] of Object.entries(parsed)) {
      if (isInsight(value)) valid[id] = value;
      else dropped++;
    }
    if (dropped > 0) logger.warn({ path, dropped }, 'Ignored malformed insight entries');

    return new InsightCache(path, valid);
  }

  get size(): number {
    return this.entries.size;
  }

  has(conversationId: string): boolean {
    return this.entries.has(conversationId);
  }

  get(conversationId: string): Insight | null {
    return this.entries.get(conversationId) ?? null;
  }

  set(conversationId: string, insight: Insight): void {
    this.entries.set(conversationId, { summary: insight.summary, keywords: [...insight.keywords] });
  }

  conversationIds(): string[] {
    return [...this.entries.keys()];
  }

  toJSON(): InsightMap {
    return Object.fromEntries(this.entries);
  }

  /** Write to a temp file then rename, so an interrupted save leaves the old file intact */
  async save(): Promise<void> {
    if (!this.path) return;
    const tmp = `${this.path}.tmp`;
    await writeFile(tmp, JSON.stringify(this, null, 2));
    await rename(tmp, this.path);
  }
}

/**
 * Parse a SUMMARY:/KEYWORDS: response.
 *
 * Prefixes match case-insensitively at the start of a line. Keywords are
 * comma-separated; one pair of enclosing brackets is dropped, at most
 * MAX_KEYWORDS are kept. Returns null when neither line yields anything.
 */
export function parseInsightResponse(text: string): Insight | null {
  let summary = '';
  let keywordsLine = '';

  for (const line of text.split('\n')) {
    const upper = line.toUpperCase();
    if (upper.startsWith('SUMMARY:')) {
      summary = line.slice('SUMMARY:'.length).trim();
    } else if (upper.startsWith('KEYWORDS:')) {
      keywordsLine = line.slice('KEYWORDS:'.length).trim();
    }
  }

  if (keywordsLine.startsWith('[') && keywordsLine.endsWith(']')) {
    keywordsLine = keywordsLine.slice(1, -1);
  }
  const keywords = keywordsLine
    .split(',')
    .map((k) => k.trim())
    .filter(Boolean)
    .slice(0, MAX_KEYWORDS);

  if (!summary && keywords.length === 0) return null;
  return { summary, keywords };
}

/**
 * Ask the generator for an insight. Empty text → null without calling it.
 * Service errors propagate; an unparsable answer → null.
 */
export async function generateInsight(conversationText: string, generator: TextGenerator): Promise<Insight | null> {
  if (!conversationText.trim()) return null;
  const raw = await generator.generate(INSIGHT_SYSTEM_PROMPT, conversationText);
  const insight = parseInsightResponse(raw);
  if (!insight) {
    logger.warn({ preview: raw.slice(0, 200) }, 'Unparsable insight response');
  }
  return insight;
}

export interface PopulateOptions {
  /** Pause between two external calls */
  delayMs: number;
  /** Persist after this many newly written entries */
  saveEvery: number;
  /** Max conversations to process this run */
  limit?: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface PopulateReport {
  total: number;
  skipped: number;
  processed: number;
  generated: number;
  failed: number;
  saves: number;
}

const wait = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

/**
 * Generate insights for every conversation id not already cached.
 *
 * Threads are rebuilt from `records`. Sequential, one call at a time, with
 * delayMs between calls. Saves every saveEvery new entries and once at the end;
 * writes nothing when every id was already cached.
 */
export async function populateInsights(
  conversationIds: readonly string[],
  records: readonly MessageRecord[],
  cache: InsightCache,
  generator: TextGenerator,
  options: PopulateOptions,
): Promise<PopulateReport> {
  const sleep = options.sleep ?? wait;
  const ids = [...new Set(conversationIds)].sort();
  let pending = ids.filter((id) => !cache.has(id));
  if (options.limit !== undefined) pending = pending.slice(0, Math.max(0, options.limit));

  const report: PopulateReport = {
    total: ids.length,
    skipped: ids.length - pending.length,
    processed: 0,
    generated: 0,
    failed: 0,
    saves: 0,
  };
  logger.info({ total: report.total, pending: pending.length }, 'Insight batch starting');

  const saveEvery = Math.max(1, options.saveEvery);
  let unsaved = 0;
  let called = false;

  const persist = async () => {
    try {
      await cache.save();
      report.saves++;
      unsaved = 0;
      logger.info({ total: cache.size }, 'Insights saved');
    } catch (err) {
      logger.error({ err: errMessage(err) }, 'Saving insights failed');
    }
  };

  for (const [i, id] of pending.entries()) {
    const text = conversationToText(reconstructConversation(id, records));

    if (!text.trim()) {
      cache.set(id, { summary: NO_TEXT_SUMMARY, keywords: [] });
      report.failed++;
    } else {
      if (called) await sleep(options.delayMs);
      called = true;

      let insight: Insight | null = null;
      try {
        insight = await generateInsight(text, generator);
      } catch (err) {
        logger.warn({ conversationId: id, err: errMessage(err) }, 'Insight generation failed');
      }

      if (insight) {
        cache.set(id, insight);
        report.generated++;
      } else {
        cache.set(id, { summary: FAILED_SUMMARY, keywords: [] });
        report.failed++;
      }
    }

    report.processed++;
    unsaved++;
    logger.info({ conversationId: id, progress: `${i + 1}/${pending.length}` }, 'Conversation processed');

    if (unsaved >= saveEvery) await persist();
  }

  if (unsaved > 0) await persist();

  logger.info(report, 'Insight batch finished');
  return report;
}

/**
 * On-demand insight for one conversation: cached value first (failure markers
 * count as missing), otherwise generate, cache and save.
 */
export async function getOrGenerateInsight(
  conversationId: string,
  records: readonly MessageRecord[],
  cache: InsightCache,
  generator: TextGenerator,
): Promise<Insight> {
  const cached = cache.get(conversationId);
  if (cached && !isFailureMarker(cached)) return cached;

  const text = conversationToText(reconstructConversation(conversationId, records));
  if (!text.trim()) {
    throw new InsightGenerationError(`No processable text for conversation ${conversationId}`);
  }

  let insight: Insight | null;
  try {
    insight = await generateInsight(text, generator);
  } catch (err) {
    throw new InsightGenerationError(`Insight generation failed: ${errMessage(err)}`);
  }
  if (!insight) throw new InsightGenerationError('Insight response could not be parsed');

  cache.set(conversationId, insight);
  await cache.save();
  return insight;
}
