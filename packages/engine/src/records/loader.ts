/**
 * loader.ts: Message record loading and validation
 *
 * Source archive is newline-delimited JSON, one message per line.
 * Each line is validated into a MessageRecord; lines that are not JSON
 * objects or lack a usable conversation_id/role are counted and skipped.
 */

import { readFile } from 'node:fs/promises';
import type { MessageRecord } from '@threadseek/shared';
import { logger, errMessage } from '../logger.ts';

export interface LoadReport {
  records: MessageRecord[];
  malformedLines: number;
  invalidRecords: number;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asId(value: unknown): string | undefined {
  if (typeof value === 'string' && value.trim()) return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return undefined;
}

/**
 * Validate an arbitrary JSON value into a MessageRecord.
 * Returns null when conversation_id is missing (record cannot take part in indexing).
 * A missing role becomes 'unknown'; content is kept as-is, whatever its type.
 */
export function toMessageRecord(value: unknown): MessageRecord | null {
  if (!isObject(value)) return null;

  const conversationId = asId(value['conversation_id']);
  if (!conversationId) return null;

  const record: MessageRecord = {
    conversation_id: conversationId,
    role: typeof value['role'] === 'string' && value['role'] ? value['role'] : 'unknown',
  };

  const messageId = asId(value['message_id']);
  if (messageId !== undefined) record.message_id = messageId;
  if ('content' in value) record.content = value['content'];

  const ts = value['timestamp'];
  if (typeof ts === 'number' || typeof ts === 'string') record.timestamp = ts;

  return record;
}

/** Parse NDJSON text. Blank lines are ignored. */
export function parseRecordsNdjson(text: string): LoadReport {
  const records: MessageRecord[] = [];
  let malformedLines = 0;
  let invalidRecords = 0;

  for (const line of text.split('\n')) {
    if (!line.trim()) continue;

    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      malformedLines++;
      continue;
    }

    const record = toMessageRecord(parsed);
    if (record) records.push(record);
    else invalidRecords++;
  }

  return { records, malformedLines, invalidRecords };
}

/** Read the records source. A missing file is a configuration error and throws. */
export async function loadRecords(path: string): Promise<LoadReport> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    throw new Error(`Records source not readable: ${path} (${errMessage(err)})`);
  }

  const report = parseRecordsNdjson(text);
  if (report.malformedLines > 0 || report.invalidRecords > 0) {
    logger.warn(
      { path, malformedLines: report.malformedLines, invalidRecords: report.invalidRecords },
      'Some source lines were skipped',
    );
  }
  logger.info({ path, records: report.records.length }, 'Records loaded');
  return report;
}

const MAX_DATE_MS = 8.64e15;

// Date and time with no Z / ±hh:mm suffix; read as UTC rather than host-local time
const NAIVE_DATE_TIME = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)$/;

function parseDateString(value: string): number {
  const naive = NAIVE_DATE_TIME.exec(value);
  return naive ? Date.parse(`${naive[1]}T${naive[2]}Z`) : Date.parse(value);
}

/**
 * Timestamp → epoch milliseconds, or null when missing/unparsable.
 *
 * Numbers and numeric strings are epoch seconds; anything else must parse as a date string.
 * Date-times without an offset are UTC.
 */
export function parseTimestamp(ts: MessageRecord['timestamp']): number | null {
  if (ts === undefined) return null;

  let ms: number;
  if (typeof ts === 'number') {
    ms = ts * 1000;
  } else {
    const trimmed = ts.trim();
    if (!trimmed) return null;
    ms = /^-?\d+(\.\d+)?$/.test(trimmed) ? parseFloat(trimmed) * 1000 : parseDateString(trimmed);
  }

  // Outside the range a Date can represent
  if (!Number.isFinite(ms) || Math.abs(ms) > MAX_DATE_MS) return null;
  return ms;
}

/** UTC calendar day (YYYY-MM-DD) of a record, or null without a usable timestamp */
export function recordDay(record: MessageRecord): string | null {
  const ms = parseTimestamp(record.timestamp);
  if (ms === null) return null;
  return new Date(ms).toISOString().slice(0, 10);
}
