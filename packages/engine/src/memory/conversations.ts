/**
 * conversations.ts: Thread reconstruction
 *
 * A conversation is never stored as such: it is every record sharing a
 * conversation_id, ordered by timestamp. Records without a parsable timestamp
 * cannot be placed and are left out of the thread (and of any summary text
 * built from it).
 */

import type { MessageRecord } from '@threadseek/shared';
import { parseTimestamp, recordDay } from '../records/loader.ts';

export function reconstructConversation(
  conversationId: string,
  records: readonly MessageRecord[],
): MessageRecord[] {
  const timed: Array<{ record: MessageRecord; ms: number }> = [];
  for (const record of records) {
    if (record.conversation_id !== conversationId) continue;
    const ms = parseTimestamp(record.timestamp);
    if (ms === null) continue;
    timed.push({ record, ms });
  }

  // Array.prototype.sort is stable: equal timestamps keep source order
  timed.sort((a, b) => a.ms - b.ms);
  return timed.map((t) => t.record);
}

export function roleLabel(role: string): 'User' | 'Assistant' {
  return role === 'user' ? 'User' : 'Assistant';
}

export function contentText(content: unknown): string {
  if (typeof content === 'string') return content;
  if (content === undefined || content === null) return '';
  return JSON.stringify(content);
}

/** "User: …" / "Assistant: …" transcript, one message per line */
export function conversationToText(messages: readonly MessageRecord[]): string {
  return messages
    .map((m) => `${roleLabel(m.role)}: ${contentText(m.content).trim()}`)
    .join('\n');
}

export interface DayEntry {
  role: string;
  content: string;
}

/** Messages grouped by UTC day; records without a usable timestamp go under "unknown" */
export function groupByDay(records: readonly MessageRecord[]): Record<string, DayEntry[]> {
  const days: Record<string, DayEntry[]> = {};
  for (const record of records) {
    const day = recordDay(record) ?? 'unknown';
    (days[day] ??= []).push({ role: record.role, content: contentText(record.content) });
  }
  return days;
}
