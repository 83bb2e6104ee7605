/**
 * export.ts: Plain-text export of a conversation thread
 */

import type { Insight, MessageRecord } from '@threadseek/shared';
import { contentText } from './conversations.ts';
import { parseTimestamp } from '../records/loader.ts';

const DATE_FORMAT = new Intl.DateTimeFormat('en-US', {
  timeZone: 'UTC',
  weekday: 'short',
  month: 'short',
  day: '2-digit',
  hour: '2-digit',
  minute: '2-digit',
  hour12: true,
});

/** "MON - JAN 15 @ 10:30 AM" (UTC), or "No Timestamp" */
export function formatTimestamp(ts: MessageRecord['timestamp']): string {
  const ms = parseTimestamp(ts);
  if (ms === null) return 'No Timestamp';

  const parts = DATE_FORMAT.formatToParts(new Date(ms));
  const part = (type: Intl.DateTimeFormatPartTypes) => parts.find((p) => p.type === type)?.value ?? '';
  return `${part('weekday')} - ${part('month')} ${part('day')} @ ${part('hour')}:${part('minute')} ${part('dayPeriod')}`.toUpperCase();
}

export function formatRoleHeader(record: MessageRecord): string {
  const when = formatTimestamp(record.timestamp);
  if (record.role === 'user') return `You asked on ${when}`;
  if (record.role === 'assistant') return `Assistant responded on ${when}`;
  return `${record.role} wrote on ${when}`;
}

export function exportConversation(messages: readonly MessageRecord[], insight: Insight | null): string {
  let text = messages
    .map((m) => `${formatRoleHeader(m)}:\n${contentText(m.content)}`)
    .join('\n\n');

  if (insight?.summary) text += `\n\n--- SUMMARY ---\n${insight.summary}`;
  if (insight && insight.keywords.length > 0) text += `\n\n--- KEYWORDS ---\n${insight.keywords.join(', ')}`;
  return text;
}

/** Word characters, whitespace and hyphens only; runs of space/hyphen → "-"; 50 chars max */
export function safeFilename(base: string): string {
  const cleaned = base
    .replace(/[^\p{L}\p{N}_\s-]/gu, '')
    .replace(/[-\s]+/g, '-')
    .replace(/^[-_]+|[-_]+$/g, '');
  return `${cleaned.slice(0, 50)}.txt`;
}

/** Filename from the conversation id plus the start of its first user message */
export function exportFilename(conversationId: string, messages: readonly MessageRecord[]): string {
  const firstUser = messages.find((m) => m.role === 'user');
  const opening = firstUser ? contentText(firstUser.content) : '';
  return safeFilename(opening ? `conv_${conversationId}_${opening.slice(0, 20)}` : `conversation_${conversationId}`);
}
