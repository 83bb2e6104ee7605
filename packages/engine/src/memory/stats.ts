import type { ArchiveStats } from '@threadseek/shared';
import type { SearchContext } from './context.ts';
import { recordDay } from '../records/loader.ts';

export function computeStats(context: SearchContext): ArchiveStats {
  const byRole: Record<string, number> = {};
  const byDay: Record<string, number> = {};
  const conversations = new Set<string>();

  for (const record of context.archive) {
    byRole[record.role] = (byRole[record.role] ?? 0) + 1;
    const day = recordDay(record) ?? 'unknown';
    byDay[day] = (byDay[day] ?? 0) + 1;
    conversations.add(record.conversation_id);
  }

  return {
    totalRecords: context.archive.length,
    indexedRecords: context.metadata.size,
    conversations: conversations.size,
    byRole,
    byDay,
    insights: context.insights.size,
  };
}
