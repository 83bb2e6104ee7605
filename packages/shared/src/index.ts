// ============================================================
// threadseek Shared Types
// ============================================================

// Roles: anything other than user/assistant is kept but shown generically
export type Role = 'user' | 'assistant';
export type RoleFilter = 'any' | Role;

export const ROLE_FILTERS: readonly RoleFilter[] = ['any', 'user', 'assistant'];

// Records
export interface MessageRecord {
  conversation_id: string;
  message_id?: string;
  role: string;
  content?: unknown;
  /** Epoch seconds (number or numeric string) or an ISO-8601 string */
  timestamp?: number | string;
}

export interface EligibleRecord extends MessageRecord {
  content: string;
}

// Insights
export interface Insight {
  summary: string;
  keywords: string[];
}

export type InsightMap = Record<string, Insight>;

// Search
export interface SearchOptions {
  roleFilter?: RoleFilter;
  maxResults?: number;
  candidateCount?: number;
  /** UTC calendar day, YYYY-MM-DD */
  date?: string;
  withContext?: boolean;
}

export interface ConversationContext {
  messages: MessageRecord[];
  /** Position of the hit inside `messages`, -1 when it cannot be matched */
  hitIndex: number;
}

export interface SearchHit {
  handle: number;
  distance: number;
  record: EligibleRecord;
  context: ConversationContext | null;
  insight: Insight | null;
}

// Stats
export interface ArchiveStats {
  totalRecords: number;
  indexedRecords: number;
  conversations: number;
  byRole: Record<string, number>;
  /** UTC day (YYYY-MM-DD, or "unknown") → message count */
  byDay: Record<string, number>;
  insights: number;
}
