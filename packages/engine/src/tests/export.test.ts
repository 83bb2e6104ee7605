import { describe, it, expect } from 'vitest';
import type { MessageRecord } from '@threadseek/shared';
import { formatTimestamp, formatRoleHeader, exportConversation, safeFilename, exportFilename } from '../memory/export.ts';

describe('formatTimestamp', () => {
  it('formats in UTC, upper-cased', () => {
    expect(formatTimestamp('2024-01-15T10:30:00Z')).toBe('MON - JAN 15 @ 10:30 AM');
    expect(formatTimestamp(1705339800)).toBe('MON - JAN 15 @ 05:30 PM');
  });

  it('falls back for missing or unparsable timestamps', () => {
    expect(formatTimestamp(undefined)).toBe('No Timestamp');
    expect(formatTimestamp('tomorrow')).toBe('No Timestamp');
  });
});

describe('formatRoleHeader', () => {
  it('phrases the header by role', () => {
    const at = '2024-01-15T10:30:00Z';
    expect(formatRoleHeader({ conversation_id: 'c', role: 'user', timestamp: at })).toBe('You asked on MON - JAN 15 @ 10:30 AM');
    expect(formatRoleHeader({ conversation_id: 'c', role: 'assistant', timestamp: at })).toBe('Assistant responded on MON - JAN 15 @ 10:30 AM');
    expect(formatRoleHeader({ conversation_id: 'c', role: 'tool' })).toBe('tool wrote on No Timestamp');
  });
});

describe('exportConversation', () => {
  const messages: MessageRecord[] = [
    { conversation_id: 'c1', role: 'user', content: 'Ping?', timestamp: '2024-01-15T10:30:00Z' },
    { conversation_id: 'c1', role: 'assistant', content: { text: 'Pong' } },
  ];

  it('renders messages with headers and appends the insight', () => {
    expect(exportConversation(messages, { summary: 'A ping.', keywords: ['ping', 'pong'] })).toBe(
      'You asked on MON - JAN 15 @ 10:30 AM:\nPing?\n\n' +
        'Assistant responded on No Timestamp:\n{"text":"Pong"}\n\n' +
        '--- SUMMARY ---\nA ping.\n\n--- KEYWORDS ---\nping, pong',
    );
  });

  it('leaves out empty insight sections', () => {
    const text = exportConversation(messages.slice(0, 1), { summary: '', keywords: [] });
    expect(text).toBe('You asked on MON - JAN 15 @ 10:30 AM:\nPing?');
    expect(exportConversation(messages.slice(0, 1), null)).toBe(text);
  });
});

describe('safeFilename', () => {
  it('keeps word characters and collapses separators', () => {
    expect(safeFilename('  Hello, World! -- ok  ')).toBe('Hello-World-ok.txt');
    expect(safeFilename('café déjà')).toBe('café-déjà.txt');
  });

  it('caps the base at 50 characters', () => {
    expect(safeFilename('a'.repeat(80))).toBe(`${'a'.repeat(50)}.txt`);
  });
});

describe('exportFilename', () => {
  it('uses the start of the first user message', () => {
    const messages: MessageRecord[] = [
      { conversation_id: 'x', role: 'assistant', content: 'Welcome' },
      { conversation_id: 'x', role: 'user', content: 'What is the capital of France?' },
    ];
    expect(exportFilename('x', messages)).toBe('conv_x_What-is-the-capital.txt');
  });

  it('falls back to the id alone', () => {
    expect(exportFilename('c9', [])).toBe('conversation_c9.txt');
  });
});
