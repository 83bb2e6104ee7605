import pc from 'picocolors';
import type { SearchHit } from '@threadseek/shared';
import type { BuildReport } from '../indexer.ts';
import type { PopulateReport } from '../memory/insights.ts';
import { contentText } from '../memory/conversations.ts';
import { formatRoleHeader } from '../memory/export.ts';

export type Colors = Pick<typeof pc, 'cyan' | 'gray' | 'green' | 'yellow' | 'red' | 'bold'>;

const MAX_PREVIEW = 1000;

function preview(content: unknown, max: number): string {
  const text = contentText(content).trim();
  return text.length > max ? `${text.slice(0, max)}…` : text;
}

export function formatHit(hit: SearchHit, position: number, colors: Colors = pc): string[] {
  const lines = [
    colors.cyan(`Result ${position} (distance: ${hit.distance.toFixed(2)}, handle: ${hit.handle})`),
    colors.bold(`${formatRoleHeader(hit.record)}`),
    preview(hit.record.content, MAX_PREVIEW),
  ];

  if (hit.context && hit.context.messages.length > 0) {
    lines.push(colors.gray(`Conversation ${hit.record.conversation_id} (${hit.context.messages.length} messages)`));
    hit.context.messages.forEach((m, i) => {
      const marker = i === hit.context?.hitIndex ? colors.green('➡️ ') : '   ';
      lines.push(`${marker}${formatRoleHeader(m)}: ${preview(m.content, 120)}`);
    });
  }

  if (hit.insight) {
    if (hit.insight.summary) lines.push(`${colors.yellow('Summary:')} ${hit.insight.summary}`);
    if (hit.insight.keywords.length > 0) lines.push(`${colors.yellow('Keywords:')} ${hit.insight.keywords.join(', ')}`);
  }

  lines.push(colors.gray('-'.repeat(50)));
  return lines;
}

export function formatBuildReport(report: BuildReport, colors: Colors = pc): string[] {
  const excluded = Object.values(report.excluded).reduce((a, b) => a + b, 0);
  const lines = [
    colors.green(`✅ Indexed ${report.embedded} of ${report.sourceRecords} records (dimension ${report.dimension})`),
    colors.gray(`   eligible: ${report.eligible}, excluded: ${excluded}`),
  ];
  if (report.skippedBatches > 0) {
    lines.push(colors.yellow(`   ${report.skippedBatches} batches dropped (${report.skippedTexts} messages not searchable)`));
  }
  return lines;
}

export function formatPopulateReport(report: PopulateReport, colors: Colors = pc): string[] {
  return [
    colors.green(`✅ Insights: ${report.generated} generated, ${report.failed} failed, ${report.skipped} already cached`),
    colors.gray(`   ${report.processed} processed of ${report.total} conversations, ${report.saves} saves`),
  ];
}
