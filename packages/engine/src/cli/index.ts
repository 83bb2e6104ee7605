#!/usr/bin/env tsx
import { Command, InvalidArgumentError } from 'commander';
import pc from 'picocolors';
import { createInterface } from 'node:readline/promises';
import { ROLE_FILTERS, type MessageRecord, type RoleFilter, type SearchOptions } from '@threadseek/shared';
import { config, validateConfig } from '../config.ts';
import { logger, errMessage } from '../logger.ts';
import { runIndexBuild } from '../indexer.ts';
import { loadSearchContext, type SearchContext } from '../memory/context.ts';
import { createVoyageEmbedder, type EmbeddingProvider } from '../memory/embeddings.ts';
import { InsightCache, populateInsights } from '../memory/insights.ts';
import { loadMetadata } from '../memory/metadata-store.ts';
import { loadRecords } from '../records/loader.ts';
import { searchMessages } from '../memory/query-engine.ts';
import { createTextGenerator } from '../llm/client.ts';
import { formatBuildReport, formatHit, formatPopulateReport } from './format.ts';

function parseRole(value: string): RoleFilter {
  const role = ROLE_FILTERS.find((r) => r === value);
  if (!role) throw new InvalidArgumentError(`expected one of ${ROLE_FILTERS.join(', ')}`);
  return role;
}

function parsePositive(value: string): number {
  const n = parseInt(value, 10);
  if (!Number.isFinite(n) || n < 1) throw new InvalidArgumentError('expected a positive integer');
  return n;
}

function parseDay(value: string): string {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) throw new InvalidArgumentError('expected YYYY-MM-DD');
  return value;
}

function requireEmbedder(): EmbeddingProvider {
  validateConfig(logger, ['embeddings']);
  const embedder = createVoyageEmbedder();
  if (!embedder) throw new Error('VOYAGE_API_KEY is not set');
  return embedder;
}

async function runQuery(context: SearchContext, embedder: EmbeddingProvider, query: string, options: SearchOptions) {
  try {
    const hits = await searchMessages(context, embedder, query, options);
    if (hits.length === 0) {
      console.log(pc.gray('No results.'));
      return;
    }
    console.log(pc.cyan('\n🧠 Top Results:\n'));
    hits.forEach((hit, i) => {
      for (const line of formatHit(hit, i + 1)) console.log(line);
    });
  } catch (err) {
    console.log(pc.red(`❌ ${errMessage(err)}`));
  }
}

const indexCommand = new Command('index')
  .description('Embed the records source and write the vector index + metadata')
  .option('-i, --input <path>', 'NDJSON records source', config.recordsPath)
  .action(async (options: { input: string }) => {
    const embedder = requireEmbedder();
    const report = await runIndexBuild(
      { recordsPath: options.input, indexPath: config.indexPath, metadataPath: config.metadataPath },
      embedder,
    );
    for (const line of formatBuildReport(report)) console.log(line);
  });

const insightsCommand = new Command('insights')
  .description('Generate summaries + keywords for every conversation not yet cached')
  .option('-n, --limit <count>', 'Max conversations this run', parsePositive)
  .action(async (options: { limit?: number }) => {
    validateConfig(logger, ['insights']);
    const generator = createTextGenerator();
    if (!generator) throw new Error('Text generation is not configured');

    const metadata = await loadMetadata(config.metadataPath);
    if (metadata.size === 0) {
      throw new Error(`No indexed records in ${config.metadataPath}: run \`threadseek index\` first`);
    }

    let archive: readonly MessageRecord[] = metadata.all();
    try {
      archive = (await loadRecords(config.recordsPath)).records;
    } catch (err) {
      logger.warn({ err: errMessage(err) }, 'Archive unavailable: summarizing indexed records only');
    }

    const cache = await InsightCache.load(config.insightsPath);
    const report = await populateInsights(metadata.conversationIds(), archive, cache, generator, {
      delayMs: config.insightDelayMs,
      saveEvery: config.insightSaveEvery,
      limit: options.limit,
    });
    for (const line of formatPopulateReport(report)) console.log(line);
  });

interface SearchCliOptions {
  role: RoleFilter;
  limit: number;
  date?: string;
  context: boolean;
}

const searchCommand = new Command('search')
  .description('Search the archive; without a query, start an interactive loop')
  .argument('[query...]', 'Free-text query')
  .option('-r, --role <role>', 'any | user | assistant', parseRole, 'any')
  .option('-n, --limit <count>', 'Max results', parsePositive, config.searchMaxResults)
  .option('-d, --date <day>', 'Only hits from this UTC day (YYYY-MM-DD)', parseDay)
  .option('--no-context', 'Skip conversation reconstruction')
  .action(async (words: string[], options: SearchCliOptions) => {
    const embedder = requireEmbedder();
    const context = await loadSearchContext(config);
    if (!context.index) throw new Error('No vector index loaded: run `threadseek index` first');

    const searchOptions: SearchOptions = {
      roleFilter: options.role,
      maxResults: options.limit,
      candidateCount: config.searchCandidates,
      date: options.date,
      withContext: options.context,
    };

    const query = words.join(' ');
    if (query.trim()) {
      await runQuery(context, embedder, query, searchOptions);
      return;
    }

    const rl = createInterface({ input: process.stdin, output: process.stdout });
    try {
      for (;;) {
        const line = (await rl.question('\n🔍 Ask your archive: ')).trim();
        if (!line) {
          console.log(pc.gray('⛔ Empty query. Try again.'));
          continue;
        }
        if (['exit', 'quit'].includes(line.toLowerCase())) {
          console.log('👋 Goodbye.');
          break;
        }
        await runQuery(context, embedder, line, searchOptions);
      }
    } finally {
      rl.close();
    }
  });

const serveCommand = new Command('serve')
  .description('Start the HTTP API')
  .action(async () => {
    await import('../start-server.ts');
  });

const program = new Command('threadseek')
  .description('Semantic search over a personal conversation archive')
  .addCommand(indexCommand)
  .addCommand(insightsCommand)
  .addCommand(searchCommand)
  .addCommand(serveCommand);

try {
  await program.parseAsync(process.argv);
} catch (err) {
  logger.fatal({ err: errMessage(err) }, 'Command failed');
  console.error(pc.red(`⛔ ${errMessage(err)}`));
  process.exitCode = 1;
}
