import Fastify from 'fastify';
import cors from '@fastify/cors';
import { ROLE_FILTERS, type RoleFilter } from '@threadseek/shared';
import type { SearchContext } from './memory/context.ts';
import type { EmbeddingProvider } from './memory/embeddings.ts';
import type { TextGenerator } from './llm/client.ts';
import { searchMessages } from './memory/query-engine.ts';
import { reconstructConversation, groupByDay } from './memory/conversations.ts';
import { getOrGenerateInsight } from './memory/insights.ts';
import { exportConversation, exportFilename } from './memory/export.ts';
import { computeStats } from './memory/stats.ts';
import { QueryEmbeddingError, SearchUnavailableError, InsightGenerationError } from './errors.ts';
import { config } from './config.ts';
import { logger, errMessage } from './logger.ts';

export interface ServerDeps {
  context: SearchContext;
  embedder: EmbeddingProvider | null;
  generator: TextGenerator | null;
}

function parseRole(value: string | undefined): RoleFilter | null {
  if (value === undefined || value === '') return 'any';
  return ROLE_FILTERS.find((r) => r === value) ?? null;
}

export async function buildServer(deps: ServerDeps) {
  const app = Fastify({ logger: false });
  const { context } = deps;

  await app.register(cors, { origin: true });

  app.get('/api/health', async () => ({
    status: 'ok',
    uptime: process.uptime(),
    indexLoaded: context.index !== null,
    vectors: context.index?.size ?? 0,
  }));

  // GET /api/stats: archive counts for the dashboards
  app.get('/api/stats', async () => computeStats(context));

  // GET /api/search?q=...&role=any|user|assistant&limit=10&date=YYYY-MM-DD
  app.get<{ Querystring: { q?: string; role?: string; limit?: string; date?: string } }>(
    '/api/search',
    async (req, reply) => {
      const query = req.query.q ?? '';
      if (!query.trim()) return { query, results: [] };

      const roleFilter = parseRole(req.query.role);
      if (!roleFilter) return reply.status(400).send({ error: `Invalid role: ${req.query.role}` });

      const date = req.query.date || undefined;
      if (date && !/^\d{4}-\d{2}-\d{2}$/.test(date)) {
        return reply.status(400).send({ error: 'date must be YYYY-MM-DD' });
      }

      const limit = parseInt(req.query.limit ?? String(config.searchMaxResults), 10);
      if (!Number.isFinite(limit) || limit < 1) {
        return reply.status(400).send({ error: 'limit must be a positive integer' });
      }

      if (!deps.embedder) return reply.status(503).send({ error: 'Embedding service not configured' });

      try {
        const results = await searchMessages(context, deps.embedder, query, {
          roleFilter,
          maxResults: limit,
          candidateCount: config.searchCandidates,
          date,
        });
        return { query, results };
      } catch (err) {
        if (err instanceof SearchUnavailableError) return reply.status(503).send({ error: err.message });
        if (err instanceof QueryEmbeddingError) return reply.status(502).send({ error: err.message });
        throw err;
      }
    },
  );

  // GET /api/conversations/:id: full thread, time-ordered
  app.get<{ Params: { id: string } }>('/api/conversations/:id', async (req, reply) => {
    const messages = reconstructConversation(req.params.id, context.archive);
    if (messages.length === 0) return reply.status(404).send({ error: 'Conversation not found' });
    return { conversationId: req.params.id, messages, insight: context.insights.get(req.params.id) };
  });

  // GET /api/conversations/:id/insight: cached only
  app.get<{ Params: { id: string } }>('/api/conversations/:id/insight', async (req, reply) => {
    const insight = context.insights.get(req.params.id);
    if (!insight) return reply.status(404).send({ error: 'No insight cached for this conversation' });
    return insight;
  });

  // POST /api/conversations/:id/insight: generate now (manual retry on failure)
  app.post<{ Params: { id: string } }>('/api/conversations/:id/insight', async (req, reply) => {
    if (!deps.generator) return reply.status(503).send({ error: 'Text generation not configured' });
    try {
      return await getOrGenerateInsight(req.params.id, context.archive, context.insights, deps.generator);
    } catch (err) {
      if (err instanceof InsightGenerationError) {
        logger.warn({ conversationId: req.params.id, err: errMessage(err) }, 'On-demand insight failed');
        return reply.status(502).send({ error: err.message });
      }
      throw err;
    }
  });

  // GET /api/conversations/:id/export: text/plain download
  app.get<{ Params: { id: string } }>('/api/conversations/:id/export', async (req, reply) => {
    const messages = reconstructConversation(req.params.id, context.archive);
    if (messages.length === 0) return reply.status(404).send({ error: 'Conversation not found' });

    const body = exportConversation(messages, context.insights.get(req.params.id));
    return reply
      .header('Content-Type', 'text/plain; charset=utf-8')
      .header('Content-Disposition', `attachment; filename="${exportFilename(req.params.id, messages)}"`)
      .send(body);
  });

  // GET /api/threads/by-day: messages grouped by UTC day
  app.get('/api/threads/by-day', async () => groupByDay(context.archive));

  return app;
}
