import { config, validateConfig } from './config.ts';
import { logger } from './logger.ts';
import { buildServer } from './server.ts';
import { loadSearchContext } from './memory/context.ts';
import { createVoyageEmbedder } from './memory/embeddings.ts';
import { createTextGenerator } from './llm/client.ts';

validateConfig(logger, ['embeddings']);

const context = await loadSearchContext(config);
if (!context.index) {
  logger.warn('No index loaded: /api/search will answer 503 until `threadseek index` has run');
}

const server = await buildServer({
  context,
  embedder: createVoyageEmbedder(),
  generator: createTextGenerator(),
});

// Graceful shutdown
for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, async () => {
    logger.info({ signal }, 'Shutting down...');
    await server.close();
    process.exit(0);
  });
}

await server.listen({ port: config.apiPort, host: '127.0.0.1' });
logger.info(`API listening on http://127.0.0.1:${config.apiPort}`);
