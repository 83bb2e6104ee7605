import { config as dotenvConfig } from 'dotenv';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

// Load .env from monorepo root (works regardless of which package runs the process)
const rootDir = resolve(fileURLToPath(import.meta.url), '../../../..');
dotenvConfig({ path: resolve(rootDir, '.env') });

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

function optionalInt(key: string, fallback: number): number {
  const parsed = parseInt(optional(key, String(fallback)), 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function oneOf<T extends string>(key: string, allowed: readonly T[], fallback: T): T {
  const value = optional(key, fallback);
  return allowed.find((a) => a === value) ?? fallback;
}

const dataDir = resolve(rootDir, optional('DATA_DIR', 'data'));

export const config = {
  // Embeddings (Voyage AI)
  voyageApiKey: optional('VOYAGE_API_KEY', ''),
  embedModel: optional('EMBED_MODEL', 'voyage-3'),
  embedBatchSize: optionalInt('EMBED_BATCH_SIZE', 100),
  embedMaxTokens: optionalInt('EMBED_MAX_TOKENS', 8192),
  embedFailurePolicy: oneOf('EMBED_FAILURE_POLICY', ['skip', 'retry'] as const, 'retry'),
  embedMaxRetries: optionalInt('EMBED_MAX_RETRIES', 3),
  embedRetryBaseMs: optionalInt('EMBED_RETRY_BASE_MS', 1000),

  // Insights (summary + keywords)
  anthropicApiKey: optional('ANTHROPIC_API_KEY', ''),
  openrouterApiKey: optional('OPENROUTER_API_KEY', ''),
  insightProvider: oneOf('INSIGHT_PROVIDER', ['anthropic', 'openrouter'] as const, 'anthropic'),
  insightModel: optional('INSIGHT_MODEL', ''),
  insightDelayMs: optionalInt('INSIGHT_DELAY_MS', 1100),
  insightSaveEvery: optionalInt('INSIGHT_SAVE_EVERY', 5),

  // Files
  dataDir,
  recordsPath: resolve(dataDir, optional('RECORDS_PATH', 'conversations.jsonl')),
  indexPath: resolve(dataDir, optional('INDEX_PATH', 'messages.index')),
  metadataPath: resolve(dataDir, optional('METADATA_PATH', 'metadata.json')),
  insightsPath: resolve(dataDir, optional('INSIGHTS_PATH', 'insights.json')),

  // Search
  searchCandidates: optionalInt('SEARCH_CANDIDATES', 20),
  searchMaxResults: optionalInt('SEARCH_MAX_RESULTS', 10),

  // API
  apiPort: optionalInt('API_PORT', 3100),
  nodeEnv: optional('NODE_ENV', 'development'),
} as const;

export type Config = typeof config;

/** What a command is about to use; decides which keys are required */
export type ConfigNeed = 'embeddings' | 'insights';

interface BootLogger {
  fatal: (obj: object, msg: string) => void;
  warn: (obj: object, msg: string) => void;
  info: (obj: object, msg: string) => void;
}

/**
 * Call at boot to validate env vars.
 * Required vars missing → logs fatal + exit(1).
 * Optional vars missing → logs warnings (features degraded).
 *
 * Takes logger as param to avoid circular dependency (logger → config → logger).
 */
export function validateConfig(log: BootLogger, needs: readonly ConfigNeed[]): void {
  const missing = missingKeys(needs);

  if (missing.length > 0) {
    log.fatal({ missing }, 'Missing required env vars: cannot start');
    process.exit(1);
  }

  if (!needs.includes('insights') && !hasInsightKey()) {
    log.warn({ missing: 'ANTHROPIC_API_KEY / OPENROUTER_API_KEY' }, 'On-demand insights disabled');
  }

  log.info({ env: config.nodeEnv, dataDir: config.dataDir }, 'Config validated');
}

function hasInsightKey(): boolean {
  return config.insightProvider === 'openrouter' ? Boolean(config.openrouterApiKey) : Boolean(config.anthropicApiKey);
}

export function missingKeys(needs: readonly ConfigNeed[]): string[] {
  const missing: string[] = [];
  if (needs.includes('embeddings') && !config.voyageApiKey) missing.push('VOYAGE_API_KEY');
  if (needs.includes('insights') && !hasInsightKey()) {
    missing.push(config.insightProvider === 'openrouter' ? 'OPENROUTER_API_KEY' : 'ANTHROPIC_API_KEY');
  }
  return missing;
}
