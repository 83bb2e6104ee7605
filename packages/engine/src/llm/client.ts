import Anthropic from '@anthropic-ai/sdk';
import { config } from '../config.ts';
import { logger } from '../logger.ts';

export type InsightProvider = 'anthropic' | 'openrouter';

/** Text-generation service used for conversation summaries */
export interface TextGenerator {
  readonly provider: InsightProvider;
  readonly model: string;
  generate(system: string, user: string): Promise<string>;
}

export interface GeneratorOptions {
  provider?: InsightProvider;
  /** Defaults to the configured key of the provider */
  apiKey?: string;
  model?: string;
  maxTokens?: number;
  temperature?: number;
}

const DEFAULT_MODELS: Record<InsightProvider, string> = {
  anthropic: 'claude-haiku-4-5-20251001',
  openrouter: 'google/gemini-2.0-flash-001',
};

async function callOpenRouter(
  apiKey: string,
  model: string,
  system: string,
  user: string,
  maxTokens: number,
  temperature: number,
): Promise<string> {
  const res = await fetch('https://openrouter.ai/api/v1/chat/completions', {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
      'Authorization': `Bearer ${apiKey}`,
      'X-Title': 'threadseek',
    },
    body: JSON.stringify({
      model,
      messages: [
        { role: 'system', content: system },
        { role: 'user', content: user },
      ],
      max_tokens: maxTokens,
      temperature,
    }),
  });

  if (!res.ok) {
    const body = await res.text();
    throw new Error(`OpenRouter API error ${res.status}: ${body}`);
  }

  return completionText(await res.json());
}

function completionText(data: unknown): string {
  if (typeof data !== 'object' || data === null || !('choices' in data) || !Array.isArray(data.choices)) return '';
  const [first] = data.choices;
  const content: unknown = first?.message?.content;
  return typeof content === 'string' ? content : '';
}

/**
 * Build the configured generator. Returns null when the provider's key is
 * missing (on-demand insights disabled).
 */
export function createTextGenerator(options: GeneratorOptions = {}): TextGenerator | null {
  const provider = options.provider ?? config.insightProvider;
  const model = options.model || config.insightModel || DEFAULT_MODELS[provider];
  const maxTokens = options.maxTokens ?? 250;
  const temperature = options.temperature ?? 0.2;
  const apiKey = options.apiKey ?? (provider === 'openrouter' ? config.openrouterApiKey : config.anthropicApiKey);
  if (!apiKey) return null;

  if (provider === 'openrouter') {
    return {
      provider,
      model,
      generate: (system, user) => callOpenRouter(apiKey, model, system, user, maxTokens, temperature),
    };
  }

  const anthropic = new Anthropic({ apiKey });

  return {
    provider,
    model,
    async generate(system, user) {
      const start = Date.now();
      const response = await anthropic.messages.create({
        model,
        max_tokens: maxTokens,
        temperature,
        system,
        messages: [{ role: 'user', content: user }],
      });
      logger.debug(
        { model, tokensIn: response.usage.input_tokens, tokensOut: response.usage.output_tokens, durationMs: Date.now() - start },
        'Insight generated',
      );
      return response.content
        .map((b) => (b.type === 'text' ? b.text : ''))
        .join('');
    },
  };
}
