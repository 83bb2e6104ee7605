/**
 * helpers.ts: In-process stand-ins for the embedding and generation services
 */

import { beforeAll, afterAll } from 'vitest';
import { mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { EmbeddingProvider, EmbedInputKind } from '../memory/embeddings.ts';
import type { TextGenerator } from '../llm/client.ts';

export interface FakeEmbedder extends EmbeddingProvider {
  calls: Array<{ texts: string[]; kind: EmbedInputKind }>;
}

/** Embeds each text with `vectorFor`; batches listed in `failOnCall` (1-based) throw */
export function fakeEmbedder(
  vectorFor: (text: string) => number[],
  failOnCall: number[] = [],
): FakeEmbedder {
  const calls: FakeEmbedder['calls'] = [];
  return {
    model: 'fake-embed',
    calls,
    async embed(texts, kind) {
      calls.push({ texts: [...texts], kind });
      if (failOnCall.includes(calls.length)) throw new Error('service unavailable');
      return texts.map(vectorFor);
    },
  };
}

export interface FakeGenerator extends TextGenerator {
  calls: Array<{ system: string; user: string }>;
}

export function fakeGenerator(respond: (user: string) => string | Promise<string>): FakeGenerator {
  const calls: FakeGenerator['calls'] = [];
  return {
    provider: 'anthropic',
    model: 'fake-model',
    calls,
    async generate(system, user) {
      calls.push({ system, user });
      return respond(user);
    },
  };
}

export function tempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'threadseek-test-'));
}

export const noSleep = async (_ms: number): Promise<void> => {};

/** Run the enclosing suite with the process in another time zone */
export function useHostZone(zone: string): void {
  let previous: string | undefined;
  beforeAll(() => {
    previous = process.env['TZ'];
    process.env['TZ'] = zone;
  });
  afterAll(() => {
    if (previous === undefined) delete process.env['TZ'];
    else process.env['TZ'] = previous;
  });
}
