import { describe, it, expect } from 'vitest';
import { config, missingKeys } from '../config.ts';

describe('config', () => {
  it('falls back to defaults', () => {
    expect(config.embedModel).toBe('voyage-3');
    expect(config.embedBatchSize).toBe(100);
    expect(config.embedFailurePolicy).toBe('retry');
    expect(config.insightProvider).toBe('anthropic');
    expect(config.searchCandidates).toBe(20);
    expect(config.searchMaxResults).toBe(10);
  });

  it('places data files under DATA_DIR', () => {
    expect(config.dataDir).toBe(process.env['DATA_DIR']);
    expect(config.indexPath.startsWith(config.dataDir)).toBe(true);
    expect(config.metadataPath.endsWith('metadata.json')).toBe(true);
  });

  it('lists the keys each command needs', () => {
    expect(missingKeys([])).toEqual([]);
    expect(missingKeys(['embeddings'])).toEqual(['VOYAGE_API_KEY']);
    expect(missingKeys(['embeddings', 'insights'])).toEqual(['VOYAGE_API_KEY', 'ANTHROPIC_API_KEY']);
  });
});
