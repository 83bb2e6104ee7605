/**
 * metadata-store.ts: Records behind the vector index
 *
 * Entry i is the record whose text produced vector i. The file is a single
 * JSON array in embedding order. Its SHA-256 digest is stamped into the index
 * built with it.
 */

import { createHash } from 'node:crypto';
import { readFile, writeFile } from 'node:fs/promises';
import type { EligibleRecord } from '@threadseek/shared';
import { toMessageRecord } from '../records/loader.ts';
import { logger, errMessage } from '../logger.ts';

function sha256(text: string): string {
  return createHash('sha256').update(text).digest('hex');
}

export class MetadataStore {
  private fileDigest: string | null;

  /** `digest` is the digest of the file the records were read from, when there is one */
  constructor(private readonly records: readonly EligibleRecord[], digest: string | null = null) {
    this.fileDigest = digest;
  }

  get size(): number {
    return this.records.length;
  }

  /** Record for an index handle; null when the handle is out of bounds */
  at(handle: number): EligibleRecord | null {
    if (!Number.isInteger(handle) || handle < 0 || handle >= this.records.length) return null;
    return this.records[handle] ?? null;
  }

  all(): readonly EligibleRecord[] {
    return this.records;
  }

  /** Distinct conversation ids, sorted */
  conversationIds(): string[] {
    return [...new Set(this.records.map((r) => r.conversation_id))].sort();
  }

  /** Hex SHA-256 of the metadata file content (what saveMetadata writes) */
  digest(): string {
    if (this.fileDigest === null) this.fileDigest = sha256(JSON.stringify(this.records));
    return this.fileDigest;
  }

  toJSON(): readonly EligibleRecord[] {
    return this.records;
  }
}

/** Parse the metadata file content. Entries that are not eligible records are refused. */
export function parseMetadata(text: string): EligibleRecord[] {
  const parsed: unknown = JSON.parse(text);
  if (!Array.isArray(parsed)) throw new Error('Metadata file is not a JSON array');

  return parsed.map((value, i) => {
    const record = toMessageRecord(value);
    const content = record?.content;
    if (!record || typeof content !== 'string') {
      throw new Error(`Metadata entry ${i} is not an indexed message record`);
    }
    return { ...record, content };
  });
}

/**
 * Load the metadata file. Missing or corrupt → empty store with a warning;
 * the caller decides whether an empty store makes its operation meaningless.
 */
export async function loadMetadata(path: string): Promise<MetadataStore> {
  try {
    const text = await readFile(path, 'utf8');
    const records = parseMetadata(text);
    logger.info({ path, records: records.length }, 'Metadata loaded');
    return new MetadataStore(records, sha256(text));
  } catch (err) {
    logger.warn({ path, err: errMessage(err) }, 'Metadata unavailable: using empty store');
    return new MetadataStore([]);
  }
}

export async function saveMetadata(store: MetadataStore, path: string): Promise<void> {
  await writeFile(path, JSON.stringify(store));
}
