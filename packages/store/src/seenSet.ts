import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { z } from 'zod';

/**
 * Durable set of offer ids that have already been processed.
 *
 * `load` returns the persisted ids in stored order (empty when nothing was
 * written yet). `save` replaces the whole blob; there are no partial writes.
 */
export interface SeenSetStore {
  load(): Promise<string[]>;
  save(ids: readonly string[]): Promise<void>;
  describe(): string;
}

const seenIdsSchema = z.array(z.string());

export function parseSeenIds(text: string): string[] {
  if (!text.trim()) return [];
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (e) {
    throw new Error(`seen_store_invalid_json:${e instanceof Error ? e.message : String(e)}`);
  }
  const parsed = seenIdsSchema.safeParse(json);
  if (!parsed.success) {
    throw new Error(`seen_store_invalid_shape:${parsed.error.issues[0]?.message ?? 'expected string[]'}`);
  }
  return parsed.data;
}

export function serializeSeenIds(ids: readonly string[]): string {
  return JSON.stringify(ids);
}

// Minimal view of a Supabase Storage bucket (`client.storage.from(bucket)`).
export type StorageBucketApi = {
  download(
    objectPath: string,
  ): PromiseLike<{ data: { text(): Promise<string> }; error: null } | { data: null; error: Error }>;
  upload(
    objectPath: string,
    body: string,
    options: { upsert: boolean; contentType: string },
  ): PromiseLike<{ error: Error | null }>;
};

function isNotFound(error: Error): boolean {
  if ('status' in error && error.status === 404) return true;
  if ('statusCode' in error && String(error.statusCode) === '404') return true;
  return /not[\s_]?found/i.test(error.message);
}

export class SupabaseSeenSetStore implements SeenSetStore {
  constructor(
    private readonly bucket: StorageBucketApi,
    private readonly objectPath: string,
    private readonly bucketName = 'bucket',
  ) {}

  describe() {
    return `supabase://${this.bucketName}/${this.objectPath}`;
  }

  async load(): Promise<string[]> {
    const res = await this.bucket.download(this.objectPath);
    if (res.error) {
      if (isNotFound(res.error)) return [];
      throw new Error(`seen_store_download:${res.error.message}`);
    }
    return parseSeenIds(await res.data.text());
  }

  async save(ids: readonly string[]): Promise<void> {
    const res = await this.bucket.upload(this.objectPath, serializeSeenIds(ids), {
      upsert: true,
      contentType: 'application/json',
    });
    if (res.error) throw new Error(`seen_store_upload:${res.error.message}`);
  }
}

function isMissingFile(e: unknown): boolean {
  return e instanceof Error && 'code' in e && e.code === 'ENOENT';
}

export class FileSeenSetStore implements SeenSetStore {
  constructor(private readonly filePath: string) {}

  describe() {
    return `file://${path.resolve(this.filePath)}`;
  }

  async load(): Promise<string[]> {
    let text: string;
    try {
      text = await readFile(this.filePath, 'utf8');
    } catch (e) {
      if (isMissingFile(e)) return [];
      throw e;
    }
    return parseSeenIds(text);
  }

  async save(ids: readonly string[]): Promise<void> {
    // Full overwrite through a temp file + rename.
    const tmp = `${this.filePath}.${process.pid}.tmp`;
    await mkdir(path.dirname(path.resolve(this.filePath)), { recursive: true });
    await writeFile(tmp, serializeSeenIds(ids), 'utf8');
    await rename(tmp, this.filePath);
  }
}
