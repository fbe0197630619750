import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { getServerEnv } from '@dealwatch/shared';

import {
  createSeenSetStore,
  FileSeenSetStore,
  parseSeenIds,
  SupabaseSeenSetStore,
  type StorageBucketApi,
} from '../src/index.js';

describe('parseSeenIds', () => {
  it('reads a JSON string array', () => {
    expect(parseSeenIds('["a","b"]')).toEqual(['a', 'b']);
    expect(parseSeenIds('  ')).toEqual([]);
  });

  it('rejects other shapes', () => {
    expect(() => parseSeenIds('{"a":1}')).toThrow(/^seen_store_invalid_shape:/);
    expect(() => parseSeenIds('[1,2]')).toThrow(/^seen_store_invalid_shape:/);
    expect(() => parseSeenIds('[oops')).toThrow(/^seen_store_invalid_json:/);
  });
});

describe('FileSeenSetStore', () => {
  let dir = '';

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'seen-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('starts empty and round-trips a full overwrite', async () => {
    const file = path.join(dir, 'nested', 'seen.json');
    const store = new FileSeenSetStore(file);

    expect(await store.load()).toEqual([]);
    await store.save(['a', 'b']);
    await store.save(['a', 'b', 'c']);

    expect(await store.load()).toEqual(['a', 'b', 'c']);
    expect(await readFile(file, 'utf8')).toBe('["a","b","c"]');
    expect(await readdir(path.join(dir, 'nested'))).toEqual(['seen.json']);
  });

  it('refuses a corrupt blob', async () => {
    const file = path.join(dir, 'seen.json');
    await writeFile(file, 'not json', 'utf8');
    await expect(new FileSeenSetStore(file).load()).rejects.toThrow(/^seen_store_invalid_json:/);
  });
});

type Upload = { objectPath: string; body: string; options: { upsert: boolean; contentType: string } };

function fakeBucket(download: Awaited<ReturnType<StorageBucketApi['download']>>, uploadError: Error | null = null) {
  const uploads: Upload[] = [];
  const bucket: StorageBucketApi = {
    download: async () => download,
    upload: async (objectPath, body, options) => {
      uploads.push({ objectPath, body, options });
      return { error: uploadError };
    },
  };
  return { bucket, uploads };
}

function blob(text: string) {
  return { text: async () => text };
}

describe('SupabaseSeenSetStore', () => {
  it('reads the stored blob', async () => {
    const { bucket } = fakeBucket({ data: blob('["x"]'), error: null });
    expect(await new SupabaseSeenSetStore(bucket, 'seen_deals.json').load()).toEqual(['x']);
  });

  it('treats a missing object as an empty set', async () => {
    const notFound = Object.assign(new Error('Object not found'), { statusCode: '404' });
    const { bucket } = fakeBucket({ data: null, error: notFound });
    expect(await new SupabaseSeenSetStore(bucket, 'seen_deals.json').load()).toEqual([]);
  });

  it('surfaces any other download error', async () => {
    const { bucket } = fakeBucket({ data: null, error: new Error('permission denied') });
    await expect(new SupabaseSeenSetStore(bucket, 'seen_deals.json').load()).rejects.toThrow(
      'seen_store_download:permission denied',
    );
  });

  it('upserts the whole blob as JSON', async () => {
    const { bucket, uploads } = fakeBucket({ data: blob('[]'), error: null });
    const store = new SupabaseSeenSetStore(bucket, 'alerts/seen.json', 'deals');

    await store.save(['a', 'b']);

    expect(uploads).toEqual([
      { objectPath: 'alerts/seen.json', body: '["a","b"]', options: { upsert: true, contentType: 'application/json' } },
    ]);
    expect(store.describe()).toBe('supabase://deals/alerts/seen.json');
  });

  it('reports an upload error', async () => {
    const { bucket } = fakeBucket({ data: blob('[]'), error: null }, new Error('quota exceeded'));
    await expect(new SupabaseSeenSetStore(bucket, 'seen.json').save(['a'])).rejects.toThrow(
      'seen_store_upload:quota exceeded',
    );
  });
});

describe('createSeenSetStore', () => {
  it('defaults to a local file', () => {
    const store = createSeenSetStore(getServerEnv({ SEEN_STORE_FILE: '/tmp/seen.json' }));
    expect(store.describe()).toBe('file:///tmp/seen.json');
  });

  it('requires credentials for the supabase backend', () => {
    expect(() => createSeenSetStore(getServerEnv({ SEEN_STORE: 'supabase' }))).toThrow(/Missing seen-store env vars/);
  });
});
