import type { ServerEnv } from '@dealwatch/shared';

import { getSupabase } from './client.js';
import { FileSeenSetStore, SupabaseSeenSetStore, type SeenSetStore } from './seenSet.js';

export { getSupabase } from './client.js';
export {
  FileSeenSetStore,
  SupabaseSeenSetStore,
  parseSeenIds,
  serializeSeenIds,
  type SeenSetStore,
  type StorageBucketApi,
} from './seenSet.js';

export function createSeenSetStore(env: ServerEnv): SeenSetStore {
  if (env.SEEN_STORE === 'file') return new FileSeenSetStore(env.SEEN_STORE_FILE);

  const url = env.SUPABASE_URL ?? '';
  const serviceRoleKey = env.SUPABASE_SERVICE_ROLE_KEY ?? '';
  const bucket = env.SEEN_STORE_BUCKET ?? '';
  if (!url || !serviceRoleKey || !bucket) {
    throw new Error('Missing seen-store env vars. Set SUPABASE_URL, SUPABASE_SERVICE_ROLE_KEY, SEEN_STORE_BUCKET.');
  }
  const client = getSupabase({ url, serviceRoleKey });
  return new SupabaseSeenSetStore(client.storage.from(bucket), env.SEEN_STORE_OBJECT, bucket);
}
