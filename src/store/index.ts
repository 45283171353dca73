/**
 * Feedkeeper — Store Exports
 */

import type { AppConfig } from '../lib/config';
import { ConfigError } from '../lib/errors';
import { createServiceClient } from '../db/client';
import { FileSeenStore } from './file-store';
import { MemorySeenStore } from './seen-store';
import type { SeenStore } from './seen-store';
import { SupabaseSeenStore } from './supabase-store';

export type { SeenStore } from './seen-store';
export { MemorySeenStore } from './seen-store';
export { FileSeenStore } from './file-store';
export { SupabaseSeenStore } from './supabase-store';

/**
 * Build the configured dedup backend.
 */
export function createSeenStore(config: AppConfig['store'], options: { fetch?: typeof fetch } = {}): SeenStore {
  switch (config.backend) {
    case 'memory':
      return new MemorySeenStore();
    case 'file':
      return new FileSeenStore(config.dir);
    case 'supabase':
      if (!config.supabaseUrl || !config.supabaseKey) {
        throw new ConfigError('Supabase store requires SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY');
      }
      return new SupabaseSeenStore(
        createServiceClient({ url: config.supabaseUrl, serviceRoleKey: config.supabaseKey, fetch: options.fetch })
      );
  }
}
