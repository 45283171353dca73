/**
 * Feedkeeper — Supabase Client
 *
 * Service client used by the Supabase dedup store. Collection runs as a
 * background job, so it always uses the service role key and never
 * persists a session.
 */

import { createClient, SupabaseClient } from '@supabase/supabase-js';
import WebSocket from 'ws';
import { StoreError, describeError } from '../lib/errors';

export interface SupabaseClientOptions {
  url: string;
  serviceRoleKey: string;
  /** Custom fetch, mainly for tests */
  fetch?: typeof fetch;
}

/**
 * The realtime client is built eagerly even though the store never
 * subscribes, and Node.js 20 has no global WebSocket, so `ws` is passed in.
 */
export function createServiceClient(options: SupabaseClientOptions): SupabaseClient {
  try {
    return createClient(options.url, options.serviceRoleKey, {
      auth: {
        autoRefreshToken: false,
        persistSession: false,
      },
      realtime: { transport: WebSocket },
      ...(options.fetch ? { global: { fetch: options.fetch } } : {}),
    });
  } catch (error) {
    throw new StoreError('Unavailable', `Could not create Supabase client: ${describeError(error)}`, {
      cause: error,
    });
  }
}

// ============================================================
// ERRORS
// ============================================================

export interface SupabaseErrorLike {
  message: string;
  code?: string;
}

function isSupabaseErrorLike(error: unknown): error is SupabaseErrorLike {
  return (
    typeof error === 'object' &&
    error !== null &&
    'message' in error &&
    typeof error.message === 'string'
  );
}

/**
 * Error codes meaning the schema is missing: Postgres' undefined table,
 * and PostgREST's table-not-in-schema-cache.
 */
const MISSING_TABLE_CODES = new Set(['42P01', 'PGRST205']);

export function isMissingTable(error: unknown): boolean {
  return isSupabaseErrorLike(error) && error.code !== undefined && MISSING_TABLE_CODES.has(error.code);
}

/**
 * Handle Supabase errors consistently
 */
export function describeSupabaseError(error: unknown): string {
  if (isSupabaseErrorLike(error)) {
    return `Supabase error: ${error.message}${error.code ? ` (code: ${error.code})` : ''}`;
  }
  return 'Unknown Supabase error';
}

// ============================================================
// ROW TYPES
// ============================================================

export interface SeenItemRow {
  feed_id: string;
  fingerprint: string;
  first_seen_at: string;
}
