import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import WebSocket from 'ws';
import type { AppConfig } from '../config.js';

export function createSupabaseClient(config: AppConfig): SupabaseClient | null {
  if (!config.supabase) {
    return null;
  }

  // Node 20 has no global WebSocket, which the realtime client requires at construction.
  return createClient(config.supabase.url, config.supabase.serviceRoleKey, {
    auth: { persistSession: false, autoRefreshToken: false },
    realtime: { transport: WebSocket }
  });
}
