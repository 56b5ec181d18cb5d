import { createClient, type SupabaseClient } from '@supabase/supabase-js';

import type { AppConfig } from '../config';

let client: SupabaseClient | null = null;

/** Shared service-role client for the account database, or null when not configured. */
export const getSupabaseClient = (config: AppConfig): SupabaseClient | null => {
  const settings = config.accounts.supabase;
  if (!settings) {
    return null;
  }

  if (!client) {
    client = createClient(settings.url, settings.serviceRoleKey, {
      auth: { persistSession: false, autoRefreshToken: false },
    });
  }

  return client;
};

export const resetSupabaseClient = () => {
  client = null;
};
