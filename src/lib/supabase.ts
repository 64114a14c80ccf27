import { createClient } from '@supabase/supabase-js';
import type { SupabaseClient } from '@supabase/supabase-js';

export interface SupabaseSettings {
  supabaseUrl: string;
  supabaseKey: string;
}

// Use the service role key for backend operations to bypass RLS
export function createSupabase(settings: SupabaseSettings): SupabaseClient {
  return createClient(settings.supabaseUrl, settings.supabaseKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
}

export type { SupabaseClient };
