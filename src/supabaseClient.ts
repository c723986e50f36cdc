import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import type { AppConfig } from './config';

export function createSupabase(config: AppConfig): SupabaseClient {
    return createClient(config.supabaseUrl, config.supabaseAnonKey, {
        auth: { persistSession: false }
    });
}
