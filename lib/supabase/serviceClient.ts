import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { getResaleConfig } from "@/lib/config/resaleConfig";

let supabaseSingleton: SupabaseClient | null = null;
let warned = false;

/**
 * Service-role Supabase client for cache and usage tables.
 * Returns null (and warns once) when SUPABASE_URL / SUPABASE_SERVICE_ROLE_KEY are not set.
 */
export function getSupabaseServiceClient(): SupabaseClient | null {
  if (supabaseSingleton) return supabaseSingleton;

  const { supabase_url, supabase_service_key } = getResaleConfig();
  if (!supabase_url || !supabase_service_key) {
    if (!warned) {
      console.warn("SUPABASE_DISABLED: Supabase URL or service role key not configured.");
      warned = true;
    }
    return null;
  }

  supabaseSingleton = createClient(supabase_url, supabase_service_key, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
  });
  return supabaseSingleton;
}
