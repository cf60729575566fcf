import { createClient as createSupabaseClient, type SupabaseClient } from "@supabase/supabase-js";

let supabase: SupabaseClient | null = null;

/** Shared service-role client, or null when Supabase is not configured. */
export function createClient(): SupabaseClient | null {
    const url = process.env.SUPABASE_URL || process.env.NEXT_PUBLIC_SUPABASE_URL;
    const key = process.env.SUPABASE_SERVICE_ROLE_KEY;
    if (!supabase && url && key) {
        supabase = createSupabaseClient(url, key, {
            auth: { persistSession: false, autoRefreshToken: false },
        });
    }
    return supabase;
}
