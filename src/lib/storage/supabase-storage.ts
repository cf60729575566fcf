import type { SupabaseClient } from "@supabase/supabase-js";
import { createClient } from "../supabase";

/** The slice of Supabase Storage the document loader needs. */
export interface ObjectStore {
    download(bucket: string, path: string): Promise<Buffer>;
}

export function createSupabaseObjectStore(client: SupabaseClient | null = createClient()): ObjectStore {
    return {
        async download(bucket, path) {
            if (!client) {
                throw new Error("Supabase is required for supabase:// documents. Please configure SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY.");
            }
            const { data, error } = await client.storage.from(bucket).download(path);
            if (error || !data) throw new Error(`Download failed: ${error?.message ?? "empty response"}`);
            return Buffer.from(await data.arrayBuffer());
        },
    };
}
