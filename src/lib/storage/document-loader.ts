/**
 * @file    document-loader.ts
 * @purpose Fetch a claim document's raw bytes from its location.
 *          supabase://<bucket>/<path> reads from Supabase Storage,
 *          https://... is fetched with axios.
 * @deps    @supabase/supabase-js (via supabase-storage), axios
 */

import axios, { type AxiosInstance } from "axios";
import { LoadError } from "../errors";
import { parseDocumentLocation } from "./locations";
import { createSupabaseObjectStore, type ObjectStore } from "./supabase-storage";

export interface DocumentLoader {
    load(location: string, signal?: AbortSignal): Promise<Buffer>;
}

export interface DocumentLoaderOptions {
    store?: ObjectStore;
    http?: Pick<AxiosInstance, "get">;
    maxBytes?: number;
}

const DEFAULT_MAX_BYTES = 50 * 1024 * 1024;

export function createDocumentLoader(options: DocumentLoaderOptions = {}): DocumentLoader {
    const http = options.http ?? axios;
    const maxBytes = options.maxBytes ?? DEFAULT_MAX_BYTES;
    let store = options.store ?? null;

    async function fetchBytes(location: string, signal?: AbortSignal): Promise<Buffer> {
        const parsed = parseDocumentLocation(location);
        if (!parsed) {
            throw new LoadError(`Unsupported document location: ${location}`, location);
        }

        if (parsed.scheme === "supabase") {
            store ??= createSupabaseObjectStore();
            return store.download(parsed.bucket, parsed.path);
        }

        const response = await http.get<ArrayBuffer>(parsed.url.toString(), {
            responseType: "arraybuffer",
            maxContentLength: maxBytes,
            signal,
        });
        return Buffer.from(response.data);
    }

    return {
        async load(location, signal) {
            let bytes: Buffer;
            try {
                bytes = await fetchBytes(location, signal);
            } catch (err) {
                if (err instanceof LoadError) throw err;
                const reason = err instanceof Error ? err.message : String(err);
                throw new LoadError(`Could not load ${location}: ${reason}`, location, err);
            }

            if (bytes.length === 0) throw new LoadError(`Document at ${location} is empty`, location);
            if (bytes.length > maxBytes) {
                throw new LoadError(`Document at ${location} is ${bytes.length} bytes; the limit is ${maxBytes}`, location);
            }
            return bytes;
        },
    };
}
