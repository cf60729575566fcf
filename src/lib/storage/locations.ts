export type DocumentLocation =
    | { scheme: "supabase"; bucket: string; path: string }
    | { scheme: "https"; url: URL };

export const OBJECT_STORE_SCHEME = "supabase:";

/** Returns null for anything that is not supabase://<bucket>/<path> or https://... */
export function parseDocumentLocation(location: string): DocumentLocation | null {
    let url: URL;
    try {
        url = new URL(location.trim());
    } catch {
        return null;
    }

    if (url.protocol === "https:") return { scheme: "https", url };

    if (url.protocol === OBJECT_STORE_SCHEME) {
        const bucket = url.hostname;
        const path = decodeURIComponent(url.pathname.replace(/^\/+/, ""));
        if (!bucket || !path) return null;
        return { scheme: "supabase", bucket, path };
    }

    return null;
}

/** Last path segment of a location, without query or fragment. */
export function fileNameFromLocation(location: string): string {
    const withoutQuery = location.trim().split(/[?#]/)[0];
    const segments = withoutQuery.split("/").filter(Boolean);
    const last = segments[segments.length - 1] ?? "";
    try {
        return decodeURIComponent(last) || "document";
    } catch {
        return last || "document";
    }
}

const CONTENT_TYPES: Record<string, string> = {
    pdf: "application/pdf",
    png: "image/png",
    jpg: "image/jpeg",
    jpeg: "image/jpeg",
    gif: "image/gif",
    webp: "image/webp",
    tif: "image/tiff",
    tiff: "image/tiff",
    txt: "text/plain",
    json: "application/json",
};

/** MIME type for a file name's extension; application/octet-stream when unknown. */
export function contentTypeFromFileName(fileName: string): string {
    const dot = fileName.lastIndexOf(".");
    if (dot <= 0) return "application/octet-stream";
    return CONTENT_TYPES[fileName.slice(dot + 1).toLowerCase()] ?? "application/octet-stream";
}
