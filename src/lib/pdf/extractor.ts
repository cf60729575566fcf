/**
 * @file    extractor.ts
 * @purpose Raw bytes → page text. PDFs go through pdf-parse first; scanned PDFs
 *          and images fall back to Claude vision. UTF-8 text passes through.
 * @deps    pdf-parse, @anthropic-ai/sdk
 * @env     ANTHROPIC_API_KEY, ANTHROPIC_OCR_MODEL
 *
 * DECISION: a PDF longer than the page limit is rejected outright, never
 * truncated. A partial bill would fingerprint differently from the full one.
 */

import { getAnthropicClient } from "../anthropic";
import { ExtractionServiceError } from "../errors";
import type { ExtractedContent } from "../../types/claims";

export type VisionMediaType = "application/pdf" | "image/png" | "image/jpeg" | "image/gif" | "image/webp";

/** OCR for documents without a usable text layer. */
export interface VisionOcr {
    readText(bytes: Buffer, mediaType: VisionMediaType, signal?: AbortSignal): Promise<string>;
}

export interface PdfTextLayer {
    text: string;
    numpages: number;
}

export type PdfReader = (bytes: Buffer, maxPages: number) => Promise<PdfTextLayer>;

export interface TextExtractionOptions {
    maxPages: number;
    vision?: VisionOcr | null;
    pdfReader?: PdfReader;
}

const OCR_PROMPT = `Extract ALL text from this document. Include every number, date, vendor name, and line item exactly as shown. Keep one line item per line. Separate pages with a form feed character.`;

// ──────────────────────────────────────────────────
// FORMAT DETECTION
// ──────────────────────────────────────────────────

type DetectedFormat = VisionMediaType | "text/plain" | null;

const utf8 = new TextDecoder("utf-8", { fatal: true });

export function detectFormat(bytes: Buffer): DetectedFormat {
    const ascii = (start: number, end: number) => bytes.subarray(start, end).toString("latin1");

    if (ascii(0, 5) === "%PDF-") return "application/pdf";
    if (bytes.length >= 8 && bytes[0] === 0x89 && ascii(1, 4) === "PNG") return "image/png";
    if (bytes.length >= 3 && bytes[0] === 0xff && bytes[1] === 0xd8 && bytes[2] === 0xff) return "image/jpeg";
    if (ascii(0, 4) === "GIF8") return "image/gif";
    if (ascii(0, 4) === "RIFF" && ascii(8, 12) === "WEBP") return "image/webp";

    if (bytes.includes(0)) return null;
    try {
        utf8.decode(bytes);
        return "text/plain";
    } catch {
        return null;
    }
}

function splitIntoPages(text: string): string[] {
    // Form feed = page break; a trailing one does not open another page
    return text.replace(/\x0C\s*$/, "").split("\x0C").map(page => page.trim());
}

// ──────────────────────────────────────────────────
// READERS
// ──────────────────────────────────────────────────

/** pdf-parse is imported on first use: its entry point runs debug code when loaded outside a parent module. */
export const readPdfTextLayer: PdfReader = async (bytes, maxPages) => {
    const { default: pdfParse } = await import("pdf-parse");
    const parsed = await pdfParse(bytes, { max: maxPages });
    return { text: parsed.text, numpages: parsed.numpages };
};

export function createVisionOcr(model: string): VisionOcr {
    return {
        async readText(bytes, mediaType, signal) {
            const data = bytes.toString("base64");
            const source =
                mediaType === "application/pdf"
                    ? { type: "document" as const, source: { type: "base64" as const, media_type: mediaType, data } }
                    : { type: "image" as const, source: { type: "base64" as const, media_type: mediaType, data } };

            const response = await getAnthropicClient().messages.create(
                {
                    model,
                    max_tokens: 4096,
                    messages: [{
                        role: "user",
                        content: [source, { type: "text", text: OCR_PROMPT }],
                    }],
                },
                { signal }
            );

            return response.content
                .map(block => (block.type === "text" ? block.text : ""))
                .join("\n")
                .trim();
        },
    };
}

// ──────────────────────────────────────────────────
// SERVICE
// ──────────────────────────────────────────────────

export interface TextExtractionService {
    extractText(bytes: Buffer, options?: { signal?: AbortSignal }): Promise<ExtractedContent>;
}

export function createTextExtractionService(options: TextExtractionOptions): TextExtractionService {
    const { maxPages } = options;
    const vision = options.vision ?? null;
    const readPdf = options.pdfReader ?? readPdfTextLayer;

    async function viaVision(bytes: Buffer, mediaType: VisionMediaType, pageCount: number, signal?: AbortSignal): Promise<ExtractedContent> {
        if (!vision) {
            throw new ExtractionServiceError(`No text layer found and no vision OCR is configured for ${mediaType}`);
        }
        const text = await vision.readText(bytes, mediaType, signal);
        if (!text) throw new ExtractionServiceError("Vision OCR returned no text");
        const pages = splitIntoPages(text);
        return { text, pages, pageCount: Math.max(pageCount, pages.length), method: "vision" };
    }

    async function extractPdf(bytes: Buffer, signal?: AbortSignal): Promise<ExtractedContent> {
        let layer: PdfTextLayer;
        try {
            layer = await readPdf(bytes, maxPages);
        } catch (err) {
            throw new ExtractionServiceError(
                `PDF could not be read: ${err instanceof Error ? err.message : String(err)}`,
                "EXTRACTION_SERVICE_ERROR",
                err
            );
        }

        if (layer.numpages > maxPages) {
            throw new ExtractionServiceError(`PDF has ${layer.numpages} pages; the limit is ${maxPages}`);
        }

        // Sparse text usually means a scanned PDF
        const density = layer.text.replace(/\s/g, "").length / (Math.max(1, layer.numpages) * 1000);
        if (density < 0.1 && vision) {
            return viaVision(bytes, "application/pdf", layer.numpages, signal);
        }
        if (!layer.text.trim()) {
            return viaVision(bytes, "application/pdf", layer.numpages, signal);
        }

        return { text: layer.text, pages: splitIntoPages(layer.text), pageCount: layer.numpages, method: "text-layer" };
    }

    return {
        async extractText(bytes, { signal } = {}) {
            const format = detectFormat(bytes);
            switch (format) {
                case "application/pdf":
                    return extractPdf(bytes, signal);
                case "text/plain": {
                    const text = bytes.toString("utf8");
                    const pages = splitIntoPages(text);
                    if (pages.length > maxPages) {
                        throw new ExtractionServiceError(`Document has ${pages.length} pages; the limit is ${maxPages}`);
                    }
                    return { text, pages, pageCount: pages.length, method: "plain-text" };
                }
                case null:
                    throw new ExtractionServiceError("Unsupported document format");
                default:
                    return viaVision(bytes, format, 1, signal);
            }
        },
    };
}
