/**
 * Shared builders and in-process fakes for the pipeline tests.
 */
import { ExtractionServiceError } from "../lib/errors";
import type { DocumentLoader } from "../lib/storage/document-loader";
import type { TextExtractionService } from "../lib/pdf/extractor";
import type { ParsedBillFields } from "../lib/pdf/bill-schema";
import type { BillCandidate, DocumentRef, LineItem } from "../types/claims";

// ─── refs & candidates ────────────────────────────────────────────────────────

export function makeRef(ingestionIndex: number, claimId = "CLM-1", fileName = `doc${ingestionIndex + 1}.pdf`): DocumentRef {
    return {
        documentId: `${claimId}_doc_${ingestionIndex + 1}_${fileName}`,
        location: `supabase://claims/${claimId}/${fileName}`,
        fileName,
        ingestionIndex,
    };
}

export function makeItem(
    lineNumber: number,
    description: string,
    quantity: number,
    unitPrice: number | null,
    lineTotal: number | null = unitPrice === null ? null : quantity * unitPrice
): LineItem {
    return { lineNumber, description, quantity, unitPrice, lineTotal, totalMismatch: false };
}

export function makeCandidate(ingestionIndex: number, overrides: Partial<Omit<BillCandidate, "ref">> = {}): BillCandidate {
    return {
        ref: makeRef(ingestionIndex),
        vendorName: "City Hospital",
        billDate: "2024-03-04",
        totalAmount: 150,
        currency: "USD",
        invoiceNumber: null,
        subtotal: null,
        tax: null,
        lineItems: [makeItem(1, "Consultation", 1, 100), makeItem(2, "X-Ray", 1, 50)],
        warnings: [],
        ...overrides,
    };
}

// ─── bill field payloads ──────────────────────────────────────────────────────

export const hospitalBill: ParsedBillFields = {
    vendorName: "City Hospital",
    invoiceNumber: "INV-100",
    billDate: "2024-03-04",
    currency: "USD",
    totalAmount: 150,
    lineItems: [
        { description: "Consultation", quantity: 1, unitPrice: 100, total: 100 },
        { description: "X-Ray", quantity: 1, unitPrice: 50, total: 50 },
    ],
};

export const pharmacyBill: ParsedBillFields = {
    vendorName: "Corner Pharmacy",
    billDate: "2024-03-05",
    currency: "USD",
    totalAmount: 60,
    lineItems: [
        { description: "Antibiotics", quantity: 2, unitPrice: 10, total: 20 },
        { description: "Bandages", quantity: 4, unitPrice: 5, total: 20 },
        { description: "Saline", quantity: 1, unitPrice: 20, total: 20 },
    ],
};

export const prescription: ParsedBillFields = {
    vendorName: "Dr. Rao Clinic",
    billDate: "2024-03-04",
    lineItems: [],
    totalAmount: 0,
};

// ─── fakes ────────────────────────────────────────────────────────────────────

export type FakeDocument = ParsedBillFields | Buffer | Error | { delayMs: number; fields: ParsedBillFields };

/** Bytes the JSON extraction service cannot read. */
export const CORRUPT = Buffer.from([0x00, 0x9f, 0x92, 0x96]);

export function location(name: string): string {
    return `supabase://claims/CLM-1/${name}`;
}

/**
 * Loader that serves JSON-encoded bill fields per location. An Error entry
 * makes load() reject, a Buffer is served as-is, and a delayed entry
 * resolves after delayMs unless its signal aborts first.
 */
export function fakeLoader(documents: Record<string, FakeDocument>): DocumentLoader & { calls: string[] } {
    const calls: string[] = [];
    return {
        calls,
        async load(loc, signal) {
            calls.push(loc);
            const doc = documents[loc];
            if (doc === undefined) throw new Error(`not found: ${loc}`);
            if (doc instanceof Error) throw doc;
            if (Buffer.isBuffer(doc)) return doc;
            if ("delayMs" in doc) {
                await new Promise<void>((resolve, reject) => {
                    const timer = setTimeout(resolve, doc.delayMs);
                    signal?.addEventListener("abort", () => {
                        clearTimeout(timer);
                        reject(new Error("aborted"));
                    });
                });
                return Buffer.from(JSON.stringify(doc.fields));
            }
            return Buffer.from(JSON.stringify(doc));
        },
    };
}

/** Extraction service that reads the JSON payload back as pre-structured fields. */
export const jsonExtractionService: TextExtractionService = {
    async extractText(bytes) {
        if (bytes[0] === 0x00) throw new ExtractionServiceError("Unsupported document format");
        const text = bytes.toString("utf8");
        const fields: ParsedBillFields = JSON.parse(text);
        return { text, pages: [text], pageCount: 1, method: "plain-text", fields };
    },
};

export const fixedClock = () => new Date("2024-05-01T10:00:00.000Z");
