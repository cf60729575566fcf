/**
 * StructuredBillExtractor (Maker) – fields → BillCandidate | ExtractionFailure
 */
import { createStructuredBillExtractor } from "../lib/claims/structured-extractor";
import { ExtractionFailure } from "../lib/errors";
import type { BillTextParser, ParsedBillFields } from "../lib/pdf/bill-schema";
import type { BillCandidate, ExtractedDocument } from "../types/claims";
import { makeRef } from "./fixtures";

function extracted(text: string, fields?: ParsedBillFields): ExtractedDocument {
    return {
        ref: makeRef(0),
        status: "SUCCEEDED",
        content: { text, pages: [text], pageCount: 1, method: "plain-text", fields },
    };
}

function parserReturning(fields: ParsedBillFields): BillTextParser & jest.Mock {
    return jest.fn().mockResolvedValue(fields);
}

async function extractCandidate(fields: ParsedBillFields, tolerance = 0.01): Promise<BillCandidate> {
    const extractor = createStructuredBillExtractor({ parser: parserReturning(fields), totalMismatchTolerance: tolerance });
    const result = await extractor.extract(extracted("bill text"));
    if (result instanceof ExtractionFailure) throw result;
    return result;
}

describe("createStructuredBillExtractor", () => {
    it("builds a candidate from parsed fields", async () => {
        const candidate = await extractCandidate({
            vendorName: "  City   Hospital ",
            invoiceNumber: "INV-9",
            billDate: "2024-03-04",
            currency: "usd",
            subtotal: 150,
            tax: 0,
            totalAmount: 150,
            lineItems: [
                { description: "Consultation", quantity: 1, unitPrice: 100, total: 100 },
                { description: "X-Ray", unitPrice: 50 },
            ],
        });

        expect(candidate).toEqual({
            ref: makeRef(0),
            vendorName: "City Hospital",
            billDate: "2024-03-04",
            totalAmount: 150,
            currency: "USD",
            invoiceNumber: "INV-9",
            subtotal: 150,
            tax: 0,
            lineItems: [
                { lineNumber: 1, description: "Consultation", quantity: 1, unitPrice: 100, lineTotal: 100, totalMismatch: false },
                { lineNumber: 2, description: "X-Ray", quantity: 1, unitPrice: 50, lineTotal: 50, totalMismatch: false },
            ],
            warnings: [],
        });
        expect(Object.isFrozen(candidate)).toBe(true);
    });

    it("tolerates missing date, currency and vendor", async () => {
        const candidate = await extractCandidate({ totalAmount: 20, lineItems: [{ description: "Dressing", total: 20 }] });

        expect(candidate.vendorName).toBeNull();
        expect(candidate.billDate).toBeNull();
        expect(candidate.currency).toBeNull();
        expect(candidate.lineItems[0]).toEqual({
            lineNumber: 1, description: "Dressing", quantity: 1, unitPrice: null, lineTotal: 20, totalMismatch: false,
        });
    });

    it("keeps a line total that disagrees with quantity × unit price and flags it", async () => {
        const candidate = await extractCandidate({
            totalAmount: 35,
            lineItems: [{ description: "Bandages", quantity: 3, unitPrice: 10, total: 35 }],
        });

        expect(candidate.lineItems[0].lineTotal).toBe(35);
        expect(candidate.lineItems[0].totalMismatch).toBe(true);
        expect(candidate.warnings).toEqual(["Line 1 total 35 differs from quantity × unit price 30"]);
    });

    it("drops unusable rows and renumbers the rest", async () => {
        const candidate = await extractCandidate({
            totalAmount: 15,
            currency: "dollars",
            lineItems: [
                { description: "   ", total: 3 },
                { description: "Refund", quantity: -1, unitPrice: 5 },
                { description: "Gauze", quantity: 3, unitPrice: 5 },
            ],
        });

        expect(candidate.lineItems).toEqual([
            { lineNumber: 1, description: "Gauze", quantity: 3, unitPrice: 5, lineTotal: 15, totalMismatch: false },
        ]);
        expect(candidate.currency).toBeNull();
        expect(candidate.warnings).toEqual([
            'Ignored unrecognised currency "DOLLARS"',
            "Dropped line 1: empty description",
            "Dropped line 2: invalid quantity -1",
        ]);
    });

    it("prefers fields supplied by the extraction service over the parser", async () => {
        const parser = parserReturning({ lineItems: [] });
        const extractor = createStructuredBillExtractor({ parser });

        const result = await extractor.extract(extracted("ignored", {
            totalAmount: 12,
            lineItems: [{ description: "Syringe", quantity: 2, unitPrice: 6 }],
        }));

        expect(parser).not.toHaveBeenCalled();
        expect(result instanceof ExtractionFailure).toBe(false);
    });

    // ─── failures ─────────────────────────────────────────────────────────────

    it("fails with 'no billable content' when there are no items and no total", async () => {
        const extractor = createStructuredBillExtractor({ parser: parserReturning({ vendorName: "Clinic", lineItems: [] }) });
        const result = await extractor.extract(extracted("Discharge summary"));

        expect(result).toBeInstanceOf(ExtractionFailure);
        expect(result instanceof ExtractionFailure && result.message).toBe("no billable content");
        expect(result instanceof ExtractionFailure && result.ref).toEqual(makeRef(0));
    });

    it("turns parser errors into an ExtractionFailure", async () => {
        const extractor = createStructuredBillExtractor({ parser: jest.fn().mockRejectedValue(new Error("model offline")) });
        const result = await extractor.extract(extracted("text"));

        expect(result instanceof ExtractionFailure && result.message).toBe("Bill fields could not be parsed: model offline");
    });

    it("rejects documents that were never extracted", async () => {
        const extractor = createStructuredBillExtractor({ parser: parserReturning({ lineItems: [] }) });
        const result = await extractor.extract({ ref: makeRef(0), status: "FAILED", reason: "timeout", errorCode: "EXTRACTION_TIMEOUT" });

        expect(result instanceof ExtractionFailure && result.message).toBe("Document was not extracted: timeout");
    });
});
