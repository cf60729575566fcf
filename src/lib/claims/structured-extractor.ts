/**
 * @file    structured-extractor.ts
 * @purpose Maker step: turn one extracted document into a BillCandidate
 *          (header fields + ordered line items) or an ExtractionFailure.
 *
 * Missing optional fields (date, currency, vendor) are not fatal. The only
 * fatal case is a document with neither line items nor a claimed total.
 * Line totals that disagree with quantity × unit price are kept as extracted
 * and flagged, never corrected.
 */

import { ExtractionFailure, describeError } from "../errors";
import { ParsedBillFieldsSchema, type BillTextParser, type ParsedBillFields } from "../pdf/bill-schema";
import { roundMoney } from "./money";
import type { BillCandidate, ExtractedDocument, LineItem } from "../../types/claims";

export interface StructuredBillExtractor {
    extract(document: ExtractedDocument, options?: { signal?: AbortSignal }): Promise<BillCandidate | ExtractionFailure>;
}

export interface StructuredBillExtractorOptions {
    parser: BillTextParser;
    totalMismatchTolerance?: number;
}

function finiteOrNull(value: number | null | undefined): number | null {
    return typeof value === "number" && Number.isFinite(value) ? value : null;
}

function cleanText(value: string | null | undefined): string | null {
    const cleaned = value?.replace(/\s+/g, " ").trim();
    return cleaned ? cleaned : null;
}

function normalizeCurrencyCode(value: string | null | undefined, warnings: string[]): string | null {
    const code = cleanText(value)?.toUpperCase() ?? null;
    if (code === null) return null;
    if (!/^[A-Z]{3}$/.test(code)) {
        warnings.push(`Ignored unrecognised currency "${code}"`);
        return null;
    }
    return code;
}

function buildLineItems(
    fields: ParsedBillFields,
    currency: string | null,
    tolerance: number,
    warnings: string[]
): LineItem[] {
    const items: LineItem[] = [];

    fields.lineItems.forEach((raw, idx) => {
        const position = idx + 1;
        const description = cleanText(raw.description);
        if (!description) {
            warnings.push(`Dropped line ${position}: empty description`);
            return;
        }

        const quantity = raw.quantity == null ? 1 : raw.quantity;
        if (!Number.isFinite(quantity) || quantity < 0) {
            warnings.push(`Dropped line ${position}: invalid quantity ${quantity}`);
            return;
        }

        const unitPrice = finiteOrNull(raw.unitPrice);
        const extractedTotal = finiteOrNull(raw.total);
        const derivedTotal = unitPrice === null ? null : roundMoney(quantity * unitPrice, currency);

        let totalMismatch = false;
        if (extractedTotal !== null && derivedTotal !== null && Math.abs(extractedTotal - derivedTotal) > tolerance) {
            totalMismatch = true;
            warnings.push(
                `Line ${items.length + 1} total ${extractedTotal} differs from quantity × unit price ${derivedTotal}`
            );
        }

        items.push(Object.freeze({
            lineNumber: items.length + 1,
            description,
            quantity,
            unitPrice,
            lineTotal: extractedTotal ?? derivedTotal,
            totalMismatch,
        }));
    });

    return items;
}

export function createStructuredBillExtractor(options: StructuredBillExtractorOptions): StructuredBillExtractor {
    const tolerance = options.totalMismatchTolerance ?? 0.01;

    async function resolveFields(
        document: Extract<ExtractedDocument, { status: "SUCCEEDED" }>,
        signal?: AbortSignal
    ): Promise<ParsedBillFields> {
        const source = document.content.fields ?? await options.parser(document.content.text, { signal });
        return ParsedBillFieldsSchema.parse(source);
    }

    return {
        async extract(document, { signal } = {}) {
            if (document.status === "FAILED") {
                return new ExtractionFailure(document.ref, `Document was not extracted: ${document.reason}`);
            }

            let fields: ParsedBillFields;
            try {
                fields = await resolveFields(document, signal);
            } catch (err) {
                return new ExtractionFailure(document.ref, `Bill fields could not be parsed: ${describeError(err).message}`, err);
            }

            const warnings: string[] = [];
            const currency = normalizeCurrencyCode(fields.currency, warnings);
            const lineItems = buildLineItems(fields, currency, tolerance, warnings);
            const totalAmount = finiteOrNull(fields.totalAmount);

            if (lineItems.length === 0 && totalAmount === null) {
                return new ExtractionFailure(document.ref, "no billable content");
            }

            return Object.freeze({
                ref: document.ref,
                vendorName: cleanText(fields.vendorName),
                billDate: cleanText(fields.billDate),
                totalAmount,
                currency,
                invoiceNumber: cleanText(fields.invoiceNumber),
                subtotal: finiteOrNull(fields.subtotal),
                tax: finiteOrNull(fields.tax),
                lineItems: Object.freeze(lineItems),
                warnings: Object.freeze(warnings),
            });
        },
    };
}
