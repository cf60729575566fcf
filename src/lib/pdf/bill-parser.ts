/**
 * @file    bill-parser.ts
 * @purpose Rule-based bill field extraction from OCR / text-layer output.
 *          Deterministic and offline; the LLM parser in invoice-parser.ts is
 *          the model-backed alternative behind the same BillTextParser type.
 *
 * Fields that cannot be found stay absent. Nothing is defaulted here: no
 * "Unknown Vendor", no generated invoice numbers, no placeholder line item.
 */

import type { BillTextParser, ParsedBillFields, ParsedLineItem } from "./bill-schema";

export const MAX_LINE_ITEMS = 200;

// Lines that open with one of these are headings or labels, never the vendor
const HEADING_RE = /^(invoice|inv\b|bill\b|receipt|statement|date|total|sub\s*total|qty|quantity|description|page)/i;
// Summary rows are not line items
const SUMMARY_RE = /\b(sub\s*-?\s*total|grand\s*total|total|tax|vat|gst|amount\s+due|balance\s+due|balance|invoice|date)\b/i;

const INVOICE_NUMBER_RE = /\b(?:invoice|inv|bill|receipt)\b\.?\s*(?:no\.?|number|num|#)?\s*[:#]?\s*([A-Z0-9][A-Z0-9\-/]*\d[A-Z0-9\-/]*)/i;

const MONTH = "(?:jan|feb|mar|apr|may|jun|jul|aug|sep|sept|oct|nov|dec)[a-z]*\\.?";
const DATE_PATTERNS: RegExp[] = [
    /\b\d{4}[-/.]\d{1,2}[-/.]\d{1,2}\b/,
    /\b\d{1,2}[/-]\d{1,2}[/-](?:\d{4}|\d{2})\b/,
    /\b\d{1,2}\.\d{1,2}\.(?:\d{4}|\d{2})\b/,
    new RegExp(`\\b${MONTH} \\d{1,2}(?:st|nd|rd|th)?,? \\d{4}\\b`, "i"),
    new RegExp(`\\b\\d{1,2}(?:st|nd|rd|th)? ${MONTH},? \\d{4}\\b`, "i"),
];

const AMOUNT_TOKEN_RE = /^[$€£₹¥]?-?\d[\d,]*(?:\.\d+)?$/;
const MONEY_TOKEN_RE = /^[$€£₹¥]?-?\d[\d,]*\.\d{2}$/;
const AMOUNT_IN_TEXT_RE = /[$€£₹¥]?\s?-?\d[\d,]*(?:\.\d+)?/g;

const ISO_CURRENCIES = ["USD", "EUR", "GBP", "INR", "JPY", "CAD", "AUD", "CHF", "CNY", "SGD", "AED", "NZD", "HKD", "SEK", "NOK", "DKK", "MXN", "BRL", "ZAR"];
const CURRENCY_SYMBOLS: Array<[string, string]> = [["€", "EUR"], ["£", "GBP"], ["₹", "INR"], ["¥", "JPY"], ["$", "USD"]];

// ──────────────────────────────────────────────────
// AMOUNTS
// ──────────────────────────────────────────────────

/** "$1,234.50" → 1234.5, "1.234,50" → 1234.5. Null when no number is present. */
export function parseAmount(raw: string): number | null {
    const negative = /^\s*-|^\s*\(.*\)\s*$|-\s*$/.test(raw);
    let cleaned = raw.replace(/[^\d.,]/g, "");
    if (!/\d/.test(cleaned)) return null;

    if (cleaned.includes(",") && cleaned.includes(".")) {
        cleaned = cleaned.lastIndexOf(",") > cleaned.lastIndexOf(".")
            ? cleaned.replace(/\./g, "").replace(",", ".")
            : cleaned.replace(/,/g, "");
    } else if (cleaned.includes(",")) {
        const parts = cleaned.split(",");
        cleaned = parts.length === 2 && parts[1].length <= 2 ? parts.join(".") : parts.join("");
    }

    const value = Number(cleaned);
    if (!Number.isFinite(value)) return null;
    return negative ? -value : value;
}

function lastAmount(line: string): number | null {
    const matches = line.match(AMOUNT_IN_TEXT_RE);
    if (!matches) return null;
    return parseAmount(matches[matches.length - 1]);
}

// ──────────────────────────────────────────────────
// HEADER FIELDS
// ──────────────────────────────────────────────────

function findVendor(lines: string[]): string | null {
    for (const line of lines.slice(0, 5)) {
        if (line.length <= 2) continue;
        if (/^[\d\s\-/.,:#]+$/.test(line)) continue;
        if (HEADING_RE.test(line)) continue;
        return line.slice(0, 100);
    }
    return null;
}

function findInvoiceNumber(lines: string[]): string | null {
    for (const line of lines) {
        const m = line.match(INVOICE_NUMBER_RE);
        if (m) return m[1];
    }
    return null;
}

function findDate(lines: string[]): string | null {
    for (const line of lines) {
        let best: { index: number; text: string } | null = null;
        for (const pattern of DATE_PATTERNS) {
            const m = pattern.exec(line);
            if (m && (best === null || m.index < best.index)) best = { index: m.index, text: m[0] };
        }
        if (best) return best.text;
    }
    return null;
}

function findCurrency(text: string): string | null {
    let best: { index: number; code: string } | null = null;
    for (const code of ISO_CURRENCIES) {
        const m = new RegExp(`\\b${code}\\b`).exec(text);
        if (m && (best === null || m.index < best.index)) best = { index: m.index, code };
    }
    if (best) return best.code;

    for (const [symbol, code] of CURRENCY_SYMBOLS) {
        if (text.includes(symbol)) return code;
    }
    return null;
}

interface Totals {
    subtotal: number | null;
    tax: number | null;
    totalAmount: number | null;
}

function findTotals(lines: string[]): Totals {
    let subtotal: number | null = null;
    let tax: number | null = null;
    let grandTotal: number | null = null;
    let total: number | null = null;
    let amountDue: number | null = null;

    for (const line of lines) {
        const amount = lastAmount(line);
        if (amount === null) continue;

        if (/\bsub\s*-?\s*total\b/i.test(line)) {
            subtotal ??= amount;
        } else if (/\bgrand\s*total\b/i.test(line)) {
            grandTotal ??= amount;
        } else if (/\btotal\b/i.test(line)) {
            total = amount;                         // Last plain "total" row wins
        } else if (/\b(amount|balance)\s+due\b/i.test(line)) {
            amountDue ??= amount;
        } else if (/^(tax|vat|gst)\b/i.test(line)) {
            tax ??= amount;
        }
    }

    return { subtotal, tax, totalAmount: grandTotal ?? total ?? amountDue };
}

// ──────────────────────────────────────────────────
// LINE ITEMS
// ──────────────────────────────────────────────────

/**
 * A line item row is a description followed by up to three numbers:
 * `desc total`, `desc qty unitPrice`, or `desc qty unitPrice total`.
 * The last number must look like money (two decimals).
 */
export function parseLineItemRow(line: string): ParsedLineItem | null {
    if (SUMMARY_RE.test(line)) return null;

    const tokens = line.split(/\s+/).filter(Boolean);
    const numbers: string[] = [];
    while (tokens.length > 0 && numbers.length < 3 && AMOUNT_TOKEN_RE.test(tokens[tokens.length - 1])) {
        numbers.unshift(tokens.pop() ?? "");
    }
    // "@" or "x" between quantity and price
    if (numbers.length > 0 && tokens.length > 0 && /^(x|@|×)$/i.test(tokens[tokens.length - 1])) {
        tokens.pop();
        const qty = tokens[tokens.length - 1];
        if (qty !== undefined && AMOUNT_TOKEN_RE.test(qty) && numbers.length < 3) numbers.unshift(tokens.pop() ?? "");
    }

    const description = tokens.join(" ");
    if (numbers.length === 0 || !/[\p{L}]{2,}/u.test(description)) return null;
    if (!MONEY_TOKEN_RE.test(numbers[numbers.length - 1])) return null;

    const values = numbers.map(parseAmount);
    if (numbers.length === 1) {
        return { description, quantity: null, unitPrice: null, total: values[0] };
    }
    if (numbers.length === 2) {
        return { description, quantity: values[0], unitPrice: values[1], total: null };
    }
    return { description, quantity: values[0], unitPrice: values[1], total: values[2] };
}

// ──────────────────────────────────────────────────
// PARSER
// ──────────────────────────────────────────────────

export function extractBillFields(text: string): ParsedBillFields {
    const lines = text
        .split(/\r?\n|\x0C/)
        .map(line => line.trim())
        .filter(Boolean);

    const vendorName = findVendor(lines);
    const lineItems: ParsedLineItem[] = [];
    for (const line of lines) {
        if (line === vendorName) continue;
        const item = parseLineItemRow(line);
        if (item) lineItems.push(item);
        if (lineItems.length >= MAX_LINE_ITEMS) break;
    }

    const { subtotal, tax, totalAmount } = findTotals(lines);

    return {
        vendorName,
        invoiceNumber: findInvoiceNumber(lines),
        billDate: findDate(lines),
        currency: findCurrency(text),
        subtotal,
        tax,
        totalAmount,
        lineItems,
    };
}

export const parseBillText: BillTextParser = async text => extractBillFields(text);
