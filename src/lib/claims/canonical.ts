/**
 * @file    canonical.ts
 * @purpose Order-independent, case/whitespace-insensitive canonical form of a
 *          bill candidate. Fingerprints are digests of serializeCanonicalBill().
 *
 * DECISION: slash and dash dates are read month-first (03/04/2024 is
 * 2024-03-04) unless the first part cannot be a month; dotted dates are read
 * day-first. Dates that parse to no valid calendar day keep a raw token so
 * they still compare equal to themselves.
 */

import { FingerprintError } from "../errors";
import { toMinorUnits } from "./money";
import type { BillCandidate, LineItem } from "../../types/claims";

export const MISSING = "<missing>";

/** [description, quantity, unit price in minor units, line total in minor units] */
export type CanonicalLineItem = [string, string, string, string];

export interface CanonicalBill {
    vendor: string;
    date: string;
    currency: string;
    total: string;
    items: CanonicalLineItem[];
}

// ──────────────────────────────────────────────────
// FIELD NORMALIZATION
// ──────────────────────────────────────────────────

export function normalizeVendorName(name: string | null): string {
    if (!name) return MISSING;
    const normalized = name
        .normalize("NFKC")
        .toLowerCase()
        .replace(/[\p{P}\p{S}]/gu, "")
        .replace(/\s+/g, " ")
        .trim();
    return normalized || MISSING;
}

export function normalizeDescription(description: string): string {
    return description.normalize("NFKC").toLowerCase().replace(/\s+/g, " ").trim();
}

export function normalizeCurrency(currency: string | null): string {
    const code = currency?.trim().toUpperCase();
    return code ? code : MISSING;
}

const MONTHS = ["jan", "feb", "mar", "apr", "may", "jun", "jul", "aug", "sep", "oct", "nov", "dec"];

function monthFromName(name: string): number | null {
    const idx = MONTHS.indexOf(name.slice(0, 3).toLowerCase());
    return idx === -1 ? null : idx + 1;
}

function expandYear(year: string): number {
    const y = Number(year);
    return year.length === 2 ? 2000 + y : y;
}

function isoDate(year: number, month: number, day: number): string | null {
    if (month < 1 || month > 12 || day < 1) return null;
    const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
    if (day > daysInMonth) return null;
    return `${String(year).padStart(4, "0")}-${String(month).padStart(2, "0")}-${String(day).padStart(2, "0")}`;
}

/** Normalize a printed bill date to YYYY-MM-DD. */
export function normalizeBillDate(raw: string | null): string {
    if (!raw) return MISSING;
    const text = raw.trim().replace(/\s+/g, " ");
    if (!text) return MISSING;

    let m = text.match(/^(\d{4})[-/.](\d{1,2})[-/.](\d{1,2})(?:[T ].*)?$/);
    if (m) return isoDate(Number(m[1]), Number(m[2]), Number(m[3])) ?? rawDateToken(text);

    m = text.match(/^(\d{1,2})[/-](\d{1,2})[/-](\d{2}|\d{4})$/);
    if (m) {
        const a = Number(m[1]);
        const b = Number(m[2]);
        const year = expandYear(m[3]);
        const parsed = a > 12 && b <= 12 ? isoDate(year, b, a) : isoDate(year, a, b);
        return parsed ?? rawDateToken(text);
    }

    m = text.match(/^(\d{1,2})\.(\d{1,2})\.(\d{2}|\d{4})$/);
    if (m) return isoDate(expandYear(m[3]), Number(m[2]), Number(m[1])) ?? rawDateToken(text);

    m = text.match(/^([A-Za-z]{3,9})\.? (\d{1,2})(?:st|nd|rd|th)?,? (\d{4})$/);
    if (m) {
        const month = monthFromName(m[1]);
        const parsed = month ? isoDate(Number(m[3]), month, Number(m[2])) : null;
        return parsed ?? rawDateToken(text);
    }

    m = text.match(/^(\d{1,2})(?:st|nd|rd|th)? ([A-Za-z]{3,9})\.?,? (\d{4})$/);
    if (m) {
        const month = monthFromName(m[2]);
        const parsed = month ? isoDate(Number(m[3]), month, Number(m[1])) : null;
        return parsed ?? rawDateToken(text);
    }

    return rawDateToken(text);
}

function rawDateToken(text: string): string {
    return `raw:${text.toLowerCase()}`;
}

function formatQuantity(quantity: number): string {
    return String(Number(quantity.toFixed(6)));
}

function money(amount: number | null, currency: string | null): string {
    return amount === null ? MISSING : String(toMinorUnits(amount, currency));
}

// ──────────────────────────────────────────────────
// LINE ITEM ORDERING
// ──────────────────────────────────────────────────

function compareText(a: string, b: string): number {
    // Code-unit order: independent of the host locale
    return a < b ? -1 : a > b ? 1 : 0;
}

function compareAmount(a: string, b: string): number {
    if (a === b) return 0;
    if (a === MISSING) return 1;
    if (b === MISSING) return -1;
    return Number(a) - Number(b);
}

export function compareCanonicalLineItems(a: CanonicalLineItem, b: CanonicalLineItem): number {
    return (
        compareText(a[0], b[0]) ||
        compareAmount(a[2], b[2]) ||
        Number(a[1]) - Number(b[1]) ||
        compareAmount(a[3], b[3])
    );
}

export function canonicalizeLineItem(item: LineItem, currency: string | null): CanonicalLineItem {
    return [
        normalizeDescription(item.description),
        formatQuantity(item.quantity),
        money(item.unitPrice, currency),
        money(item.lineTotal, currency),
    ];
}

// ──────────────────────────────────────────────────
// BILL
// ──────────────────────────────────────────────────

function assertFinite(candidate: BillCandidate): void {
    const amounts: Array<number | null> = [candidate.totalAmount];
    for (const item of candidate.lineItems) {
        amounts.push(item.quantity, item.unitPrice, item.lineTotal);
    }
    if (amounts.some(a => a !== null && !Number.isFinite(a))) {
        throw new FingerprintError(candidate.ref, "Bill contains a non-finite amount");
    }
}

/** Throws FingerprintError when the candidate has nothing that can be canonicalized. */
export function canonicalizeBill(candidate: BillCandidate): CanonicalBill {
    assertFinite(candidate);

    const currency = candidate.currency;
    const canonical: CanonicalBill = {
        vendor: normalizeVendorName(candidate.vendorName),
        date: normalizeBillDate(candidate.billDate),
        currency: normalizeCurrency(currency),
        total: money(candidate.totalAmount, currency),
        items: candidate.lineItems
            .map(item => canonicalizeLineItem(item, currency))
            .sort(compareCanonicalLineItems),
    };

    if (
        canonical.vendor === MISSING &&
        canonical.date === MISSING &&
        canonical.total === MISSING &&
        canonical.items.length === 0
    ) {
        throw new FingerprintError(candidate.ref, "Bill has no computable fields to fingerprint");
    }
    return canonical;
}

export function serializeCanonicalBill(bill: CanonicalBill): string {
    return JSON.stringify(["bill/v1", bill.vendor, bill.date, bill.currency, bill.total, bill.items]);
}
