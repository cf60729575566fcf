/**
 * Rule-based bill parser
 */
import { MAX_LINE_ITEMS, extractBillFields, parseAmount, parseBillText, parseLineItemRow } from "../lib/pdf/bill-parser";

const HOSPITAL_BILL = [
    "City General Hospital",
    "Invoice #: INV-1001",
    "Date: 03/04/2024",
    "Description Qty Price",
    "Consultation 1 150.00",
    "Blood test 2 45.50 91.00",
    "X-Ray 120.00",
    "Subtotal 361.00",
    "Tax 0.00",
    "Total USD 361.00",
].join("\n");

// ─── amounts ──────────────────────────────────────────────────────────────────

describe("parseAmount", () => {
    it.each([
        ["$1,234.50", 1234.5],
        ["1.234,50", 1234.5],
        ["12,50", 12.5],
        ["1,234", 1234],
        ["€ 80", 80],
        ["-5.00", -5],
        ["(5.00)", -5],
    ])("reads %s as %d", (raw, expected) => {
        expect(parseAmount(raw)).toBe(expected);
    });

    it("returns null without digits", () => {
        expect(parseAmount("n/a")).toBeNull();
    });
});

// ─── rows ─────────────────────────────────────────────────────────────────────

describe("parseLineItemRow", () => {
    it("reads description, quantity, unit price and total", () => {
        expect(parseLineItemRow("Blood test 2 45.50 91.00")).toEqual({
            description: "Blood test", quantity: 2, unitPrice: 45.5, total: 91,
        });
    });

    it("reads a quantity written with x", () => {
        expect(parseLineItemRow("Bandage 2 x 5.00")).toEqual({
            description: "Bandage", quantity: 2, unitPrice: 5, total: null,
        });
    });

    it("reads a price-only row as a line total", () => {
        expect(parseLineItemRow("X-Ray 120.00")).toEqual({
            description: "X-Ray", quantity: null, unitPrice: null, total: 120,
        });
    });

    it("skips summary rows and rows without a money amount", () => {
        expect(parseLineItemRow("Subtotal 361.00")).toBeNull();
        expect(parseLineItemRow("Room 101")).toBeNull();
        expect(parseLineItemRow("12 150.00")).toBeNull();
    });
});

// ─── whole documents ──────────────────────────────────────────────────────────

describe("extractBillFields", () => {
    it("extracts header, totals and line items", () => {
        expect(extractBillFields(HOSPITAL_BILL)).toEqual({
            vendorName: "City General Hospital",
            invoiceNumber: "INV-1001",
            billDate: "03/04/2024",
            currency: "USD",
            subtotal: 361,
            tax: 0,
            totalAmount: 361,
            lineItems: [
                { description: "Consultation", quantity: 1, unitPrice: 150, total: null },
                { description: "Blood test", quantity: 2, unitPrice: 45.5, total: 91 },
                { description: "X-Ray", quantity: null, unitPrice: null, total: 120 },
            ],
        });
    });

    it("leaves missing fields absent instead of inventing them", () => {
        expect(extractBillFields("Please keep this prescription\nTake twice daily")).toEqual({
            vendorName: "Please keep this prescription",
            invoiceNumber: null,
            billDate: null,
            currency: null,
            subtotal: null,
            tax: null,
            totalAmount: null,
            lineItems: [],
        });
    });

    it("reads month-name dates and currency symbols", () => {
        const fields = extractBillFields("Corner Pharmacy\nIssued March 5, 2024\nAntibiotics 2 £10.00\nGrand Total £20.00");
        expect(fields.billDate).toBe("March 5, 2024");
        expect(fields.currency).toBe("GBP");
        expect(fields.totalAmount).toBe(20);
        expect(fields.lineItems).toEqual([{ description: "Antibiotics", quantity: 2, unitPrice: 10, total: null }]);
    });

    it("skips heading lines when looking for the vendor", () => {
        expect(extractBillFields("INVOICE\n12/03/2024\nSunrise Diagnostics\nMRI 400.00").vendorName).toBe("Sunrise Diagnostics");
    });

    it(`stops after ${MAX_LINE_ITEMS} line items`, () => {
        const rows = Array.from({ length: MAX_LINE_ITEMS + 5 }, (_, i) => `Item ${String.fromCharCode(65 + (i % 26))}x 1.00`);
        expect(extractBillFields(["Big Clinic", ...rows].join("\n")).lineItems).toHaveLength(MAX_LINE_ITEMS);
    });

    it("is exposed as an async BillTextParser", async () => {
        await expect(parseBillText(HOSPITAL_BILL)).resolves.toEqual(extractBillFields(HOSPITAL_BILL));
    });
});
