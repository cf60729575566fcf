import { z } from "zod";

// Every field is optional: extraction services and parsers report what they
// found, and absence is decided downstream, never papered over here.
export const ParsedLineItemSchema = z.object({
    description: z.string(),
    quantity: z.number().nullish(),
    unitPrice: z.number().nullish(),
    total: z.number().nullish(),
});

export const ParsedBillFieldsSchema = z.object({
    vendorName: z.string().nullish(),
    invoiceNumber: z.string().nullish(),
    billDate: z.string().nullish(),          // As printed; canonicalised later
    currency: z.string().nullish(),          // ISO 4217 when known
    subtotal: z.number().nullish(),
    tax: z.number().nullish(),
    totalAmount: z.number().nullish(),
    lineItems: z.array(ParsedLineItemSchema).default([]),
});

export type ParsedLineItem = z.infer<typeof ParsedLineItemSchema>;
export type ParsedBillFields = z.infer<typeof ParsedBillFieldsSchema>;

export interface BillParseOptions {
    signal?: AbortSignal;
}

/** Turns text into bill fields. Implementations may be rule-based or model-backed. */
export type BillTextParser = (text: string, options?: BillParseOptions) => Promise<ParsedBillFields>;
