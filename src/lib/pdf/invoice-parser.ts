import { unifiedObjectGeneration, type ProviderEntry } from "../intelligence/llm";
import { silentLogger, type Logger } from "../logger";
import { ParsedBillFieldsSchema, type BillTextParser } from "./bill-schema";

const BILL_SYSTEM_PROMPT = `You are a precise medical and service bill data extractor for an insurance claims system.
Extract the fields of the bill exactly as printed. Do not round, convert or infer amounts.
- Line items: every billed line, in the order printed, with description, quantity, unit price and line total
- Leave a field null when it is not printed on the document; never guess a vendor, date or total
- billDate: as printed on the document
- currency: ISO 4217 code when it can be read from symbols or text, otherwise null
If the document is not a bill (a prescription, discharge summary, ID card, letter), return no line items and a null total.`;

export interface LlmBillParserOptions {
    providers?: ProviderEntry[];
    logger?: Logger;
    maxChars?: number;
}

/** Model-backed BillTextParser. Output is validated against the same schema as the rule-based parser. */
export function createLlmBillParser(options: LlmBillParserOptions = {}): BillTextParser {
    const maxChars = options.maxChars ?? 12_000;
    return async (text, { signal } = {}) =>
        unifiedObjectGeneration(
            {
                system: BILL_SYSTEM_PROMPT,
                prompt: `Bill text:\n${text.slice(0, maxChars)}`,
                temperature: 0,
                schema: ParsedBillFieldsSchema,
                schemaName: "ParsedBillFields",
                abortSignal: signal,
            },
            options.providers,
            options.logger ?? silentLogger
        );
}

export const parseBillWithLlm: BillTextParser = (text, options) => createLlmBillParser()(text, options);
