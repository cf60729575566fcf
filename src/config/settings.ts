/**
 * @file    settings.ts
 * @purpose Pipeline configuration, read from the environment and validated
 *          with zod. The CLI loads `.env.local` through dotenv before calling
 *          loadSettings(); library callers may pass any env-like record.
 * @env     OCR_MAX_PAGES, DUPLICATE_HASH_ALGORITHM, TOTAL_MISMATCH_TOLERANCE,
 *          TIE_BREAK_ENABLED, EXTRACTION_TIMEOUT_MS, EXTRACTION_CONCURRENCY,
 *          BILL_PARSER, LOG_LEVEL, AUDIT_MAX_EVENTS, ANTHROPIC_OCR_MODEL
 *
 * DECISION: an unknown hash algorithm is a configuration error at startup,
 * not a per-candidate FingerprintError at run time.
 */

import { getHashes } from "node:crypto";
import { z } from "zod";
import { ConfigurationError } from "../lib/errors";
import type { LogLevel } from "../lib/logger";

export type BillParserKind = "rules" | "llm";

export interface PipelineSettings {
    maxPages: number;
    hashAlgorithm: string;
    totalMismatchTolerance: number;
    tieBreakEnabled: boolean;
    extractionTimeoutMs: number;
    extractionConcurrency: number;
    billParser: BillParserKind;
    logLevel: LogLevel;
    auditMaxEvents: number;
    ocrModel: string;
}

const booleanFlag = z
    .enum(["true", "false", "1", "0", "yes", "no"])
    .transform(v => v === "true" || v === "1" || v === "yes");

const EnvSchema = z.object({
    OCR_MAX_PAGES: z.coerce.number().int().positive().default(100),
    DUPLICATE_HASH_ALGORITHM: z
        .string()
        .transform(v => v.toLowerCase())
        .refine(v => getHashes().includes(v), { message: "unsupported digest algorithm" })
        .default("sha256"),
    TOTAL_MISMATCH_TOLERANCE: z.coerce.number().nonnegative().default(0.01),
    TIE_BREAK_ENABLED: booleanFlag.default("true"),
    EXTRACTION_TIMEOUT_MS: z.coerce.number().int().positive().default(300_000),
    EXTRACTION_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(4),
    BILL_PARSER: z.enum(["rules", "llm"]).default("rules"),
    LOG_LEVEL: z
        .string()
        .transform(v => v.toLowerCase())
        .pipe(z.enum(["debug", "info", "warn", "error"]))
        .default("info"),
    AUDIT_MAX_EVENTS: z.coerce.number().int().positive().default(10_000),
    ANTHROPIC_OCR_MODEL: z.string().default("claude-3-5-sonnet-20241022"),
});

export function loadSettings(env: Record<string, string | undefined> = process.env): PipelineSettings {
    // Blank variables count as unset
    const present: Record<string, string> = {};
    for (const [key, value] of Object.entries(env)) {
        if (value !== undefined && value.trim() !== "") present[key] = value.trim();
    }

    const parsed = EnvSchema.safeParse(present);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`);
        throw new ConfigurationError(`Invalid pipeline configuration (${issues.join("; ")})`, issues);
    }

    const e = parsed.data;
    return Object.freeze({
        maxPages: e.OCR_MAX_PAGES,
        hashAlgorithm: e.DUPLICATE_HASH_ALGORITHM,
        totalMismatchTolerance: e.TOTAL_MISMATCH_TOLERANCE,
        tieBreakEnabled: e.TIE_BREAK_ENABLED,
        extractionTimeoutMs: e.EXTRACTION_TIMEOUT_MS,
        extractionConcurrency: e.EXTRACTION_CONCURRENCY,
        billParser: e.BILL_PARSER,
        logLevel: e.LOG_LEVEL,
        auditMaxEvents: e.AUDIT_MAX_EVENTS,
        ocrModel: e.ANTHROPIC_OCR_MODEL,
    });
}

export const DEFAULT_SETTINGS: PipelineSettings = loadSettings({});
