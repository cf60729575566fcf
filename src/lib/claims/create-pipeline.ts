import type { AxiosInstance } from "axios";
import type { AuditSink } from "../audit/ledger";
import type { PipelineSettings } from "../../config/settings";
import { createLogger, type Logger } from "../logger";
import { parseBillText } from "../pdf/bill-parser";
import type { BillTextParser } from "../pdf/bill-schema";
import { createTextExtractionService, createVisionOcr, type PdfReader, type VisionOcr } from "../pdf/extractor";
import { createLlmBillParser } from "../pdf/invoice-parser";
import { createDocumentLoader } from "../storage/document-loader";
import type { ObjectStore } from "../storage/supabase-storage";
import type { DocumentClassifier } from "./classifier";
import { ClaimPipeline } from "./pipeline";
import { createStructuredBillExtractor } from "./structured-extractor";

export interface CreateClaimPipelineOptions {
    settings: PipelineSettings;
    logger?: Logger;
    store?: ObjectStore;
    http?: Pick<AxiosInstance, "get">;
    /** null disables vision OCR; undefined uses Claude when ANTHROPIC_API_KEY is set. */
    vision?: VisionOcr | null;
    pdfReader?: PdfReader;
    parser?: BillTextParser;
    classifier?: DocumentClassifier;
    auditSinks?: AuditSink[];
}

/** Wires the production collaborators named by the settings. */
export function createClaimPipeline(options: CreateClaimPipelineOptions): ClaimPipeline {
    const { settings } = options;
    const logger = options.logger ?? createLogger("claims", settings.logLevel);

    const vision =
        options.vision !== undefined
            ? options.vision
            : process.env.ANTHROPIC_API_KEY
                ? createVisionOcr(settings.ocrModel)
                : null;

    const parser =
        options.parser ??
        (settings.billParser === "llm" ? createLlmBillParser({ logger }) : parseBillText);

    return new ClaimPipeline({
        loader: createDocumentLoader({ store: options.store, http: options.http }),
        extractionService: createTextExtractionService({
            maxPages: settings.maxPages,
            vision,
            pdfReader: options.pdfReader,
        }),
        extractor: createStructuredBillExtractor({
            parser,
            totalMismatchTolerance: settings.totalMismatchTolerance,
        }),
        classifier: options.classifier,
        settings,
        logger,
        auditSinks: options.auditSinks,
    });
}
