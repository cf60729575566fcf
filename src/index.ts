export * from "./types/claims";
export * from "./lib/errors";
export { createLogger, silentLogger, type Logger, type LogLevel } from "./lib/logger";
export { loadSettings, DEFAULT_SETTINGS, type PipelineSettings, type BillParserKind } from "./config/settings";

export { AuditLedger, MemoryAuditSink, type AuditEventInput, type AuditSink, type AuditLedgerOptions } from "./lib/audit/ledger";

export { createStructuredBillExtractor, type StructuredBillExtractor } from "./lib/claims/structured-extractor";
export { fieldPresenceClassifier, type DocumentClassifier, type ClassifiableDocument } from "./lib/claims/classifier";
export { canonicalizeBill, serializeCanonicalBill, normalizeBillDate, MISSING, type CanonicalBill } from "./lib/claims/canonical";
export { computeFingerprint, createDigest, type DigestAlgorithm } from "./lib/claims/fingerprint";
export { detectDuplicates, type DuplicateDetectionResult } from "./lib/claims/duplicate-detector";
export { selectFinal, buildBillItemList, buildSupportingDocMap, type FinalBillSelection } from "./lib/claims/final-bill-selector";
export { ClaimPipeline, nextStage, resolveClaimStatus, type ClaimPipelineDeps, type ProcessClaimOptions } from "./lib/claims/pipeline";
export { createClaimPipeline, type CreateClaimPipelineOptions } from "./lib/claims/create-pipeline";
export { writeClaimOutputs } from "./lib/claims/outputs";

export { createDocumentLoader, type DocumentLoader } from "./lib/storage/document-loader";
export { parseDocumentLocation, type DocumentLocation } from "./lib/storage/locations";
export { createSupabaseObjectStore, type ObjectStore } from "./lib/storage/supabase-storage";
export { createTextExtractionService, createVisionOcr, type TextExtractionService, type VisionOcr } from "./lib/pdf/extractor";
export { parseBillText, extractBillFields } from "./lib/pdf/bill-parser";
export { createLlmBillParser, parseBillWithLlm } from "./lib/pdf/invoice-parser";
export { ParsedBillFieldsSchema, type ParsedBillFields, type BillTextParser } from "./lib/pdf/bill-schema";
