/**
 * @file    pipeline.ts
 * @purpose Claim orchestrator. Moves one claim through a fixed sequence of
 *          stages, each a barrier: ingestion → extraction → structuring →
 *          classification → duplicate detection → selection → assembly.
 * @deps    audit/ledger, claims/*, utils/concurrency
 *
 * Each stage takes the current ClaimContext and returns a new one; nothing
 * downstream mutates an earlier stage's output. Per-document work (extraction,
 * structuring, classification) fans out with a concurrency bound; duplicate
 * detection and selection see the whole set at once.
 *
 * Per-document errors are isolated, recorded once in the ledger and excluded
 * from later stages. Claim-level outcomes become the ClaimResult status.
 * An AuditLedgerError is the one failure that escapes processClaim().
 *
 * DECISION: a document that fails structuring or classification counts as a
 * failed document, the same as one that could not be loaded or read.
 */

import { AuditLedger, type AuditEventInput, type AuditSink } from "../audit/ledger";
import { DEFAULT_SETTINGS, type PipelineSettings } from "../../config/settings";
import {
    AuditLedgerError,
    ClaimCancelledError,
    ClaimPipelineError,
    ExtractionFailure,
    ExtractionServiceError,
    InvalidInputError,
    LoadError,
    NoBillFoundError,
    describeError,
} from "../errors";
import { silentLogger, type Logger } from "../logger";
import { contentTypeFromFileName, fileNameFromLocation } from "../storage/locations";
import type { DocumentLoader } from "../storage/document-loader";
import type { TextExtractionService } from "../pdf/extractor";
import { runWithConcurrency, withDeadline } from "../utils/concurrency";
import { fieldPresenceClassifier, type DocumentClassifier } from "./classifier";
import { detectDuplicates, type DuplicateDetectionResult } from "./duplicate-detector";
import {
    buildBillItemList,
    buildSupportingDocMap,
    selectFinal,
    type FinalBillSelection,
} from "./final-bill-selector";
import { createDigest, type DigestAlgorithm } from "./fingerprint";
import type { StructuredBillExtractor } from "./structured-extractor";
import type {
    AuditSubject,
    BillCandidate,
    ClaimOutputs,
    ClaimResult,
    ClaimStage,
    ClaimStatus,
    ClassifiedCandidate,
    DocumentRef,
    ExtractedDocument,
} from "../../types/claims";

// ──────────────────────────────────────────────────
// COLLABORATORS
// ──────────────────────────────────────────────────

export interface ClaimPipelineDeps {
    loader: DocumentLoader;
    extractionService: TextExtractionService;
    extractor: StructuredBillExtractor;
    classifier?: DocumentClassifier;
    digest?: DigestAlgorithm;
    settings?: PipelineSettings;
    logger?: Logger;
    auditSinks?: AuditSink[];
    clock?: () => Date;
}

export interface ProcessClaimOptions {
    signal?: AbortSignal;
}

// ──────────────────────────────────────────────────
// CLAIM CONTEXT & STAGE MACHINE
// ──────────────────────────────────────────────────

export interface FailedDocument {
    readonly ref: DocumentRef;
    readonly stage: ClaimStage;
    readonly reason: string;
    readonly errorCode: string;
}

export interface ClaimContext {
    readonly claimId: string;
    readonly stage: ClaimStage;
    readonly locations: readonly string[];
    readonly documents: readonly DocumentRef[];
    readonly extracted: readonly ExtractedDocument[];
    readonly candidates: readonly BillCandidate[];
    readonly classified: readonly ClassifiedCandidate[];
    readonly failed: readonly FailedDocument[];
    readonly detection: DuplicateDetectionResult | null;
    readonly selection: FinalBillSelection | null;
    readonly selectionError: NoBillFoundError | null;
    readonly cancelled: boolean;
}

const STAGE_SEQUENCE: readonly ClaimStage[] = [
    "INGESTION",
    "EXTRACTION",
    "STRUCTURING",
    "CLASSIFICATION",
    "DUPLICATE_DETECTION",
    "SELECTION",
    "ASSEMBLY",
    "COMPLETE",
];

/** Stages run strictly in sequence; a cancelled claim jumps to ASSEMBLY to close out its record. */
export function nextStage(stage: ClaimStage, cancelled: boolean): ClaimStage {
    if (stage === "COMPLETE") return "COMPLETE";
    if (cancelled && stage !== "ASSEMBLY") return "ASSEMBLY";
    return STAGE_SEQUENCE[STAGE_SEQUENCE.indexOf(stage) + 1];
}

export function resolveClaimStatus(ctx: ClaimContext): ClaimStatus {
    if (ctx.cancelled) return "CANCELLED";
    if (ctx.documents.length > 0 && ctx.failed.length === ctx.documents.length) return "FAILED_ALL_DOCUMENTS";
    if (!ctx.selection) return "FAILED_NO_BILL";
    return ctx.failed.length > 0 ? "PARTIAL" : "SUCCESS";
}

export function validateClaimInput(claimId: unknown, locations: unknown): void {
    if (typeof claimId !== "string" || claimId.trim() === "") {
        throw new InvalidInputError("claimId must be a non-empty string");
    }
    if (!Array.isArray(locations) || locations.length === 0) {
        throw new InvalidInputError("At least one document location is required");
    }
    locations.forEach((loc, idx) => {
        if (typeof loc !== "string" || loc.trim() === "") {
            throw new InvalidInputError(`Document location #${idx + 1} must be a non-empty string`);
        }
    });
}

type StageHandler = (ctx: ClaimContext) => Promise<{ ctx: ClaimContext; summary: string }>;

// ──────────────────────────────────────────────────
// PIPELINE
// ──────────────────────────────────────────────────

export class ClaimPipeline {
    private readonly settings: PipelineSettings;
    private readonly classifier: DocumentClassifier;
    private readonly digest: DigestAlgorithm;
    private readonly logger: Logger;

    constructor(private readonly deps: ClaimPipelineDeps) {
        this.settings = deps.settings ?? DEFAULT_SETTINGS;
        this.classifier = deps.classifier ?? fieldPresenceClassifier;
        this.digest = deps.digest ?? createDigest(this.settings.hashAlgorithm);
        this.logger = deps.logger ?? silentLogger;
    }

    async processClaim(
        claimId: string,
        locations: readonly string[],
        options: ProcessClaimOptions = {}
    ): Promise<ClaimResult> {
        try {
            validateClaimInput(claimId, locations);
        } catch (err) {
            if (!(err instanceof InvalidInputError)) throw err;
            this.logger.error(`Rejected claim input: ${err.message}`);
            return { claimId: typeof claimId === "string" ? claimId : "", status: "INVALID_INPUT", finalBillId: null, error: describeError(err) };
        }

        const ledger = new AuditLedger(claimId, {
            maxEvents: this.settings.auditMaxEvents,
            sinks: this.deps.auditSinks,
            clock: this.deps.clock,
        });
        const claimSubject: AuditSubject = { kind: "claim", id: claimId };
        const signal = options.signal;

        this.logger.info(`📥 Processing claim ${claimId} (${locations.length} documents)`);

        let ctx: ClaimContext = {
            claimId,
            stage: "INGESTION",
            locations: [...locations],
            documents: [],
            extracted: [],
            candidates: [],
            classified: [],
            failed: [],
            detection: null,
            selection: null,
            selectionError: null,
            cancelled: false,
        };

        const handlers: Record<Exclude<ClaimStage, "COMPLETE" | "ASSEMBLY">, StageHandler> = {
            INGESTION: c => this.ingest(c, ledger),
            EXTRACTION: c => this.extract(c, ledger, signal),
            STRUCTURING: c => this.structure(c, ledger, signal),
            CLASSIFICATION: c => this.classify(c, ledger),
            DUPLICATE_DETECTION: c => this.deduplicate(c, ledger),
            SELECTION: c => this.select(c, ledger),
        };

        for (;;) {
            const stage = ctx.stage;
            if (stage === "ASSEMBLY" || stage === "COMPLETE") break;

            ledger.record({ stage, subject: claimSubject, outcome: "STARTED", detail: `${stage} started` });
            this.logger.info(`▶️  ${stage}`);
            const { ctx: next, summary } = await handlers[stage](ctx);
            ledger.record({ stage, subject: claimSubject, outcome: "COMPLETED", detail: summary });

            let cancelled = next.cancelled;
            if (!cancelled && signal?.aborted) {
                cancelled = true;
                ledger.record({ stage, subject: claimSubject, outcome: "CANCELLED", detail: "Claim cancelled by caller" });
                this.logger.warn(`⚠️ Claim ${claimId} cancelled after ${stage}`);
            }
            ctx = { ...next, cancelled, stage: nextStage(stage, cancelled) };
        }

        return this.assemble(ctx, ledger);
    }

    // ── Stage 0: ingestion ─────────────────────────

    private async ingest(ctx: ClaimContext, ledger: AuditLedger) {
        const documents = ctx.locations.map((location, idx): DocumentRef => {
            const fileName = fileNameFromLocation(location);
            return Object.freeze({
                documentId: `${ctx.claimId}_doc_${idx + 1}_${fileName}`,
                location: location.trim(),
                fileName,
                ingestionIndex: idx,
            });
        });
        for (const ref of documents) {
            ledger.record({
                stage: "INGESTION",
                subject: documentSubject(ref),
                outcome: "SUCCEEDED",
                detail: `Registered ${ref.fileName}`,
                metadata: { location: ref.location },
            });
        }
        return { ctx: { ...ctx, documents }, summary: `Registered ${documents.length} documents` };
    }

    // ── Stage 1: extraction (fan-out) ──────────────

    private async extract(ctx: ClaimContext, ledger: AuditLedger, signal?: AbortSignal) {
        const tasks = ctx.documents.map(ref => () => this.extractDocument(ref, ledger, signal));
        const extracted = await runWithConcurrency(tasks, this.settings.extractionConcurrency, (done, total) => {
            this.logger.debug(`   Extracted ${done}/${total}...`);
        });

        const failed = extracted.flatMap((doc): FailedDocument[] =>
            doc.status === "FAILED"
                ? [{ ref: doc.ref, stage: "EXTRACTION", reason: doc.reason, errorCode: doc.errorCode }]
                : []
        );
        const ok = extracted.length - failed.length;
        return {
            ctx: { ...ctx, extracted, failed: [...ctx.failed, ...failed] },
            summary: `Extracted ${ok}/${extracted.length} documents`,
        };
    }

    private async extractDocument(ref: DocumentRef, ledger: AuditLedger, signal?: AbortSignal): Promise<ExtractedDocument> {
        const { loader, extractionService } = this.deps;

        let outcome: ExtractedDocument;
        let sizeBytes: number | undefined;
        try {
            const content = await withDeadline(async s => {
                const bytes = await loader.load(ref.location, s).catch((err: unknown) => {
                    throw err instanceof ClaimPipelineError
                        ? err
                        : new LoadError(`Could not load ${ref.location}: ${describeError(err).message}`, ref.location, err);
                });
                sizeBytes = bytes.length;
                return extractionService.extractText(bytes, { signal: s }).catch((err: unknown) => {
                    throw err instanceof ClaimPipelineError
                        ? err
                        : new ExtractionServiceError(`Text extraction failed: ${describeError(err).message}`, "EXTRACTION_SERVICE_ERROR", err);
                });
            }, this.settings.extractionTimeoutMs, signal);
            outcome = { ref, status: "SUCCEEDED", content, sizeBytes };
        } catch (err) {
            if (err instanceof AuditLedgerError) throw err;
            const { code, message } = describeError(err);
            outcome = { ref, status: "FAILED", reason: message, errorCode: code, sizeBytes };
        }

        if (outcome.status === "SUCCEEDED") {
            ledger.record({
                stage: "EXTRACTION",
                subject: documentSubject(ref),
                outcome: "SUCCEEDED",
                detail: `Extracted ${outcome.content.pageCount} page(s) via ${outcome.content.method}`,
                metadata: { pageCount: outcome.content.pageCount, method: outcome.content.method, characters: outcome.content.text.length },
            });
        } else {
            ledger.record({
                stage: "EXTRACTION",
                subject: documentSubject(ref),
                outcome: "FAILED",
                detail: outcome.reason,
                metadata: { errorCode: outcome.errorCode },
            });
            this.logger.warn(`⚠️ ${ref.fileName}: ${outcome.errorCode} ${outcome.reason}`);
        }
        return outcome;
    }

    // ── Stage 2: structuring (Maker) ───────────────

    private async structure(ctx: ClaimContext, ledger: AuditLedger, signal?: AbortSignal) {
        const extracted = ctx.extracted.filter(d => d.status === "SUCCEEDED");
        const tasks = extracted.map(doc => async () => {
            let result: BillCandidate | ExtractionFailure;
            try {
                result = await withDeadline(
                    s => this.deps.extractor.extract(doc, { signal: s }),
                    this.settings.extractionTimeoutMs,
                    signal
                );
            } catch (err) {
                result = new ExtractionFailure(doc.ref, `Structuring failed: ${describeError(err).message}`, err);
            }
            this.recordStructuring(ledger, result);
            return result;
        });
        const results = await runWithConcurrency(tasks, this.settings.extractionConcurrency);

        const candidates: BillCandidate[] = [];
        const failed: FailedDocument[] = [];
        for (const result of results) {
            if (result instanceof ExtractionFailure) {
                failed.push({ ref: result.ref, stage: "STRUCTURING", reason: result.message, errorCode: result.code });
            } else {
                candidates.push(result);
            }
        }
        return {
            ctx: { ...ctx, candidates, failed: [...ctx.failed, ...failed] },
            summary: `Structured ${candidates.length} bill candidates, ${failed.length} without billable content`,
        };
    }

    private recordStructuring(ledger: AuditLedger, result: BillCandidate | ExtractionFailure): void {
        if (result instanceof ExtractionFailure) {
            ledger.record({
                stage: "STRUCTURING",
                subject: documentSubject(result.ref),
                outcome: "FAILED",
                detail: result.message,
                metadata: { errorCode: result.code },
            });
            this.logger.warn(`⚠️ ${result.ref.fileName}: ${result.message}`);
            return;
        }
        ledger.record({
            stage: "STRUCTURING",
            subject: documentSubject(result.ref),
            outcome: "SUCCEEDED",
            detail: `${result.lineItems.length} line items, claimed total ${result.totalAmount ?? "unknown"}`,
            metadata: {
                lineItems: result.lineItems.length,
                totalAmount: result.totalAmount,
                vendorName: result.vendorName,
                warnings: [...result.warnings],
            },
        });
    }

    // ── Stage 3: classification ────────────────────

    private async classify(ctx: ClaimContext, ledger: AuditLedger) {
        const tasks = ctx.candidates.map(candidate => async (): Promise<ClassifiedCandidate | FailedDocument> => {
            try {
                const label = await this.classifier.classify(candidate);
                ledger.record({
                    stage: "CLASSIFICATION",
                    subject: documentSubject(candidate.ref),
                    outcome: "CLASSIFIED",
                    detail: label,
                    metadata: { classifier: this.classifier.name },
                });
                return { candidate, label };
            } catch (err) {
                if (err instanceof AuditLedgerError) throw err;
                const { code, message } = describeError(err);
                ledger.record({
                    stage: "CLASSIFICATION",
                    subject: documentSubject(candidate.ref),
                    outcome: "FAILED",
                    detail: `Classifier ${this.classifier.name} failed: ${message}`,
                    metadata: { errorCode: code },
                });
                return { ref: candidate.ref, stage: "CLASSIFICATION", reason: message, errorCode: code };
            }
        });
        const results = await runWithConcurrency(tasks, this.settings.extractionConcurrency);

        const classified = results.filter((r): r is ClassifiedCandidate => "label" in r);
        const failed = results.filter((r): r is FailedDocument => !("label" in r));
        const bills = classified.filter(c => c.label === "BILL").length;
        return {
            ctx: { ...ctx, classified, failed: [...ctx.failed, ...failed] },
            summary: `${bills} BILL, ${classified.length - bills} SUPPORTING_DOC`,
        };
    }

    // ── Stage 4: duplicate detection (Checker) ─────

    private async deduplicate(ctx: ClaimContext, ledger: AuditLedger) {
        const bills = ctx.classified.filter(c => c.label === "BILL").map(c => c.candidate);
        const detection = detectDuplicates(bills, this.digest);

        for (const { candidate, fingerprint } of detection.fingerprints) {
            ledger.record({
                stage: "DUPLICATE_DETECTION",
                subject: documentSubject(candidate.ref),
                outcome: "FINGERPRINTED",
                detail: `${this.digest.name}:${fingerprint}`,
                metadata: { fingerprint, algorithm: this.digest.name },
            });
        }
        for (const failure of detection.failures) {
            ledger.record({
                stage: "DUPLICATE_DETECTION",
                subject: documentSubject(failure.ref),
                outcome: "FAILED",
                detail: failure.message,
                metadata: { errorCode: failure.code },
            });
        }
        let duplicateCount = 0;
        for (const group of detection.groups) {
            for (const dup of group.duplicates) {
                duplicateCount++;
                ledger.record({
                    stage: "DUPLICATE_DETECTION",
                    subject: documentSubject(dup.ref),
                    outcome: "DUPLICATE",
                    detail: `DUPLICATE_OF(${group.representative.ref.documentId})`,
                    metadata: { duplicateOf: group.representative.ref.documentId, fingerprint: group.fingerprint },
                });
            }
        }

        return {
            ctx: { ...ctx, detection },
            summary: `${detection.groups.length} unique bills, ${duplicateCount} duplicates, ${detection.failures.length} not fingerprinted`,
        };
    }

    // ── Stage 5: selection ─────────────────────────

    private async select(ctx: ClaimContext, ledger: AuditLedger) {
        const outcome = selectFinal(ctx.claimId, ctx.detection?.groups ?? [], {
            tieBreakEnabled: this.settings.tieBreakEnabled,
            totalMismatchTolerance: this.settings.totalMismatchTolerance,
        });

        if (outcome instanceof NoBillFoundError) {
            ledger.record({
                stage: "SELECTION",
                subject: { kind: "claim", id: ctx.claimId },
                outcome: "FAILED",
                detail: outcome.message,
                metadata: { errorCode: outcome.code },
            });
            this.logger.error(`❌ Claim ${ctx.claimId}: ${outcome.message}`);
            return { ctx: { ...ctx, selectionError: outcome }, summary: "No final bill selected" };
        }

        const { result } = outcome;
        ledger.record({
            stage: "SELECTION",
            subject: documentSubject(result.sourceDocument),
            outcome: "SELECTED",
            detail: result.selectedReason,
            metadata: {
                billId: result.billId,
                itemCount: result.summary.itemCount,
                lineItemTotal: result.summary.lineItemTotal,
                totalMismatch: result.summary.totalMismatch,
                candidates: outcome.ranked.map(c => c.ref.documentId),
            },
        });
        return { ctx: { ...ctx, selection: outcome }, summary: `Selected ${result.billId}` };
    }

    // ── Stage 6: assembly ──────────────────────────

    private assemble(ctx: ClaimContext, ledger: AuditLedger): ClaimResult {
        const claimSubject: AuditSubject = { kind: "claim", id: ctx.claimId };
        ledger.record({ stage: "ASSEMBLY", subject: claimSubject, outcome: "STARTED", detail: "ASSEMBLY started" });

        const status = resolveClaimStatus(ctx);
        const finalBill = ctx.selection?.result ?? null;

        const sizes = documentSizes(ctx.extracted);
        const supportingDocMap = buildSupportingDocMap({
            claimId: ctx.claimId,
            finalDocument: finalBill?.sourceDocument ?? null,
            classified: ctx.classified,
            groups: ctx.detection?.groups ?? [],
            fingerprintFailures: ctx.detection?.failures ?? [],
            failed: ctx.failed,
            sizes,
        });
        if (ctx.cancelled) {
            // Documents the run never reached still need a terminal status
            const seen = new Set([
                ...supportingDocMap.documents.map(e => e.document.documentId),
                ...supportingDocMap.failedDocuments.map(e => e.document.documentId),
                ...(finalBill ? [finalBill.sourceDocument.documentId] : []),
            ]);
            const cancelled = new ClaimCancelledError();
            for (const ref of ctx.documents.filter(d => !seen.has(d.documentId))) {
                supportingDocMap.failedDocuments.push({
                    document: ref,
                    status: "EXTRACTION_FAILED",
                    label: null,
                    duplicateOf: null,
                    reason: cancelled.message,
                    contentType: contentTypeFromFileName(ref.fileName),
                    sizeBytes: sizes.get(ref.documentId) ?? null,
                });
                ledger.record({
                    stage: "ASSEMBLY",
                    subject: documentSubject(ref),
                    outcome: "FAILED",
                    detail: cancelled.message,
                    metadata: { errorCode: cancelled.code },
                });
            }
            supportingDocMap.failedDocuments.sort((a, b) => a.document.ingestionIndex - b.document.ingestionIndex);
        }

        const billItemList = finalBill ? buildBillItemList(finalBill) : null;

        ledger.record({
            stage: "ASSEMBLY",
            subject: claimSubject,
            outcome: "COMPLETED",
            detail: `Assembled outputs: ${supportingDocMap.documents.length} supporting, ${supportingDocMap.failedDocuments.length} failed`,
        });
        const closing: AuditEventInput = {
            stage: "COMPLETE",
            subject: claimSubject,
            outcome: status === "SUCCESS" || status === "PARTIAL" ? "COMPLETED" : status === "CANCELLED" ? "CANCELLED" : "FAILED",
            detail: `Claim finished with status ${status}`,
            metadata: { status, finalBillId: finalBill?.billId ?? null },
        };
        ledger.record(closing);

        const events = [...ledger.snapshot()];
        const outputs: ClaimOutputs = {
            final_bill: finalBill,
            bill_item_list: billItemList,
            supporting_doc_map: supportingDocMap,
            audit_logs: {
                claimId: ctx.claimId,
                totalEvents: events.length,
                startedAt: events[0]?.timestamp ?? null,
                completedAt: events[events.length - 1]?.timestamp ?? null,
                events,
            },
        };

        if (status === "SUCCESS" || status === "PARTIAL") {
            this.logger.info(`${status === "SUCCESS" ? "✅" : "⚠️"} Claim ${ctx.claimId} finished: ${status}`);
        } else {
            this.logger.error(`❌ Claim ${ctx.claimId} finished: ${status}`);
        }

        const result: ClaimResult = {
            claimId: ctx.claimId,
            status,
            finalBillId: finalBill?.billId ?? null,
            outputs,
        };
        if (ctx.selectionError && status === "FAILED_NO_BILL") result.error = describeError(ctx.selectionError);
        if (status === "CANCELLED") result.error = describeError(new ClaimCancelledError());
        return result;
    }
}

function documentSubject(ref: DocumentRef): AuditSubject {
    return { kind: "document", id: ref.documentId, ingestionIndex: ref.ingestionIndex };
}

function documentSizes(extracted: readonly ExtractedDocument[]): Map<string, number> {
    const sizes = new Map<string, number>();
    for (const doc of extracted) {
        if (doc.sizeBytes !== undefined) sizes.set(doc.ref.documentId, doc.sizeBytes);
    }
    return sizes;
}
