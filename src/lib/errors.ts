/**
 * @file    errors.ts
 * @purpose Error taxonomy for the claim pipeline. Document-level errors are
 *          recovered and recorded by the orchestrator; claim-level errors end
 *          the claim with a non-SUCCESS status; AuditLedgerError ends the run.
 */

import type { DocumentRef } from "../types/claims";

export type PipelineErrorCode =
    | "INVALID_INPUT"
    | "LOAD_ERROR"
    | "EXTRACTION_SERVICE_ERROR"
    | "EXTRACTION_TIMEOUT"
    | "EXTRACTION_FAILURE"
    | "FINGERPRINT_ERROR"
    | "NO_BILL_FOUND"
    | "CLAIM_CANCELLED"
    | "AUDIT_LEDGER_EXHAUSTED"
    | "CONFIGURATION_ERROR";

export class ClaimPipelineError extends Error {
    readonly code: PipelineErrorCode;
    readonly details?: unknown;

    constructor(message: string, code: PipelineErrorCode, details?: unknown) {
        super(message);
        this.name = "ClaimPipelineError";
        this.code = code;
        this.details = details;
    }
}

export class InvalidInputError extends ClaimPipelineError {
    constructor(message: string) {
        super(message, "INVALID_INPUT");
        this.name = "InvalidInputError";
    }
}

export class LoadError extends ClaimPipelineError {
    constructor(message: string, public readonly location: string, cause?: unknown) {
        super(message, "LOAD_ERROR", cause);
        this.name = "LoadError";
    }
}

export class ExtractionServiceError extends ClaimPipelineError {
    constructor(message: string, code: PipelineErrorCode = "EXTRACTION_SERVICE_ERROR", cause?: unknown) {
        super(message, code, cause);
        this.name = "ExtractionServiceError";
    }
}

export class ExtractionTimeoutError extends ExtractionServiceError {
    constructor(public readonly timeoutMs: number) {
        super(`Extraction timed out after ${timeoutMs}ms`, "EXTRACTION_TIMEOUT");
        this.name = "ExtractionTimeoutError";
    }
}

/** Structuring could not turn an extracted document into a bill candidate. */
export class ExtractionFailure extends ClaimPipelineError {
    constructor(public readonly ref: DocumentRef, reason: string, cause?: unknown) {
        super(reason, "EXTRACTION_FAILURE", cause);
        this.name = "ExtractionFailure";
    }
}

export class FingerprintError extends ClaimPipelineError {
    constructor(public readonly ref: DocumentRef, reason: string) {
        super(reason, "FINGERPRINT_ERROR");
        this.name = "FingerprintError";
    }
}

export class NoBillFoundError extends ClaimPipelineError {
    constructor(message = "No eligible bill found for claim") {
        super(message, "NO_BILL_FOUND");
        this.name = "NoBillFoundError";
    }
}

export class ClaimCancelledError extends ClaimPipelineError {
    constructor(message = "Claim processing was cancelled") {
        super(message, "CLAIM_CANCELLED");
        this.name = "ClaimCancelledError";
    }
}

export class AuditLedgerError extends ClaimPipelineError {
    constructor(message: string) {
        super(message, "AUDIT_LEDGER_EXHAUSTED");
        this.name = "AuditLedgerError";
    }
}

export class ConfigurationError extends ClaimPipelineError {
    constructor(message: string, public readonly issues: string[]) {
        super(message, "CONFIGURATION_ERROR", issues);
        this.name = "ConfigurationError";
    }
}

export interface ErrorDescription {
    name: string;
    code: string;
    message: string;
}

export function describeError(err: unknown): ErrorDescription {
    if (err instanceof ClaimPipelineError) {
        return { name: err.name, code: err.code, message: err.message };
    }
    if (err instanceof Error) {
        return { name: err.name, code: "UNEXPECTED_ERROR", message: err.message };
    }
    return { name: "Error", code: "UNEXPECTED_ERROR", message: String(err) };
}
