import type { ParsedBillFields } from "../lib/pdf/bill-schema";

export type ClassificationLabel = "BILL" | "SUPPORTING_DOC";

/** Hex digest of a bill's canonical form. Equal fingerprints mean duplicate bills. */
export type Fingerprint = string;

export interface DocumentRef {
    readonly documentId: string;       // <claimId>_doc_<n>_<fileName>
    readonly location: string;         // supabase://bucket/path or https://...
    readonly fileName: string;
    readonly ingestionIndex: number;   // 0-based input order, stable for the run
}

export type ExtractionMethod = "text-layer" | "vision" | "plain-text";

export interface ExtractedContent {
    text: string;
    pages: string[];
    pageCount: number;
    method: ExtractionMethod;
    fields?: ParsedBillFields;         // Pre-structured fields from an entity-extracting service
}

/** sizeBytes is set once the loader has returned the document's bytes. */
export type ExtractedDocument =
    | { readonly ref: DocumentRef; readonly status: "SUCCEEDED"; readonly content: ExtractedContent; readonly sizeBytes?: number }
    | { readonly ref: DocumentRef; readonly status: "FAILED"; readonly reason: string; readonly errorCode: string; readonly sizeBytes?: number };

export interface LineItem {
    readonly lineNumber: number;
    readonly description: string;
    readonly quantity: number;
    readonly unitPrice: number | null;
    readonly lineTotal: number | null;      // As extracted, or quantity × unitPrice when absent
    readonly totalMismatch: boolean;        // Extracted total disagrees with quantity × unitPrice
}

export interface BillCandidate {
    readonly ref: DocumentRef;
    readonly vendorName: string | null;
    readonly billDate: string | null;
    readonly totalAmount: number | null;    // Claimed header total
    readonly currency: string | null;
    readonly invoiceNumber: string | null;
    readonly subtotal: number | null;
    readonly tax: number | null;
    readonly lineItems: readonly LineItem[];
    readonly warnings: readonly string[];
}

export interface ClassifiedCandidate {
    readonly candidate: BillCandidate;
    readonly label: ClassificationLabel;
}

export interface DuplicateGroup {
    readonly fingerprint: Fingerprint;
    readonly representative: BillCandidate;
    readonly members: readonly BillCandidate[];     // Sorted by ingestion order, representative first
    readonly duplicates: readonly BillCandidate[];  // members minus the representative
}

export interface BillHeader {
    vendorName: string | null;
    billDate: string | null;
    currency: string | null;
    invoiceNumber: string | null;
    claimedTotal: number | null;
}

export interface BillSummary {
    itemCount: number;
    lineItemTotal: number;
    claimedTotal: number | null;
    subtotal: number | null;
    tax: number | null;
    difference: number | null;        // lineItemTotal - claimedTotal
    totalMismatch: boolean;
    currency: string | null;
}

export interface FinalBillResult {
    claimId: string;
    billId: string;
    sourceDocument: DocumentRef;
    fingerprint: Fingerprint;
    header: BillHeader;
    summary: BillSummary;
    lineItems: LineItem[];
    selectedReason: string;
    duplicateFlags: {
        hasDuplicates: boolean;
        duplicateCount: number;
        duplicates: DocumentRef[];
    };
}

export type SupportingDocStatus =
    | "SUPPORTING_DOC"
    | "DUPLICATE"
    | "NON_FINAL_BILL"
    | "FINGERPRINT_ERROR"
    | "EXTRACTION_FAILED";

export interface SupportingDocEntry {
    document: DocumentRef;
    status: SupportingDocStatus;
    label: ClassificationLabel | null;
    duplicateOf: string | null;       // documentId of the group representative
    reason: string | null;
    contentType: string | null;       // From the file extension
    sizeBytes: number | null;         // Null when the document was never loaded
}

export interface SupportingDocMap {
    claimId: string;
    documents: SupportingDocEntry[];
    failedDocuments: SupportingDocEntry[];
}

export interface BillItemList {
    claimId: string;
    billId: string;
    items: LineItem[];
    summary: BillSummary;
}

export type ClaimStage =
    | "INGESTION"
    | "EXTRACTION"
    | "STRUCTURING"
    | "CLASSIFICATION"
    | "DUPLICATE_DETECTION"
    | "SELECTION"
    | "ASSEMBLY"
    | "COMPLETE";

export type AuditOutcome =
    | "STARTED"
    | "COMPLETED"
    | "SUCCEEDED"
    | "FAILED"
    | "CLASSIFIED"
    | "FINGERPRINTED"
    | "DUPLICATE"
    | "SELECTED"
    | "CANCELLED";

export type AuditSubject =
    | { kind: "claim"; id: string }
    | { kind: "document"; id: string; ingestionIndex: number };

export interface AuditEvent {
    readonly sequence: number;
    readonly eventId: string;
    readonly timestamp: string;
    readonly claimId: string;
    readonly stage: ClaimStage;
    readonly subject: AuditSubject;
    readonly outcome: AuditOutcome;
    readonly detail: string;
    readonly metadata?: Readonly<Record<string, unknown>>;
}

export type ClaimStatus =
    | "SUCCESS"
    | "PARTIAL"
    | "FAILED_NO_BILL"
    | "FAILED_ALL_DOCUMENTS"
    | "CANCELLED"
    | "INVALID_INPUT";

export interface ClaimOutputs {
    final_bill: FinalBillResult | null;
    bill_item_list: BillItemList | null;
    supporting_doc_map: SupportingDocMap;
    audit_logs: {
        claimId: string;
        totalEvents: number;
        startedAt: string | null;
        completedAt: string | null;
        events: AuditEvent[];
    };
}

export interface ClaimResult {
    claimId: string;
    status: ClaimStatus;
    finalBillId: string | null;
    outputs?: ClaimOutputs;
    error?: { name: string; code: string; message: string };
}
