/**
 * @file    final-bill-selector.ts
 * @purpose Pick the claim's authoritative bill from the duplicate groups and
 *          assemble the final_bill, bill_item_list and supporting_doc_map outputs.
 *
 * Only group representatives compete. Ranking: most line items, then
 * (when tie-break is enabled) the higher computed total, then the earliest
 * ingested document. The last rule always applies so selection is total.
 *
 * DECISION: the total-amount tie-break is a policy choice, not something the
 * source data dictates; it is configurable through TIE_BREAK_ENABLED.
 */

import { NoBillFoundError, type FingerprintError } from "../errors";
import { contentTypeFromFileName } from "../storage/locations";
import { duplicateIndex } from "./duplicate-detector";
import { roundMoney, sumMoney } from "./money";
import type {
    BillCandidate,
    BillItemList,
    BillSummary,
    ClassifiedCandidate,
    DocumentRef,
    DuplicateGroup,
    FinalBillResult,
    SupportingDocEntry,
    SupportingDocMap,
} from "../../types/claims";

export interface SelectionOptions {
    tieBreakEnabled?: boolean;
    totalMismatchTolerance?: number;
}

export interface FinalBillSelection {
    result: FinalBillResult;
    group: DuplicateGroup;
    ranked: BillCandidate[];     // Eligible candidates, best first
}

/** Sum of line totals, rounded to the currency's smallest unit. */
export function computedTotal(candidate: BillCandidate): number {
    return sumMoney(candidate.lineItems.map(i => i.lineTotal ?? 0), candidate.currency);
}

function rankCandidates(candidates: BillCandidate[], tieBreakEnabled: boolean): BillCandidate[] {
    return [...candidates].sort((a, b) => {
        const byItems = b.lineItems.length - a.lineItems.length;
        if (byItems !== 0) return byItems;
        if (tieBreakEnabled) {
            const byTotal = computedTotal(b) - computedTotal(a);
            if (byTotal !== 0) return byTotal;
        }
        return a.ref.ingestionIndex - b.ref.ingestionIndex;
    });
}

function explainSelection(ranked: BillCandidate[], tieBreakEnabled: boolean): string {
    const [best, runnerUp] = ranked;
    const items = best.lineItems.length;
    if (!runnerUp) return `Only eligible bill (${items} line items)`;
    if (runnerUp.lineItems.length !== items) return `Highest line-item count (${items})`;
    if (tieBreakEnabled && computedTotal(runnerUp) !== computedTotal(best)) {
        return `Tied on line-item count (${items}); higher computed total (${computedTotal(best)})`;
    }
    return `Tied on line-item count (${items}); earliest ingested document (#${best.ref.ingestionIndex})`;
}

export function summarizeBill(candidate: BillCandidate, tolerance: number): BillSummary {
    const lineItemTotal = computedTotal(candidate);
    const claimedTotal = candidate.totalAmount;
    const difference = claimedTotal === null ? null : roundMoney(lineItemTotal - claimedTotal, candidate.currency);
    return {
        itemCount: candidate.lineItems.length,
        lineItemTotal,
        claimedTotal,
        subtotal: candidate.subtotal,
        tax: candidate.tax,
        difference,
        totalMismatch: difference !== null && Math.abs(difference) > tolerance,
        currency: candidate.currency,
    };
}

export function selectFinal(
    claimId: string,
    groups: readonly DuplicateGroup[],
    options: SelectionOptions = {}
): FinalBillSelection | NoBillFoundError {
    const tieBreakEnabled = options.tieBreakEnabled ?? true;
    const tolerance = options.totalMismatchTolerance ?? 0.01;

    const eligible = groups.map(g => g.representative).filter(c => c.lineItems.length > 0);
    if (eligible.length === 0) {
        return new NoBillFoundError(
            groups.length === 0
                ? "No BILL-labeled candidate reached selection"
                : "Every eligible bill has zero line items"
        );
    }

    const ranked = rankCandidates(eligible, tieBreakEnabled);
    const chosen = ranked[0];
    const group = groups.find(g => g.representative === chosen);
    if (!group) {
        // Unreachable: `eligible` is built from the groups' representatives
        return new NoBillFoundError("Selected bill does not belong to a duplicate group");
    }

    const result: FinalBillResult = {
        claimId,
        billId: `BILL_${chosen.ref.documentId}`,
        sourceDocument: chosen.ref,
        fingerprint: group.fingerprint,
        header: {
            vendorName: chosen.vendorName,
            billDate: chosen.billDate,
            currency: chosen.currency,
            invoiceNumber: chosen.invoiceNumber,
            claimedTotal: chosen.totalAmount,
        },
        summary: summarizeBill(chosen, tolerance),
        lineItems: [...chosen.lineItems],
        selectedReason: explainSelection(ranked, tieBreakEnabled),
        duplicateFlags: {
            hasDuplicates: group.duplicates.length > 0,
            duplicateCount: group.duplicates.length,
            duplicates: group.duplicates.map(d => d.ref),
        },
    };

    return { result, group, ranked };
}

// ──────────────────────────────────────────────────
// OUTPUT ASSEMBLY
// ──────────────────────────────────────────────────

export function buildBillItemList(result: FinalBillResult): BillItemList {
    return {
        claimId: result.claimId,
        billId: result.billId,
        items: result.lineItems.map(item => ({ ...item })),
        summary: { ...result.summary },
    };
}

export interface SupportingDocInputs {
    claimId: string;
    finalDocument: DocumentRef | null;
    classified: readonly ClassifiedCandidate[];
    groups: readonly DuplicateGroup[];
    fingerprintFailures: readonly FingerprintError[];
    failed: ReadonlyArray<{ ref: DocumentRef; reason: string }>;
    sizes?: ReadonlyMap<string, number>;  // Loaded byte length by documentId
}

const byIngestion = (a: SupportingDocEntry, b: SupportingDocEntry) =>
    a.document.ingestionIndex - b.document.ingestionIndex;

/**
 * Every document except the final bill, tagged with its terminal status.
 * Failed documents are kept apart so that documents ∪ failedDocuments ∪
 * {final bill} is exactly the input set.
 */
export function buildSupportingDocMap(inputs: SupportingDocInputs): SupportingDocMap {
    const duplicates = duplicateIndex(inputs.groups);
    const fingerprintErrors = new Map(inputs.fingerprintFailures.map(f => [f.ref.documentId, f.message]));
    const finalId = inputs.finalDocument?.documentId ?? null;
    const fileFacts = (ref: DocumentRef) => ({
        contentType: contentTypeFromFileName(ref.fileName),
        sizeBytes: inputs.sizes?.get(ref.documentId) ?? null,
    });

    const documents: SupportingDocEntry[] = [];
    for (const { candidate, label } of inputs.classified) {
        const id = candidate.ref.documentId;
        if (id === finalId) continue;

        const entry: SupportingDocEntry = {
            document: candidate.ref,
            status: "SUPPORTING_DOC",
            label,
            duplicateOf: null,
            reason: null,
            ...fileFacts(candidate.ref),
        };
        if (label === "BILL") {
            const representative = duplicates.get(id);
            const fingerprintError = fingerprintErrors.get(id);
            if (representative) {
                entry.status = "DUPLICATE";
                entry.duplicateOf = representative.documentId;
            } else if (fingerprintError !== undefined) {
                entry.status = "FINGERPRINT_ERROR";
                entry.reason = fingerprintError;
            } else {
                entry.status = "NON_FINAL_BILL";
            }
        }
        documents.push(entry);
    }

    const failedDocuments = inputs.failed.map((f): SupportingDocEntry => ({
        document: f.ref,
        status: "EXTRACTION_FAILED",
        label: null,
        duplicateOf: null,
        reason: f.reason,
        ...fileFacts(f.ref),
    }));

    return {
        claimId: inputs.claimId,
        documents: documents.sort(byIngestion),
        failedDocuments: failedDocuments.sort(byIngestion),
    };
}
