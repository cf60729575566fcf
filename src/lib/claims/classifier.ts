import type { BillCandidate, ClassificationLabel, ExtractedDocument } from "../../types/claims";

export type ClassifiableDocument = BillCandidate | ExtractedDocument;

/**
 * Labels a document BILL or SUPPORTING_DOC. Implementations must be
 * deterministic for the same structured content; a learned model can sit
 * behind this interface without callers changing.
 */
export interface DocumentClassifier {
    readonly name: string;
    classify(document: ClassifiableDocument): ClassificationLabel | Promise<ClassificationLabel>;
}

function isExtractedDocument(document: ClassifiableDocument): document is ExtractedDocument {
    return "status" in document;
}

/** BILL when there is at least one line item and a claimed total. */
export const fieldPresenceClassifier: DocumentClassifier = {
    name: "field-presence",
    classify(document) {
        if (isExtractedDocument(document)) {
            if (document.status !== "SUCCEEDED" || !document.content.fields) return "SUPPORTING_DOC";
            const { lineItems, totalAmount } = document.content.fields;
            return lineItems.length > 0 && totalAmount != null ? "BILL" : "SUPPORTING_DOC";
        }
        return document.lineItems.length > 0 && document.totalAmount !== null ? "BILL" : "SUPPORTING_DOC";
    },
};
