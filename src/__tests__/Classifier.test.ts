/**
 * DocumentClassifier – field-presence policy
 */
import { fieldPresenceClassifier } from "../lib/claims/classifier";
import type { ExtractedDocument } from "../types/claims";
import { makeCandidate, makeRef } from "./fixtures";

describe("fieldPresenceClassifier", () => {
    it("labels a candidate with items and a total as BILL", () => {
        expect(fieldPresenceClassifier.classify(makeCandidate(0))).toBe("BILL");
    });

    it("labels a candidate without a total as SUPPORTING_DOC", () => {
        expect(fieldPresenceClassifier.classify(makeCandidate(0, { totalAmount: null }))).toBe("SUPPORTING_DOC");
    });

    it("labels a candidate without line items as SUPPORTING_DOC", () => {
        expect(fieldPresenceClassifier.classify(makeCandidate(0, { lineItems: [] }))).toBe("SUPPORTING_DOC");
    });

    it("treats a zero total as present", () => {
        expect(fieldPresenceClassifier.classify(makeCandidate(0, { totalAmount: 0 }))).toBe("BILL");
    });

    it("classifies raw extracted documents from their pre-structured fields", () => {
        const withFields: ExtractedDocument = {
            ref: makeRef(0),
            status: "SUCCEEDED",
            content: {
                text: "",
                pages: [],
                pageCount: 1,
                method: "plain-text",
                fields: { totalAmount: 10, lineItems: [{ description: "Visit", total: 10 }] },
            },
        };
        const textOnly: ExtractedDocument = {
            ref: makeRef(1),
            status: "SUCCEEDED",
            content: { text: "Total 10.00", pages: ["Total 10.00"], pageCount: 1, method: "plain-text" },
        };
        const failed: ExtractedDocument = { ref: makeRef(2), status: "FAILED", reason: "corrupt", errorCode: "LOAD_ERROR" };

        expect(fieldPresenceClassifier.classify(withFields)).toBe("BILL");
        expect(fieldPresenceClassifier.classify(textOnly)).toBe("SUPPORTING_DOC");
        expect(fieldPresenceClassifier.classify(failed)).toBe("SUPPORTING_DOC");
    });

    it("is deterministic for the same content", () => {
        const candidate = makeCandidate(0);
        const labels = new Set(Array.from({ length: 5 }, () => fieldPresenceClassifier.classify(candidate)));
        expect([...labels]).toEqual(["BILL"]);
    });
});
