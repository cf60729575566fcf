/**
 * @file    duplicate-detector.ts
 * @purpose Checker step: fingerprint every BILL candidate and partition the set
 *          by fingerprint. The earliest-ingested member of each group is its
 *          representative; the rest are DUPLICATE_OF(representative).
 *
 * Needs the whole candidate set at once. Input order never matters: candidates
 * are sorted by ingestion index before grouping.
 */

import { FingerprintError } from "../errors";
import { computeFingerprint, createDigest, type DigestAlgorithm } from "./fingerprint";
import type { BillCandidate, DocumentRef, DuplicateGroup, Fingerprint } from "../../types/claims";

export interface FingerprintedCandidate {
    candidate: BillCandidate;
    fingerprint: Fingerprint;
}

export interface DuplicateDetectionResult {
    groups: DuplicateGroup[];
    fingerprints: FingerprintedCandidate[];
    failures: FingerprintError[];     // Excluded from grouping: neither duplicate nor unique
}

export function detectDuplicates(
    candidates: readonly BillCandidate[],
    digest: DigestAlgorithm = createDigest()
): DuplicateDetectionResult {
    const ordered = [...candidates].sort((a, b) => a.ref.ingestionIndex - b.ref.ingestionIndex);

    const fingerprints: FingerprintedCandidate[] = [];
    const failures: FingerprintError[] = [];
    const byFingerprint = new Map<Fingerprint, BillCandidate[]>();

    for (const candidate of ordered) {
        let fingerprint: Fingerprint;
        try {
            fingerprint = computeFingerprint(candidate, digest);
        } catch (err) {
            if (err instanceof FingerprintError) {
                failures.push(err);
                continue;
            }
            throw err;
        }
        fingerprints.push({ candidate, fingerprint });
        const members = byFingerprint.get(fingerprint);
        if (members) members.push(candidate);
        else byFingerprint.set(fingerprint, [candidate]);
    }

    // Map iteration follows insertion order, i.e. each group's first-seen member
    const groups: DuplicateGroup[] = [];
    for (const [fingerprint, members] of byFingerprint) {
        const [representative, ...duplicates] = members;
        groups.push({ fingerprint, representative, members, duplicates });
    }

    return { groups, fingerprints, failures };
}

/** documentId of each non-representative member → its representative's ref */
export function duplicateIndex(groups: readonly DuplicateGroup[]): Map<string, DocumentRef> {
    const index = new Map<string, DocumentRef>();
    for (const group of groups) {
        for (const dup of group.duplicates) {
            index.set(dup.ref.documentId, group.representative.ref);
        }
    }
    return index;
}
