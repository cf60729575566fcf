import { createHash, getHashes } from "node:crypto";
import { canonicalizeBill, serializeCanonicalBill } from "./canonical";
import type { BillCandidate, Fingerprint } from "../../types/claims";

/** Digest over a canonical byte sequence. Swap the algorithm without touching canonicalization. */
export interface DigestAlgorithm {
    readonly name: string;
    digest(canonical: string): string;
}

export function createDigest(algorithm: string = "sha256"): DigestAlgorithm {
    const name = algorithm.toLowerCase();
    if (!getHashes().includes(name)) {
        throw new Error(`Unsupported digest algorithm: ${algorithm}`);
    }
    return {
        name,
        digest: canonical => createHash(name).update(Buffer.from(canonical, "utf8")).digest("hex"),
    };
}

/** Throws FingerprintError (from canonicalization) when the candidate cannot be canonicalized. */
export function computeFingerprint(candidate: BillCandidate, digest: DigestAlgorithm = createDigest()): Fingerprint {
    return digest.digest(serializeCanonicalBill(canonicalizeBill(candidate)));
}
