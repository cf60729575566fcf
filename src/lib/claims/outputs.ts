import { mkdir, writeFile } from "node:fs/promises";
import * as path from "node:path";
import type { ClaimOutputs, ClaimResult } from "../../types/claims";

export const OUTPUT_FILES: ReadonlyArray<[keyof ClaimOutputs, string]> = [
    ["final_bill", "final_bill.json"],
    ["bill_item_list", "bill_item_list.json"],
    ["supporting_doc_map", "supporting_doc_map.json"],
    ["audit_logs", "audit_logs.json"],
];

/** Claim ids become a single directory name under the output root. */
export function claimOutputDir(root: string, claimId: string): string {
    const safe = claimId.replace(/[^A-Za-z0-9._-]/g, "_").replace(/^\.+/, "_");
    return path.join(root, safe || "_");
}

/**
 * Writes the four outputs as pretty-printed JSON under <root>/<claimId>/.
 * Returns the written paths; an empty list when the result has no outputs.
 */
export async function writeClaimOutputs(root: string, result: ClaimResult): Promise<string[]> {
    const { outputs } = result;
    if (!outputs) return [];

    const dir = claimOutputDir(root, result.claimId);
    await mkdir(dir, { recursive: true });

    const written: string[] = [];
    for (const [key, fileName] of OUTPUT_FILES) {
        const file = path.join(dir, fileName);
        await writeFile(file, JSON.stringify(outputs[key], null, 2) + "\n", "utf8");
        written.push(file);
    }
    return written;
}
