#!/usr/bin/env node
/**
 * @file    process-claim.ts
 * @purpose Run one claim through the bill pipeline from the command line.
 *
 * Usage: process-claim <claimId> <location...> [--out <dir>] [--verbose]
 * Locations are supabase://<bucket>/<path> or https:// URLs.
 * Exit code is 0 for SUCCESS and PARTIAL, 1 for everything else.
 */

import * as dotenv from "dotenv";
dotenv.config({ path: ".env.local" });

import { loadSettings } from "../config/settings";
import { createClaimPipeline } from "../lib/claims/create-pipeline";
import { writeClaimOutputs } from "../lib/claims/outputs";
import { describeError } from "../lib/errors";
import type { ClaimResult } from "../types/claims";

export interface CliArgs {
    claimId: string;
    locations: string[];
    outDir: string | null;
    verbose: boolean;
}

const USAGE = "Usage: process-claim <claimId> <location...> [--out <dir>] [--verbose]";

export function parseArgs(argv: string[]): CliArgs | string {
    const positional: string[] = [];
    let outDir: string | null = null;
    let verbose = false;

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (arg === "--verbose" || arg === "-v") {
            verbose = true;
        } else if (arg === "--out" || arg === "-o") {
            const value = argv[++i];
            if (!value) return `--out needs a directory\n${USAGE}`;
            outDir = value;
        } else if (arg.startsWith("--out=")) {
            outDir = arg.slice("--out=".length);
        } else if (arg.startsWith("-")) {
            return `Unknown option ${arg}\n${USAGE}`;
        } else {
            positional.push(arg);
        }
    }

    const [claimId, ...locations] = positional;
    if (!claimId || locations.length === 0) return USAGE;
    return { claimId, locations, outDir, verbose };
}

export function exitCodeFor(result: ClaimResult): number {
    return result.status === "SUCCESS" || result.status === "PARTIAL" ? 0 : 1;
}

function printSummary(result: ClaimResult): void {
    console.log(`\n📋 Claim ${result.claimId}: ${result.status}`);
    const outputs = result.outputs;
    if (!outputs) {
        if (result.error) console.log(`  ${result.error.code}: ${result.error.message}`);
        return;
    }

    const bill = outputs.final_bill;
    if (bill) {
        console.log(`  Final bill: ${bill.billId}`);
        console.log(`  Vendor: ${bill.header.vendorName ?? "(none)"} | Date: ${bill.header.billDate ?? "(none)"}`);
        console.log(`  Items: ${bill.summary.itemCount} | Line total: ${bill.summary.lineItemTotal} ${bill.summary.currency ?? ""}`.trimEnd());
        if (bill.summary.totalMismatch) {
            console.log(`  ⚠️ Claimed total ${bill.header.claimedTotal} differs by ${bill.summary.difference}`);
        }
        console.log(`  Why: ${bill.selectedReason}`);
    } else if (result.error) {
        console.log(`  ${result.error.code}: ${result.error.message}`);
    }

    const map = outputs.supporting_doc_map;
    for (const entry of map.documents) {
        const suffix = entry.duplicateOf ? ` of ${entry.duplicateOf}` : "";
        console.log(`  📎 ${entry.document.documentId}: ${entry.status}${suffix}`);
    }
    for (const entry of map.failedDocuments) {
        console.log(`  ❌ ${entry.document.documentId}: ${entry.reason}`);
    }
    console.log(`  Audit events: ${outputs.audit_logs.totalEvents}`);
}

async function main(): Promise<number> {
    const args = parseArgs(process.argv.slice(2));
    if (typeof args === "string") {
        console.error(args);
        return 1;
    }

    const settings = loadSettings(args.verbose ? { ...process.env, LOG_LEVEL: "debug" } : process.env);
    const pipeline = createClaimPipeline({ settings });

    const controller = new AbortController();
    process.once("SIGINT", () => {
        console.warn("\n⏹️  Cancelling claim...");
        controller.abort();
    });

    const result = await pipeline.processClaim(args.claimId, args.locations, { signal: controller.signal });
    printSummary(result);

    if (args.outDir) {
        const written = await writeClaimOutputs(args.outDir, result);
        for (const file of written) console.log(`  💾 ${file}`);
    }
    return exitCodeFor(result);
}

if (require.main === module) {
    main()
        .then(code => {
            process.exitCode = code;
        })
        .catch(err => {
            const { name, message } = describeError(err);
            console.error(`Fatal: ${name}: ${message}`);
            process.exitCode = 1;
        });
}
