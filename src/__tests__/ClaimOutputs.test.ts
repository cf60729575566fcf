/**
 * Writing the four claim outputs to disk
 */
import { mkdtemp, readFile, readdir, rm } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { claimOutputDir, writeClaimOutputs } from "../lib/claims/outputs";
import { ClaimPipeline } from "../lib/claims/pipeline";
import { createStructuredBillExtractor } from "../lib/claims/structured-extractor";
import { parseBillText } from "../lib/pdf/bill-parser";
import { fakeLoader, fixedClock, hospitalBill, jsonExtractionService, location } from "./fixtures";

describe("claimOutputDir", () => {
    it("keeps a claim id to one directory name", () => {
        expect(claimOutputDir("/out", "CLM-1")).toBe(path.join("/out", "CLM-1"));
        expect(claimOutputDir("/out", "CLM/../1")).toBe(path.join("/out", "CLM_.._1"));
        expect(claimOutputDir("/out", "..hidden")).toBe(path.join("/out", "_hidden"));
    });
});

describe("writeClaimOutputs", () => {
    let root: string;

    beforeEach(async () => {
        root = await mkdtemp(path.join(os.tmpdir(), "claim-outputs-"));
    });

    afterEach(async () => {
        await rm(root, { recursive: true, force: true });
    });

    it("writes one pretty-printed JSON file per output", async () => {
        const result = await new ClaimPipeline({
            loader: fakeLoader({ [location("hospital.pdf")]: hospitalBill }),
            extractionService: jsonExtractionService,
            extractor: createStructuredBillExtractor({ parser: parseBillText }),
            clock: fixedClock,
        }).processClaim("CLM-1", [location("hospital.pdf")]);

        const written = await writeClaimOutputs(root, result);

        const dir = path.join(root, "CLM-1");
        expect(written).toEqual([
            path.join(dir, "final_bill.json"),
            path.join(dir, "bill_item_list.json"),
            path.join(dir, "supporting_doc_map.json"),
            path.join(dir, "audit_logs.json"),
        ]);
        expect((await readdir(dir)).sort()).toEqual(["audit_logs.json", "bill_item_list.json", "final_bill.json", "supporting_doc_map.json"]);

        const finalBill = await readFile(path.join(dir, "final_bill.json"), "utf8");
        expect(finalBill).toBe(JSON.stringify(result.outputs?.final_bill, null, 2) + "\n");
        expect(JSON.parse(finalBill).billId).toBe("BILL_CLM-1_doc_1_hospital.pdf");
    });

    it("writes nothing for a result without outputs", async () => {
        const written = await writeClaimOutputs(root, { claimId: "CLM-1", status: "INVALID_INPUT", finalBillId: null });
        expect(written).toEqual([]);
        expect(await readdir(root)).toEqual([]);
    });
});
