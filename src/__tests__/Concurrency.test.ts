/**
 * runWithConcurrency / withDeadline
 */
import { runWithConcurrency, withDeadline } from "../lib/utils/concurrency";
import { ClaimCancelledError, ExtractionTimeoutError } from "../lib/errors";

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

describe("runWithConcurrency", () => {
    it("keeps task order in the results", async () => {
        const tasks = [30, 5, 15].map((ms, i) => async () => {
            await sleep(ms);
            return i;
        });
        await expect(runWithConcurrency(tasks, 3)).resolves.toEqual([0, 1, 2]);
    });

    it("never runs more than the limit at once", async () => {
        let active = 0;
        let peak = 0;
        const tasks = Array.from({ length: 6 }, () => async () => {
            active++;
            peak = Math.max(peak, active);
            await sleep(5);
            active--;
        });

        await runWithConcurrency(tasks, 2);
        expect(peak).toBe(2);
    });

    it("reports progress after each task", async () => {
        const progress: string[] = [];
        await runWithConcurrency([async () => 1, async () => 2], 1, (done, total) => progress.push(`${done}/${total}`));
        expect(progress).toEqual(["1/2", "2/2"]);
    });

    it("handles an empty task list", async () => {
        await expect(runWithConcurrency([], 4)).resolves.toEqual([]);
    });
});

describe("withDeadline", () => {
    it("resolves with the work's value", async () => {
        await expect(withDeadline(async () => "done", 1000)).resolves.toBe("done");
    });

    it("rejects with ExtractionTimeoutError and aborts the work's signal", async () => {
        const seen: AbortSignal[] = [];
        const pending = withDeadline(signal => {
            seen.push(signal);
            return new Promise<string>(() => undefined);
        }, 20);

        await expect(pending).rejects.toBeInstanceOf(ExtractionTimeoutError);
        await expect(pending).rejects.toThrow("Extraction timed out after 20ms");
        expect(seen[0]?.aborted).toBe(true);
    });

    it("rejects with ClaimCancelledError when the outer signal aborts", async () => {
        const controller = new AbortController();
        const cancelled = withDeadline(() => new Promise<string>(() => undefined), 5000, controller.signal);
        controller.abort();

        await expect(cancelled).rejects.toBeInstanceOf(ClaimCancelledError);
        await expect(cancelled).rejects.toThrow("Claim processing was cancelled");
    });

    it("rejects immediately for an already-aborted signal", async () => {
        const work = jest.fn(async () => "never");
        const controller = new AbortController();
        controller.abort();

        await expect(withDeadline(work, 1000, controller.signal)).rejects.toBeInstanceOf(ClaimCancelledError);
        expect(work).not.toHaveBeenCalled();
    });

    it("passes through the work's own rejection", async () => {
        await expect(withDeadline(async () => { throw new Error("boom"); }, 1000)).rejects.toThrow("boom");
    });
});
