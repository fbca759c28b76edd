import { describe, expect, it } from "vitest";
import { AbortedError, TimeoutError, withTimeout } from "./resilience.js";

describe("withTimeout", () => {
    it("resolves with the operation's value", async () => {
        await expect(withTimeout(async () => 42, { timeoutMs: 1000 })).resolves.toBe(42);
    });

    it("passes on the operation's own error", async () => {
        const failing = withTimeout(
            async () => {
                throw new Error("upstream 500");
            },
            { timeoutMs: 1000 },
        );

        await expect(failing).rejects.toThrow("upstream 500");
    });

    it("rejects with a timeout and aborts the operation's signal", async () => {
        let seen: AbortSignal | undefined;
        const slow = withTimeout(
            (signal) => {
                seen = signal;
                return new Promise<never>((_, reject) => {
                    signal.addEventListener("abort", () => reject(new Error("aborted by signal")));
                });
            },
            { timeoutMs: 10, name: "Slow call" },
        );

        await expect(slow).rejects.toEqual(new TimeoutError("Slow call", 10));
        expect(seen?.aborted).toBe(true);
    });

    it("rejects straight away when the caller already aborted", async () => {
        const controller = new AbortController();
        controller.abort();

        await expect(withTimeout(async () => 1, { timeoutMs: 1000, signal: controller.signal })).rejects.toBeInstanceOf(
            AbortedError,
        );
    });

    it("rejects when the caller aborts mid-flight", async () => {
        const controller = new AbortController();
        const pending = withTimeout(() => new Promise<never>(() => {}), {
            timeoutMs: 1000,
            name: "Pending call",
            signal: controller.signal,
        });
        controller.abort();

        await expect(pending).rejects.toThrow("Pending call was aborted by the caller");
    });
});
