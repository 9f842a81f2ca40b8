import { describe, expect, it, vi } from "vitest";
import { SupersededError } from "../src/core/errors.js";
import { ConcurrencyRegistry, type ConcurrencyLease } from "../src/scheduler/concurrency.js";

describe("concurrency registry", () => {
	it("grants a free group without superseding anyone", async () => {
		const registry = new ConcurrencyRegistry();
		const lease = await registry.acquire("ci", { runId: "run-1", cancel: () => {} });

		expect(lease.superseded).toBeUndefined();
		expect(registry.holderOf("ci")).toBe("run-1");
		lease.release();
		expect(registry.holderOf("ci")).toBeUndefined();
	});

	it("cancels the holder and waits for it to release", async () => {
		const registry = new ConcurrencyRegistry();
		const reasons: SupersededError[] = [];
		const first = await registry.acquire("ci", {
			runId: "run-1",
			cancel: (reason) => {
				reasons.push(reason);
				setTimeout(() => first.release(), 10);
			},
		});

		const second = await registry.acquire("ci", { runId: "run-2", cancel: () => {} });

		expect(reasons.map((reason) => reason.message)).toEqual(["Run run-1 superseded by run-2"]);
		expect(second.superseded).toBe("run-1");
		expect(registry.holderOf("ci")).toBe("run-2");
	});

	it("supersedes in trigger order when runs queue up", async () => {
		const registry = new ConcurrencyRegistry();
		const leases = new Map<string, ConcurrencyLease>();
		const log: string[] = [];
		const acquire = async (runId: string): Promise<ConcurrencyLease> => {
			const lease = await registry.acquire(
				"ci",
				{ runId, cancel: () => setTimeout(() => leases.get(runId)?.release(), 5) },
				{ onSupersede: (previous) => log.push(`${previous} -> ${runId}`) },
			);
			leases.set(runId, lease);
			return lease;
		};

		await acquire("run-1");
		const [second, third] = await Promise.all([acquire("run-2"), acquire("run-3")]);

		expect(log).toEqual(["run-1 -> run-2", "run-2 -> run-3"]);
		expect(second.superseded).toBe("run-1");
		expect(third.superseded).toBe("run-2");
		expect(registry.holderOf("ci")).toBe("run-3");
	});

	it("gives up without superseding once the waiter is aborted", async () => {
		const registry = new ConcurrencyRegistry();
		const cancelHolder = vi.fn();
		await registry.acquire("ci", { runId: "run-1", cancel: cancelHolder });
		const controller = new AbortController();
		controller.abort(new Error("Run canceled"));

		await expect(
			registry.acquire("ci", { runId: "run-2", cancel: () => {} }, { signal: controller.signal }),
		).rejects.toThrow("Run canceled");
		expect(cancelHolder).not.toHaveBeenCalled();
		expect(registry.holderOf("ci")).toBe("run-1");
	});

	it("keeps groups independent", async () => {
		const registry = new ConcurrencyRegistry();
		const canceled: string[] = [];
		await registry.acquire("a", { runId: "run-a", cancel: () => canceled.push("run-a") });
		const lease = await registry.acquire("b", { runId: "run-b", cancel: () => canceled.push("run-b") });

		expect(lease.superseded).toBeUndefined();
		expect(canceled).toEqual([]);
	});

	it("ignores repeated or stale releases", async () => {
		const registry = new ConcurrencyRegistry();
		const first = await registry.acquire("ci", {
			runId: "run-1",
			cancel: () => setTimeout(() => first.release(), 0),
		});
		await registry.acquire("ci", { runId: "run-2", cancel: () => {} });

		first.release();
		first.release();
		expect(registry.holderOf("ci")).toBe("run-2");
	});
});
