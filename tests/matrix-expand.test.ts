import { describe, expect, it, vi } from "vitest";
import { expand, filterJobs, interpolate } from "../src/core/expand.js";
import type { CacheSpec } from "../src/core/types.js";
import { group, matrix } from "./helpers/fakes.js";

const cache: CacheSpec = {
	namespace: "${os}-cargo-",
	paths: ["~/.cargo/registry", "target"],
	lockFiles: ["**/Cargo.lock"],
	restorePrefixes: ["${os}-"],
};

describe("matrix expansion", () => {
	it("produces one job per target in group then target order", () => {
		const jobs = expand(
			matrix([
				group("linux", ["x86_64-unknown-linux-gnu", "aarch64-unknown-linux-gnu"]),
				group("cross", ["armv7-unknown-linux-gnueabihf"], { executor: "cross" }),
			]),
		);

		expect(jobs.map((job) => job.id)).toEqual([
			"linux/x86_64-unknown-linux-gnu",
			"linux/aarch64-unknown-linux-gnu",
			"cross/armv7-unknown-linux-gnueabihf",
		]);
		expect(jobs.map((job) => job.index)).toEqual([0, 1, 2]);
		expect(jobs[2]?.executor).toBe("cross");
	});

	it("keeps job ids unique when groups share a target", () => {
		const jobs = expand(matrix([group("a", ["t1", "t2"]), group("b", ["t1"])]));
		expect(new Set(jobs.map((job) => job.id)).size).toBe(jobs.length);
		expect(jobs).toHaveLength(3);
	});

	it("substitutes placeholders into step commands, names and env", () => {
		const [job] = expand(
			matrix([
				group("linux", ["x86_64-unknown-linux-gnu"], {
					steps: [
						{
							name: "build ${target}",
							command: "${toolchain}",
							args: ["build", "--target", "${target}", "--features", "${features}"],
							env: { CARGO_TARGET: "${target}" },
						},
					],
					env: { GROUP: "${group}", OS: "${os}" },
				}),
			]),
			{ variables: { os: "Linux" } },
		);

		expect(job?.steps[0]).toEqual({
			index: 0,
			name: "build x86_64-unknown-linux-gnu",
			command: "${toolchain}",
			args: ["build", "--target", "x86_64-unknown-linux-gnu", "--features", "${features}"],
			env: { CARGO_TARGET: "x86_64-unknown-linux-gnu" },
		});
		expect(job?.env).toEqual({ GROUP: "linux", OS: "Linux" });
	});

	it("lets target vars override seed variables but never the target id", () => {
		const [job] = expand(
			matrix([
				{
					...group("g", []),
					targets: [{ id: "wasm32-wasi", vars: { os: "wasi", target: "ignored" } }],
					steps: [{ name: "s", command: "echo", args: ["${os}", "${target}"] }],
				},
			]),
			{ variables: { os: "Linux" } },
		);
		expect(job?.steps[0]?.args).toEqual(["wasi", "wasm32-wasi"]);
	});

	it("takes the timeout from the target before the group", () => {
		const jobs = expand(
			matrix([
				{
					...group("g", []),
					timeoutMs: 1000,
					targets: [{ id: "a" }, { id: "b", timeoutMs: 50 }],
				},
			]),
		);
		expect(jobs.map((job) => job.timeoutMs)).toEqual([1000, 50]);
	});

	it("carries a target's host platform into its job", () => {
		const jobs = expand(
			matrix([{ ...group("native", []), targets: [{ id: "mac", platform: "darwin" }, { id: "any" }] }]),
		);
		expect(jobs.map((job) => job.platform)).toEqual(["darwin", undefined]);
	});

	it("inherits the document cache unless the group sets its own", () => {
		const own: CacheSpec = { namespace: "own-", paths: ["deps"], lockFiles: [], restorePrefixes: [] };
		const jobs = expand(
			matrix([group("shared", ["a"]), group("private", ["b"], { cache: own })], { cache }),
			{ variables: { os: "Linux" }, lockFingerprint: "abc" },
		);

		expect(jobs[0]?.cache).toEqual({
			namespace: "Linux-cargo-",
			lockFingerprint: "abc",
			paths: ["~/.cargo/registry", "target"],
			restorePrefixes: ["Linux-"],
		});
		expect(jobs[1]?.cache?.namespace).toBe("own-");
	});

	it("fingerprints each distinct cache spec once", () => {
		const fingerprint = vi.fn((spec: CacheSpec) => `fp:${spec.lockFiles.join(",")}`);
		const jobs = expand(matrix([group("a", ["t1", "t2", "t3"])], { cache }), {
			lockFingerprint: fingerprint,
		});

		expect(fingerprint).toHaveBeenCalledTimes(1);
		expect(jobs.every((job) => job.cache?.lockFingerprint === "fp:**/Cargo.lock")).toBe(true);
	});

	it("leaves jobs without a cache when nothing declares one", () => {
		const [job] = expand(matrix([group("a", ["t"])]));
		expect(job?.cache).toBeUndefined();
		expect(job?.timeoutMs).toBeUndefined();
	});

	it("returns frozen job specs", () => {
		const [job] = expand(matrix([group("a", ["t"])]));
		expect(Object.isFrozen(job)).toBe(true);
		expect(Object.isFrozen(job?.steps)).toBe(true);
	});

	it("expands an empty matrix to no jobs", () => {
		expect(expand(matrix([]))).toEqual([]);
	});
});

describe("interpolate", () => {
	it("keeps unknown placeholders verbatim", () => {
		expect(interpolate("${a}-${b}-$c", { a: "1" })).toBe("1-${b}-$c");
	});
});

describe("filterJobs", () => {
	const jobs = expand(matrix([group("a", ["t1", "t2"]), group("b", ["t1"])]));

	it("filters by group and target", () => {
		expect(filterJobs(jobs, { groups: ["a"] }).map((job) => job.id)).toEqual(["a/t1", "a/t2"]);
		expect(filterJobs(jobs, { targets: ["t1"] }).map((job) => job.id)).toEqual(["a/t1", "b/t1"]);
		expect(filterJobs(jobs, { groups: ["b"], targets: ["t2"] })).toEqual([]);
	});

	it("keeps everything for an empty filter", () => {
		expect(filterJobs(jobs, { groups: [], targets: [] })).toHaveLength(3);
	});
});
