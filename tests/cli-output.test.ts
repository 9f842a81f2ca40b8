import fs from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { formatPlan, formatReport, writeReportFile } from "../src/cli/output.js";
import { expand } from "../src/core/expand.js";
import type { RunReport } from "../src/report/report.js";
import { group, makeTempDir, matrix } from "./helpers/fakes.js";

const report: RunReport = {
	schemaVersion: 1,
	runId: "run-1",
	trigger: "push",
	concurrencyGroup: "ci",
	verdict: "fail",
	superseded: false,
	createdAt: "2024-01-01T00:00:00.000Z",
	durationMs: 75_000,
	totals: { jobs: 2, passed: 1, failed: 1 },
	jobs: [
		{
			jobId: "linux/t1",
			group: "linux",
			target: "t1",
			status: "success",
			durationMs: 1500,
			attempts: 1,
			cache: { key: "k", hit: "prefix", restoredKey: "k0", saved: true },
		},
		{
			jobId: "linux/t2",
			group: "linux",
			target: "t2",
			status: "failed",
			failingStep: { index: 0, name: "build" },
			durationMs: 250,
			attempts: 2,
		},
	],
	failures: [
		{
			jobId: "linux/t2",
			group: "linux",
			target: "t2",
			status: "failed",
			kind: "step-failure",
			failingStep: { index: 0, name: "build" },
			message: "Step 1 (build) exited with code 1",
		},
	],
};

describe("formatReport", () => {
	it("prints one line per job, the failures and a verdict", () => {
		expect(formatReport(report)).toEqual([
			"● success   linux/t1  1.5s  cache:prefix+saved",
			"✕ failed    linux/t2  250ms (2 attempts)",
			"",
			"Failures:",
			"  linux/t2 [step-failure] at step 1 (build): Step 1 (build) exited with code 1",
			"",
			"FAIL: 1/2 passed, 1 failed in 1m15s",
		]);
	});

	it("marks superseded runs", () => {
		const lines = formatReport({
			...report,
			verdict: "pass",
			superseded: true,
			failures: [],
			jobs: [],
			totals: { jobs: 0, passed: 0, failed: 0 },
			durationMs: undefined,
		});
		expect(lines).toEqual(["", "PASS (superseded): 0/0 passed, 0 failed"]);
	});
});

describe("formatPlan", () => {
	it("groups jobs and lists their steps", () => {
		const jobs = expand(
			matrix([
				group("linux", ["t1"], { timeoutMs: 90_000 }),
				group("cross", ["t2"], {
					executor: "cross",
					steps: [{ name: "build", command: "cross", args: ["build", "--message", "hello world"] }],
				}),
			]),
		);

		expect(formatPlan(jobs)).toEqual([
			"linux (native)",
			"  t1  [timeout 1m30s]",
			"    1. build: build --target t1",
			"    2. test: test --target t1",
			"cross (cross)",
			"  t2",
			'    1. build: cross build --message "hello world"',
		]);
	});
});

describe("writeReportFile", () => {
	it("writes pretty JSON, creating parent directories", () => {
		const file = path.join(makeTempDir("report"), "nested", "report.json");
		writeReportFile(file, report);

		const raw = fs.readFileSync(file, "utf-8");
		expect(raw.endsWith("}\n")).toBe(true);
		expect(JSON.parse(raw)).toEqual(report);
	});
});
