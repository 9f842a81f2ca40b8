import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from "vitest";
import { EXIT_FAIL, EXIT_PASS, EXIT_USAGE, runCli, type CliContext } from "../src/cli/run-cli.js";
import { makeTempDir } from "./helpers/fakes.js";

const STEP_SCRIPT = "process.exit(process.env.TRELLIS_TARGET === 'beta' ? 3 : 0)";

const matrixDocument = [
	"name: e2e",
	"groups:",
	"  - name: node",
	"    targets: [alpha, beta]",
	"    steps:",
	"      - name: check",
	'        command: "${toolchain}"',
	`        args: ["-e", "${STEP_SCRIPT}"]`,
].join("\n");

function project(): string {
	const dir = makeTempDir("cli");
	fs.writeFileSync(
		path.join(dir, ".trellis.yml"),
		["isolation: none", "logLevel: warn", "toolchains:", "  native:", `    program: ${JSON.stringify(process.execPath)}`].join(
			"\n",
		),
	);
	fs.writeFileSync(path.join(dir, "trellis.matrix.yml"), matrixDocument);
	return dir;
}

function contextFor(cwd: string): CliContext {
	return { cwd, interactive: false, env: process.env };
}

describe("trellis cli", () => {
	let stdout: MockInstance;
	let stderr: MockInstance;

	beforeEach(() => {
		stdout = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
		stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	const written = (spy: MockInstance): string => spy.mock.calls.map(([chunk]) => String(chunk)).join("");

	it("runs every job and prints a JSON report", async () => {
		const dir = project();

		const code = await runCli(["run", "--json", "--report", "out/report.json"], contextFor(dir));

		expect(code).toBe(EXIT_FAIL);
		const report: unknown = JSON.parse(written(stdout));
		expect(report).toMatchObject({
			verdict: "fail",
			trigger: "push",
			totals: { jobs: 2, passed: 1, failed: 1 },
			failures: [
				{
					jobId: "node/beta",
					kind: "step-failure",
					failingStep: { index: 0, name: "check" },
					message: "Step 1 (check) exited with code 3",
				},
			],
		});
		expect(JSON.parse(fs.readFileSync(path.join(dir, "out", "report.json"), "utf-8"))).toEqual(report);
	});

	it("prints a text summary", async () => {
		const code = await runCli(["run"], contextFor(project()));

		expect(code).toBe(EXIT_FAIL);
		const lines = written(stdout).trimEnd().split("\n");
		expect(lines).toContain("  node/beta [step-failure] at step 1 (check): Step 1 (check) exited with code 3");
		expect(lines.at(-1)).toMatch(/^FAIL: 1\/2 passed, 1 failed in \d/);
	});

	it("passes when the selection only holds passing targets", async () => {
		const code = await runCli(["run", "--target", "alpha", "--json"], contextFor(project()));

		expect(code).toBe(EXIT_PASS);
		expect(JSON.parse(written(stdout))).toMatchObject({ verdict: "pass", totals: { jobs: 1, passed: 1 } });
	});

	it("plans without running anything", async () => {
		const code = await runCli(["plan"], contextFor(project()));

		expect(code).toBe(EXIT_PASS);
		expect(written(stdout).split("\n")).toEqual([
			"node (native)",
			"  alpha",
			`    1. check: \${toolchain} -e ${JSON.stringify(STEP_SCRIPT)}`,
			"  beta",
			`    1. check: \${toolchain} -e ${JSON.stringify(STEP_SCRIPT)}`,
			"",
		]);
	});

	it("plans as JSON", async () => {
		await runCli(["plan", "--json"], contextFor(project()));

		const jobs: unknown = JSON.parse(written(stdout));
		expect(jobs).toMatchObject([{ id: "node/alpha" }, { id: "node/beta" }]);
	});

	it("exits with a usage error when the matrix document is missing", async () => {
		const dir = makeTempDir("cli-empty");

		const code = await runCli(["run"], contextFor(dir));

		expect(code).toBe(EXIT_USAGE);
		expect(written(stderr)).toBe(
			`Invalid configuration: ${path.join(dir, "trellis.matrix.yml")}: matrix document not found (use --matrix or --workflow)\n`,
		);
	});

	it("exits with a usage error when nothing matches the selection", async () => {
		const code = await runCli(["run", "--group", "missing"], contextFor(project()));

		expect(code).toBe(EXIT_USAGE);
		expect(written(stderr)).toBe("No jobs match the selection.\n");
	});

	it("does nothing for an event the matrix does not run on", async () => {
		const dir = project();
		fs.writeFileSync(path.join(dir, "pr-only.yml"), `on: pull_request\n${matrixDocument}`);

		const code = await runCli(["run", "-m", "pr-only.yml", "--event", "push"], contextFor(dir));

		expect(code).toBe(EXIT_PASS);
		expect(written(stdout)).toBe("");
	});

	it("rejects bad usage before touching the project", async () => {
		expect(await runCli(["--bogus"], contextFor(project()))).toBe(EXIT_USAGE);
		expect(written(stderr)).toBe("Unknown option(s): --bogus\nRun `trellis --help` for usage.\n");
	});

	it("prints the package version", async () => {
		expect(await runCli(["--version"], contextFor(project()))).toBe(EXIT_PASS);
		expect(written(stdout)).toBe("trellis 0.3.0\n");
	});
});
