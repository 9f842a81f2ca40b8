import { describe, expect, it } from "vitest";
import { parseArgs } from "../src/cli/args.js";

describe("cli args", () => {
	it("parses run options and repeatable filters", () => {
		const parsed = parseArgs([
			"run",
			"--matrix",
			"ci/matrix.yml",
			"--group",
			"linux,cross",
			"--group",
			"wasm",
			"--target",
			"x86_64-unknown-linux-gnu",
			"--event",
			"pull_request",
			"--branch",
			"main",
			"-j",
			"3",
			"--retries",
			"2",
			"--json",
			"--report",
			"out/report.json",
			"--no-cache",
		]);

		expect(parsed).toEqual({
			command: "run",
			matrix: "ci/matrix.yml",
			groups: ["linux", "cross", "wasm"],
			targets: ["x86_64-unknown-linux-gnu"],
			event: "pull_request",
			branch: "main",
			concurrency: 3,
			retries: 2,
			json: true,
			report: "out/report.json",
			noCache: true,
			unknown: [],
			errors: [],
		});
	});

	it("defaults to the run command", () => {
		expect(parseArgs([]).command).toBe("run");
		expect(parseArgs(["--json"]).command).toBe("run");
	});

	it("captures unknown options and commands", () => {
		const parsed = parseArgs(["deploy", "--wat"]);
		expect(parsed.unknown).toEqual(["--wat"]);
		expect(parsed.errors).toEqual(["Unknown command: deploy"]);
	});

	it("reports missing values for valued flags", () => {
		const parsed = parseArgs(["--workflow", "--event", "push"]);
		expect(parsed.errors).toEqual(["Missing value for --workflow"]);
		expect(parsed.event).toBe("push");
	});

	it("rejects invalid events and counts", () => {
		const parsed = parseArgs(["--event", "release", "--concurrency", "0", "--retries", "x"]);
		expect(parsed.event).toBeUndefined();
		expect(parsed.concurrency).toBeUndefined();
		expect(parsed.errors).toEqual([
			"Invalid value for --event: release (expected push|pull_request)",
			"Invalid value for --concurrency: 0 (expected an integer >= 1)",
			"Invalid value for --retries: x (expected an integer >= 0)",
		]);
	});

	it("refuses a matrix and a workflow together", () => {
		expect(parseArgs(["-m", "a.yml", "--workflow", "b.yml"]).errors).toEqual([
			"--matrix and --workflow are mutually exclusive",
		]);
	});

	it("parses other subcommands", () => {
		expect(parseArgs(["init"]).command).toBe("init");
		expect(parseArgs(["plan", "--group", "linux"])).toMatchObject({ command: "plan", groups: ["linux"] });
		expect(parseArgs(["-h"]).help).toBe(true);
		expect(parseArgs(["-v"]).version).toBe(true);
	});
});
