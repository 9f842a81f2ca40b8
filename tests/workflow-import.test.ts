import YAML from "yaml";
import { describe, expect, it } from "vitest";
import { expand } from "../src/core/expand.js";
import { convertExpressions, expandMatrix, importWorkflow, importWorkflowFile } from "../src/core/workflow.js";

const workflow = `
name: CI
on:
  push:
    branches: [main]
  pull_request:
env:
  CARGO_TERM_COLOR: always
concurrency:
  group: ci-\${{ github.ref }}
jobs:
  lint:
    runs-on: ubuntu-latest
    steps:
      - run: cargo clippy
  build:
    runs-on: ubuntu-latest
    timeout-minutes: 30
    strategy:
      matrix:
        target: [x86_64-unknown-linux-gnu, aarch64-unknown-linux-gnu]
        rust: [stable]
        include:
          - target: aarch64-unknown-linux-gnu
            use-cross: "true"
    steps:
      - uses: actions/checkout@v4
      - uses: actions/cache@v4
        with:
          path: |
            ~/.cargo/registry
            target
          key: \${{ runner.os }}-cargo-\${{ hashFiles('**/Cargo.lock') }}
          restore-keys: |
            \${{ runner.os }}-cargo-
      - name: Build
        run: cross build --target \${{ matrix.target }}
      - name: Test
        run: cargo test --target \${{ matrix.target }}
        working-directory: crates/core
        env:
          RUST_VERSION: \${{ matrix.rust }}
          TOKEN: \${{ secrets.TOKEN }}
`;

const crossAndNative = `
name: Test Suite
on: [push]
jobs:
  test-cross:
    runs-on: ubuntu-20.04
    strategy:
      matrix:
        target: [aarch64-unknown-linux-gnu, mips-unknown-linux-gnu]
    steps:
      - uses: actions/cache@v2
        with:
          path: ~/.cargo/registry
          key: \${{ runner.os }}-cargo-\${{ hashFiles('**/Cargo.lock') }}
      - run: cross build --target \${{ matrix.target }}
  test-native:
    runs-on: \${{ matrix.os }}
    strategy:
      matrix:
        include:
          - os: ubuntu-20.04
            display_name: Ubuntu 20.04
          - os: macos-10.15
            display_name: macOS 10.15
          - os: windows-2019
            display_name: Windows Server 2019
    steps:
      - uses: actions/cache@v2
        with:
          path: ~/.cargo/registry
          key: \${{ runner.os }}-cargo-\${{ hashFiles('**/Cargo.lock') }}
      - run: cargo build --verbose
`;

describe("workflow import", () => {
	it("turns matrix jobs into target groups", () => {
		const { spec, warnings } = importWorkflow(YAML.parse(workflow));

		expect(spec.name).toBe("CI");
		expect(spec.concurrencyGroup).toBe("ci-github.ref");
		expect(spec.triggers).toEqual({ push: { branches: ["main"] }, pullRequest: true });
		expect(spec.groups).toHaveLength(1);

		const [build] = spec.groups;
		expect(build).toMatchObject({
			name: "build",
			executor: "cross",
			env: { CARGO_TERM_COLOR: "always" },
			timeoutMs: 1_800_000,
		});
		expect(build?.targets).toEqual([
			{
				id: "x86_64-unknown-linux-gnu",
				vars: { target: "x86_64-unknown-linux-gnu", rust: "stable", runner_os: "Linux" },
			},
			{
				id: "aarch64-unknown-linux-gnu",
				vars: { target: "aarch64-unknown-linux-gnu", rust: "stable", use_cross: "true", runner_os: "Linux" },
			},
		]);
		expect(build?.steps).toEqual([
			{ name: "Build", command: "cross", args: ["build", "--target", "${target}"] },
			{
				name: "Test",
				command: "sh",
				args: ["-c", 'cd "crates/core" && cargo test --target ${target}'],
				env: { RUST_VERSION: "${rust}", TOKEN: "${{ secrets.TOKEN }}" },
			},
		]);
		expect(build?.cache).toEqual({
			namespace: "${runner_os}-cargo-",
			paths: ["~/.cargo/registry", "target"],
			lockFiles: ["**/Cargo.lock"],
			restorePrefixes: ["${runner_os}-cargo-"],
		});
		expect(warnings).toEqual([
			'job "lint": no static strategy.matrix, skipped',
			'job "build": step "actions/checkout@v4" uses an action, skipped',
			'job "build": unsupported expression "${{ secrets.TOKEN }}" left as-is',
		]);
	});

	it("fails when no job has a matrix", () => {
		expect(() => importWorkflow({ jobs: { lint: { steps: [{ run: "make" }] } } })).toThrow(
			"<workflow>: workflow has no job with a strategy.matrix",
		);
	});

	it("skips matrix jobs without run steps", () => {
		expect(() =>
			importWorkflow({
				jobs: { docs: { strategy: { matrix: { os: ["a"] } }, steps: [{ uses: "actions/checkout@v4" }] } },
			}),
		).toThrow(/no job with a strategy\.matrix/);
	});

	it("takes runner.os and the host platform from each combination's runs-on", () => {
		const { spec } = importWorkflow(YAML.parse(crossAndNative));
		const jobs = expand(spec, { variables: { runner_os: "Linux" }, lockFingerprint: "lock" });

		expect(jobs.map((job) => [job.id, job.executor, job.platform, job.cache?.namespace])).toEqual([
			["test-cross/aarch64-unknown-linux-gnu", "cross", undefined, "Linux-cargo-"],
			["test-cross/mips-unknown-linux-gnu", "cross", undefined, "Linux-cargo-"],
			["test-native/Ubuntu 20.04", "native", "linux", "Linux-cargo-"],
			["test-native/macOS 10.15", "native", "darwin", "macOS-cargo-"],
			["test-native/Windows Server 2019", "native", "win32", "Windows-cargo-"],
		]);
	});

	it("leaves runner.os to the host when runs-on names no known runner", () => {
		const { spec } = importWorkflow({
			jobs: {
				build: {
					"runs-on": "self-hosted",
					strategy: { matrix: { target: ["t"] } },
					steps: [{ run: "echo ${{ runner.os }}" }],
				},
			},
		});
		const [job] = expand(spec, { variables: { runner_os: "Linux" } });
		expect(spec.groups[0]?.targets).toEqual([{ id: "t", vars: { target: "t" } }]);
		expect(job?.steps[0]?.args).toEqual(["Linux"]);
		expect(job?.platform).toBeUndefined();
	});

	it("renames combinations that would repeat a target id", () => {
		const { spec, warnings } = importWorkflow({
			jobs: {
				build: {
					strategy: { matrix: { target: ["a"], rust: ["stable", "beta"] } },
					steps: [{ run: "cargo +${{ matrix.rust }} build" }],
				},
			},
		});
		expect(spec.groups[0]?.targets.map((target) => target.id)).toEqual(["a", "a-2"]);
		expect(warnings).toEqual(['job "build": duplicate target "a" renamed to "a-2"']);
	});

	it("reports a missing file", () => {
		expect(() => importWorkflowFile("/nonexistent/trellis/ci.yml")).toThrow();
	});
});

describe("expandMatrix", () => {
	it("drops excluded combinations", () => {
		expect(expandMatrix({ os: ["a", "b"], v: [1, 2], exclude: [{ os: "a", v: 2 }] })).toEqual([
			{ os: "a", v: "1" },
			{ os: "b", v: "1" },
			{ os: "b", v: "2" },
		]);
	});

	it("appends includes that match no combination", () => {
		expect(expandMatrix({ os: ["a"], include: [{ os: "c", extra: "x" }] })).toEqual([
			{ os: "a" },
			{ os: "c", extra: "x" },
		]);
	});

	it("extends every combination with an include that names no dimension", () => {
		expect(expandMatrix({ os: ["a", "b"], include: [{ extra: "x" }] })).toEqual([
			{ os: "a", extra: "x" },
			{ os: "b", extra: "x" },
		]);
	});

	it("gives every entry of an include-only matrix its own combination", () => {
		expect(expandMatrix({ include: [{ target: "x" }, { target: "y" }] })).toEqual([
			{ target: "x" },
			{ target: "y" },
		]);
	});

	it("serializes object values", () => {
		expect(expandMatrix({ cfg: [{ a: 1 }] })).toEqual([{ cfg: '{"a":1}' }]);
	});
});

describe("convertExpressions", () => {
	it("maps matrix, runner and env references", () => {
		const unknown: string[] = [];
		expect(
			convertExpressions(
				"${{ matrix.use-cross }} ${{ runner.os }} ${{ env.HOME }} ${{ github.sha }}",
				(expression) => unknown.push(expression),
			),
		).toBe("${use_cross} ${runner_os} $HOME ${{ github.sha }}");
		expect(unknown).toEqual(["github.sha"]);
	});
});
