import fs from "node:fs";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { ensureGitignore, runInit, writeStarterMatrix } from "../src/cli/init.js";
import { parseMatrixFile } from "../src/core/parser.js";
import { makeTempDir } from "./helpers/fakes.js";

function gitRepo(ignore?: string): string {
	const dir = makeTempDir("init");
	fs.mkdirSync(path.join(dir, ".git"));
	if (ignore !== undefined) {
		fs.writeFileSync(path.join(dir, ".gitignore"), ignore);
	}
	return dir;
}

describe("ensureGitignore", () => {
	it("skips directories that are not repositories", () => {
		expect(ensureGitignore(makeTempDir("init-plain"))).toBe("skipped");
	});

	it("creates the ignore file", () => {
		const dir = gitRepo();
		expect(ensureGitignore(dir)).toBe("added");
		expect(fs.readFileSync(path.join(dir, ".gitignore"), "utf-8")).toBe(".trellis\n");
	});

	it("appends on a new line", () => {
		const dir = gitRepo("target");
		expect(ensureGitignore(dir)).toBe("added");
		expect(fs.readFileSync(path.join(dir, ".gitignore"), "utf-8")).toBe("target\n.trellis\n");
	});

	it("recognizes an existing entry with slashes", () => {
		expect(ensureGitignore(gitRepo("target\n/.trellis/\n"))).toBe("present");
	});
});

describe("writeStarterMatrix", () => {
	it("writes a document the matrix parser accepts", () => {
		const dir = makeTempDir("init-starter");
		expect(writeStarterMatrix(dir)).toBe("created");

		const spec = parseMatrixFile(path.join(dir, "trellis.matrix.yml"));
		expect(spec.concurrencyGroup).toBe("ci");
		expect(spec.triggers).toEqual({ push: { branches: [] }, pullRequest: true });
		expect(spec.groups.map((group) => [group.name, group.executor, group.targets.length])).toEqual([
			["host", "native", 1],
			["cross", "cross", 2],
		]);
		expect(spec.groups[0]?.steps[0]).toEqual({
			name: "${toolchain} build --locked --target ${target}",
			command: "${toolchain}",
			args: ["build", "--locked", "--target", "${target}"],
		});
	});

	it("never overwrites an existing document", () => {
		const dir = makeTempDir("init-existing");
		fs.writeFileSync(path.join(dir, "trellis.matrix.yml"), "name: mine\n");

		expect(writeStarterMatrix(dir)).toBe("exists");
		expect(fs.readFileSync(path.join(dir, "trellis.matrix.yml"), "utf-8")).toBe("name: mine\n");
	});
});

describe("runInit", () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("reports what it did", () => {
		const write = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
		const dir = gitRepo();

		runInit(dir);
		runInit(dir);
		runInit(makeTempDir("init-none"));

		expect(write.mock.calls.map(([chunk]) => String(chunk))).toEqual([
			"Added '.trellis' to .gitignore.\n",
			"Created trellis.matrix.yml.\n",
			"'.trellis' is already in .gitignore.\n",
			"trellis.matrix.yml already exists; left unchanged.\n",
			"Skipped .gitignore: not a git repository.\n",
			"Created trellis.matrix.yml.\n",
		]);
	});
});
