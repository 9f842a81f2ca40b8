import fs from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { deriveCacheKey, fingerprintLockFiles, globToRegExp } from "../src/cache/key.js";
import { makeTempDir } from "./helpers/fakes.js";

describe("cache keys", () => {
	it("keeps the namespace readable and the digest fixed-width", () => {
		const key = deriveCacheKey("Linux-cargo-", "abc");
		expect(key.startsWith("Linux-cargo-")).toBe(true);
		expect(key).toHaveLength("Linux-cargo-".length + 40);
		expect(key.slice("Linux-cargo-".length)).toMatch(/^[0-9a-f]{40}$/);
	});

	it("is deterministic and sensitive to the lock fingerprint", () => {
		expect(deriveCacheKey("ns-", "abc")).toBe(deriveCacheKey("ns-", "abc"));
		expect(deriveCacheKey("ns-", "abc")).not.toBe(deriveCacheKey("ns-", "abd"));
	});
});

describe("lock file fingerprints", () => {
	it("is empty without patterns or matches", () => {
		const root = makeTempDir("fp-empty");
		expect(fingerprintLockFiles(root, [])).toBe("");
		expect(fingerprintLockFiles(root, ["**/Cargo.lock"])).toBe("");
	});

	it("changes when a matching lock file changes", () => {
		const root = makeTempDir("fp-change");
		fs.mkdirSync(path.join(root, "crates", "core"), { recursive: true });
		fs.writeFileSync(path.join(root, "Cargo.lock"), "version = 3\n");
		fs.writeFileSync(path.join(root, "crates", "core", "Cargo.lock"), "a\n");

		const first = fingerprintLockFiles(root, ["**/Cargo.lock"]);
		expect(first).toMatch(/^[0-9a-f]{64}$/);
		expect(fingerprintLockFiles(root, ["**/Cargo.lock"])).toBe(first);

		fs.writeFileSync(path.join(root, "crates", "core", "Cargo.lock"), "b\n");
		expect(fingerprintLockFiles(root, ["**/Cargo.lock"])).not.toBe(first);
	});

	it("skips build and vendor directories", () => {
		const root = makeTempDir("fp-skip");
		fs.writeFileSync(path.join(root, "Cargo.lock"), "root\n");
		const before = fingerprintLockFiles(root, ["**/Cargo.lock"]);

		fs.mkdirSync(path.join(root, "target", "debug"), { recursive: true });
		fs.writeFileSync(path.join(root, "target", "debug", "Cargo.lock"), "generated\n");
		fs.mkdirSync(path.join(root, "node_modules", "pkg"), { recursive: true });
		fs.writeFileSync(path.join(root, "node_modules", "pkg", "Cargo.lock"), "vendored\n");

		expect(fingerprintLockFiles(root, ["**/Cargo.lock"])).toBe(before);
	});
});

describe("globToRegExp", () => {
	it("matches path segments the way workflow globs do", () => {
		expect(globToRegExp("**/Cargo.lock").test("Cargo.lock")).toBe(true);
		expect(globToRegExp("**/Cargo.lock").test("crates/a/Cargo.lock")).toBe(true);
		expect(globToRegExp("release/*").test("release/1.0")).toBe(true);
		expect(globToRegExp("release/*").test("release/1.0/hotfix")).toBe(false);
		expect(globToRegExp("release/**").test("release/1.0/hotfix")).toBe(true);
		expect(globToRegExp("v?.lock").test("v1.lock")).toBe(true);
		expect(globToRegExp("Cargo.lock").test("CargoXlock")).toBe(false);
	});
});
