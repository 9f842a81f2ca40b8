import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";

const SKIPPED_DIRS = new Set([".git", ".trellis", "node_modules", "target"]);

/**
 * Cache keys keep the namespace readable so prefix restores can match on it:
 * `linux-cargo-<digest>`.
 */
export function deriveCacheKey(namespace: string, lockFingerprint: string): string {
	const digest = crypto
		.createHash("sha256")
		.update(namespace)
		.update("\0")
		.update(lockFingerprint)
		.digest("hex")
		.slice(0, 40);
	return `${namespace}${digest}`;
}

/**
 * Digest over every lock file matching `patterns` under `root`, in path order.
 * Returns an empty string when nothing matches.
 */
export function fingerprintLockFiles(root: string, patterns: readonly string[]): string {
	if (patterns.length === 0) {
		return "";
	}
	const matchers = patterns.map(globToRegExp);
	const files = walkFiles(root)
		.filter((relative) => matchers.some((matcher) => matcher.test(relative)))
		.sort();
	if (files.length === 0) {
		return "";
	}

	const hash = crypto.createHash("sha256");
	for (const relative of files) {
		const fileHash = crypto
			.createHash("sha256")
			.update(fs.readFileSync(path.join(root, relative)))
			.digest();
		hash.update(fileHash);
	}
	return hash.digest("hex");
}

export function globToRegExp(pattern: string): RegExp {
	const normalized = pattern.replace(/\\/g, "/").replace(/^\.\//, "");
	let source = "";
	for (let i = 0; i < normalized.length; i += 1) {
		const char = normalized[i];
		if (char === "*" && normalized[i + 1] === "*") {
			if (normalized[i + 2] === "/") {
				source += "(?:.*/)?";
				i += 2;
			} else {
				source += ".*";
				i += 1;
			}
			continue;
		}
		if (char === "*") {
			source += "[^/]*";
			continue;
		}
		if (char === "?") {
			source += "[^/]";
			continue;
		}
		source += char.replace(/[.+^${}()|[\]\\]/g, "\\$&");
	}
	return new RegExp(`^${source}$`);
}

function walkFiles(root: string, relativeDir = ""): string[] {
	const dir = path.join(root, relativeDir);
	if (!fs.existsSync(dir)) {
		return [];
	}
	const files: string[] = [];
	for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
		const relative = relativeDir ? `${relativeDir}/${entry.name}` : entry.name;
		if (entry.isDirectory()) {
			if (!SKIPPED_DIRS.has(entry.name)) {
				files.push(...walkFiles(root, relative));
			}
			continue;
		}
		if (entry.isFile()) {
			files.push(relative);
		}
	}
	return files;
}
