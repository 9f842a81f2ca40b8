import os from "node:os";
import path from "node:path";

export function ensureWithinBase(baseDir: string, childPath: string, label: string): string {
	const base = path.resolve(baseDir);
	const resolved = path.resolve(base, childPath);
	if (!isWithin(base, resolved)) {
		throw new Error(`Invalid ${label}: ${childPath} escapes ${base}`);
	}
	return resolved;
}

export function isWithin(baseDir: string, candidate: string): boolean {
	const rel = path.relative(path.resolve(baseDir), path.resolve(candidate));
	return !(rel === ".." || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel));
}

export function sanitizePathSegment(value: string, fallback: string): string {
	const normalized = value
		.trim()
		.replace(/[\\/]+/g, "-")
		.replace(/[^a-zA-Z0-9._-]+/g, "-")
		.replace(/^[-.]+|-+$/g, "")
		.slice(0, 64);
	return normalized.length > 0 ? normalized : fallback;
}

/** `~` and `~/x` resolve against the home directory, other relative paths against `baseDir`. */
export function resolveUserPath(baseDir: string, value: string, homeDir = os.homedir()): string {
	if (value === "~") {
		return homeDir;
	}
	if (value.startsWith("~/")) {
		return path.join(homeDir, value.slice(2));
	}
	return path.resolve(baseDir, value);
}
