import crypto from "node:crypto";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { create, extract } from "tar";
import { ensureWithinBase, resolveUserPath } from "../utils/path-safety.js";

const SNAPSHOT_VERSION = 2;
const MANIFEST_NAME = "manifest.json";

type RootKind = "file" | "dir" | "missing";

type SnapshotRoot = {
	path: string;
	kind: RootKind;
};

type Manifest = {
	version: number;
	roots: SnapshotRoot[];
};

export type SnapshotOptions = {
	/** Where relative cache paths resolve; usually the job workspace. */
	baseDir: string;
	homeDir?: string;
	/** Parent of the scratch directories used while packing or restoring. */
	tempDir?: string;
};

export type RestoreOptions = SnapshotOptions & {
	/** Called once per restorable root with its absolute path; `false` leaves it alone. */
	restoreRoot?: (absoluteRoot: string) => boolean;
};

/**
 * Streams every file under the cache paths into a gzip'd tar archive at
 * `archiveFile`. Each root lands under its own directory in the archive next to
 * a manifest; missing paths are recorded so a first run with an empty registry
 * still produces an entry.
 */
export async function packSnapshot(
	paths: readonly string[],
	archiveFile: string,
	options: SnapshotOptions,
): Promise<void> {
	const workDir = await fs.promises.mkdtemp(path.join(options.tempDir ?? os.tmpdir(), "trellis-pack-"));
	try {
		const roots: SnapshotRoot[] = [];
		const members = [MANIFEST_NAME];
		for (const [index, entry] of paths.entries()) {
			const absolute = resolveUserPath(options.baseDir, entry, options.homeDir);
			const kind = await rootKind(absolute);
			roots.push({ path: entry, kind });
			if (kind === "missing") {
				continue;
			}

			const names = kind === "file" ? [path.basename(absolute)] : (await fs.promises.readdir(absolute)).sort();
			if (names.length === 0) {
				continue;
			}
			const part = `${rootDirName(index)}.tar`;
			await create(
				{
					file: path.join(workDir, part),
					cwd: kind === "file" ? path.dirname(absolute) : absolute,
					prefix: rootDirName(index),
					portable: true,
					filter: (_entryPath, stat) => !(stat instanceof fs.Stats) || stat.isFile() || stat.isDirectory(),
				},
				names,
			);
			members.push(`@${part}`);
		}

		const manifest: Manifest = { version: SNAPSHOT_VERSION, roots };
		await fs.promises.writeFile(path.join(workDir, MANIFEST_NAME), JSON.stringify(manifest));
		await create({ file: archiveFile, cwd: workDir, gzip: true, portable: true }, members);
	} finally {
		await fs.promises.rm(workDir, { recursive: true, force: true });
	}
}

/**
 * Restores an archive produced by `packSnapshot`; returns the number of files
 * written. Roots the restoring job does not declare at the same position are
 * skipped. Each file is staged beside its destination and renamed into place,
 * so a concurrent reader sees the old file or the new one, never a partial one.
 */
export async function unpackSnapshot(
	archiveFile: string,
	paths: readonly string[],
	options: RestoreOptions,
): Promise<number> {
	const staging = await fs.promises.mkdtemp(path.join(options.tempDir ?? os.tmpdir(), "trellis-restore-"));
	try {
		await extract({ file: archiveFile, cwd: staging });
		const manifest = await readManifest(path.join(staging, MANIFEST_NAME));

		let written = 0;
		for (const [index, entry] of paths.entries()) {
			const root = manifest.roots[index];
			if (!root || root.path !== entry || root.kind === "missing") {
				continue;
			}
			const absoluteRoot = resolveUserPath(options.baseDir, entry, options.homeDir);
			if (options.restoreRoot && !options.restoreRoot(absoluteRoot)) {
				continue;
			}

			const source = path.join(staging, rootDirName(index));
			if (root.kind === "file") {
				const packed = path.join(source, path.basename(absoluteRoot));
				if (await exists(packed)) {
					await placeFile(packed, absoluteRoot);
					written += 1;
				}
				continue;
			}

			await fs.promises.mkdir(absoluteRoot, { recursive: true });
			for (const relative of await listFiles(source)) {
				await placeFile(path.join(source, relative), ensureWithinBase(absoluteRoot, relative, "cached file"));
				written += 1;
			}
		}
		return written;
	} finally {
		await fs.promises.rm(staging, { recursive: true, force: true });
	}
}

function rootDirName(index: number): string {
	return `root-${index}`;
}

async function placeFile(source: string, destination: string): Promise<void> {
	await fs.promises.mkdir(path.dirname(destination), { recursive: true });
	const staged = `${destination}.${crypto.randomBytes(6).toString("hex")}.tmp`;
	try {
		await fs.promises.copyFile(source, staged);
		const stat = await fs.promises.stat(source);
		await fs.promises.utimes(staged, stat.atime, stat.mtime);
		await fs.promises.rename(staged, destination);
	} catch (error) {
		await fs.promises.rm(staged, { force: true });
		throw error;
	}
}

async function readManifest(file: string): Promise<Manifest> {
	let parsed: unknown;
	try {
		parsed = JSON.parse(await fs.promises.readFile(file, "utf-8"));
	} catch {
		throw new Error("Unrecognized cache snapshot format");
	}
	if (
		typeof parsed !== "object" ||
		parsed === null ||
		!("version" in parsed) ||
		parsed.version !== SNAPSHOT_VERSION ||
		!("roots" in parsed) ||
		!Array.isArray(parsed.roots) ||
		!parsed.roots.every(isSnapshotRoot)
	) {
		throw new Error("Unrecognized cache snapshot format");
	}
	return { version: SNAPSHOT_VERSION, roots: parsed.roots };
}

function isSnapshotRoot(value: unknown): value is SnapshotRoot {
	return (
		typeof value === "object" &&
		value !== null &&
		"path" in value &&
		typeof value.path === "string" &&
		"kind" in value &&
		(value.kind === "file" || value.kind === "dir" || value.kind === "missing")
	);
}

async function rootKind(absolute: string): Promise<RootKind> {
	try {
		const stat = await fs.promises.stat(absolute);
		if (stat.isFile()) {
			return "file";
		}
		return stat.isDirectory() ? "dir" : "missing";
	} catch (error) {
		if (error instanceof Error && "code" in error && error.code === "ENOENT") {
			return "missing";
		}
		throw error;
	}
}

async function exists(file: string): Promise<boolean> {
	try {
		await fs.promises.access(file);
		return true;
	} catch {
		return false;
	}
}

async function listFiles(dir: string, relativeDir = ""): Promise<string[]> {
	let entries: fs.Dirent[];
	try {
		entries = await fs.promises.readdir(path.join(dir, relativeDir), { withFileTypes: true });
	} catch (error) {
		if (error instanceof Error && "code" in error && error.code === "ENOENT") {
			return [];
		}
		throw error;
	}
	const files: string[] = [];
	for (const entry of entries) {
		const relative = relativeDir ? path.join(relativeDir, entry.name) : entry.name;
		if (entry.isDirectory()) {
			files.push(...(await listFiles(dir, relative)));
		} else if (entry.isFile()) {
			files.push(relative);
		}
	}
	return files.sort();
}
