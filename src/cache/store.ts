import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { ensureWithinBase, sanitizePathSegment } from "../utils/path-safety.js";

export type CacheEntry = {
	key: string;
	/** Path of the stored archive. */
	archive: string;
	writtenAt: number;
};

/**
 * Key/archive storage behind the cache manager. `put` must publish atomically:
 * a reader sees either the previous archive or the complete new one.
 */
export interface CacheStore {
	get(key: string): Promise<string | undefined>;
	/** Most recently written entry whose key starts with `prefix`. */
	getPrefix(prefix: string): Promise<CacheEntry | undefined>;
	has(key: string): Promise<boolean>;
	/** Publishes a copy of the archive at `source` under `key`. */
	put(key: string, source: string): Promise<void>;
}

type EntryMeta = {
	key: string;
	writtenAt: number;
};

export class FsCacheStore implements CacheStore {
	private readonly entriesDir: string;
	private readonly stagingDir: string;

	constructor(private readonly baseDir: string) {
		this.entriesDir = path.join(baseDir, "entries");
		this.stagingDir = path.join(baseDir, "staging");
	}

	async get(key: string): Promise<string | undefined> {
		return (await this.has(key)) ? this.archivePath(key) : undefined;
	}

	async getPrefix(prefix: string): Promise<CacheEntry | undefined> {
		const candidates = (await this.listMeta())
			.filter((meta) => meta.key.startsWith(prefix))
			.sort((a, b) => b.writtenAt - a.writtenAt);

		for (const meta of candidates) {
			const archive = await this.get(meta.key);
			if (archive) {
				return { key: meta.key, archive, writtenAt: meta.writtenAt };
			}
		}
		return undefined;
	}

	async has(key: string): Promise<boolean> {
		try {
			await fs.promises.access(this.archivePath(key));
			return true;
		} catch {
			return false;
		}
	}

	async put(key: string, source: string): Promise<void> {
		await fs.promises.mkdir(this.entriesDir, { recursive: true });
		await fs.promises.mkdir(this.stagingDir, { recursive: true });

		const meta: EntryMeta = { key, writtenAt: Date.now() };
		await this.publish(this.archivePath(key), (staged) => fs.promises.copyFile(source, staged));
		await this.publish(this.metaPath(key), (staged) => fs.promises.writeFile(staged, JSON.stringify(meta)));
	}

	private async publish(finalPath: string, write: (staged: string) => Promise<void>): Promise<void> {
		const staged = ensureWithinBase(
			this.stagingDir,
			`${path.basename(finalPath)}.${crypto.randomBytes(6).toString("hex")}.tmp`,
			"cache staging file",
		);
		try {
			await write(staged);
			await fs.promises.rename(staged, finalPath);
		} catch (error) {
			await fs.promises.rm(staged, { force: true });
			throw error;
		}
	}

	private async listMeta(): Promise<EntryMeta[]> {
		let files: string[];
		try {
			files = await fs.promises.readdir(this.entriesDir);
		} catch (error) {
			if (isNotFound(error)) {
				return [];
			}
			throw error;
		}

		const metas: EntryMeta[] = [];
		for (const file of files.filter((name) => name.endsWith(".json"))) {
			try {
				const raw = await fs.promises.readFile(path.join(this.entriesDir, file), "utf-8");
				const parsed: unknown = JSON.parse(raw);
				if (isEntryMeta(parsed)) {
					metas.push(parsed);
				}
			} catch (error) {
				if (!isNotFound(error) && !(error instanceof SyntaxError)) {
					throw error;
				}
			}
		}
		return metas;
	}

	private archivePath(key: string): string {
		return ensureWithinBase(this.entriesDir, `${entryFileName(key)}.tar.gz`, "cache entry");
	}

	private metaPath(key: string): string {
		return ensureWithinBase(this.entriesDir, `${entryFileName(key)}.json`, "cache entry");
	}
}

export function entryFileName(key: string): string {
	const normalized = sanitizePathSegment(key, "entry");
	const hash = crypto.createHash("sha1").update(key).digest("hex").slice(0, 8);
	return `${normalized}-${hash}`;
}

function isEntryMeta(value: unknown): value is EntryMeta {
	if (typeof value !== "object" || value === null) {
		return false;
	}
	return (
		"key" in value &&
		typeof value.key === "string" &&
		"writtenAt" in value &&
		typeof value.writtenAt === "number"
	);
}

function isNotFound(error: unknown): boolean {
	return error instanceof Error && "code" in error && error.code === "ENOENT";
}
