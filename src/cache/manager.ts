import { CacheWriteError, describeError } from "../core/errors.js";
import type { CacheHitKind, CacheKeyInputs } from "../core/types.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import { deriveCacheKey } from "./key.js";
import type { CacheStore } from "./store.js";

export type CacheHandle = {
	readonly key: string;
	readonly inputs: CacheKeyInputs;
	readonly hit: CacheHitKind;
	readonly restoredKey?: string;
	/** Archive to restore from, present on a hit. */
	readonly archive?: string;
};

/** A freshly packed archive offered for the handle's key. */
export type CacheArchive = { file: string };

export type CacheReleaseResult = "committed" | "skipped" | "failed";

export type CacheStats = {
	exactHits: number;
	prefixHits: number;
	misses: number;
	commits: number;
	skipped: number;
	failures: number;
};

export const UNCHANGED = "unchanged";

/**
 * Restores by exact key, then by the longest matching restore prefix. Saves
 * follow a single-writer rule per key: an exact hit, a key another job already
 * claimed, or a key already in the store is never rewritten.
 */
export class CacheManager {
	private readonly claimed = new Set<string>();
	private readonly counters: CacheStats = {
		exactHits: 0,
		prefixHits: 0,
		misses: 0,
		commits: 0,
		skipped: 0,
		failures: 0,
	};

	constructor(
		private readonly store: CacheStore,
		private readonly logger: Logger = silentLogger,
	) {}

	async acquire(inputs: CacheKeyInputs): Promise<CacheHandle> {
		const key = deriveCacheKey(inputs.namespace, inputs.lockFingerprint);

		const exact = await this.read(() => this.store.get(key), key);
		if (exact) {
			this.counters.exactHits += 1;
			this.logger.debug(`cache hit ${key}`);
			return { key, inputs, hit: "exact", restoredKey: key, archive: exact };
		}

		for (const prefix of restorePrefixes(inputs)) {
			const entry = await this.read(() => this.store.getPrefix(prefix), prefix);
			if (entry) {
				this.counters.prefixHits += 1;
				this.logger.debug(`cache restored ${entry.key} for ${key} (prefix "${prefix}")`);
				return { key, inputs, hit: "prefix", restoredKey: entry.key, archive: entry.archive };
			}
		}

		this.counters.misses += 1;
		this.logger.debug(`cache miss ${key}`);
		return { key, inputs, hit: "miss" };
	}

	async release(handle: CacheHandle, next: CacheArchive | typeof UNCHANGED): Promise<CacheReleaseResult> {
		if (next === UNCHANGED || handle.hit === "exact" || this.claimed.has(handle.key)) {
			this.counters.skipped += 1;
			return "skipped";
		}
		this.claimed.add(handle.key);

		try {
			if (await this.store.has(handle.key)) {
				this.counters.skipped += 1;
				return "skipped";
			}
			await this.store.put(handle.key, next.file);
		} catch (error) {
			this.counters.failures += 1;
			this.logger.warn(new CacheWriteError(handle.key, error).message);
			return "failed";
		}

		this.counters.commits += 1;
		this.logger.debug(`cache saved ${handle.key}`);
		return "committed";
	}

	stats(): CacheStats {
		return { ...this.counters };
	}

	private async read<T>(load: () => Promise<T | undefined>, label: string): Promise<T | undefined> {
		try {
			return await load();
		} catch (error) {
			this.logger.warn(`cache read for ${label} failed: ${describeError(error)}`);
			return undefined;
		}
	}
}

/** Candidate prefixes, longest first, namespace included. */
export function restorePrefixes(inputs: CacheKeyInputs): string[] {
	const unique = Array.from(new Set([inputs.namespace, ...inputs.restorePrefixes])).filter(
		(prefix) => prefix.length > 0,
	);
	return unique.sort((a, b) => b.length - a.length);
}
