import type { ExecutorKind } from "./types.js";

export class UnresolvedTargetError extends Error {
	readonly kind = "unresolved-target";

	constructor(
		readonly target: string,
		readonly executor: ExecutorKind,
		reason: string,
	) {
		super(`Cannot resolve ${executor} toolchain for "${target}": ${reason}`);
		this.name = "UnresolvedTargetError";
	}
}

export class SupersededError extends Error {
	constructor(
		readonly runId: string,
		readonly supersededBy: string,
	) {
		super(`Run ${runId} superseded by ${supersededBy}`);
		this.name = "SupersededError";
	}
}

export class JobTimeoutError extends Error {
	constructor(
		readonly jobId: string,
		readonly timeoutMs: number,
	) {
		super(`Job ${jobId} exceeded its ${timeoutMs}ms budget`);
		this.name = "JobTimeoutError";
	}
}

export class CacheWriteError extends Error {
	constructor(
		readonly key: string,
		cause: unknown,
	) {
		super(`Failed to save cache entry ${key}: ${describeError(cause)}`);
		this.name = "CacheWriteError";
	}
}

/**
 * Raised when engine bookkeeping breaks (illegal executor transition, a job
 * outcome recorded twice, a sealed run mutated). The only error that aborts a
 * whole run.
 */
export class InvariantViolationError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "InvariantViolationError";
	}
}

export class ConfigError extends Error {
	constructor(
		readonly source: string,
		message: string,
	) {
		super(`${source}: ${message}`);
		this.name = "ConfigError";
	}
}

export function describeError(error: unknown): string {
	if (error instanceof Error) {
		return error.message;
	}
	return String(error);
}
