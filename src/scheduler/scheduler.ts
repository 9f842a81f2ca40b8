import crypto from "node:crypto";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { UNCHANGED, type CacheHandle, type CacheManager } from "../cache/manager.js";
import { packSnapshot, unpackSnapshot } from "../cache/snapshot.js";
import type { EngineEventListener, EngineRuntimeEvent } from "../core/engine.js";
import {
	InvariantViolationError,
	JobTimeoutError,
	SupersededError,
	UnresolvedTargetError,
	describeError,
} from "../core/errors.js";
import type {
	ExecutorHandle,
	FailureKind,
	JobCacheSummary,
	JobOutcome,
	JobSpec,
	TriggerEvent,
} from "../core/types.js";
import type { JobExecutor } from "../executor/job-executor.js";
import type { Workspace, WorkspaceFactory } from "../executor/workspace.js";
import { ResultAggregator, type SealedRun } from "../report/aggregate.js";
import type { ToolchainResolver } from "../toolchain/resolver.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import { isWithin } from "../utils/path-safety.js";
import type { ConcurrencyLease, ConcurrencyRegistry } from "./concurrency.js";

export type SchedulerOptions = {
	registry: ConcurrencyRegistry;
	executor: JobExecutor;
	workspaces: WorkspaceFactory;
	/** Called once per run; toolchain memoization lives and dies with the run. */
	createResolver: (signal: AbortSignal) => ToolchainResolver;
	cache?: CacheManager;
	/** Extra attempts for jobs that fail in a step. Cancellations, timeouts and unresolved targets are final. */
	retries?: number;
	homeDir?: string;
	logger?: Logger;
	onEvent?: EngineEventListener;
};

export type ScheduleOptions = {
	concurrency: number;
	concurrencyGroup: string;
	trigger: TriggerEvent;
	runId?: string;
};

type RunContext = {
	runId: string;
	signal: AbortSignal;
	resolver: ToolchainResolver;
	/** Restores of roots outside a workspace, by restored key and root; each happens once per run. */
	sharedRestores: Map<string, Promise<void>>;
};

export class Scheduler {
	private readonly active = new Map<string, AbortController>();
	private readonly logger: Logger;
	private readonly retries: number;

	constructor(private readonly options: SchedulerOptions) {
		this.logger = options.logger ?? silentLogger;
		this.retries = options.retries ?? 0;
	}

	/**
	 * Runs every job to a terminal state under a pool of `concurrency` workers
	 * and returns the sealed run. A job's failure never stops its siblings; only
	 * supersession or `cancel` does.
	 */
	async run(jobs: readonly JobSpec[], options: ScheduleOptions): Promise<SealedRun> {
		if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
			throw new RangeError(`Concurrency must be a positive integer, got ${options.concurrency}`);
		}

		const runId = options.runId ?? createRunId();
		const controller = new AbortController();
		this.active.set(runId, controller);

		const aggregator = new ResultAggregator({
			id: runId,
			trigger: options.trigger,
			concurrencyGroup: options.concurrencyGroup,
			jobs,
		});

		let lease: ConcurrencyLease | undefined;
		try {
			lease = await this.options.registry.acquire(
				options.concurrencyGroup,
				{ runId, cancel: (reason) => controller.abort(reason) },
				{
					signal: controller.signal,
					onSupersede: (previous) => {
						this.logger.info(`superseding run ${previous} in group "${options.concurrencyGroup}"`);
						this.emit({
							type: "run-superseding",
							runId,
							supersededRunId: previous,
							concurrencyGroup: options.concurrencyGroup,
						});
					},
				},
			);
		} catch (error) {
			// Canceled while queued: the run still seals, with nothing started.
			if (!controller.signal.aborted) {
				this.active.delete(runId);
				throw error;
			}
		}

		try {
			this.emit({
				type: "run-started",
				runId,
				concurrencyGroup: options.concurrencyGroup,
				trigger: options.trigger,
				jobs: jobs.map((job) => ({ jobId: job.id, group: job.group, target: job.target })),
				createdAt: aggregator.snapshot().createdAt,
			});
			this.logger.debug(
				`run ${runId}: ${jobs.length} job(s), concurrency ${options.concurrency}`,
			);

			const context: RunContext = {
				runId,
				signal: controller.signal,
				resolver: this.options.createResolver(controller.signal),
				sharedRestores: new Map(),
			};
			const notStarted: string[] = [];
			let next = 0;

			const worker = async (): Promise<void> => {
				while (next < jobs.length) {
					const position = next;
					next += 1;
					const job = jobs[position];
					let outcome: JobOutcome;
					if (controller.signal.aborted) {
						outcome = canceledBeforeStart(job, controller.signal.reason);
						notStarted.push(job.id);
					} else {
						outcome = await this.runWithRetries(job, context);
						this.emit({ type: "job-finished", runId, outcome, finishedAt: new Date().toISOString() });
					}
					aggregator.record(position, outcome);
				}
			};

			const workers = Array.from({ length: Math.min(options.concurrency, jobs.length) }, () =>
				worker().catch((error: unknown) => {
					controller.abort(error);
					throw error;
				}),
			);
			const settled = await Promise.allSettled(workers);
			const crashed = settled.find((result) => result.status === "rejected");
			if (crashed && crashed.status === "rejected") {
				throw crashed.reason;
			}

			if (notStarted.length > 0) {
				this.emit({ type: "jobs-canceled", runId, jobIds: notStarted });
			}
			if (controller.signal.reason instanceof SupersededError) {
				aggregator.markSuperseded();
			}

			const sealed = aggregator.seal();
			this.emit({
				type: "run-finished",
				runId,
				verdict: sealed.verdict,
				superseded: sealed.superseded,
				finishedAt: sealed.finishedAt,
			});
			return sealed;
		} finally {
			lease?.release();
			this.active.delete(runId);
		}
	}

	/** Cancels one run, or every active run when `runId` is omitted. */
	cancel(runId?: string, reason: Error = new Error("Run canceled")): boolean {
		const targets = runId ? [this.active.get(runId)] : Array.from(this.active.values());
		let canceled = false;
		for (const controller of targets) {
			if (controller && !controller.signal.aborted) {
				controller.abort(reason);
				canceled = true;
			}
		}
		return canceled;
	}

	private async runWithRetries(job: JobSpec, context: RunContext): Promise<JobOutcome> {
		for (let attempt = 1; ; attempt += 1) {
			const outcome = await this.runJob(job, context, attempt);
			const retryable = outcome.status === "failed" && outcome.failure?.kind === "step-failure";
			if (!retryable || attempt > this.retries || context.signal.aborted) {
				return { ...outcome, attempts: attempt };
			}
			this.logger.warn(`${job.id} failed on attempt ${attempt}; retrying`);
		}
	}

	/**
	 * The job's timeout runs from here, so toolchain resolution, workspace
	 * setup and cache restore count against it as well as the steps.
	 */
	private async runJob(job: JobSpec, context: RunContext, attempt: number): Promise<JobOutcome> {
		const startedAt = Date.now();
		this.emit({
			type: "job-started",
			runId: context.runId,
			jobId: job.id,
			attempt,
			startedAt: new Date(startedAt).toISOString(),
		});

		const deadline = new JobDeadline(job, context.signal);
		try {
			let handle: ExecutorHandle;
			try {
				handle = await deadline.race(context.resolver.resolve(job.target, job.executor, job.platform));
			} catch (error) {
				rethrowInvariant(error);
				if (deadline.signal.aborted) {
					return interruptedBeforeSteps(job, startedAt, deadline.signal.reason);
				}
				const kind = error instanceof UnresolvedTargetError ? "unresolved-target" : "internal";
				this.logger.warn(`${job.id}: ${describeError(error)}`);
				return failedBeforeSteps(job, startedAt, kind, describeError(error));
			}

			let workspace: Workspace;
			try {
				workspace = await this.options.workspaces.create(context.runId, job.id);
			} catch (error) {
				rethrowInvariant(error);
				return failedBeforeSteps(job, startedAt, "internal", `workspace: ${describeError(error)}`);
			}

			try {
				const cacheHandle = await this.restoreCache(job, workspace, context);
				if (deadline.signal.aborted) {
					if (cacheHandle && this.options.cache) {
						await this.options.cache.release(cacheHandle, UNCHANGED);
					}
					return interruptedBeforeSteps(job, startedAt, deadline.signal.reason);
				}
				deadline.handOff();
				const outcome = await this.options.executor.execute(job, handle, cacheHandle, context.signal, {
					cwd: workspace.dir,
					startedAt,
					onStepStarted: (step) =>
						this.emit({
							type: "job-step",
							runId: context.runId,
							jobId: job.id,
							stepIndex: step.index,
							stepName: step.name,
						}),
					onOutput: (chunk, source, stepIndex) =>
						this.emit({ type: "job-output", runId: context.runId, jobId: job.id, stepIndex, source, chunk }),
				});
				const cache = cacheHandle ? await this.saveCache(job, cacheHandle, outcome, workspace) : undefined;
				return cache ? { ...outcome, cache } : outcome;
			} finally {
				await workspace.dispose().catch((error: unknown) => {
					this.logger.warn(`${job.id}: could not remove workspace: ${describeError(error)}`);
				});
			}
		} finally {
			deadline.handOff();
		}
	}

	/**
	 * Paths inside the workspace are restored for every job. Shared paths, such
	 * as a registry under the home directory, are restored by the first job of
	 * the run that restores a given key; later jobs wait for that restore.
	 */
	private async restoreCache(
		job: JobSpec,
		workspace: Workspace,
		context: RunContext,
	): Promise<CacheHandle | undefined> {
		if (!job.cache || !this.options.cache) {
			return undefined;
		}
		const handle = await this.options.cache.acquire(job.cache);
		if (!handle.archive) {
			return handle;
		}

		const pending: Promise<void>[] = [];
		let finished = (): void => {};
		const restored = new Promise<void>((resolve) => {
			finished = resolve;
		});
		const restoreRoot = (absoluteRoot: string): boolean => {
			if (isWithin(workspace.dir, absoluteRoot)) {
				return true;
			}
			const id = `${handle.restoredKey ?? handle.key}\0${absoluteRoot}`;
			const earlier = context.sharedRestores.get(id);
			if (earlier) {
				pending.push(earlier);
				return false;
			}
			context.sharedRestores.set(id, restored);
			return true;
		};

		try {
			const files = await unpackSnapshot(handle.archive, job.cache.paths, {
				...this.snapshotOptions(workspace),
				restoreRoot,
			});
			this.logger.debug(`${job.id}: restored ${files} cached file(s) from ${handle.restoredKey}`);
		} catch (error) {
			this.logger.warn(`${job.id}: cache restore from ${handle.restoredKey} failed: ${describeError(error)}`);
		} finally {
			finished();
		}
		await Promise.all(pending);
		return handle;
	}

	private async saveCache(
		job: JobSpec,
		handle: CacheHandle,
		outcome: JobOutcome,
		workspace: Workspace,
	): Promise<JobCacheSummary> {
		const summary = {
			key: handle.key,
			hit: handle.hit,
			...(handle.restoredKey ? { restoredKey: handle.restoredKey } : {}),
		};
		const manager = this.options.cache;
		if (!manager || !job.cache) {
			return { ...summary, saved: false };
		}
		if (outcome.status !== "success" || handle.hit === "exact") {
			await manager.release(handle, UNCHANGED);
			return { ...summary, saved: false };
		}

		let scratch: string | undefined;
		try {
			let archive: string;
			try {
				scratch = await fs.promises.mkdtemp(path.join(os.tmpdir(), "trellis-save-"));
				archive = path.join(scratch, "snapshot.tar.gz");
				await packSnapshot(job.cache.paths, archive, this.snapshotOptions(workspace));
			} catch (error) {
				this.logger.warn(`${job.id}: could not snapshot cache paths: ${describeError(error)}`);
				await manager.release(handle, UNCHANGED);
				return { ...summary, saved: false };
			}
			const result = await manager.release(handle, { file: archive });
			return { ...summary, saved: result === "committed" };
		} finally {
			if (scratch) {
				await fs.promises.rm(scratch, { recursive: true, force: true });
			}
		}
	}

	private snapshotOptions(workspace: Workspace): { baseDir: string; homeDir: string } {
		return { baseDir: workspace.dir, homeDir: this.options.homeDir ?? os.homedir() };
	}

	private emit(event: EngineRuntimeEvent): void {
		this.options.onEvent?.(event);
	}
}

export function createRunId(now = new Date()): string {
	const stamp = now.toISOString().replace(/[-:]/g, "").split(".")[0];
	const random = crypto.randomBytes(3).toString("hex");
	return `${stamp}-${random}`;
}

function canceledBeforeStart(job: JobSpec, reason: unknown): JobOutcome {
	return {
		jobId: job.id,
		group: job.group,
		target: job.target,
		status: "canceled",
		failure: { kind: "canceled", message: `Not started: ${describeError(reason)}` },
		steps: [],
		durationMs: 0,
		attempts: 0,
	};
}

function failedBeforeSteps(
	job: JobSpec,
	startedAt: number,
	kind: Extract<FailureKind, "unresolved-target" | "internal" | "canceled" | "timed-out">,
	message: string,
): JobOutcome {
	return {
		jobId: job.id,
		group: job.group,
		target: job.target,
		status: kind === "canceled" ? "canceled" : kind === "timed-out" ? "timed-out" : "failed",
		failure: { kind, message },
		steps: [],
		durationMs: Date.now() - startedAt,
		attempts: 1,
	};
}

function interruptedBeforeSteps(job: JobSpec, startedAt: number, reason: unknown): JobOutcome {
	const kind = reason instanceof JobTimeoutError ? "timed-out" : "canceled";
	return failedBeforeSteps(job, startedAt, kind, describeError(reason));
}

/**
 * Aborts with `JobTimeoutError` once the job's budget is spent, or with the
 * run's reason when the run is canceled. `handOff` stops the timer when the
 * executor takes over the same deadline.
 */
class JobDeadline {
	private readonly controller = new AbortController();
	private readonly timer: NodeJS.Timeout | undefined;
	private readonly forward = (): void => this.controller.abort(this.runSignal.reason);

	constructor(
		job: JobSpec,
		private readonly runSignal: AbortSignal,
	) {
		if (runSignal.aborted) {
			this.forward();
		} else {
			runSignal.addEventListener("abort", this.forward, { once: true });
		}
		const { timeoutMs } = job;
		this.timer =
			timeoutMs === undefined
				? undefined
				: setTimeout(() => this.controller.abort(new JobTimeoutError(job.id, timeoutMs)), timeoutMs);
	}

	get signal(): AbortSignal {
		return this.controller.signal;
	}

	/** Settles like `work`, or rejects with the abort reason if that comes first. */
	async race<T>(work: Promise<T>): Promise<T> {
		const { signal } = this.controller;
		let onAbort = (): void => {};
		const aborted = new Promise<never>((_, reject) => {
			onAbort = () => reject(signal.reason);
			if (signal.aborted) {
				onAbort();
			} else {
				signal.addEventListener("abort", onAbort, { once: true });
			}
		});
		try {
			return await Promise.race([work, aborted]);
		} finally {
			signal.removeEventListener("abort", onAbort);
		}
	}

	handOff(): void {
		clearTimeout(this.timer);
		this.runSignal.removeEventListener("abort", this.forward);
	}
}

function rethrowInvariant(error: unknown): void {
	if (error instanceof InvariantViolationError) {
		throw error;
	}
}
