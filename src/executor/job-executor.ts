import path from "node:path";
import { interpolate } from "../core/expand.js";
import { JobTimeoutError } from "../core/errors.js";
import type {
	ExecutorHandle,
	FailureKind,
	JobOutcome,
	JobSpec,
	JobStatus,
	JobStep,
	StepRecord,
	StepStatus,
} from "../core/types.js";
import type { CacheHandle } from "../cache/manager.js";
import { formatCommandLine } from "../utils/command-line.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import type { OutputSource, ProcessResult, ProcessRunner } from "./process.js";
import { JobStateMachine } from "./state.js";

export type ExecutionContext = {
	cwd: string;
	/** When the job's wall-clock budget began; defaults to the call to `execute`. */
	startedAt?: number;
	onOutput?: (chunk: string, source: OutputSource, stepIndex: number) => void;
	onStepStarted?: (step: JobStep) => void;
};

export type JobExecutorOptions = {
	runner: ProcessRunner;
	logger?: Logger;
	baseEnv?: NodeJS.ProcessEnv;
};

type Termination = { status: JobStatus; kind: FailureKind; message: string };

/**
 * Runs one job's steps in order and stops at the first failing step. Retries
 * are the scheduler's business; the executor is a plain state machine.
 */
export class JobExecutor {
	private readonly runner: ProcessRunner;
	private readonly logger: Logger;
	private readonly baseEnv: NodeJS.ProcessEnv;

	constructor(options: JobExecutorOptions) {
		this.runner = options.runner;
		this.logger = options.logger ?? silentLogger;
		this.baseEnv = options.baseEnv ?? process.env;
	}

	async execute(
		job: JobSpec,
		handle: ExecutorHandle,
		cache: CacheHandle | undefined,
		signal: AbortSignal | undefined,
		context: ExecutionContext,
	): Promise<JobOutcome> {
		const startedAt = context.startedAt ?? Date.now();
		const machine = new JobStateMachine(job.id);
		const records: StepRecord[] = [];
		const controller = new AbortController();
		const forwardAbort = (): void => controller.abort(signal?.reason);
		let timer: NodeJS.Timeout | undefined;
		let termination: Termination | undefined;

		if (signal?.aborted) {
			forwardAbort();
		} else {
			signal?.addEventListener("abort", forwardAbort, { once: true });
		}
		if (job.timeoutMs !== undefined && !controller.signal.aborted) {
			const timeoutMs = job.timeoutMs;
			const remaining = startedAt + timeoutMs - Date.now();
			if (remaining <= 0) {
				controller.abort(new JobTimeoutError(job.id, timeoutMs));
			} else {
				timer = setTimeout(() => controller.abort(new JobTimeoutError(job.id, timeoutMs)), remaining);
			}
		}

		try {
			for (const step of job.steps) {
				if (controller.signal.aborted) {
					break;
				}
				machine.startStep(step.index);
				context.onStepStarted?.(step);

				const stepStartedAt = Date.now();
				const command = interpolate(step.command, { toolchain: handle.program });
				const args = step.args.map((arg) => interpolate(arg, { toolchain: handle.program }));
				this.logger.debug(`${job.id} step ${step.index} $ ${formatCommandLine(command, args)}`);

				const result = await this.runner.run({
					command,
					args,
					cwd: context.cwd,
					env: this.buildEnv(job, step, handle, cache),
					signal: controller.signal,
					onOutput: (chunk, source) => context.onOutput?.(chunk, source, step.index),
				});
				const durationMs = Date.now() - stepStartedAt;

				if (result.aborted) {
					const aborted = abortTermination(controller.signal.reason);
					records.push(toStepRecord(step, aborted.status, result, durationMs));
					break;
				}
				if (result.exitCode !== 0) {
					records.push(toStepRecord(step, "failed", result, durationMs));
					machine.fail(step.index);
					termination = {
						status: "failed",
						kind: "step-failure",
						message: describeStepFailure(step, result),
					};
					break;
				}
				records.push(toStepRecord(step, "success", result, durationMs));
			}
		} finally {
			if (timer) {
				clearTimeout(timer);
			}
			signal?.removeEventListener("abort", forwardAbort);
		}

		if (!machine.isTerminal()) {
			if (records.length === job.steps.length && records.every((record) => record.status === "success")) {
				machine.succeed();
			} else {
				termination = abortTermination(controller.signal.reason);
				if (termination.status === "timed-out") {
					machine.timeOut();
				} else {
					machine.cancel();
				}
			}
		}

		const state = machine.state;
		return {
			jobId: job.id,
			group: job.group,
			target: job.target,
			status: termination?.status ?? "success",
			...(state.phase === "failed" ? { failingStep: state.stepIndex } : {}),
			...(termination ? { failure: { kind: termination.kind, message: termination.message } } : {}),
			steps: records,
			durationMs: Date.now() - startedAt,
			attempts: 1,
		};
	}

	private buildEnv(
		job: JobSpec,
		step: JobStep,
		handle: ExecutorHandle,
		cache: CacheHandle | undefined,
	): NodeJS.ProcessEnv {
		const basePath = this.baseEnv.PATH ?? "";
		return {
			...this.baseEnv,
			...job.env,
			...handle.env,
			...step.env,
			PATH: [...handle.pathEntries, basePath].filter(Boolean).join(path.delimiter),
			TRELLIS_JOB: job.id,
			TRELLIS_GROUP: job.group,
			TRELLIS_TARGET: job.target,
			TRELLIS_EXECUTOR: job.executor,
			...(cache
				? { TRELLIS_CACHE_KEY: cache.key, TRELLIS_CACHE_HIT: String(cache.hit === "exact") }
				: {}),
		};
	}
}

function abortTermination(reason: unknown): Termination {
	if (reason instanceof JobTimeoutError) {
		return { status: "timed-out", kind: "timed-out", message: reason.message };
	}
	const message = reason instanceof Error ? reason.message : "Job canceled";
	return { status: "canceled", kind: "canceled", message };
}

function toStepRecord(
	step: JobStep,
	status: StepStatus,
	result: ProcessResult,
	durationMs: number,
): StepRecord {
	return {
		index: step.index,
		name: step.name,
		status,
		exitCode: result.exitCode,
		signal: result.signal,
		output: result.error ? `${result.output}${result.error}\n` : result.output,
		durationMs,
	};
}

function describeStepFailure(step: JobStep, result: ProcessResult): string {
	const label = `Step ${step.index + 1} (${step.name})`;
	if (result.error) {
		return `${label} could not start: ${result.error}`;
	}
	if (result.signal) {
		return `${label} terminated by ${result.signal}`;
	}
	return `${label} exited with code ${result.exitCode}`;
}
