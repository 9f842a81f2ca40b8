import { InvariantViolationError } from "../core/errors.js";
import type {
	ExecutionRun,
	FailureEntry,
	JobOutcome,
	JobSpec,
	TriggerEvent,
	Verdict,
} from "../core/types.js";

/** `pass` only when every outcome is `success`; every non-success is listed. */
export function aggregate(outcomes: readonly JobOutcome[]): Verdict {
	const failures: FailureEntry[] = [];
	for (const outcome of outcomes) {
		if (outcome.status === "success") {
			continue;
		}
		const failedStep =
			outcome.failingStep === undefined
				? undefined
				: outcome.steps.find((step) => step.index === outcome.failingStep);
		failures.push({
			jobId: outcome.jobId,
			group: outcome.group,
			target: outcome.target,
			status: outcome.status,
			kind: outcome.failure?.kind ?? defaultKind(outcome.status),
			...(outcome.failingStep !== undefined
				? { failingStep: { index: outcome.failingStep, name: failedStep?.name ?? "" } }
				: {}),
			message: outcome.failure?.message ?? outcome.status,
		});
	}

	return {
		verdict: failures.length === 0 ? "pass" : "fail",
		total: outcomes.length,
		passed: outcomes.length - failures.length,
		failures,
	};
}

export type SealedRun = ExecutionRun & {
	state: "sealed";
	verdict: Verdict;
	finishedAt: string;
};

export type RunInit = {
	id: string;
	trigger: TriggerEvent;
	concurrencyGroup: string;
	jobs: readonly JobSpec[];
	createdAt?: string;
};

/**
 * Owns the execution run record. Outcomes land in job order whatever order
 * the jobs finish in; `seal` computes the verdict exactly once.
 */
export class ResultAggregator {
	private readonly run: ExecutionRun;
	private readonly slots: (JobOutcome | undefined)[];
	private readonly jobs: readonly JobSpec[];

	constructor(init: RunInit) {
		this.jobs = init.jobs;
		this.slots = init.jobs.map(() => undefined);
		this.run = {
			id: init.id,
			trigger: init.trigger,
			concurrencyGroup: init.concurrencyGroup,
			createdAt: init.createdAt ?? new Date().toISOString(),
			state: "running",
			superseded: false,
			outcomes: [],
		};
	}

	record(position: number, outcome: JobOutcome): void {
		this.ensureOpen(`record ${outcome.jobId}`);
		const job = this.jobs[position];
		if (!job || job.id !== outcome.jobId) {
			throw new InvariantViolationError(`Run ${this.run.id}: no job ${outcome.jobId} at position ${position}`);
		}
		if (this.slots[position]) {
			throw new InvariantViolationError(`Run ${this.run.id}: outcome for ${outcome.jobId} recorded twice`);
		}
		this.slots[position] = Object.freeze(outcome);
		this.run.outcomes = this.slots.filter((slot): slot is JobOutcome => slot !== undefined);
	}

	markSuperseded(): void {
		this.ensureOpen("mark superseded");
		this.run.superseded = true;
	}

	pending(): JobSpec[] {
		return this.jobs.filter((_, position) => this.slots[position] === undefined);
	}

	seal(): SealedRun {
		this.ensureOpen("seal");
		const missing = this.pending();
		if (missing.length > 0) {
			throw new InvariantViolationError(
				`Run ${this.run.id}: sealing with ${missing.length} job(s) lacking an outcome`,
			);
		}
		const verdict = aggregate(this.run.outcomes);
		const finishedAt = new Date().toISOString();
		this.run.verdict = verdict;
		this.run.state = "sealed";
		this.run.finishedAt = finishedAt;
		return { ...this.snapshot(), state: "sealed", verdict, finishedAt };
	}

	snapshot(): ExecutionRun {
		return { ...this.run, outcomes: [...this.run.outcomes] };
	}

	private ensureOpen(action: string): void {
		if (this.run.state === "sealed") {
			throw new InvariantViolationError(`Run ${this.run.id}: cannot ${action} after sealing`);
		}
	}
}

function defaultKind(status: JobOutcome["status"]): FailureEntry["kind"] {
	switch (status) {
		case "timed-out":
			return "timed-out";
		case "canceled":
			return "canceled";
		default:
			return "step-failure";
	}
}
