import type { EngineRuntimeEvent } from "../../core/engine.js";
import type { JobSpec, RunStatus, Verdict } from "../../core/types.js";

export const MAX_OUTPUT_CHARS = 16_000;

export type JobRow = {
	jobId: string;
	group: string;
	target: string;
	status: RunStatus;
	attempt: number;
	stepIndex?: number;
	stepName?: string;
	startedAt?: number;
	durationMs?: number;
	message?: string;
	output: string;
};

export type RunViewState = {
	runId?: string;
	concurrencyGroup?: string;
	supersededRunId?: string;
	jobs: JobRow[];
	verdict?: Verdict;
	superseded: boolean;
};

export function createRunViewState(jobs: readonly JobSpec[]): RunViewState {
	return {
		jobs: jobs.map((job) => ({
			jobId: job.id,
			group: job.group,
			target: job.target,
			status: "pending",
			attempt: 0,
			output: "",
		})),
		superseded: false,
	};
}

export function applyEvent(state: RunViewState, event: EngineRuntimeEvent): RunViewState {
	switch (event.type) {
		case "run-started":
			return { ...state, runId: event.runId, concurrencyGroup: event.concurrencyGroup };
		case "run-superseding":
			return { ...state, supersededRunId: event.supersededRunId };
		case "job-started":
			return updateJob(state, event.jobId, () => ({
				status: "running",
				attempt: event.attempt,
				startedAt: Date.parse(event.startedAt),
				stepIndex: undefined,
				stepName: undefined,
				output: "",
			}));
		case "job-step":
			return updateJob(state, event.jobId, () => ({
				stepIndex: event.stepIndex,
				stepName: event.stepName,
			}));
		case "job-output":
			return updateJob(state, event.jobId, (job) => ({
				output: (job.output + event.chunk).slice(-MAX_OUTPUT_CHARS),
			}));
		case "job-finished":
			return updateJob(state, event.outcome.jobId, () => ({
				status: event.outcome.status,
				attempt: event.outcome.attempts,
				durationMs: event.outcome.durationMs,
				...(event.outcome.failure ? { message: event.outcome.failure.message } : {}),
			}));
		case "jobs-canceled": {
			const canceled = new Set(event.jobIds);
			return {
				...state,
				jobs: state.jobs.map((job) =>
					canceled.has(job.jobId) ? { ...job, status: "canceled", message: "not started" } : job,
				),
			};
		}
		case "run-finished":
			return { ...state, verdict: event.verdict, superseded: event.superseded };
	}
}

export function countByStatus(jobs: readonly JobRow[]): Record<RunStatus, number> {
	const counts: Record<RunStatus, number> = {
		pending: 0,
		running: 0,
		success: 0,
		failed: 0,
		canceled: 0,
		"timed-out": 0,
	};
	for (const job of jobs) {
		counts[job.status] += 1;
	}
	return counts;
}

function updateJob(
	state: RunViewState,
	jobId: string,
	update: (job: JobRow) => Partial<JobRow>,
): RunViewState {
	return {
		...state,
		jobs: state.jobs.map((job) => (job.jobId === jobId ? { ...job, ...update(job) } : job)),
	};
}
