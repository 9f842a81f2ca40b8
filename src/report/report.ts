import type {
	ExecutionRun,
	FailureEntry,
	JobCacheSummary,
	JobStatus,
	TriggerEvent,
} from "../core/types.js";
import { aggregate } from "./aggregate.js";

export const REPORT_SCHEMA_VERSION = 1;

export type JobReport = {
	jobId: string;
	group: string;
	target: string;
	status: JobStatus;
	failingStep?: { index: number; name: string };
	durationMs: number;
	attempts: number;
	cache?: JobCacheSummary;
};

export type RunReport = {
	schemaVersion: number;
	runId: string;
	trigger: TriggerEvent;
	concurrencyGroup: string;
	verdict: "pass" | "fail";
	superseded: boolean;
	createdAt: string;
	finishedAt?: string;
	durationMs?: number;
	totals: { jobs: number; passed: number; failed: number };
	jobs: JobReport[];
	failures: FailureEntry[];
};

export function buildReport(run: ExecutionRun): RunReport {
	const verdict = run.verdict ?? aggregate(run.outcomes);
	const durationMs = run.finishedAt
		? new Date(run.finishedAt).getTime() - new Date(run.createdAt).getTime()
		: undefined;

	return {
		schemaVersion: REPORT_SCHEMA_VERSION,
		runId: run.id,
		trigger: run.trigger,
		concurrencyGroup: run.concurrencyGroup,
		verdict: verdict.verdict,
		superseded: run.superseded,
		createdAt: run.createdAt,
		...(run.finishedAt ? { finishedAt: run.finishedAt } : {}),
		...(durationMs !== undefined ? { durationMs } : {}),
		totals: {
			jobs: verdict.total,
			passed: verdict.passed,
			failed: verdict.failures.length,
		},
		jobs: run.outcomes.map((outcome) => {
			const failing = verdict.failures.find((entry) => entry.jobId === outcome.jobId)?.failingStep;
			return {
				jobId: outcome.jobId,
				group: outcome.group,
				target: outcome.target,
				status: outcome.status,
				...(failing ? { failingStep: failing } : {}),
				durationMs: outcome.durationMs,
				attempts: outcome.attempts,
				...(outcome.cache ? { cache: outcome.cache } : {}),
			};
		}),
		failures: verdict.failures,
	};
}
