import type { OutputSource } from "../executor/process.js";
import type { JobOutcome, TriggerEvent, Verdict } from "./types.js";

export type EngineRuntimeEvent =
	| {
			type: "run-started";
			runId: string;
			concurrencyGroup: string;
			trigger: TriggerEvent;
			jobs: { jobId: string; group: string; target: string }[];
			createdAt: string;
	  }
	| {
			type: "run-superseding";
			runId: string;
			supersededRunId: string;
			concurrencyGroup: string;
	  }
	| {
			type: "job-started";
			runId: string;
			jobId: string;
			attempt: number;
			startedAt: string;
	  }
	| {
			type: "job-step";
			runId: string;
			jobId: string;
			stepIndex: number;
			stepName: string;
	  }
	| {
			type: "job-output";
			runId: string;
			jobId: string;
			stepIndex: number;
			source: OutputSource;
			chunk: string;
	  }
	| {
			type: "job-finished";
			runId: string;
			outcome: JobOutcome;
			finishedAt: string;
	  }
	| {
			type: "jobs-canceled";
			runId: string;
			jobIds: string[];
	  }
	| {
			type: "run-finished";
			runId: string;
			verdict: Verdict;
			superseded: boolean;
			finishedAt: string;
	  };

export type EngineEventListener = (event: EngineRuntimeEvent) => void;
