export type ExecutorKind = "native" | "cross";

export type TriggerEvent = "push" | "pull_request";

export type TriggerSpec = {
	push?: { branches: string[] };
	pullRequest: boolean;
};

export type StepTemplate = {
	name: string;
	command: string;
	args: string[];
	env?: Record<string, string>;
};

export type TargetEntry = {
	id: string;
	vars?: Record<string, string>;
	env?: Record<string, string>;
	timeoutMs?: number;
	/** Host platform the job must run on, as `process.platform` names it. */
	platform?: string;
};

export type CacheSpec = {
	namespace: string;
	paths: string[];
	lockFiles: string[];
	restorePrefixes: string[];
};

export type TargetGroup = {
	name: string;
	executor: ExecutorKind;
	targets: TargetEntry[];
	steps: StepTemplate[];
	env?: Record<string, string>;
	timeoutMs?: number;
	cache?: CacheSpec;
};

export type MatrixSpecification = {
	name: string;
	path?: string;
	concurrencyGroup?: string;
	triggers: TriggerSpec;
	cache?: CacheSpec;
	groups: TargetGroup[];
};

export type JobStep = {
	readonly index: number;
	readonly name: string;
	readonly command: string;
	readonly args: readonly string[];
	readonly env: Readonly<Record<string, string>>;
};

export type CacheKeyInputs = {
	readonly namespace: string;
	readonly lockFingerprint: string;
	readonly paths: readonly string[];
	readonly restorePrefixes: readonly string[];
};

export type JobSpec = {
	readonly id: string;
	readonly index: number;
	readonly group: string;
	readonly target: string;
	readonly executor: ExecutorKind;
	readonly steps: readonly JobStep[];
	readonly env: Readonly<Record<string, string>>;
	readonly timeoutMs?: number;
	readonly platform?: string;
	readonly cache?: CacheKeyInputs;
};

export type JobStatus = "success" | "failed" | "canceled" | "timed-out";

export type RunStatus = "pending" | "running" | JobStatus;

export type FailureKind = "step-failure" | "unresolved-target" | "canceled" | "timed-out" | "internal";

export type StepStatus = "success" | "failed" | "canceled" | "timed-out";

export type StepRecord = {
	readonly index: number;
	readonly name: string;
	readonly status: StepStatus;
	readonly exitCode: number | null;
	readonly signal: string | null;
	readonly output: string;
	readonly durationMs: number;
};

export type CacheHitKind = "exact" | "prefix" | "miss";

export type JobCacheSummary = {
	readonly key: string;
	readonly hit: CacheHitKind;
	readonly restoredKey?: string;
	readonly saved: boolean;
};

export type JobOutcome = {
	readonly jobId: string;
	readonly group: string;
	readonly target: string;
	readonly status: JobStatus;
	readonly failingStep?: number;
	readonly failure?: { readonly kind: FailureKind; readonly message: string };
	readonly steps: readonly StepRecord[];
	readonly durationMs: number;
	readonly attempts: number;
	readonly cache?: JobCacheSummary;
};

export type FailureEntry = {
	jobId: string;
	group: string;
	target: string;
	status: Exclude<JobStatus, "success">;
	kind: FailureKind;
	failingStep?: { index: number; name: string };
	message: string;
};

export type Verdict = {
	verdict: "pass" | "fail";
	total: number;
	passed: number;
	failures: FailureEntry[];
};

export type ExecutionRun = {
	id: string;
	trigger: TriggerEvent;
	concurrencyGroup: string;
	createdAt: string;
	finishedAt?: string;
	state: "running" | "sealed";
	superseded: boolean;
	outcomes: JobOutcome[];
	verdict?: Verdict;
};

export type ExecutorHandle = {
	readonly target: string;
	readonly kind: ExecutorKind;
	readonly program: string;
	readonly env: Readonly<Record<string, string>>;
	readonly pathEntries: readonly string[];
};
