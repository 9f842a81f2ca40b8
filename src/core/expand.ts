import type {
	CacheKeyInputs,
	CacheSpec,
	JobSpec,
	JobStep,
	MatrixSpecification,
	TargetEntry,
	TargetGroup,
} from "./types.js";

export type ExpandOptions = {
	/** Seed values for `${name}` placeholders, e.g. `os`. */
	variables?: Record<string, string>;
	/**
	 * Digest of the dependency lock state; see `fingerprintLockFiles`. A function
	 * is called once per distinct cache spec.
	 */
	lockFingerprint?: string | ((cache: CacheSpec) => string);
};

export type JobFilter = {
	groups?: string[];
	targets?: string[];
};

const PLACEHOLDER = /\$\{(\w+)\}/g;

/**
 * Flattens every group's targets into one job per target, in group order then
 * target order. Never rejects a target: unknown identifiers surface later when
 * the toolchain is resolved.
 */
export function expand(spec: MatrixSpecification, options: ExpandOptions = {}): JobSpec[] {
	const jobs: JobSpec[] = [];
	const fingerprints = new Map<CacheSpec, string>();
	const fingerprintOf = (cache: CacheSpec): string => {
		const { lockFingerprint } = options;
		if (typeof lockFingerprint !== "function") {
			return lockFingerprint ?? "";
		}
		let value = fingerprints.get(cache);
		if (value === undefined) {
			value = lockFingerprint(cache);
			fingerprints.set(cache, value);
		}
		return value;
	};
	for (const group of spec.groups) {
		for (const target of group.targets) {
			jobs.push(expandTarget(spec, group, target, jobs.length, options.variables, fingerprintOf));
		}
	}
	return jobs;
}

export function interpolate(template: string, values: Record<string, string>): string {
	return template.replace(PLACEHOLDER, (match, name: string) => values[name] ?? match);
}

export function filterJobs(jobs: readonly JobSpec[], filter: JobFilter): JobSpec[] {
	const groups = filter.groups?.length ? new Set(filter.groups) : undefined;
	const targets = filter.targets?.length ? new Set(filter.targets) : undefined;
	return jobs.filter(
		(job) => (!groups || groups.has(job.group)) && (!targets || targets.has(job.target)),
	);
}

function expandTarget(
	spec: MatrixSpecification,
	group: TargetGroup,
	target: TargetEntry,
	index: number,
	variables: Record<string, string> | undefined,
	fingerprintOf: (cache: CacheSpec) => string,
): JobSpec {
	const values: Record<string, string> = {
		...variables,
		group: group.name,
		...target.vars,
		target: target.id,
	};

	const steps: JobStep[] = group.steps.map((step, stepIndex) =>
		Object.freeze({
			index: stepIndex,
			name: interpolate(step.name, values),
			command: interpolate(step.command, values),
			args: Object.freeze(step.args.map((arg) => interpolate(arg, values))),
			env: Object.freeze(interpolateRecord(step.env ?? {}, values)),
		}),
	);

	const env = interpolateRecord({ ...group.env, ...target.env }, values);
	const cache = group.cache ?? spec.cache;
	const timeoutMs = target.timeoutMs ?? group.timeoutMs;

	return Object.freeze({
		id: `${group.name}/${target.id}`,
		index,
		group: group.name,
		target: target.id,
		executor: group.executor,
		steps: Object.freeze(steps),
		env: Object.freeze(env),
		...(timeoutMs !== undefined ? { timeoutMs } : {}),
		...(target.platform ? { platform: target.platform } : {}),
		...(cache ? { cache: toCacheKeyInputs(cache, values, fingerprintOf(cache)) } : {}),
	});
}

function toCacheKeyInputs(
	cache: CacheSpec,
	values: Record<string, string>,
	lockFingerprint: string,
): CacheKeyInputs {
	return Object.freeze({
		namespace: interpolate(cache.namespace, values),
		lockFingerprint,
		paths: Object.freeze(cache.paths.map((entry) => interpolate(entry, values))),
		restorePrefixes: Object.freeze(
			cache.restorePrefixes.map((prefix) => interpolate(prefix, values)),
		),
	});
}

function interpolateRecord(
	record: Record<string, string>,
	values: Record<string, string>,
): Record<string, string> {
	return Object.fromEntries(
		Object.entries(record).map(([key, value]) => [key, interpolate(value, values)]),
	);
}
