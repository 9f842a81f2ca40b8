import path from "node:path";
import { z } from "zod";
import { formatZodError, parseYamlFile } from "../config/load-config.js";
import { toInvocation } from "../utils/command-line.js";
import { ConfigError } from "./errors.js";
import type {
	CacheSpec,
	ExecutorKind,
	MatrixSpecification,
	StepTemplate,
	TargetEntry,
	TargetGroup,
	TriggerSpec,
} from "./types.js";

const scalar = z.union([z.string(), z.number(), z.boolean()]).transform(String);
const envSchema = z.record(scalar);

const StepYamlSchema = z
	.object({
		name: z.string().optional(),
		uses: z.string().optional(),
		run: z.string().optional(),
		env: envSchema.optional(),
		with: z.record(scalar).optional(),
		"working-directory": z.string().optional(),
	})
	.passthrough();

const JobYamlSchema = z
	.object({
		name: z.string().optional(),
		"runs-on": z.union([z.string(), z.array(z.string())]).optional(),
		"timeout-minutes": z.number().positive().optional(),
		env: envSchema.optional(),
		strategy: z
			.object({
				matrix: z.union([z.record(z.unknown()), z.string()]).optional(),
			})
			.passthrough()
			.optional(),
		steps: z.array(StepYamlSchema).default([]),
	})
	.passthrough();

const WorkflowYamlSchema = z
	.object({
		name: z.string().optional(),
		on: z.union([z.string(), z.array(z.string()), z.record(z.unknown())]).optional(),
		env: envSchema.optional(),
		concurrency: z
			.union([z.string(), z.object({ group: z.string() }).passthrough()])
			.optional(),
		jobs: z.record(JobYamlSchema).default({}),
	})
	.passthrough();

type StepYaml = z.infer<typeof StepYamlSchema>;
type JobYaml = z.infer<typeof JobYamlSchema>;
type WorkflowYaml = z.infer<typeof WorkflowYamlSchema>;
type Combination = Record<string, string>;

export type WorkflowImport = {
	spec: MatrixSpecification;
	/** Things the import could not carry over: skipped jobs, `uses:` steps, unknown expressions. */
	warnings: string[];
};

export function importWorkflowFile(workflowPath: string): WorkflowImport {
	const parsed = parseYamlFile(workflowPath);
	return importWorkflow(parsed, workflowPath);
}

/**
 * Converts a GitHub Actions workflow into a matrix specification. Every job
 * with a `strategy.matrix` becomes a target group; its combinations become
 * targets and its `run:` steps the step template.
 */
export function importWorkflow(input: unknown, source = "<workflow>"): WorkflowImport {
	const result = WorkflowYamlSchema.safeParse(input ?? {});
	if (!result.success) {
		throw new ConfigError(source, formatZodError(result.error));
	}
	const workflow = result.data;
	const warnings: string[] = [];
	const groups: TargetGroup[] = [];

	for (const [jobId, job] of Object.entries(workflow.jobs)) {
		const matrix = job.strategy?.matrix;
		if (!matrix || typeof matrix === "string") {
			warnings.push(`job "${jobId}": no static strategy.matrix, skipped`);
			continue;
		}
		const group = importJob(jobId, job, matrix, workflow, warnings);
		if (group) {
			groups.push(group);
		}
	}

	if (groups.length === 0) {
		throw new ConfigError(source, "workflow has no job with a strategy.matrix");
	}

	const concurrency =
		typeof workflow.concurrency === "string" ? workflow.concurrency : workflow.concurrency?.group;

	return {
		spec: {
			name: workflow.name ?? (source.startsWith("<") ? "workflow" : path.basename(source)),
			...(source.startsWith("<") ? {} : { path: path.resolve(source) }),
			...(concurrency ? { concurrencyGroup: flattenExpressions(concurrency) } : {}),
			triggers: importTriggers(workflow.on),
			groups,
		},
		warnings,
	};
}

const EXPRESSION = /\$\{\{\s*(.*?)\s*\}\}/g;

/** Placeholder for `runner.os`; seeded from the host unless `runs-on` names one. */
export const RUNNER_OS_VAR = "runner_os";

type RunnerHost = { os: string; platform: string };

const RUNNER_HOSTS: { pattern: RegExp; host: RunnerHost }[] = [
	{ pattern: /ubuntu|linux/i, host: { os: "Linux", platform: "linux" } },
	{ pattern: /macos|osx/i, host: { os: "macOS", platform: "darwin" } },
	{ pattern: /windows/i, host: { os: "Windows", platform: "win32" } },
];

/** `${{ matrix.x }}` → `${x}`, `${{ runner.os }}` → `${runner_os}`, `${{ env.X }}` → `$X`. */
export function convertExpressions(value: string, unknown?: (expression: string) => void): string {
	return value.replace(EXPRESSION, (match, expression: string) => {
		const matrixRef = /^matrix\.([A-Za-z_][\w-]*)$/.exec(expression);
		if (matrixRef) {
			return `\${${placeholderName(matrixRef[1])}}`;
		}
		if (expression === "runner.os") {
			return `\${${RUNNER_OS_VAR}}`;
		}
		const envRef = /^env\.(\w+)$/.exec(expression);
		if (envRef) {
			return `$${envRef[1]}`;
		}
		unknown?.(expression);
		return match;
	});
}

function importJob(
	jobId: string,
	job: JobYaml,
	matrix: Record<string, unknown>,
	workflow: WorkflowYaml,
	warnings: string[],
): TargetGroup | undefined {
	const unknownExpression = (expression: string): void => {
		warnings.push(`job "${jobId}": unsupported expression "\${{ ${expression} }}" left as-is`);
	};
	const convert = (value: string): string => convertExpressions(value, unknownExpression);

	const combinations = expandMatrix(matrix);
	if (combinations.length === 0) {
		warnings.push(`job "${jobId}": matrix produced no combinations, skipped`);
		return undefined;
	}

	const steps: StepTemplate[] = [];
	let cache: CacheSpec | undefined;
	for (const [index, step] of job.steps.entries()) {
		if (step.uses) {
			if (isCacheAction(step.uses)) {
				cache = importCache(step, convert) ?? cache;
			} else {
				warnings.push(`job "${jobId}": step "${step.name ?? step.uses}" uses an action, skipped`);
			}
			continue;
		}
		if (step.run) {
			steps.push(importStep(step, step.run, index, convert));
		}
	}

	if (steps.length === 0) {
		warnings.push(`job "${jobId}": no run steps, skipped`);
		return undefined;
	}

	const executor = detectExecutor(steps);
	const targets = uniqueTargetIds(
		combinations.map((combination, index) => toTarget(combination, index, job["runs-on"], executor)),
		(id, renamed) => warnings.push(`job "${jobId}": duplicate target "${id}" renamed to "${renamed}"`),
	);
	const env = Object.fromEntries(
		Object.entries({ ...workflow.env, ...job.env }).map(([key, value]) => [key, convert(value)]),
	);
	const timeoutMinutes = job["timeout-minutes"];

	return {
		name: jobId,
		executor,
		targets,
		steps,
		...(Object.keys(env).length > 0 ? { env } : {}),
		...(timeoutMinutes !== undefined ? { timeoutMs: Math.round(timeoutMinutes * 60_000) } : {}),
		...(cache ? { cache } : {}),
	};
}

function importStep(
	step: StepYaml,
	run: string,
	index: number,
	convert: (value: string) => string,
): StepTemplate {
	const script = convert(run);
	const workingDirectory = step["working-directory"];
	const invocation = workingDirectory
		? { command: "sh", args: ["-c", `cd ${JSON.stringify(convert(workingDirectory))} && ${script.trim()}`] }
		: toInvocation(script);
	const env = step.env
		? Object.fromEntries(Object.entries(step.env).map(([key, value]) => [key, convert(value)]))
		: undefined;
	return {
		name: step.name ? convert(step.name) : script.trim().split("\n")[0] || `Step ${index + 1}`,
		command: invocation.command,
		args: invocation.args,
		...(env ? { env } : {}),
	};
}

function isCacheAction(uses: string): boolean {
	return /^actions\/cache(\/restore)?@/.test(uses);
}

const HASH_FILES = /\$\{\{\s*hashFiles\((.*?)\)\s*\}\}/;

function importCache(step: StepYaml, convert: (value: string) => string): CacheSpec | undefined {
	const inputs = step.with ?? {};
	const key = inputs.key;
	const pathInput = inputs.path;
	if (!key || !pathInput) {
		return undefined;
	}

	const hashFiles = HASH_FILES.exec(key);
	const lockFiles = hashFiles ? parseHashFilesArgs(hashFiles[1]) : [];
	const namespace = convert(hashFiles ? key.slice(0, hashFiles.index) : key);
	const restorePrefixes = splitLines(inputs["restore-keys"] ?? "").map(convert);

	return {
		namespace: namespace || "cache-",
		paths: splitLines(pathInput).map(convert),
		lockFiles,
		restorePrefixes,
	};
}

function parseHashFilesArgs(args: string): string[] {
	const patterns: string[] = [];
	const literal = /'([^']*)'|"([^"]*)"/g;
	for (let match = literal.exec(args); match; match = literal.exec(args)) {
		const pattern = match[1] ?? match[2];
		if (pattern) {
			patterns.push(pattern);
		}
	}
	return patterns;
}

function detectExecutor(steps: StepTemplate[]): ExecutorKind {
	const usesCross = steps.some(
		(step) =>
			step.command === "cross" ||
			(step.command === "sh" && step.args.some((arg) => /(^|[\s;&|])cross\s/.test(arg))),
	);
	return usesCross ? "cross" : "native";
}

/**
 * Cartesian product of the matrix dimensions, minus `exclude` entries. An
 * `include` entry extends every product combination it agrees with on the
 * original dimensions, or is appended as a combination of its own. Appended
 * combinations are never extended by later entries.
 */
export function expandMatrix(matrix: Record<string, unknown>): Combination[] {
	const dimensions = Object.entries(matrix).filter(
		(entry): entry is [string, unknown[]] => entry[0] !== "include" && entry[0] !== "exclude" && Array.isArray(entry[1]),
	);
	const dimensionKeys = new Set(dimensions.map(([key]) => key));

	let combinations: Combination[] = dimensions.length > 0 ? [{}] : [];
	for (const [key, values] of dimensions) {
		combinations = combinations.flatMap((combination) =>
			values.map((value) => ({ ...combination, [key]: stringifyMatrixValue(value) })),
		);
	}

	const excludes = toEntries(matrix.exclude);
	combinations = combinations.filter(
		(combination) => !excludes.some((exclude) => agrees(combination, exclude, Object.keys(exclude))),
	);

	const appended: Combination[] = [];
	for (const include of toEntries(matrix.include)) {
		const shared = Object.keys(include).filter((key) => dimensionKeys.has(key));
		const matching = combinations.filter((combination) => agrees(combination, include, shared));
		if (matching.length === 0) {
			appended.push({ ...include });
			continue;
		}
		for (const combination of matching) {
			for (const [key, value] of Object.entries(include)) {
				if (!dimensionKeys.has(key)) {
					combination[key] = value;
				}
			}
		}
	}
	return [...combinations, ...appended];
}

/**
 * A combination's `runs-on` labels decide its `runner.os` and, for native
 * jobs, the host platform the target needs. Cross jobs build on any host.
 */
function toTarget(
	combination: Combination,
	index: number,
	runsOn: JobYaml["runs-on"],
	executor: ExecutorKind,
): TargetEntry {
	const vars = Object.fromEntries(
		Object.entries(combination).map(([key, value]) => [placeholderName(key), value]),
	);
	const id =
		combination.target ??
		combination.display_name ??
		combination.os ??
		(Object.values(combination).join("-") || `combination-${index + 1}`);
	const host = runnerHost(runsOn, combination);
	if (!host) {
		return { id, vars };
	}
	return {
		id,
		vars: { ...vars, [RUNNER_OS_VAR]: host.os },
		...(executor === "native" ? { platform: host.platform } : {}),
	};
}

function runnerHost(runsOn: JobYaml["runs-on"], combination: Combination): RunnerHost | undefined {
	const labels = runsOn === undefined ? [] : Array.isArray(runsOn) ? runsOn : [runsOn];
	for (const label of labels) {
		const resolved = label.replace(EXPRESSION, (match, expression: string) => {
			const matrixRef = /^matrix\.([A-Za-z_][\w-]*)$/.exec(expression);
			const value = matrixRef ? combination[matrixRef[1]] : undefined;
			return value ?? match;
		});
		const known = RUNNER_HOSTS.find((entry) => entry.pattern.test(resolved));
		if (known) {
			return known.host;
		}
	}
	return undefined;
}

/** Later combinations that repeat an id get a numeric suffix. */
function uniqueTargetIds(
	targets: TargetEntry[],
	onRename: (id: string, renamed: string) => void,
): TargetEntry[] {
	const seen = new Set<string>();
	return targets.map((target) => {
		let id = target.id;
		for (let suffix = 2; seen.has(id); suffix += 1) {
			id = `${target.id}-${suffix}`;
		}
		seen.add(id);
		if (id === target.id) {
			return target;
		}
		onRename(target.id, id);
		return { ...target, id };
	});
}

function toEntries(value: unknown): Combination[] {
	if (!Array.isArray(value)) {
		return [];
	}
	return value
		.filter((entry): entry is Record<string, unknown> => typeof entry === "object" && entry !== null)
		.map((entry) =>
			Object.fromEntries(Object.entries(entry).map(([key, item]) => [key, stringifyMatrixValue(item)])),
		);
}

function agrees(combination: Combination, entry: Combination, keys: string[]): boolean {
	return keys.every((key) => combination[key] === entry[key]);
}

function stringifyMatrixValue(value: unknown): string {
	return typeof value === "object" && value !== null ? JSON.stringify(value) : String(value);
}

function placeholderName(key: string): string {
	return key.replace(/-/g, "_");
}

function importTriggers(on: WorkflowYaml["on"]): TriggerSpec {
	if (!on) {
		return { pullRequest: false };
	}
	const events = typeof on === "string" ? [on] : Array.isArray(on) ? on : Object.keys(on);
	const pushConfig = typeof on === "object" && !Array.isArray(on) ? on.push : undefined;
	const branches = readBranches(pushConfig);
	return {
		...(events.includes("push") ? { push: { branches } } : {}),
		pullRequest: events.includes("pull_request"),
	};
}

function readBranches(pushConfig: unknown): string[] {
	if (typeof pushConfig !== "object" || pushConfig === null || !("branches" in pushConfig)) {
		return [];
	}
	const { branches } = pushConfig;
	return Array.isArray(branches) ? branches.map(String) : [];
}

function flattenExpressions(value: string): string {
	return convertExpressions(value).replace(EXPRESSION, (_, expression: string) => expression);
}

function splitLines(value: string): string[] {
	return value
		.split("\n")
		.map((line) => line.trim())
		.filter((line) => line.length > 0);
}
