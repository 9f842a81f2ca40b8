import path from "node:path";
import { formatZodError, parseYamlFile } from "../config/load-config.js";
import {
	MatrixDocumentSchema,
	type MatrixDocument,
	type StepDocument,
	type TriggerDocument,
} from "../config/schema.js";
import { globToRegExp } from "../cache/key.js";
import { formatCommandLine, toInvocation } from "../utils/command-line.js";
import { ConfigError } from "./errors.js";
import type { MatrixSpecification, StepTemplate, TargetEntry, TriggerEvent, TriggerSpec } from "./types.js";

export const DEFAULT_MATRIX_PATH = "trellis.matrix.yml";

export function parseMatrixFile(matrixPath: string): MatrixSpecification {
	const parsed = parseYamlFile(matrixPath);
	return parseMatrixDocument(parsed, matrixPath);
}

export function parseMatrixDocument(input: unknown, source = "<matrix>"): MatrixSpecification {
	const result = MatrixDocumentSchema.safeParse(input ?? {});
	if (!result.success) {
		throw new ConfigError(source, formatZodError(result.error));
	}
	return toSpecification(result.data, source);
}

function toSpecification(doc: MatrixDocument, source: string): MatrixSpecification {
	const concurrencyGroup =
		typeof doc.concurrency === "string" ? doc.concurrency : doc.concurrency?.group;

	return {
		name: doc.name,
		...(source.startsWith("<") ? {} : { path: path.resolve(source) }),
		...(concurrencyGroup ? { concurrencyGroup } : {}),
		triggers: parseTriggers(doc.on),
		...(doc.cache ? { cache: doc.cache } : {}),
		groups: doc.groups.map((group) => ({
			name: group.name,
			executor: group.executor,
			targets: group.targets.map(
				(target): TargetEntry => (typeof target === "string" ? { id: target } : target),
			),
			steps: group.steps.map(parseStep),
			...(group.env ? { env: group.env } : {}),
			...(group.timeoutMs !== undefined ? { timeoutMs: group.timeoutMs } : {}),
			...(group.cache ? { cache: group.cache } : {}),
		})),
	};
}

function parseStep(step: StepDocument, index: number): StepTemplate {
	const invocation =
		"run" in step ? toInvocation(step.run) : { command: step.command, args: step.args };
	const fallbackName =
		"run" in step ? step.run.split("\n")[0] : formatCommandLine(step.command, step.args);
	return {
		name: step.name ?? (fallbackName || `Step ${index + 1}`),
		command: invocation.command,
		args: invocation.args,
		...(step.env ? { env: step.env } : {}),
	};
}

export function parseTriggers(trigger: TriggerDocument): TriggerSpec {
	if (!trigger) {
		return { pullRequest: false };
	}
	if (typeof trigger === "string" || Array.isArray(trigger)) {
		const events = typeof trigger === "string" ? [trigger] : trigger;
		return {
			...(events.includes("push") ? { push: { branches: [] } } : {}),
			pullRequest: events.includes("pull_request"),
		};
	}
	return {
		...(trigger.push !== undefined ? { push: { branches: trigger.push?.branches ?? [] } } : {}),
		pullRequest: trigger.pull_request !== undefined,
	};
}

export type TriggerContext = {
	event: TriggerEvent;
	branch?: string;
};

/**
 * An empty trigger set accepts every event. Branch filters use the same glob
 * rules as lock file patterns; an unknown branch never matches a filter.
 */
export function matchesTrigger(triggers: TriggerSpec, context: TriggerContext): boolean {
	if (!triggers.push && !triggers.pullRequest) {
		return true;
	}
	if (context.event === "pull_request") {
		return triggers.pullRequest;
	}
	if (!triggers.push) {
		return false;
	}
	const { branches } = triggers.push;
	if (branches.length === 0) {
		return true;
	}
	const branch = context.branch;
	return branch !== undefined && branches.some((pattern) => globToRegExp(pattern).test(branch));
}
