import fs from "node:fs";
import path from "node:path";
import { interpolate } from "../core/expand.js";
import { UnresolvedTargetError, describeError } from "../core/errors.js";
import type { ExecutorHandle } from "../core/types.js";
import type { ProcessRunner } from "../executor/process.js";
import { toInvocation } from "../utils/command-line.js";
import { findExecutable, type ResolveContext, type ToolchainProvider } from "./provider.js";

export type CrossToolchainOptions = {
	program: string;
	/** Command line that installs `program` when it is missing. */
	install?: string;
	/** Per-target preparation, `${target}` substituted, e.g. `rustup target add ${target}`. */
	setup?: string;
	supportedTargets: readonly string[];
};

const OUTPUT_TAIL_CHARS = 2000;

type Installation = { program: string } | { failure: string };

export class CrossToolchainProvider implements ToolchainProvider {
	readonly kind = "cross";
	private readonly supported: Set<string>;
	/** Keyed by the run's context, so an install never outlives its run. */
	private readonly installations = new WeakMap<ResolveContext, Promise<Installation>>();

	constructor(
		private readonly options: CrossToolchainOptions,
		private readonly runner: ProcessRunner,
	) {
		this.supported = new Set(options.supportedTargets);
	}

	async resolve(target: string, context: ResolveContext): Promise<ExecutorHandle> {
		if (!this.supported.has(target)) {
			throw new UnresolvedTargetError(target, this.kind, "not a supported cross target");
		}

		const installation = await this.installFor(context);
		if ("failure" in installation) {
			throw new UnresolvedTargetError(target, this.kind, installation.failure);
		}
		const { program } = installation;

		if (this.options.setup) {
			const invocation = toInvocation(interpolate(this.options.setup, { target }));
			context.logger.info(`preparing ${target}: ${invocation.command} ${invocation.args.join(" ")}`);
			const result = await this.runner.run({
				...invocation,
				cwd: context.cwd,
				env: context.env,
				signal: context.signal,
			});
			if (result.exitCode !== 0) {
				throw new UnresolvedTargetError(
					target,
					this.kind,
					`setup failed (${result.error ?? `exit ${result.exitCode ?? result.signal}`})\n${tail(result.output)}`,
				);
			}
		}

		return {
			target,
			kind: this.kind,
			program,
			env: {},
			pathEntries: [path.dirname(program)],
		};
	}

	/**
	 * Concurrent callers of one run share a single attempt. A failed attempt is
	 * dropped once it settles, so the next target tries again.
	 */
	private async installFor(context: ResolveContext): Promise<Installation> {
		let pending = this.installations.get(context);
		if (!pending) {
			pending = this.install(context);
			this.installations.set(context, pending);
		}
		const installation = await pending;
		if ("failure" in installation && this.installations.get(context) === pending) {
			this.installations.delete(context);
		}
		return installation;
	}

	private async install(context: ResolveContext): Promise<Installation> {
		const existing = findExecutable(this.options.program, context.env);
		if (existing) {
			return { program: existing };
		}
		if (!this.options.install) {
			return { failure: `${this.options.program} not found on PATH` };
		}

		const invocation = toInvocation(this.options.install);
		context.logger.info(`installing ${this.options.program}: ${this.options.install}`);
		try {
			const result = await this.runner.run({
				...invocation,
				cwd: context.cwd,
				env: context.env,
				signal: context.signal,
			});
			const installed = result.exitCode === 0 ? findExecutable(this.options.program, context.env) : undefined;
			return installed
				? { program: installed }
				: { failure: `installing ${this.options.program} failed\n${tail(result.output)}` };
		} catch (error) {
			return { failure: `installing ${this.options.program} failed: ${describeError(error)}` };
		}
	}
}

export function loadSupportedTargets(
	file = new URL("../../data/cross-targets.json", import.meta.url),
): string[] {
	const parsed: unknown = JSON.parse(fs.readFileSync(file, "utf-8"));
	if (!Array.isArray(parsed) || !parsed.every((item) => typeof item === "string")) {
		throw new Error(`Expected a list of target triples in ${file.toString()}`);
	}
	return parsed.map(String);
}

function tail(output: string): string {
	return output.length > OUTPUT_TAIL_CHARS ? output.slice(-OUTPUT_TAIL_CHARS) : output;
}
