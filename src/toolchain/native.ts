import path from "node:path";
import { UnresolvedTargetError } from "../core/errors.js";
import type { ExecutorHandle } from "../core/types.js";
import { findExecutable, type ResolveContext, type ToolchainProvider } from "./provider.js";

export type NativeToolchainOptions = {
	program: string;
	/** Targets that only build on a given host, e.g. `{ "macos-14": "darwin" }`. */
	platforms: Record<string, string>;
	hostPlatform?: string;
};

export class NativeToolchainProvider implements ToolchainProvider {
	readonly kind = "native";

	constructor(private readonly options: NativeToolchainOptions) {}

	async resolve(target: string, context: ResolveContext): Promise<ExecutorHandle> {
		const host = this.options.hostPlatform ?? process.platform;
		const required = this.options.platforms[target];
		if (required && required !== host) {
			throw new UnresolvedTargetError(target, this.kind, `requires a ${required} host (running on ${host})`);
		}

		const program = findExecutable(this.options.program, context.env);
		if (!program) {
			throw new UnresolvedTargetError(target, this.kind, `${this.options.program} not found on PATH`);
		}

		context.logger.debug(`native toolchain for ${target}: ${program}`);
		return {
			target,
			kind: this.kind,
			program,
			env: {},
			pathEntries: [path.dirname(program)],
		};
	}
}
