import { UnresolvedTargetError } from "../core/errors.js";
import type { ExecutorHandle, ExecutorKind } from "../core/types.js";
import type { ResolveContext, ToolchainProvider } from "./provider.js";

/**
 * Resolves toolchains for one run. Every `(target, kind, platform)` triple is
 * resolved at most once: concurrent callers share the in-flight attempt, and a
 * failure is remembered for the rest of the run. Create a new resolver per run.
 */
export class ToolchainResolver {
	private readonly providers: Map<ExecutorKind, ToolchainProvider>;
	private readonly resolved = new Map<string, Promise<ExecutorHandle>>();

	constructor(
		providers: readonly ToolchainProvider[],
		private readonly context: ResolveContext,
	) {
		this.providers = new Map(providers.map((provider) => [provider.kind, provider]));
	}

	resolve(target: string, kind: ExecutorKind, platform?: string): Promise<ExecutorHandle> {
		const memoKey = `${kind}\0${target}\0${platform ?? ""}`;
		const existing = this.resolved.get(memoKey);
		if (existing) {
			return existing;
		}

		const pending = this.attempt(target, kind, platform);
		this.resolved.set(memoKey, pending);
		return pending;
	}

	private attempt(target: string, kind: ExecutorKind, platform: string | undefined): Promise<ExecutorHandle> {
		const host = this.context.hostPlatform ?? process.platform;
		if (platform && platform !== host) {
			return Promise.reject(
				new UnresolvedTargetError(target, kind, `requires a ${platform} host (running on ${host})`),
			);
		}
		const provider = this.providers.get(kind);
		return provider
			? provider.resolve(target, this.context)
			: Promise.reject(new UnresolvedTargetError(target, kind, "no provider registered"));
	}

	get size(): number {
		return this.resolved.size;
	}
}
