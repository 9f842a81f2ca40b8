import fs from "node:fs";
import path from "node:path";
import type { ExecutorHandle, ExecutorKind } from "../core/types.js";
import type { Logger } from "../utils/logger.js";

export type ResolveContext = {
	cwd: string;
	env: NodeJS.ProcessEnv;
	logger: Logger;
	signal?: AbortSignal;
	/** Defaults to `process.platform`. */
	hostPlatform?: string;
};

/**
 * Installs or locates the toolchain for one executor kind. Throws
 * `UnresolvedTargetError` for targets it cannot serve.
 */
export interface ToolchainProvider {
	readonly kind: ExecutorKind;
	resolve(target: string, context: ResolveContext): Promise<ExecutorHandle>;
}

export function findExecutable(program: string, env: NodeJS.ProcessEnv): string | undefined {
	const candidates = executableNames(program);
	if (program.includes("/") || program.includes("\\")) {
		return candidates.find(isExecutable);
	}
	const dirs = (env.PATH ?? env.Path ?? "").split(path.delimiter).filter(Boolean);
	for (const dir of dirs) {
		const found = candidates.map((name) => path.join(dir, name)).find(isExecutable);
		if (found) {
			return found;
		}
	}
	return undefined;
}

function executableNames(program: string): string[] {
	if (process.platform !== "win32") {
		return [program];
	}
	return [program, `${program}.exe`, `${program}.cmd`, `${program}.bat`];
}

function isExecutable(candidate: string): boolean {
	try {
		const stat = fs.statSync(candidate);
		if (!stat.isFile()) {
			return false;
		}
		fs.accessSync(candidate, fs.constants.X_OK);
		return true;
	} catch {
		return false;
	}
}
