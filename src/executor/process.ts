import { spawn, type ChildProcess } from "node:child_process";

export type OutputSource = "stdout" | "stderr";

export type ProcessRequest = {
	command: string;
	args: readonly string[];
	cwd: string;
	env: NodeJS.ProcessEnv;
	signal?: AbortSignal;
	onOutput?: (chunk: string, source: OutputSource) => void;
};

export type ProcessResult = {
	exitCode: number | null;
	signal: NodeJS.Signals | null;
	output: string;
	/** The request's signal fired while the process was alive. */
	aborted: boolean;
	/** Spawn-level failure, e.g. the command does not exist. */
	error?: string;
};

export interface ProcessRunner {
	run(request: ProcessRequest): Promise<ProcessResult>;
}

export type NodeProcessRunnerOptions = {
	/** Delay between SIGTERM and SIGKILL when a step is cancelled. */
	killGraceMs?: number;
	/** Captured output keeps only this many trailing characters. */
	maxOutputChars?: number;
};

const DEFAULT_KILL_GRACE_MS = 5000;
const DEFAULT_MAX_OUTPUT_CHARS = 1_000_000;

/**
 * Spawns each step as the leader of its own process group so cancellation
 * reaches the compiler and test binaries it forks, not just the wrapper.
 */
export class NodeProcessRunner implements ProcessRunner {
	private readonly killGraceMs: number;
	private readonly maxOutputChars: number;

	constructor(options: NodeProcessRunnerOptions = {}) {
		this.killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
		this.maxOutputChars = options.maxOutputChars ?? DEFAULT_MAX_OUTPUT_CHARS;
	}

	run(request: ProcessRequest): Promise<ProcessResult> {
		if (request.signal?.aborted) {
			return Promise.resolve({ exitCode: null, signal: null, output: "", aborted: true });
		}

		return new Promise((resolve) => {
			const groupKill = process.platform !== "win32";
			let output = "";
			let aborted = false;
			let settled = false;
			let killTimer: NodeJS.Timeout | undefined;

			const child = spawn(request.command, [...request.args], {
				cwd: request.cwd,
				env: request.env,
				detached: groupKill,
				stdio: ["ignore", "pipe", "pipe"],
			});

			const onAbort = (): void => {
				aborted = true;
				terminate(child, "SIGTERM", groupKill);
				killTimer = setTimeout(() => terminate(child, "SIGKILL", groupKill), this.killGraceMs);
				killTimer.unref();
			};

			const finish = (result: Omit<ProcessResult, "output" | "aborted">): void => {
				if (settled) {
					return;
				}
				settled = true;
				if (killTimer) {
					clearTimeout(killTimer);
				}
				request.signal?.removeEventListener("abort", onAbort);
				resolve({ ...result, output, aborted });
			};

			const capture = (source: OutputSource) => (chunk: Buffer) => {
				const text = chunk.toString();
				output += text;
				if (output.length > this.maxOutputChars) {
					output = output.slice(output.length - this.maxOutputChars);
				}
				request.onOutput?.(text, source);
			};

			request.signal?.addEventListener("abort", onAbort, { once: true });
			child.stdout?.on("data", capture("stdout"));
			child.stderr?.on("data", capture("stderr"));
			child.on("error", (error) => {
				finish({ exitCode: null, signal: null, error: error.message });
			});
			child.on("close", (code, signal) => {
				finish({ exitCode: code, signal });
			});
		});
	}
}

function terminate(child: ChildProcess, signal: NodeJS.Signals, groupKill: boolean): void {
	if (child.pid === undefined || child.exitCode !== null || child.signalCode !== null) {
		return;
	}
	if (!groupKill) {
		child.kill(signal);
		return;
	}
	try {
		process.kill(-child.pid, signal);
	} catch (error) {
		if (!(error instanceof Error && "code" in error && error.code === "ESRCH")) {
			child.kill(signal);
		}
	}
}
