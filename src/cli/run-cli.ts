import fs from "node:fs";
import path from "node:path";
import process from "node:process";
import { cancel, intro, isCancel, multiselect, outro } from "@clack/prompts";
import { render } from "ink";
import React from "react";
import { CacheManager } from "../cache/manager.js";
import { fingerprintLockFiles } from "../cache/key.js";
import { FsCacheStore } from "../cache/store.js";
import { loadConfig } from "../config/load-config.js";
import type { TrellisConfig } from "../config/schema.js";
import type { EngineEventListener, EngineRuntimeEvent } from "../core/engine.js";
import { ConfigError, describeError } from "../core/errors.js";
import { expand, filterJobs } from "../core/expand.js";
import { DEFAULT_MATRIX_PATH, matchesTrigger, parseMatrixFile } from "../core/parser.js";
import type { CacheSpec, JobSpec, MatrixSpecification, TriggerEvent } from "../core/types.js";
import { RUNNER_OS_VAR, importWorkflowFile } from "../core/workflow.js";
import { JobExecutor } from "../executor/job-executor.js";
import { NodeProcessRunner } from "../executor/process.js";
import { DirectoryWorkspaceFactory } from "../executor/workspace.js";
import type { SealedRun } from "../report/aggregate.js";
import { buildReport } from "../report/report.js";
import { ConcurrencyRegistry } from "../scheduler/concurrency.js";
import { Scheduler, createRunId } from "../scheduler/scheduler.js";
import { CrossToolchainProvider, loadSupportedTargets } from "../toolchain/cross.js";
import { NativeToolchainProvider } from "../toolchain/native.js";
import { ToolchainResolver } from "../toolchain/resolver.js";
import { RunView } from "../tui/run-view/run-view.js";
import { formatDuration } from "../tui/run-view/format.js";
import { createLogger, type Logger } from "../utils/logger.js";
import { resolveUserPath } from "../utils/path-safety.js";
import { parseArgs, printHelp, readPackageVersion, type CliOptions } from "./args.js";
import { runInit } from "./init.js";
import { formatPlan, formatReport, writeReportFile } from "./output.js";

export const EXIT_PASS = 0;
export const EXIT_FAIL = 1;
export const EXIT_USAGE = 2;
export const EXIT_CANCELED = 130;

export type CliContext = {
	cwd: string;
	interactive: boolean;
	env: NodeJS.ProcessEnv;
};

export async function runCli(
	argv: string[] = process.argv.slice(2),
	context: CliContext = {
		cwd: process.cwd(),
		interactive: Boolean(process.stdout.isTTY && process.stdin.isTTY),
		env: process.env,
	},
): Promise<number> {
	const args = parseArgs(argv);
	if (args.help) {
		printHelp();
		return EXIT_PASS;
	}
	if (args.version) {
		process.stdout.write(`trellis ${readPackageVersion()}\n`);
		return EXIT_PASS;
	}
	if (args.errors?.length) {
		process.stderr.write(`${args.errors.join("\n")}\n`);
		process.stderr.write("Run `trellis --help` for usage.\n");
		return EXIT_USAGE;
	}
	if (args.unknown?.length) {
		process.stderr.write(`Unknown option(s): ${args.unknown.join(", ")}\n`);
		process.stderr.write("Run `trellis --help` for usage.\n");
		return EXIT_USAGE;
	}
	if (args.command === "init") {
		runInit(context.cwd);
		return EXIT_PASS;
	}

	try {
		return await runMatrix(args, context);
	} catch (error) {
		if (error instanceof ConfigError) {
			process.stderr.write(`Invalid configuration: ${error.message}\n`);
			return EXIT_USAGE;
		}
		process.stderr.write(`trellis: ${describeError(error)}\n`);
		return EXIT_FAIL;
	}
}

async function runMatrix(args: CliOptions, context: CliContext): Promise<number> {
	const { config } = loadConfig(context.cwd, args.config);
	const logger = createLogger({
		level: config.logLevel,
		// Keep stdout clean for the JSON report.
		...(args.json ? { sink: writeToStderr } : {}),
	});
	const useTui = context.interactive && !args.json;

	const spec = loadSpecification(args, context.cwd, logger);
	const trigger: TriggerEvent = args.event ?? "push";
	const branch = args.branch ?? context.env.GITHUB_REF_NAME;
	if (!matchesTrigger(spec.triggers, { event: trigger, ...(branch ? { branch } : {}) })) {
		logger.info(`${spec.name} does not run on ${trigger}${branch ? ` to ${branch}` : ""}; nothing to do`);
		return EXIT_PASS;
	}

	const useCache = config.cache && !args.noCache;
	const expanded = expand(spec, {
		variables: { os: runnerOs(process.platform), [RUNNER_OS_VAR]: runnerOs(process.platform) },
		...(useCache
			? { lockFingerprint: (cache: CacheSpec) => fingerprintLockFiles(context.cwd, cache.lockFiles) }
			: {}),
	});

	let groups = args.groups;
	if (useTui && !groups && !args.targets && spec.groups.length > 1) {
		intro("trellis");
		const selection = await multiselect({
			message: "Select target groups to run",
			options: spec.groups.map((group) => ({
				value: group.name,
				label: group.name,
				hint: `${group.targets.length} target(s), ${group.executor}`,
			})),
			initialValues: spec.groups.map((group) => group.name),
			required: true,
		});
		if (isCancel(selection)) {
			cancel("Canceled.");
			return EXIT_CANCELED;
		}
		groups = selection;
	}

	const jobs = withDefaultTimeout(
		filterJobs(expanded, { ...(groups ? { groups } : {}), ...(args.targets ? { targets: args.targets } : {}) }),
		config.jobTimeoutMs,
	);
	if (jobs.length === 0) {
		process.stderr.write("No jobs match the selection.\n");
		return EXIT_USAGE;
	}

	if (args.command === "plan") {
		if (args.json) {
			process.stdout.write(`${JSON.stringify(jobs, null, 2)}\n`);
		} else {
			process.stdout.write(`${formatPlan(jobs).join("\n")}\n`);
		}
		return EXIT_PASS;
	}

	const runId = createRunId();
	const concurrencyGroup = spec.concurrencyGroup ?? `run-${runId}`;
	const events = new EventHub();
	const scheduler = buildScheduler(config, context, logger, useCache, events.emit);
	if (!useTui) {
		events.subscribe(logProgress(logger));
	}

	let interrupted = false;
	const onSigint = (): void => {
		interrupted = true;
		logger.warn("interrupted; canceling running jobs");
		scheduler.cancel(runId, new Error("Interrupted"));
	};
	process.on("SIGINT", onSigint);

	let sealed: SealedRun;
	try {
		const run = scheduler.run(jobs, {
			concurrency: args.concurrency ?? config.concurrency,
			concurrencyGroup,
			trigger,
			runId,
		});
		sealed = useTui
			? await runWithInk(spec.name, jobs, run, events, () => {
					interrupted = true;
					scheduler.cancel(runId, new Error("Canceled from the run view"));
				})
			: await run;
	} finally {
		process.off("SIGINT", onSigint);
	}

	const report = buildReport(sealed);
	if (args.report) {
		writeReportFile(path.resolve(context.cwd, args.report), report);
	}
	if (args.json) {
		process.stdout.write(`${JSON.stringify(report, null, 2)}\n`);
	} else {
		process.stdout.write(`${formatReport(report).join("\n")}\n`);
		if (useTui) {
			outro(report.verdict === "pass" ? "All targets passed." : "Some targets failed.");
		}
	}

	if (interrupted) {
		return EXIT_CANCELED;
	}
	return report.verdict === "pass" ? EXIT_PASS : EXIT_FAIL;
}

function loadSpecification(args: CliOptions, cwd: string, logger: Logger): MatrixSpecification {
	if (args.workflow) {
		const workflowPath = path.resolve(cwd, args.workflow);
		if (!fs.existsSync(workflowPath)) {
			throw new ConfigError(workflowPath, "workflow file not found");
		}
		const imported = importWorkflowFile(workflowPath);
		for (const warning of imported.warnings) {
			logger.warn(warning);
		}
		return imported.spec;
	}
	const matrixPath = path.resolve(cwd, args.matrix ?? DEFAULT_MATRIX_PATH);
	if (!fs.existsSync(matrixPath)) {
		throw new ConfigError(matrixPath, "matrix document not found (use --matrix or --workflow)");
	}
	return parseMatrixFile(matrixPath);
}

function buildScheduler(
	config: TrellisConfig,
	context: CliContext,
	logger: Logger,
	useCache: boolean,
	onEvent: EngineEventListener,
): Scheduler {
	const runner = new NodeProcessRunner();
	const native = new NativeToolchainProvider({
		program: config.toolchains.native.program,
		platforms: config.toolchains.native.platforms,
	});
	const { cross: crossConfig } = config.toolchains;
	const cross = new CrossToolchainProvider(
		{
			program: crossConfig.program,
			...(crossConfig.install ? { install: crossConfig.install } : {}),
			...(crossConfig.setup ? { setup: crossConfig.setup } : {}),
			supportedTargets: [...loadSupportedTargets(), ...crossConfig.extraTargets],
		},
		runner,
	);

	return new Scheduler({
		registry: new ConcurrencyRegistry(),
		executor: new JobExecutor({ runner, logger: logger.child("exec"), baseEnv: context.env }),
		workspaces: new DirectoryWorkspaceFactory({
			sourceDir: context.cwd,
			workRoot: resolveUserPath(context.cwd, config.workDir),
			mode: config.isolation,
			keep: config.keepWorkspaces,
		}),
		createResolver: (signal) =>
			new ToolchainResolver([native, cross], {
				cwd: context.cwd,
				env: context.env,
				logger: logger.child("toolchain"),
				signal,
			}),
		...(useCache
			? {
					cache: new CacheManager(
						new FsCacheStore(resolveUserPath(context.cwd, config.cacheDir)),
						logger.child("cache"),
					),
				}
			: {}),
		retries: config.retries,
		logger,
		onEvent,
	});
}

function withDefaultTimeout(jobs: JobSpec[], timeoutMs: number | undefined): JobSpec[] {
	if (timeoutMs === undefined) {
		return jobs;
	}
	return jobs.map((job) => (job.timeoutMs === undefined ? Object.freeze({ ...job, timeoutMs }) : job));
}

export function logProgress(logger: Logger): EngineEventListener {
	return (event: EngineRuntimeEvent) => {
		switch (event.type) {
			case "run-started":
				logger.info(`run ${event.runId}: ${event.jobs.length} job(s) on ${event.trigger}`);
				break;
			case "run-superseding":
				logger.info(`superseding run ${event.supersededRunId}`);
				break;
			case "job-started":
				logger.info(`${event.jobId} started${event.attempt > 1 ? ` (attempt ${event.attempt})` : ""}`);
				break;
			case "job-step":
				logger.debug(`${event.jobId} step ${event.stepIndex + 1}: ${event.stepName}`);
				break;
			case "job-finished": {
				const { outcome } = event;
				const detail = outcome.failure ? `: ${outcome.failure.message}` : "";
				logger.info(`${outcome.jobId} ${outcome.status} in ${formatDuration(outcome.durationMs)}${detail}`);
				break;
			}
			case "jobs-canceled":
				logger.warn(`${event.jobIds.length} job(s) canceled before starting`);
				break;
			case "job-output":
			case "run-finished":
				break;
		}
	};
}

async function runWithInk(
	title: string,
	jobs: readonly JobSpec[],
	run: Promise<SealedRun>,
	events: EventHub,
	onCancel: () => void,
): Promise<SealedRun> {
	const { waitUntilExit, unmount } = render(
		React.createElement(RunView, { title, jobs, subscribe: events.subscribe, onCancel }),
		{ exitOnCtrlC: false },
	);
	try {
		const sealed = await run;
		await waitUntilExit();
		return sealed;
	} finally {
		unmount();
	}
}

/**
 * Fans engine events out to listeners. Events emitted before the first
 * listener subscribes are replayed to it, since the run starts before the
 * view mounts.
 */
export class EventHub {
	private readonly listeners = new Set<EngineEventListener>();
	private backlog: EngineRuntimeEvent[] | undefined = [];

	readonly emit = (event: EngineRuntimeEvent): void => {
		this.backlog?.push(event);
		for (const listener of this.listeners) {
			listener(event);
		}
	};

	readonly subscribe = (listener: EngineEventListener): (() => void) => {
		for (const event of this.backlog ?? []) {
			listener(event);
		}
		this.backlog = undefined;
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	};
}

function writeToStderr(_level: string, line: string): void {
	process.stderr.write(`${line}\n`);
}

export function runnerOs(platform: NodeJS.Platform): string {
	switch (platform) {
		case "darwin":
			return "macOS";
		case "win32":
			return "Windows";
		default:
			return "Linux";
	}
}
