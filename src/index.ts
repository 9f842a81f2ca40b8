export { runCli, EXIT_CANCELED, EXIT_FAIL, EXIT_PASS, EXIT_USAGE } from "./cli/run-cli.js";
export type { CliContext } from "./cli/run-cli.js";

export { parseMatrixDocument, parseMatrixFile, matchesTrigger } from "./core/parser.js";
export { importWorkflow, importWorkflowFile } from "./core/workflow.js";
export type { WorkflowImport } from "./core/workflow.js";
export { expand, filterJobs, interpolate } from "./core/expand.js";
export type { ExpandOptions, JobFilter } from "./core/expand.js";
export type { EngineEventListener, EngineRuntimeEvent } from "./core/engine.js";
export {
	CacheWriteError,
	ConfigError,
	InvariantViolationError,
	JobTimeoutError,
	SupersededError,
	UnresolvedTargetError,
	describeError,
} from "./core/errors.js";
export type * from "./core/types.js";

export { loadConfig } from "./config/load-config.js";
export type { TrellisConfig } from "./config/schema.js";

export { ToolchainResolver } from "./toolchain/resolver.js";
export { NativeToolchainProvider } from "./toolchain/native.js";
export type { NativeToolchainOptions } from "./toolchain/native.js";
export { CrossToolchainProvider } from "./toolchain/cross.js";
export type { CrossToolchainOptions } from "./toolchain/cross.js";
export type { ResolveContext, ToolchainProvider } from "./toolchain/provider.js";

export { CacheManager, UNCHANGED } from "./cache/manager.js";
export type { CacheArchive, CacheHandle, CacheReleaseResult, CacheStats } from "./cache/manager.js";
export { FsCacheStore } from "./cache/store.js";
export type { CacheEntry, CacheStore } from "./cache/store.js";
export { deriveCacheKey, fingerprintLockFiles } from "./cache/key.js";

export { JobExecutor } from "./executor/job-executor.js";
export type { ExecutionContext, JobExecutorOptions } from "./executor/job-executor.js";
export { NodeProcessRunner } from "./executor/process.js";
export type { ProcessRequest, ProcessResult, ProcessRunner } from "./executor/process.js";
export { DirectoryWorkspaceFactory } from "./executor/workspace.js";
export type { IsolationMode, Workspace, WorkspaceFactory } from "./executor/workspace.js";

export { ConcurrencyRegistry } from "./scheduler/concurrency.js";
export type { AcquireOptions, ConcurrencyLease } from "./scheduler/concurrency.js";
export { Scheduler, createRunId } from "./scheduler/scheduler.js";
export type { ScheduleOptions, SchedulerOptions } from "./scheduler/scheduler.js";

export { aggregate, ResultAggregator } from "./report/aggregate.js";
export type { SealedRun } from "./report/aggregate.js";
export { buildReport } from "./report/report.js";
export type { RunReport } from "./report/report.js";

export { createLogger, silentLogger } from "./utils/logger.js";
export type { Logger, LogLevel } from "./utils/logger.js";
