import fs from "node:fs";
import path from "node:path";
import type { JobSpec } from "../core/types.js";
import type { RunReport } from "../report/report.js";
import { formatDuration } from "../tui/run-view/format.js";
import { STATUS_LABELS, formatStatusText } from "../tui/run-view/utils/status.js";
import { formatCommandLine } from "../utils/command-line.js";

export function formatPlan(jobs: readonly JobSpec[]): string[] {
	const lines: string[] = [];
	let group: string | undefined;
	for (const job of jobs) {
		if (job.group !== group) {
			group = job.group;
			lines.push(`${group} (${job.executor})`);
		}
		const extras = [
			job.cache ? `cache ${job.cache.namespace}` : undefined,
			job.timeoutMs !== undefined ? `timeout ${formatDuration(job.timeoutMs)}` : undefined,
		].filter(Boolean);
		lines.push(`  ${job.target}${extras.length > 0 ? `  [${extras.join(", ")}]` : ""}`);
		for (const step of job.steps) {
			lines.push(`    ${step.index + 1}. ${step.name}: ${formatCommandLine(step.command, step.args)}`);
		}
	}
	return lines;
}

export function formatReport(report: RunReport): string[] {
	const lines = report.jobs.map((job) => {
		const glyph = formatStatusText(job.status, 0);
		const label = STATUS_LABELS[job.status].padEnd(9);
		const retried = job.attempts > 1 ? ` (${job.attempts} attempts)` : "";
		const cache = job.cache ? `  cache:${job.cache.hit}${job.cache.saved ? "+saved" : ""}` : "";
		return `${glyph} ${label} ${job.jobId}  ${formatDuration(job.durationMs)}${retried}${cache}`;
	});

	if (report.failures.length > 0) {
		lines.push("", "Failures:");
		for (const failure of report.failures) {
			const step = failure.failingStep
				? ` at step ${failure.failingStep.index + 1} (${failure.failingStep.name})`
				: "";
			lines.push(`  ${failure.jobId} [${failure.kind}]${step}: ${failure.message}`);
		}
	}

	const { jobs, passed, failed } = report.totals;
	const superseded = report.superseded ? " (superseded)" : "";
	lines.push(
		"",
		`${report.verdict === "pass" ? "PASS" : "FAIL"}${superseded}: ${passed}/${jobs} passed, ${failed} failed` +
			(report.durationMs !== undefined ? ` in ${formatDuration(report.durationMs)}` : ""),
	);
	return lines;
}

export function writeReportFile(filePath: string, report: RunReport): void {
	fs.mkdirSync(path.dirname(filePath), { recursive: true });
	fs.writeFileSync(filePath, `${JSON.stringify(report, null, 2)}\n`);
}
