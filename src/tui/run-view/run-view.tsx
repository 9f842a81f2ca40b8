import { Box, Text, useApp, useInput, useStdout } from "ink";
import { useEffect, useMemo, useState } from "react";
import type { EngineEventListener } from "../../core/engine.js";
import type { JobSpec } from "../../core/types.js";
import { formatDuration, tailLines } from "./format.js";
import { applyEvent, countByStatus, createRunViewState } from "./model.js";
import { formatHelpText } from "./utils/help.js";
import { colorForStatus, formatStatusText, STATUS_LABELS } from "./utils/status.js";

export type RunViewProps = {
	title: string;
	jobs: readonly JobSpec[];
	/** Registers a listener for engine events and returns its unsubscribe. */
	subscribe: (listener: EngineEventListener) => () => void;
	onCancel: () => void;
};

const JOB_ROW_WIDTH = 44;
const ROW_PADDING_X = 1;
const RESERVED_ROWS = 10;
const SPINNER_INTERVAL_MS = 80;

export function RunView({ title, jobs, subscribe, onCancel }: RunViewProps): JSX.Element {
	const { exit } = useApp();
	const { stdout } = useStdout();
	const [state, setState] = useState(() => createRunViewState(jobs));
	const [selectedIndex, setSelectedIndex] = useState(0);
	const [spinnerIndex, setSpinnerIndex] = useState(0);
	const [cancelRequested, setCancelRequested] = useState(false);
	const finished = state.verdict !== undefined;

	useEffect(() => subscribe((event) => setState((prev) => applyEvent(prev, event))), [subscribe]);

	useEffect(() => {
		if (finished) {
			return undefined;
		}
		const interval = setInterval(() => {
			setSpinnerIndex((prev) => prev + 1);
		}, SPINNER_INTERVAL_MS);
		return () => clearInterval(interval);
	}, [finished]);

	useEffect(() => {
		if (finished) {
			exit();
		}
	}, [exit, finished]);

	useInput((input, key) => {
		if (key.upArrow || input === "k") {
			setSelectedIndex((prev) => Math.max(0, prev - 1));
			return;
		}
		if (key.downArrow || input === "j") {
			setSelectedIndex((prev) => Math.min(state.jobs.length - 1, prev + 1));
			return;
		}
		if ((input === "q" || (key.ctrl && input === "c")) && !finished && !cancelRequested) {
			setCancelRequested(true);
			onCancel();
		}
	});

	const selected = state.jobs[selectedIndex];
	const maxOutputLines = Math.max(3, (stdout.rows ?? 40) - state.jobs.length - RESERVED_ROWS);
	const outputLines = useMemo(
		() => (selected ? tailLines(selected.output, maxOutputLines) : []),
		[maxOutputLines, selected],
	);
	const counts = countByStatus(state.jobs);
	const done = state.jobs.length - counts.pending - counts.running;

	return (
		<Box flexDirection="column" padding={1}>
			<Box flexDirection="column" marginBottom={1}>
				<Text>
					{title}
					{state.runId ? ` · ${state.runId}` : ""}
				</Text>
				{state.supersededRunId ? (
					<Text dimColor>Superseded run {state.supersededRunId}</Text>
				) : null}
			</Box>

			<Box flexDirection="row">
				<Box flexDirection="column" width={JOB_ROW_WIDTH}>
					{state.jobs.map((job, index) => {
						const isSelected = index === selectedIndex;
						const firstOfGroup = index === 0 || state.jobs[index - 1]?.group !== job.group;
						const glyph = formatStatusText(job.status, spinnerIndex);
						return (
							<Box flexDirection="column" key={job.jobId}>
								{firstOfGroup ? <Text dimColor>{job.group}</Text> : null}
								<Text
									color={colorForStatus(job.status)}
									backgroundColor={isSelected ? "gray" : undefined}
									bold={isSelected}
								>
									{formatRow(`${glyph} ${job.target}`, JOB_ROW_WIDTH, ROW_PADDING_X)}
								</Text>
							</Box>
						);
					})}
				</Box>
				<Box flexDirection="column" marginLeft={1} flexGrow={1}>
					{selected ? (
						<>
							<Text>{selected.jobId}</Text>
							<Text dimColor>
								{STATUS_LABELS[selected.status]}
								{selected.stepName && selected.status === "running"
									? ` · step ${(selected.stepIndex ?? 0) + 1}: ${selected.stepName}`
									: ""}
								{selected.attempt > 1 ? ` · attempt ${selected.attempt}` : ""}
								{selected.durationMs !== undefined ? ` · ${formatDuration(selected.durationMs)}` : ""}
							</Text>
							{selected.message ? <Text color="red">{selected.message}</Text> : null}
							<Box flexDirection="column" marginTop={1}>
								{outputLines.length === 0 ? (
									<Text dimColor>{selected.status === "pending" ? "Queued." : "No output yet."}</Text>
								) : (
									outputLines.map((line, lineIndex) => (
										<Text key={`${selected.jobId}-${lineIndex}`} dimColor wrap="truncate-end">
											{line}
										</Text>
									))
								)}
							</Box>
						</>
					) : (
						<Text dimColor>No jobs.</Text>
					)}
				</Box>
			</Box>

			<Box marginTop={1}>
				<Text>
					{done}/{state.jobs.length} done · <Text color="green">{counts.success} passed</Text>
					{counts.failed + counts["timed-out"] > 0 ? (
						<Text color="red"> · {counts.failed + counts["timed-out"]} failed</Text>
					) : null}
					{counts.canceled > 0 ? <Text color="gray"> · {counts.canceled} canceled</Text> : null}
				</Text>
			</Box>
			<Text dimColor>{formatHelpText({ finished, cancelRequested })}</Text>
		</Box>
	);
}

function formatRow(value: string, width: number, paddingX: number): string {
	const innerWidth = Math.max(0, width - paddingX * 2);
	const clipped =
		value.length <= innerWidth
			? value
			: innerWidth > 1
				? `${value.slice(0, innerWidth - 1)}…`
				: value.slice(0, innerWidth);
	return `${" ".repeat(paddingX)}${clipped.padEnd(innerWidth, " ")}${" ".repeat(paddingX)}`;
}
