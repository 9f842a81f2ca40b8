import type { RunStatus } from "../../../core/types.js";

export const SPINNER_FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];

export const STATUS_LABELS: Record<RunStatus, string> = {
	pending: "queued",
	running: "running",
	success: "success",
	failed: "failed",
	canceled: "canceled",
	"timed-out": "timed out",
};

export function formatStatusText(status: RunStatus, spinnerIndex: number): string {
	switch (status) {
		case "success":
			return "●";
		case "failed":
			return "✕";
		case "timed-out":
			return "⧗";
		case "running":
			return SPINNER_FRAMES[spinnerIndex % SPINNER_FRAMES.length] ?? "⠋";
		case "canceled":
			return "◌";
		default:
			return "○";
	}
}

export function colorForStatus(status: RunStatus): "green" | "red" | "yellow" | "gray" | undefined {
	switch (status) {
		case "success":
			return "green";
		case "failed":
		case "timed-out":
			return "red";
		case "running":
			return "yellow";
		case "canceled":
			return "gray";
		default:
			return undefined;
	}
}
