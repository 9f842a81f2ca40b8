export function formatDuration(durationMs: number): string {
	if (durationMs < 1000) {
		return `${Math.round(durationMs)}ms`;
	}
	const seconds = durationMs / 1000;
	if (seconds < 60) {
		return `${seconds.toFixed(1)}s`;
	}
	const minutes = Math.floor(seconds / 60);
	const remainder = Math.round(seconds % 60);
	return `${minutes}m${remainder}s`;
}

/** Last `limit` non-empty lines of `text`, without trailing carriage returns. */
export function tailLines(text: string, limit: number): string[] {
	if (limit <= 0) {
		return [];
	}
	const lines = text
		.split("\n")
		.map((line) => line.replace(/\r$/, ""))
		.filter((line) => line.length > 0);
	return lines.slice(-limit);
}
