export type HelpTextInput = {
	finished: boolean;
	cancelRequested: boolean;
};

export function formatHelpText({ finished, cancelRequested }: HelpTextInput): string {
	if (finished) {
		return "Run finished";
	}
	if (cancelRequested) {
		return "Canceling… waiting for running jobs to stop";
	}
	return "Up/Down: select job · Q: cancel run";
}
