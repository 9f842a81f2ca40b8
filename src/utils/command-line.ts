export type Invocation = {
	command: string;
	args: string[];
};

const SHELL_SYNTAX = /[|&;<>`\n]|\$\(/;

/**
 * Turns a `run:` line into a command and its arguments. Anything that needs a
 * shell (pipes, redirects, chained commands, multi-line scripts) is handed to
 * `sh -c` unchanged.
 */
export function toInvocation(run: string): Invocation {
	const trimmed = run.trim();
	if (SHELL_SYNTAX.test(stripQuoted(trimmed))) {
		return { command: "sh", args: ["-c", trimmed] };
	}
	const [command = "", ...args] = splitCommandLine(trimmed);
	return { command, args };
}

export function splitCommandLine(input: string): string[] {
	const tokens: string[] = [];
	let current = "";
	let quote: "'" | '"' | null = null;
	let pending = false;

	for (let i = 0; i < input.length; i += 1) {
		const char = input[i];
		if (quote) {
			if (char === quote) {
				quote = null;
			} else if (char === "\\" && quote === '"' && i + 1 < input.length) {
				i += 1;
				current += input[i];
			} else {
				current += char;
			}
			continue;
		}
		if (char === "'" || char === '"') {
			quote = char;
			pending = true;
			continue;
		}
		if (char === "\\" && i + 1 < input.length) {
			i += 1;
			current += input[i];
			pending = true;
			continue;
		}
		if (/\s/.test(char)) {
			if (pending) {
				tokens.push(current);
				current = "";
				pending = false;
			}
			continue;
		}
		current += char;
		pending = true;
	}

	if (pending) {
		tokens.push(current);
	}
	return tokens;
}

export function formatCommandLine(command: string, args: readonly string[]): string {
	return [command, ...args].map(quoteArg).join(" ");
}

function quoteArg(value: string): string {
	if (value.length === 0 || /[\s"'\\]/.test(value)) {
		return JSON.stringify(value);
	}
	return value;
}

function stripQuoted(input: string): string {
	return input.replace(/'[^']*'|"(?:[^"\\]|\\.)*"/g, "");
}
