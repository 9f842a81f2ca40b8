import fs from "node:fs";

export type CliCommand = "run" | "plan" | "init";

export type CliOptions = {
	command: CliCommand;
	matrix?: string;
	workflow?: string;
	config?: string;
	groups?: string[];
	targets?: string[];
	event?: "push" | "pull_request";
	branch?: string;
	concurrency?: number;
	retries?: number;
	json?: boolean;
	report?: string;
	noCache?: boolean;
	help?: boolean;
	version?: boolean;
	unknown?: string[];
	errors?: string[];
};

export function parseArgs(argv: string[]): CliOptions {
	const options: CliOptions = { command: "run", unknown: [], errors: [] };
	const args = [...argv];
	if (args[0] && !args[0].startsWith("-")) {
		const command = args[0];
		if (command === "run" || command === "plan" || command === "init") {
			options.command = command;
		} else {
			options.errors?.push(`Unknown command: ${command}`);
		}
		args.shift();
	}

	while (args.length) {
		const arg = args.shift();
		switch (arg) {
			case "--help":
			case "-h":
				options.help = true;
				break;
			case "--version":
			case "-v":
				options.version = true;
				break;
			case "--matrix":
			case "-m":
				options.matrix = takeValue(arg, args, options);
				break;
			case "--workflow":
				options.workflow = takeValue("--workflow", args, options);
				break;
			case "--config":
				options.config = takeValue("--config", args, options);
				break;
			case "--group":
				options.groups = collectList(options.groups, takeValue("--group", args, options));
				break;
			case "--target":
				options.targets = collectList(options.targets, takeValue("--target", args, options));
				break;
			case "--event":
				{
					const value = takeValue("--event", args, options);
					if (value === "push" || value === "pull_request") {
						options.event = value;
					} else if (value) {
						options.errors?.push(`Invalid value for --event: ${value} (expected push|pull_request)`);
					}
				}
				break;
			case "--branch":
				options.branch = takeValue("--branch", args, options);
				break;
			case "--concurrency":
			case "-j":
				options.concurrency = takeCount(arg, args, options, 1);
				break;
			case "--retries":
				options.retries = takeCount("--retries", args, options, 0);
				break;
			case "--json":
				options.json = true;
				break;
			case "--report":
				options.report = takeValue("--report", args, options);
				break;
			case "--no-cache":
				options.noCache = true;
				break;
			default:
				if (arg) {
					options.unknown?.push(arg);
				}
				break;
		}
	}

	if (options.matrix && options.workflow) {
		options.errors?.push("--matrix and --workflow are mutually exclusive");
	}

	return options;
}

export function printHelp(): void {
	process.stdout.write(`trellis <command> [options]\n\n`);
	process.stdout.write(`Commands:\n`);
	process.stdout.write(`  run                   Run the matrix (default)\n`);
	process.stdout.write(`  plan                  Print the expanded jobs without running them\n`);
	process.stdout.write(`  init                  Write a starter matrix and add .trellis to .gitignore\n\n`);
	process.stdout.write(`Options:\n`);
	process.stdout.write(`  -m, --matrix <file>   Matrix document (default: trellis.matrix.yml)\n`);
	process.stdout.write(`  --workflow <file>     Import a GitHub Actions workflow instead\n`);
	process.stdout.write(`  --config <file>       Settings file (default: .trellis.yml)\n`);
	process.stdout.write(`  --group <names>       Comma-separated groups to run (repeatable)\n`);
	process.stdout.write(`  --target <ids>        Comma-separated targets to run (repeatable)\n`);
	process.stdout.write(`  --event <name>        Triggering event: push or pull_request (default: push)\n`);
	process.stdout.write(`  --branch <name>       Branch the event happened on\n`);
	process.stdout.write(`  -j, --concurrency <n> Jobs to run at once\n`);
	process.stdout.write(`  --retries <n>         Extra attempts for jobs whose steps fail\n`);
	process.stdout.write(`  --no-cache            Skip cache restore and save\n`);
	process.stdout.write(`  --report <file>       Write the JSON report to a file\n`);
	process.stdout.write(`  --json                Print the JSON report\n`);
	process.stdout.write(`  -h, --help            Show help\n`);
	process.stdout.write(`  -v, --version         Show version\n`);
}

export function readPackageVersion(): string {
	const pkgUrl = new URL("../../package.json", import.meta.url);
	const raw = fs.readFileSync(pkgUrl, "utf-8");
	const parsed: unknown = JSON.parse(raw);
	if (typeof parsed === "object" && parsed !== null && "version" in parsed) {
		return String(parsed.version);
	}
	return "0.0.0";
}

function collectList(current: string[] | undefined, value?: string): string[] | undefined {
	if (!value) {
		return current;
	}
	return [...(current ?? []), ...value.split(",").filter(Boolean)];
}

function takeCount(flag: string, args: string[], options: CliOptions, min: number): number | undefined {
	const value = takeValue(flag, args, options);
	if (value === undefined) {
		return undefined;
	}
	const count = Number(value);
	if (!Number.isInteger(count) || count < min) {
		options.errors?.push(`Invalid value for ${flag}: ${value} (expected an integer >= ${min})`);
		return undefined;
	}
	return count;
}

function takeValue(flag: string, args: string[], options: CliOptions): string | undefined {
	const value = args.shift();
	if (!value || value.startsWith("-")) {
		options.errors?.push(`Missing value for ${flag}`);
		if (value) {
			args.unshift(value);
		}
		return undefined;
	}
	return value;
}
