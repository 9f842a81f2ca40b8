import fs from "node:fs";
import path from "node:path";
import { ensureWithinBase, sanitizePathSegment } from "../utils/path-safety.js";

export type IsolationMode = "copy" | "none";

export type Workspace = {
	dir: string;
	dispose(): Promise<void>;
};

export interface WorkspaceFactory {
	create(runId: string, jobId: string): Promise<Workspace>;
}

export type DirectoryWorkspaceOptions = {
	sourceDir: string;
	workRoot: string;
	mode: IsolationMode;
	keep?: boolean;
	exclude?: string[];
};

const DEFAULT_EXCLUDES = [".git", ".trellis", "node_modules", "target"];

/**
 * `copy` gives every job a private copy of the source tree under
 * `<workRoot>/<run>/<job>`; `none` runs all jobs in the source tree itself.
 */
export class DirectoryWorkspaceFactory implements WorkspaceFactory {
	private readonly excluded: Set<string>;

	constructor(private readonly options: DirectoryWorkspaceOptions) {
		this.excluded = new Set(options.exclude ?? DEFAULT_EXCLUDES);
	}

	async create(runId: string, jobId: string): Promise<Workspace> {
		if (this.options.mode === "none") {
			return { dir: this.options.sourceDir, dispose: async () => {} };
		}

		const runDir = ensureWithinBase(this.options.workRoot, sanitizePathSegment(runId, "run"), "run workspace");
		const dir = ensureWithinBase(runDir, sanitizePathSegment(jobId, "job"), "job workspace");
		await fs.promises.rm(dir, { recursive: true, force: true });
		await fs.promises.mkdir(dir, { recursive: true });

		const source = path.resolve(this.options.sourceDir);
		const workRoot = path.resolve(this.options.workRoot);
		const isExcluded = (from: string): boolean => {
			const resolved = path.resolve(from);
			if (resolved === workRoot || resolved.startsWith(`${workRoot}${path.sep}`)) {
				return true;
			}
			return this.excluded.has(path.basename(resolved));
		};
		// Entry by entry: the work root usually lives inside the source tree.
		for (const entry of await fs.promises.readdir(source)) {
			const from = path.join(source, entry);
			if (isExcluded(from)) {
				continue;
			}
			await fs.promises.cp(from, path.join(dir, entry), {
				recursive: true,
				filter: (nested) => !isExcluded(nested),
			});
		}

		return {
			dir,
			dispose: async () => {
				if (this.options.keep) {
					return;
				}
				await fs.promises.rm(dir, { recursive: true, force: true });
			},
		};
	}
}
