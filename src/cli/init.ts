import fs from "node:fs";
import path from "node:path";
import { DEFAULT_MATRIX_PATH } from "../core/parser.js";

const ignoreEntry = ".trellis";
const starterMatrixUrl = new URL("../../data/starter-matrix.yml", import.meta.url);

export type GitignoreResult = "added" | "present" | "skipped";
export type StarterResult = "created" | "exists";

export function ensureGitignore(repoRoot: string): GitignoreResult {
	if (!fs.existsSync(path.join(repoRoot, ".git"))) {
		return "skipped";
	}

	const ignorePath = path.join(repoRoot, ".gitignore");
	const current = fs.existsSync(ignorePath) ? fs.readFileSync(ignorePath, "utf-8") : "";
	if (current.split(/\r?\n/).some((line) => normalizeIgnoreLine(line) === ignoreEntry)) {
		return "present";
	}

	fs.writeFileSync(ignorePath, appendEntry(current));
	return "added";
}

/** Writes the starter matrix document unless one is already there. */
export function writeStarterMatrix(repoRoot: string, fileName = DEFAULT_MATRIX_PATH): StarterResult {
	const target = path.join(repoRoot, fileName);
	if (fs.existsSync(target)) {
		return "exists";
	}
	fs.copyFileSync(starterMatrixUrl, target);
	return "created";
}

export function runInit(repoRoot: string): void {
	switch (ensureGitignore(repoRoot)) {
		case "added":
			process.stdout.write(`Added '${ignoreEntry}' to .gitignore.\n`);
			break;
		case "present":
			process.stdout.write(`'${ignoreEntry}' is already in .gitignore.\n`);
			break;
		case "skipped":
			process.stdout.write("Skipped .gitignore: not a git repository.\n");
			break;
	}

	if (writeStarterMatrix(repoRoot) === "created") {
		process.stdout.write(`Created ${DEFAULT_MATRIX_PATH}.\n`);
	} else {
		process.stdout.write(`${DEFAULT_MATRIX_PATH} already exists; left unchanged.\n`);
	}
}

function normalizeIgnoreLine(line: string): string {
	return line.trim().replace(/^\/+/, "").replace(/\/+$/, "");
}

function appendEntry(current: string): string {
	if (current.trim().length === 0) {
		return `${ignoreEntry}\n`;
	}
	const prefix = current.endsWith("\n") ? current : `${current}\n`;
	return `${prefix}${ignoreEntry}\n`;
}
