import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import type { ZodError } from "zod";
import { ConfigError } from "../core/errors.js";
import { ConfigSchema, type TrellisConfig } from "./schema.js";

export type ConfigLoadResult = {
	config: TrellisConfig;
	path?: string;
};

export const DEFAULT_CONFIG_PATH = ".trellis.yml";

export function loadConfig(repoRoot: string, configPath?: string): ConfigLoadResult {
	const resolved = path.resolve(repoRoot, configPath ?? DEFAULT_CONFIG_PATH);
	if (!fs.existsSync(resolved)) {
		if (configPath) {
			throw new ConfigError(resolved, "config file not found");
		}
		return { config: ConfigSchema.parse({}), path: undefined };
	}

	const parsed = parseYamlFile(resolved);
	const result = ConfigSchema.safeParse(parsed ?? {});
	if (!result.success) {
		throw new ConfigError(resolved, formatZodError(result.error));
	}
	return { config: result.data, path: resolved };
}

export function parseYamlFile(filePath: string): unknown {
	const raw = fs.readFileSync(filePath, "utf-8");
	const doc = YAML.parseDocument(raw);
	if (doc.errors.length > 0) {
		const error = doc.errors[0];
		const line = error.linePos?.[0]?.line ?? 0;
		const col = error.linePos?.[0]?.col ?? 0;
		throw new ConfigError(`${filePath}:${line}:${col}`, error.message);
	}
	return doc.toJSON();
}

export function formatZodError(error: ZodError): string {
	return error.issues
		.map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
		.join("; ");
}
