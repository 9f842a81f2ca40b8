import { z } from "zod";

export const NativeToolchainSchema = z.object({
	program: z.string().min(1).default("cargo"),
	platforms: z.record(z.string()).default({}),
});

export const CrossToolchainSchema = z.object({
	program: z.string().min(1).default("cross"),
	install: z.string().optional(),
	setup: z.string().optional(),
	extraTargets: z.array(z.string()).default([]),
});

export const ConfigSchema = z.object({
	concurrency: z.number().int().positive().default(4),
	retries: z.number().int().min(0).default(0),
	jobTimeoutMs: z.number().int().positive().optional(),
	isolation: z.enum(["copy", "none"]).default("copy"),
	keepWorkspaces: z.boolean().default(false),
	cacheDir: z.string().default(".trellis/cache"),
	workDir: z.string().default(".trellis/work"),
	cache: z.boolean().default(true),
	logLevel: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
	toolchains: z
		.object({
			native: NativeToolchainSchema.default({}),
			cross: CrossToolchainSchema.default({}),
		})
		.default({}),
});

export type TrellisConfig = z.infer<typeof ConfigSchema>;

const envSchema = z.record(z.union([z.string(), z.number(), z.boolean()]).transform(String));

const StepSchema = z.union([
	z.object({
		name: z.string().optional(),
		run: z.string().min(1),
		env: envSchema.optional(),
	}),
	z.object({
		name: z.string().optional(),
		command: z.string().min(1),
		args: z.array(z.union([z.string(), z.number()]).transform(String)).default([]),
		env: envSchema.optional(),
	}),
]);

const TargetSchema = z.union([
	z.string().min(1),
	z.object({
		id: z.string().min(1),
		vars: envSchema.optional(),
		env: envSchema.optional(),
		timeoutMs: z.number().int().positive().optional(),
		platform: z.enum(["linux", "darwin", "win32"]).optional(),
	}),
]);

export const CacheSchema = z.object({
	namespace: z.string().min(1),
	paths: z.array(z.string()).min(1),
	lockFiles: z.array(z.string()).default([]),
	restorePrefixes: z.array(z.string()).default([]),
});

export const GroupSchema = z
	.object({
		name: z.string().min(1),
		executor: z.enum(["native", "cross"]).default("native"),
		targets: z.array(TargetSchema).min(1),
		steps: z.array(StepSchema).min(1),
		env: envSchema.optional(),
		timeoutMs: z.number().int().positive().optional(),
		cache: CacheSchema.optional(),
	})
	.superRefine((group, ctx) => {
		const seen = new Set<string>();
		group.targets.forEach((target, index) => {
			const id = typeof target === "string" ? target : target.id;
			if (seen.has(id)) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					path: ["targets", index],
					message: `Duplicate target "${id}" in group "${group.name}"`,
				});
			}
			seen.add(id);
		});
	});

const TriggerSchema = z
	.union([
		z.enum(["push", "pull_request"]),
		z.array(z.enum(["push", "pull_request"])),
		z.object({
			push: z
				.object({ branches: z.array(z.string()).default([]) })
				.nullable()
				.optional(),
			pull_request: z.unknown().optional(),
		}),
	])
	.optional();

export const MatrixDocumentSchema = z
	.object({
		name: z.string().default("matrix"),
		concurrency: z
			.union([z.string().min(1), z.object({ group: z.string().min(1) })])
			.optional(),
		on: TriggerSchema,
		cache: CacheSchema.optional(),
		groups: z.array(GroupSchema).min(1),
	})
	.superRefine((doc, ctx) => {
		const seen = new Set<string>();
		doc.groups.forEach((group, index) => {
			if (seen.has(group.name)) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					path: ["groups", index, "name"],
					message: `Duplicate group "${group.name}"`,
				});
			}
			seen.add(group.name);
		});
	});

export type MatrixDocument = z.infer<typeof MatrixDocumentSchema>;
export type StepDocument = z.infer<typeof StepSchema>;
export type TriggerDocument = z.infer<typeof TriggerSchema>;
