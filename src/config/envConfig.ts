import { z } from "zod";

const EnvSchema = z.object({
	// Dataset configuration
	DOCS_SEARCH_DATASET: z.string().optional(),
	DOCS_SEARCH_LOAD_ON_FIRST_SEARCH: z
		.string()
		.optional()
		.transform(val => val === "true" || val === "1"),
	// Logging
	DOCS_SEARCH_LOG_LEVEL: z
		.enum(["debug", "info", "warn", "error", "silent"])
		.optional()
		.default("info"),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

export const envConfig: EnvConfig = EnvSchema.parse(process.env);
