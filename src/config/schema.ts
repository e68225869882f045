import { z } from "zod";

export const pathmatchConfigSchema = z
	.object({
		patterns_file: z.string().min(1).optional(),
		output: z.enum(["catalog", "matched", "unmatched"]).default("catalog"),
		ignore_unused_patterns: z.boolean().default(false),
		log_level: z.enum(["debug", "info", "warning", "error"]).default("warning"),
	})
	.strict();
