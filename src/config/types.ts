import type { z } from "zod";
import type { pathmatchConfigSchema } from "./schema.js";

export type PathmatchConfig = z.infer<typeof pathmatchConfigSchema>;

// Config as loaded, with patterns_file resolved against the config location
export interface LoadedConfig extends PathmatchConfig {
	/** Config file the values came from; undefined when defaults were used. */
	configPath?: string;
}
