import fs from "node:fs/promises";
import path from "node:path";
import YAML from "yaml";
import { ZodError } from "zod";
import { pathmatchConfigSchema } from "./schema.js";
import type { LoadedConfig } from "./types.js";

export const DEFAULT_CONFIG_FILE = "pathmatch.yml";

/**
 * Load pathmatch settings.
 *
 * With no explicit path, `pathmatch.yml` in `rootDir` is read if present and
 * defaults are used otherwise. An explicit path must exist.
 */
export async function loadConfig(
	explicitPath?: string,
	rootDir: string = process.cwd(),
): Promise<LoadedConfig> {
	const configPath = path.resolve(rootDir, explicitPath ?? DEFAULT_CONFIG_FILE);

	let content: string;
	try {
		content = await fs.readFile(configPath, "utf-8");
	} catch (error: unknown) {
		if (
			explicitPath === undefined &&
			typeof error === "object" &&
			error !== null &&
			"code" in error &&
			(error as { code: string }).code === "ENOENT"
		) {
			return pathmatchConfigSchema.parse({});
		}
		if (explicitPath !== undefined) {
			throw new Error(`Configuration file not found at ${configPath}`, {
				cause: error,
			});
		}
		throw error;
	}

	let raw: unknown;
	try {
		// An empty file parses to null
		raw = YAML.parse(content) ?? {};
	} catch (error: unknown) {
		const message = error instanceof Error ? error.message : String(error);
		throw new Error(`Malformed YAML in ${configPath}: ${message}`);
	}

	let config: LoadedConfig;
	try {
		config = pathmatchConfigSchema.parse(raw);
	} catch (error: unknown) {
		if (error instanceof ZodError) {
			const details = error.errors
				.map((err) =>
					err.path.length > 0 ? `${err.path.join(".")}: ${err.message}` : err.message,
				)
				.join("; ");
			throw new Error(`Invalid configuration in ${configPath}: ${details}`);
		}
		throw error;
	}

	if (config.patterns_file) {
		config.patterns_file = path.resolve(path.dirname(configPath), config.patterns_file);
	}

	return { ...config, configPath };
}
