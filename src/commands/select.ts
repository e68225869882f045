import fs from "node:fs/promises";
import { type Command, Option } from "commander";
import { readCatalog } from "../catalog/loader.js";
import { loadConfig } from "../config/loader.js";
import { selectFields } from "../core/select.js";
import {
	getCategoryLogger,
	initLogger,
	LOG_LEVELS,
	type LogLevel,
} from "../output/app-logger.js";
import type { OutputMode } from "../output/producers.js";
import { readPatternFile, reportError } from "./shared.js";

const log = getCategoryLogger("cli");

interface SelectCommandOptions {
	patterns?: string;
	output?: string;
	matched?: boolean;
	unmatched?: boolean;
	ignoreUnusedPatterns?: boolean;
	config?: string;
	logLevel?: LogLevel;
}

export function registerSelectCommand(program: Command): void {
	program
		.command("select", { isDefault: true })
		.description("Select catalog fields matching a git-style patterns file")
		.argument("<catalog>", "read this Singer catalog JSON file")
		.option(
			"-p, --patterns <path>",
			"select fields matching a git-style patterns file",
		)
		.option("-o, --output <path>", "write output to path instead of stdout")
		.addOption(
			new Option(
				"-m, --matched",
				"instead of catalog, produce list of matched fields",
			).conflicts("unmatched"),
		)
		.addOption(
			new Option(
				"-u, --unmatched",
				"instead of catalog, produce list of unmatched fields",
			).conflicts("matched"),
		)
		.option(
			"--ignore-unused-patterns",
			"suppress requirement that every pattern matches some field(s)",
		)
		.option("-c, --config <path>", "read settings from this YAML file")
		.addOption(
			new Option("--log-level <level>", "stderr log level").choices(LOG_LEVELS),
		)
		.action(async (catalogPath: string, options: SelectCommandOptions) => {
			try {
				const config = await loadConfig(options.config);
				await initLogger({ level: options.logLevel ?? config.log_level });
				if (config.configPath) {
					log.debug("Settings read from {path}", { path: config.configPath });
				} else {
					log.debug("No settings file, using defaults");
				}

				const catalog = await readCatalog(catalogPath);
				const patternsFile = options.patterns ?? config.patterns_file;
				const patternLines = patternsFile
					? await readPatternFile(patternsFile)
					: undefined;

				let mode: OutputMode = config.output;
				if (options.matched) mode = "matched";
				if (options.unmatched) mode = "unmatched";

				const output = selectFields({
					catalog,
					patternLines,
					mode,
					ignoreUnusedPatterns:
						options.ignoreUnusedPatterns === true || config.ignore_unused_patterns,
				});

				if (options.output) {
					await fs.writeFile(options.output, output);
				} else {
					process.stdout.write(output);
				}
			} catch (error: unknown) {
				reportError(error);
				process.exitCode = 1;
			}
		});
}
