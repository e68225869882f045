import chalk from "chalk";
import type { Command } from "commander";
import { loadConfig } from "../config/loader.js";
import { compilePatterns } from "../core/patterns.js";
import { readPatternFile, reportError } from "./shared.js";

export function registerValidateCommand(program: Command): void {
	program
		.command("validate")
		.description("Check that every line of a patterns file compiles")
		.option("-p, --patterns <path>", "patterns file to check")
		.option("-c, --config <path>", "read settings from this YAML file")
		.action(async (options: { patterns?: string; config?: string }) => {
			try {
				const config = await loadConfig(options.config);
				const patternsFile = options.patterns ?? config.patterns_file;
				if (!patternsFile) {
					throw new Error(
						"No patterns file given (use --patterns or patterns_file in config)",
					);
				}

				const lines = await readPatternFile(patternsFile);
				const patterns = [...compilePatterns(lines)];
				console.log(
					chalk.green(`${patterns.length} pattern(s) in ${patternsFile} are valid.`),
				);
			} catch (error: unknown) {
				reportError(error);
				process.exitCode = 1;
			}
		});
}
