import fs from "node:fs/promises";
import chalk from "chalk";
import { CatalogFormatError, UnusedPatternsError } from "../core/errors.js";
import { splitPatternLines } from "../core/patterns.js";

export async function readPatternFile(filePath: string): Promise<string[]> {
	const content = await fs.readFile(filePath, "utf-8");
	return splitPatternLines(content);
}

/**
 * Print a failed run's error to stderr, with the details each error kind
 * carries.
 */
export function reportError(error: unknown): void {
	const message = error instanceof Error ? error.message : String(error);
	console.error(chalk.red("Error:"), message);

	if (error instanceof UnusedPatternsError) {
		for (const pattern of error.patterns) {
			console.error(`  ${pattern}`);
		}
	} else if (error instanceof CatalogFormatError) {
		for (const issue of error.issues) {
			console.error(`  ${issue}`);
		}
	}
}
