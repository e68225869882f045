import { Command } from "commander";
import { registerSelectCommand, registerValidateCommand } from "./commands/index.js";

export function createProgram(): Command {
	const program = new Command();

	program
		.name("catalog-pathmatch")
		.description("Select fields in a Singer catalog using git-style pattern matching")
		.version("0.1.0");

	registerSelectCommand(program);
	registerValidateCommand(program);

	return program;
}
