import { inspect } from "node:util";
import {
	configure,
	getLogger,
	type LogRecord,
	type Logger as LogTapeLogger,
	type Sink,
} from "@logtape/logtape";
import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warning" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warning", "error"];

export interface AppLoggerConfig {
	level?: LogLevel;
	/** Replaces the stderr sink; used by tests to capture records. */
	sink?: Sink;
}

const ROOT_CATEGORY = "pathmatch";

const LEVEL_COLORS: Record<string, (text: string) => string> = {
	debug: (text) => chalk.dim(text),
	info: (text) => chalk.blue(text),
	warning: (text) => chalk.yellow(text),
	error: (text) => chalk.red(text),
	fatal: (text) => chalk.red(text),
};

// Lists (pattern sources, paths) print comma-separated, bare.
function renderValue(value: unknown): string {
	if (typeof value === "string") return value;
	if (Array.isArray(value)) return value.map(renderValue).join(", ");
	if (value !== null && typeof value === "object") {
		return inspect(value, { breakLength: Number.POSITIVE_INFINITY });
	}
	return String(value);
}

/**
 * One stderr line per record: `[LEVEL][category] message`, with the level
 * colored and interpolated properties rendered in place.
 */
export function formatLogRecord(record: LogRecord): string {
	const label = `[${record.level.toUpperCase()}]`;
	const color = LEVEL_COLORS[record.level];
	const category = chalk.dim(`[${record.category.join(".")}]`);
	const message = record.message.map(renderValue).join("");

	return `${color ? color(label) : label}${category} ${message}`;
}

/** stdout carries the produced catalog or path list, so logs go to stderr. */
export function createStderrSink(): Sink {
	return (record: LogRecord) => {
		console.error(formatLogRecord(record));
	};
}

export async function initLogger(config: AppLoggerConfig = {}): Promise<void> {
	const { level = "warning", sink = createStderrSink() } = config;

	await configure({
		sinks: { stderr: sink },
		loggers: [
			{
				category: [ROOT_CATEGORY],
				lowestLevel: level,
				sinks: ["stderr"],
			},
			// Silence LogTape's own meta logger.
			{ category: ["logtape", "meta"], lowestLevel: "error", sinks: [] },
		],
		reset: true,
	});
}

export async function resetLogger(): Promise<void> {
	await configure({ sinks: {}, loggers: [], reset: true });
}

export function getAppLogger(): LogTapeLogger {
	return getLogger([ROOT_CATEGORY]);
}

/**
 * Get a child logger, e.g. getCategoryLogger("select") for
 * ["pathmatch", "select"].
 */
export function getCategoryLogger(...category: string[]): LogTapeLogger {
	return getLogger([ROOT_CATEGORY, ...category]);
}
