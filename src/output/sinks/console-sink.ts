import type { LogRecord, Sink } from "@logtape/logtape";
import chalk from "chalk";

export function renderMessage(record: LogRecord): string {
	return record.message
		.map((part) => {
			if (typeof part === "string") return part;
			try {
				return JSON.stringify(part);
			} catch {
				return "[Unserializable]";
			}
		})
		.join("");
}

function colorLevel(record: LogRecord): string {
	const label = `[${record.level.toUpperCase()}]`;
	switch (record.level) {
		case "debug":
			return chalk.dim(label);
		case "info":
			return chalk.blue(label);
		case "warning":
			return chalk.yellow(label);
		case "error":
		case "fatal":
			return chalk.red(label);
		default:
			return label;
	}
}

/**
 * Console sink on stderr. The root "qgates" category is implied and dropped
 * from the prefix, so a scope record reads `[INFO][scope] ...`.
 */
export function createConsoleSink(
	write: (line: string) => void = (line) => process.stderr.write(line),
): Sink {
	return (record: LogRecord) => {
		const category = record.category.slice(1).join(".");
		const categoryStr = category ? chalk.dim(`[${category}]`) : "";
		write(`${colorLevel(record)}${categoryStr} ${renderMessage(record)}\n`);
	};
}
