import fs from "node:fs";
import type { LogRecord, Sink } from "@logtape/logtape";
import { renderMessage } from "./console-sink.js";

// biome-ignore lint/suspicious/noControlCharactersInRegex: Required for ANSI escape code stripping
const ANSI_REGEX = /\x1b\[[0-9;]*m/g;

/**
 * Format a log record for file output with plain text (no ANSI).
 * Format: [ISO_TIMESTAMP] LEVEL [category] message
 */
export function formatFileRecord(record: LogRecord): string {
	const timestamp = new Date(record.timestamp).toISOString();
	const level = record.level.toUpperCase().padEnd(7);
	const category = record.category.join(".");
	const message = renderMessage(record).replace(ANSI_REGEX, "");
	const categoryStr = category ? `[${category}] ` : "";
	return `[${timestamp}] ${level} ${categoryStr}${message}\n`;
}

/**
 * Create an append-only file sink plus the function that closes it.
 * Uses synchronous writes to keep records in order.
 */
export function createCloseableFileSink(logPath: string): {
	sink: Sink;
	close: () => void;
} {
	const fd = fs.openSync(
		logPath,
		fs.constants.O_WRONLY | fs.constants.O_CREAT | fs.constants.O_APPEND,
	);
	let isClosed = false;

	const sink: Sink = (record: LogRecord) => {
		if (isClosed) return;
		try {
			fs.writeSync(fd, formatFileRecord(record));
		} catch {
			// A failed debug-log write must not break the run
		}
	};

	const close = () => {
		if (isClosed) return;
		isClosed = true;
		try {
			fs.closeSync(fd);
		} catch {
			// Already closed by the OS
		}
	};

	return { sink, close };
}
