import fsPromises from "node:fs/promises";
import path from "node:path";
import {
	configure,
	getLevelFilter,
	getLogger,
	type Logger as LogTapeLogger,
	type Sink,
	withFilter,
} from "@logtape/logtape";
import { createConsoleSink } from "./sinks/console-sink.js";
import { createCloseableFileSink } from "./sinks/file-sink.js";

const ROOT_CATEGORY = "qgates";
const DEBUG_LOG_FILENAME = ".debug.log";

/**
 * Log level options.
 */
export type LogLevel = "debug" | "info" | "warning" | "error";

/**
 * App logger configuration options.
 */
export interface AppLoggerConfig {
	level?: LogLevel;
	/**
	 * Suppress the console sink. Used when stdout/stderr must stay clean,
	 * e.g. `run --json`.
	 */
	quiet?: boolean;
	logDir?: string;
	debugLog?: {
		enabled: boolean;
	};
}

// Global state for cleanup
let closeDebugLog: (() => void) | null = null;
let isConfigured = false;

/**
 * Initialize the application logger with LogTape.
 *
 * The console sink writes to stderr so stdout only carries command output.
 * The debug log, when enabled, appends every record at debug level to
 * `<logDir>/.debug.log`.
 */
export async function initLogger(config: AppLoggerConfig = {}): Promise<void> {
	// Reset if already configured
	if (isConfigured) {
		await resetLogger();
	}

	const { level = "info", quiet = false, logDir, debugLog } = config;

	const sinks: Record<string, Sink> = {};

	if (!quiet) {
		sinks.console = withFilter(createConsoleSink(), getLevelFilter(level));
	}

	if (logDir && debugLog?.enabled) {
		await fsPromises.mkdir(logDir, { recursive: true });
		const { sink, close } = createCloseableFileSink(
			path.join(logDir, DEBUG_LOG_FILENAME),
		);
		closeDebugLog = close;
		sinks.debugLog = sink;
	}

	// The debug log records everything; the console keeps the configured level
	const lowestLevel: LogLevel = sinks.debugLog ? "debug" : level;

	await configure({
		sinks,
		loggers: [
			{
				category: [ROOT_CATEGORY],
				lowestLevel,
				sinks: Object.keys(sinks),
			},
		],
		reset: true,
	});

	isConfigured = true;
}

/**
 * Reset the logger configuration and close file handles.
 */
export async function resetLogger(): Promise<void> {
	if (closeDebugLog !== null) {
		closeDebugLog();
		closeDebugLog = null;
	}

	// Reset LogTape configuration (reset: true required after initial configure)
	await configure({ sinks: {}, loggers: [], reset: true });
	isConfigured = false;
}

/**
 * Get a child logger for a specific category.
 * Categories are hierarchical, e.g. ["qgates", "scope"] or ["qgates", "gate"]
 *
 * @param category - The category path (after the "qgates" prefix)
 */
export function getCategoryLogger(...category: string[]): LogTapeLogger {
	return getLogger([ROOT_CATEGORY, ...category]);
}
