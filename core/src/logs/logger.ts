import { LOG_LEVEL_RANK, type LogEntry, type LogLevel, type Logger } from './types';

type LogSink = (entry: LogEntry) => void;

/**
 * Build a Logger from a sink.
 * Entries below `level` are dropped before reaching the sink.
 */
export function createLogger(sink: LogSink, level: LogLevel = 'INFO'): Logger {
	const threshold = LOG_LEVEL_RANK[level];

	function write(
		entryLevel: LogLevel,
		scope: string,
		message: string,
		data?: Record<string, unknown>,
	) {
		if (LOG_LEVEL_RANK[entryLevel] < threshold) return;
		sink({
			level: entryLevel,
			scope,
			message,
			data,
			createdAtIso: new Date().toISOString(),
		});
	}

	return {
		debug: (scope, message, data) => write('DEBUG', scope, message, data),
		info: (scope, message, data) => write('INFO', scope, message, data),
		warn: (scope, message, data) => write('WARN', scope, message, data),
		error: (scope, message, data) => write('ERROR', scope, message, data),
	};
}

/**
 * Console logger.
 * Lines look like: `2025-01-01T10:00:00.000Z WARN [NORMALIZE] Record rejected { reason: ... }`
 */
export function createConsoleLogger(options: { level?: LogLevel } = {}): Logger {
	return createLogger((entry) => {
		const line = `${entry.createdAtIso} ${entry.level} [${entry.scope}] ${entry.message}`;
		const write = entry.level === 'ERROR' || entry.level === 'WARN' ? console.error : console.log;

		if (entry.data) write(line, entry.data);
		else write(line);
	}, options.level);
}

export type MemoryLogger = Logger & {
	readonly entries: LogEntry[];
	clear(): void;
};

/** Keeps entries in memory (tests, dry runs). */
export function createMemoryLogger(level: LogLevel = 'DEBUG'): MemoryLogger {
	const entries: LogEntry[] = [];
	const logger = createLogger((entry) => entries.push(entry), level);

	return {
		...logger,
		entries,
		clear: () => {
			entries.length = 0;
		},
	};
}

/** Drops everything. Default when no logger is configured. */
export const silentLogger: Logger = {
	debug: () => undefined,
	info: () => undefined,
	warn: () => undefined,
	error: () => undefined,
};
