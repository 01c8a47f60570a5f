export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

/** Numeric rank used for threshold filtering (higher = more severe). */
export const LOG_LEVEL_RANK: Record<LogLevel, number> = {
	DEBUG: 10,
	INFO: 20,
	WARN: 30,
	ERROR: 40,
};

export type LogEntry = {
	level: LogLevel;

	/** Pipeline stage that emitted the entry, e.g. "NORMALIZE", "DATASET", "FETCH". */
	scope: string;
	message: string;
	data?: Record<string, unknown>;
	createdAtIso: string;
};

/**
 * Logging collaborator passed to every pipeline entry point.
 * Implementations decide where entries go (console, memory, file...).
 */
export interface Logger {
	debug(scope: string, message: string, data?: Record<string, unknown>): void;
	info(scope: string, message: string, data?: Record<string, unknown>): void;
	warn(scope: string, message: string, data?: Record<string, unknown>): void;
	error(scope: string, message: string, data?: Record<string, unknown>): void;
}
