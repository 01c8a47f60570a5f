import { silentLogger } from './logs/logger';
import type { Logger } from './logs/types';

/**
 * Configuration passed explicitly into each pipeline entry point.
 * There is no process-wide logging state: callers own their Logger.
 */
export type PipelineConfig = {
	logger: Logger;

	/**
	 * IANA zone used to derive end_date / end_datetime / year / month from end_time.
	 * Defaults to UTC so that a dataset does not depend on the machine it was built on.
	 */
	timeZone: string;
};

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
	logger: silentLogger,
	timeZone: 'UTC',
};

export function resolvePipelineConfig(options: Partial<PipelineConfig> = {}): PipelineConfig {
	return {
		logger: options.logger ?? DEFAULT_PIPELINE_CONFIG.logger,
		timeZone: options.timeZone ?? DEFAULT_PIPELINE_CONFIG.timeZone,
	};
}
