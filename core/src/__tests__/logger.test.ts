import { resolvePipelineConfig } from '../config';
import { createConsoleLogger, createLogger, createMemoryLogger, silentLogger } from '../logs/logger';
import type { LogEntry } from '../logs/types';

describe('createLogger', () => {
	it('drops entries below the threshold', () => {
		const seen: LogEntry[] = [];
		const logger = createLogger((e) => seen.push(e), 'WARN');

		logger.debug('X', 'debug');
		logger.info('X', 'info');
		logger.warn('X', 'warn');
		logger.error('X', 'error', { code: 1 });

		expect(seen.map((e) => e.level)).toEqual(['WARN', 'ERROR']);
		expect(seen[1]?.data).toEqual({ code: 1 });
	});
});

describe('createMemoryLogger', () => {
	it('records and clears entries', () => {
		const logger = createMemoryLogger();
		logger.debug('FETCH', 'one');
		expect(logger.entries).toHaveLength(1);

		logger.clear();
		expect(logger.entries).toHaveLength(0);
	});
});

describe('createConsoleLogger', () => {
	afterEach(() => {
		jest.restoreAllMocks();
	});

	it('writes info to stdout and warnings to stderr', () => {
		const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
		const err = jest.spyOn(console, 'error').mockImplementation(() => undefined);

		const logger = createConsoleLogger({ level: 'INFO' });
		logger.debug('DATASET', 'hidden');
		logger.info('DATASET', 'Successfully processed 3 unique games');
		logger.warn('NORMALIZE', 'Record rejected', { reason: 'MISSING_FIELDS' });

		expect(log).toHaveBeenCalledTimes(1);
		expect(log).toHaveBeenCalledWith(
			expect.stringMatching(/ INFO \[DATASET\] Successfully processed 3 unique games$/),
		);
		expect(err).toHaveBeenCalledWith(
			expect.stringMatching(/ WARN \[NORMALIZE\] Record rejected$/),
			{ reason: 'MISSING_FIELDS' },
		);
	});
});

describe('resolvePipelineConfig', () => {
	it('defaults to UTC and a silent logger', () => {
		expect(resolvePipelineConfig()).toEqual({ logger: silentLogger, timeZone: 'UTC' });
		expect(resolvePipelineConfig({ timeZone: 'Europe/Paris' }).timeZone).toBe('Europe/Paris');
	});
});
