import { Command, InvalidArgumentError } from 'commander';
import {
	createConsoleLogger,
	type LogLevel,
	type Logger,
	type PipelineFail,
} from 'chess-perspective-core';

import { exportPerspectives } from './commands/exportPerspectives';
import { fetchPlayers } from './commands/fetchPlayers';
import { processArchives } from './commands/processArchives';
import {
	canonicalDatasetPath,
	loadConfig,
	perspectiveDatasetPath,
	type HostConfig,
	type HostConfigOverrides,
} from './config/loadConfig';
import { readPlayersFile } from './config/playersFile';
import type { FetchFn, SleepFn } from './fetch/fetchWithRetry';

export type ProgramDeps = {
	env?: NodeJS.ProcessEnv;
	createLogger?: (level: LogLevel) => Logger;
	fetchFn?: FetchFn;
	sleepFn?: SleepFn;
};

type GlobalOptions = {
	rawDir?: string;
	processedDir?: string;
	logLevel?: string;
	timeZone?: string;
};

type FetchOptions = {
	startYear?: number;
	endYear?: number;
	delay?: number;
};

const SCOPE = 'CLI';

export const DEFAULT_PLAYERS_FILE = 'config/players.json';

function parseIntOption(value: string): number {
	const n = Number(value);
	if (!Number.isInteger(n)) throw new InvalidArgumentError('Not an integer.');
	return n;
}

function parseSubjects(value: string, previous: string[] = []): string[] {
	const names = value
		.split(',')
		.map((s) => s.trim())
		.filter((s) => s.length > 0);
	return [...previous, ...names];
}

function reportFailure(logger: Logger, failure: PipelineFail): void {
	logger.error(SCOPE, `${failure.error.code}: ${failure.error.message}`, failure.error.details);
	process.exitCode = 1;
}

/**
 * chess-perspective command line.
 *
 *   fetch <usernames...>   download monthly archives into the raw directory
 *   fetch-all              same, for every player of a players file
 *   process                raw archives -> canonical CSV
 *   perspective            canonical CSV -> perspective CSV
 */
export function createProgram(deps: ProgramDeps = {}): Command {
	const env = deps.env ?? process.env;
	const makeLogger = deps.createLogger ?? ((level: LogLevel) => createConsoleLogger({ level }));

	function setup(
		cmd: Command,
		extra: HostConfigOverrides = {},
	): { config: HostConfig; logger: Logger } {
		const g = cmd.optsWithGlobals<GlobalOptions>();
		const config = loadConfig(
			{
				rawDir: g.rawDir,
				processedDir: g.processedDir,
				logLevel: g.logLevel,
				timeZone: g.timeZone,
				...extra,
			},
			env,
		);
		return { config, logger: makeLogger(config.logLevel) };
	}

	const program = new Command()
		.name('chess-perspective')
		.description('Fetch Chess.com game archives and build canonical and per-player datasets')
		.version('0.1.0')
		.option('--raw-dir <dir>', 'directory of the downloaded monthly archives')
		.option('--processed-dir <dir>', 'directory of the generated CSV files')
		.option('--log-level <level>', 'DEBUG, INFO, WARN or ERROR')
		.option('--time-zone <zone>', 'IANA time zone used for dates (default UTC)');

	program
		.command('fetch')
		.description('Download the monthly archives of one or more players')
		.argument('<usernames...>', 'Chess.com usernames')
		.option('--start-year <year>', 'first year to download', parseIntOption)
		.option('--end-year <year>', 'last year to download', parseIntOption)
		.option('--delay <ms>', 'pause between two requests', parseIntOption)
		.action(async (usernames: string[], opts: FetchOptions, cmd: Command) => {
			const { config, logger } = setup(cmd, { requestDelayMs: opts.delay });

			const result = await fetchPlayers({
				usernames,
				startYear: opts.startYear,
				endYear: opts.endYear,
				rawDir: config.rawDir,
				delayMs: config.requestDelayMs,
				userAgent: config.userAgent,
				fetchFn: deps.fetchFn,
				sleepFn: deps.sleepFn,
				logger,
			});
			if (!result.ok) reportFailure(logger, result);
		});

	program
		.command('fetch-all')
		.description('Download the monthly archives of every player listed in a players file')
		.option('--players-file <path>', 'JSON players file', DEFAULT_PLAYERS_FILE)
		.option('--delay <ms>', 'pause between two requests', parseIntOption)
		.action(async (opts: { playersFile: string; delay?: number }, cmd: Command) => {
			const { config, logger } = setup(cmd, { requestDelayMs: opts.delay });
			const players = await readPlayersFile(opts.playersFile);

			logger.info(SCOPE, `Starting fetch for players: ${players.players.join(', ')}`, {
				startYear: players.startYear,
				endYear: players.endYear,
			});

			const result = await fetchPlayers({
				usernames: players.players,
				startYear: players.startYear,
				endYear: players.endYear,
				continueOnError: true,
				rawDir: config.rawDir,
				delayMs: config.requestDelayMs,
				userAgent: config.userAgent,
				fetchFn: deps.fetchFn,
				sleepFn: deps.sleepFn,
				logger,
			});
			if (!result.ok) {
				reportFailure(logger, result);
				return;
			}
			if (result.failedUsers.length > 0) {
				const failed = result.failedUsers.join(', ');
				logger.warn(SCOPE, `Some players could not be fetched: ${failed}`);
			}
		});

	program
		.command('process')
		.description('Build the canonical dataset from the downloaded archives')
		.option('--output <file>', 'output CSV file name (inside the processed directory)')
		.action(async (opts: { output?: string }, cmd: Command) => {
			const { config, logger } = setup(cmd, { outputFile: opts.output });

			const result = await processArchives({
				rawDir: config.rawDir,
				outputPath: canonicalDatasetPath(config),
				timeZone: config.timeZone,
				logger,
			});
			if (!result.ok) reportFailure(logger, result);
		});

	program
		.command('perspective')
		.description('Build the per-player dataset from the canonical dataset')
		.option('--input <file>', 'canonical CSV file name (inside the processed directory)')
		.option('--output <file>', 'output CSV file name (inside the processed directory)')
		.option('--subjects <names>', 'comma-separated tracked usernames', parseSubjects)
		.action(
			async (opts: { input?: string; output?: string; subjects?: string[] }, cmd: Command) => {
				const { config, logger } = setup(cmd, {
					outputFile: opts.input,
					perspectiveFile: opts.output,
				});

				const result = await exportPerspectives({
					inputPath: canonicalDatasetPath(config),
					outputPath: perspectiveDatasetPath(config),
					subjects: opts.subjects,
					logger,
				});
				if (!result.ok) reportFailure(logger, result);
			},
		);

	return program;
}
