import {
	errorMessage,
	pipelineFail,
	type Logger,
	type PipelineResult,
} from 'chess-perspective-core';

import {
	ChessComArchiveFetcher,
	type ArchiveFetchStats,
	type ChessComArchiveFetcherParams,
} from '../fetch/ChessComArchiveFetcher';

export type FetchPlayersParams = Omit<ChessComArchiveFetcherParams, 'logger'> & {
	usernames: string[];
	startYear?: number;
	endYear?: number;

	/** Log a failing player and go on with the next one instead of stopping. */
	continueOnError?: boolean;
	logger: Logger;
};

export type FetchPlayersResult = PipelineResult<{
	perUser: Record<string, ArchiveFetchStats>;

	/** Players whose archive list could not be fetched (continueOnError only). */
	failedUsers: string[];
}>;

const SCOPE = 'FETCH';

/**
 * Download the archives of every username, one player after the other.
 */
export async function fetchPlayers(params: FetchPlayersParams): Promise<FetchPlayersResult> {
	const { usernames, startYear, endYear, continueOnError, logger, ...fetcherParams } = params;
	const fetcher = new ChessComArchiveFetcher({ ...fetcherParams, logger });

	const perUser: Record<string, ArchiveFetchStats> = {};
	const failedUsers: string[] = [];

	for (const username of usernames) {
		logger.info(SCOPE, `Fetching games for user: ${username}`);

		try {
			const stats = await fetcher.fetchUserGames(username, { startYear, endYear });
			perUser[username] = stats;
			logger.info(
				SCOPE,
				`Done with ${username}: ${stats.archivesDownloaded} downloaded, ` +
					`${stats.archivesSkipped} skipped, ${stats.archivesFailed} failed`,
			);
		} catch (err: unknown) {
			logger.error(SCOPE, `Failed to fetch data for ${username}`, { error: errorMessage(err) });
			if (!continueOnError) {
				return pipelineFail(
					'FETCH_FAILED',
					`Could not fetch archives for ${username}: ${errorMessage(err)}`,
					{ username, perUser },
				);
			}
			failedUsers.push(username);
		}
	}

	return { ok: true, perUser, failedUsers };
}
