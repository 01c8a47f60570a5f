import * as path from 'node:path';

import { errorMessage, silentLogger, type Logger } from 'chess-perspective-core';

import { pathExists, writeJsonAtomic } from '../io/files';
import { fetchWithRetry, sleep, type FetchFn, type SleepFn } from './fetchWithRetry';

type ChessComArchivesResponse = {
	archives?: unknown;
};

type ChessComMonthlyGamesResponse = {
	games?: unknown;
};

export type ArchiveFetchStats = {
	archivesFound: number;
	archivesDownloaded: number;

	/** Already on disk: not downloaded again. */
	archivesSkipped: number;
	archivesFailed: number;

	/** Games in the downloaded archives. */
	totalGames: number;
};

export type FetchUserGamesOptions = {
	startYear?: number;
	endYear?: number;
};

export type ChessComArchiveFetcherParams = {
	rawDir: string;
	logger?: Logger;

	/** Pause between two archive downloads (rate limiting). */
	delayMs?: number;
	userAgent?: string;
	baseUrl?: string;

	fetchFn?: FetchFn;
	sleepFn?: SleepFn;
};

const SCOPE = 'FETCH';

export const CHESSCOM_API_BASE_URL = 'https://api.chess.com/pub';

/**
 * Year and month of a monthly archive URL.
 * https://api.chess.com/pub/player/<user>/games/2025/11 -> { year: 2025, month: "11" }
 */
export function archiveMonthFromUrl(url: string): { year: number; month: string } | null {
	const m = url.match(/\/games\/(\d{4})\/(\d{2})\/?$/);
	if (!m) return null;
	return { year: Number(m[1]), month: m[2] ?? '' };
}

/** File name used to cache a monthly archive: `<user>_<yyyy>_<mm>.json`. */
export function archiveFileName(username: string, archiveUrl: string): string | null {
	const month = archiveMonthFromUrl(archiveUrl);
	if (!month) return null;
	return `${username}_${month.year}_${month.month}.json`;
}

function inYearRange(year: number, options: FetchUserGamesOptions): boolean {
	if (options.startYear !== undefined && year < options.startYear) return false;
	if (options.endYear !== undefined && year > options.endYear) return false;
	return true;
}

/**
 * Downloads the monthly game archives of a Chess.com player into `rawDir`.
 *
 * - Archives are fetched one by one, oldest first, with `delayMs` between requests.
 * - An archive already present on disk is skipped (idempotent re-runs).
 * - 429 / 5xx responses are retried by fetchWithRetry.
 */
export class ChessComArchiveFetcher {
	private readonly rawDir: string;
	private readonly logger: Logger;
	private readonly delayMs: number;
	private readonly userAgent: string;
	private readonly baseUrl: string;
	private readonly fetchFn: FetchFn;
	private readonly sleepFn: SleepFn;

	constructor(params: ChessComArchiveFetcherParams) {
		this.rawDir = params.rawDir;
		this.logger = params.logger ?? silentLogger;
		this.delayMs = params.delayMs ?? 1000;
		this.userAgent = params.userAgent ?? 'chess-perspective-etl';
		this.baseUrl = params.baseUrl ?? CHESSCOM_API_BASE_URL;
		this.fetchFn = params.fetchFn ?? fetch;
		this.sleepFn = params.sleepFn ?? sleep;
	}

	private async getJson(url: string): Promise<unknown> {
		const res = await fetchWithRetry(
			url,
			{ headers: { 'User-Agent': this.userAgent, Accept: 'application/json' } },
			{ fetchFn: this.fetchFn, sleepFn: this.sleepFn },
		);

		if (!res.ok) {
			const txt = await res.text().catch(() => '');
			throw new Error(`Chess.com request failed (${res.status}) ${url}: ${txt.slice(0, 300)}`);
		}

		return res.json();
	}

	/** Monthly archive URLs of a player, as listed by the API (oldest first). */
	async getArchives(username: string): Promise<string[]> {
		const url = `${this.baseUrl}/player/${encodeURIComponent(username)}/games/archives`;
		const json = (await this.getJson(url)) as ChessComArchivesResponse;

		const archives = Array.isArray(json.archives)
			? json.archives.filter((a): a is string => typeof a === 'string')
			: [];

		this.logger.info(SCOPE, `Found ${archives.length} monthly archives for user ${username}`);
		return archives;
	}

	private archivePath(username: string, archiveUrl: string): string {
		const fileName = archiveFileName(username, archiveUrl);
		if (!fileName) throw new Error(`Unrecognized archive URL: ${archiveUrl}`);
		return path.join(this.rawDir, fileName);
	}

	private async saveArchive(archiveUrl: string, filePath: string): Promise<number> {
		this.logger.info(SCOPE, `Downloading archive: ${archiveUrl}`);
		const json = (await this.getJson(archiveUrl)) as ChessComMonthlyGamesResponse;
		const games = Array.isArray(json.games) ? json.games : [];

		await writeJsonAtomic(filePath, json);
		this.logger.info(SCOPE, `Saved ${games.length} games to ${path.basename(filePath)}`);
		return games.length;
	}

	/**
	 * Fetch every archive of a player within an optional year range.
	 * A failing archive is counted and logged; the others are still fetched.
	 * Throws only when the archive list itself cannot be fetched.
	 */
	async fetchUserGames(
		username: string,
		options: FetchUserGamesOptions = {},
	): Promise<ArchiveFetchStats> {
		const stats: ArchiveFetchStats = {
			archivesFound: 0,
			archivesDownloaded: 0,
			archivesSkipped: 0,
			archivesFailed: 0,
			totalGames: 0,
		};

		const archives = (await this.getArchives(username)).filter((url) => {
			const month = archiveMonthFromUrl(url);
			return month !== null && inYearRange(month.year, options);
		});

		stats.archivesFound = archives.length;
		if (archives.length === 0) {
			this.logger.warn(SCOPE, `No archives found for user ${username} in the specified range`);
			return stats;
		}

		let previousWasRequest = false;
		for (const archiveUrl of archives) {
			try {
				const filePath = this.archivePath(username, archiveUrl);
				if (await pathExists(filePath)) {
					const fileName = path.basename(filePath);
					this.logger.info(SCOPE, `Archive already exists, skipping: ${fileName}`);
					stats.archivesSkipped++;
					continue;
				}

				// Rate limiting: wait between requests, not before cache hits
				if (previousWasRequest && this.delayMs > 0) await this.sleepFn(this.delayMs);

				stats.totalGames += await this.saveArchive(archiveUrl, filePath);
				stats.archivesDownloaded++;
				previousWasRequest = true;
			} catch (err: unknown) {
				stats.archivesFailed++;
				previousWasRequest = true;
				this.logger.error(SCOPE, `Error downloading archive ${archiveUrl}`, {
					error: errorMessage(err),
				});
			}
		}

		return stats;
	}
}
