import * as path from 'node:path';

import {
	buildDataset,
	canonicalTable,
	errorMessage,
	pipelineFail,
	summarizeDataset,
	tableToStringRows,
	type DatasetStats,
	type DatasetSummary,
	type GameBatch,
	type Logger,
	type PipelineResult,
} from 'chess-perspective-core';

import { stringifyCsv } from '../io/csv';
import { listJsonFiles, pathExists, readJsonSafely, writeFileAtomic } from '../io/files';

export type ProcessArchivesParams = {
	rawDir: string;
	outputPath: string;
	timeZone: string;
	logger: Logger;
};

export type ProcessArchivesResult = PipelineResult<{
	outputPath: string;
	stats: DatasetStats;
	summary: DatasetSummary;
}>;

const SCOPE = 'PROCESS';

function gamesOf(json: unknown): unknown[] | null {
	if (typeof json !== 'object' || json === null || !('games' in json)) return null;
	return Array.isArray(json.games) ? json.games : null;
}

/** Read every archive file of `rawDir` as one batch. Unreadable files are skipped. */
export async function loadArchiveBatches(rawDir: string, logger: Logger): Promise<GameBatch[]> {
	const files = await listJsonFiles(rawDir);
	logger.info(SCOPE, `Found ${files.length} archive files to process`);

	const batches: GameBatch[] = [];
	for (const file of files) {
		const json = await readJsonSafely(file, logger);
		if (json === null) continue;

		const games = gamesOf(json);
		if (!games) {
			logger.warn(SCOPE, `No games array in ${path.basename(file)}, skipping`);
			continue;
		}

		batches.push({ source: path.basename(file), games });
	}

	return batches;
}

/**
 * Build the canonical dataset from the downloaded archives and write it as CSV.
 */
export async function processArchives(
	params: ProcessArchivesParams,
): Promise<ProcessArchivesResult> {
	const { rawDir, outputPath, timeZone, logger } = params;

	if (!(await pathExists(rawDir))) {
		return pipelineFail('SOURCE_MISSING', `Raw archive directory not found: ${rawDir}`, {
			rawDir,
		});
	}

	const batches = await loadArchiveBatches(rawDir, logger);
	const { rows, stats } = buildDataset(batches, { logger, timeZone });

	if (rows.length === 0) {
		logger.warn(SCOPE, 'No games were processed');
		return pipelineFail('DATASET_EMPTY', 'No games could be extracted from the archives.', {
			rawDir,
			stats,
		});
	}

	const table = canonicalTable(rows);
	try {
		await writeFileAtomic(outputPath, stringifyCsv(table.columns, tableToStringRows(table)));
	} catch (err: unknown) {
		logger.error(SCOPE, `Failed to write ${outputPath}`, { error: errorMessage(err) });
		return pipelineFail('WRITE_FAILED', `Could not write ${outputPath}: ${errorMessage(err)}`);
	}

	const summary = summarizeDataset(rows);
	logger.info(SCOPE, `Saved processed data to ${outputPath}`);
	logger.info(SCOPE, 'Dataset summary', {
		totalGames: summary.totalGames,
		dateRange: `${summary.firstDate ?? '-'} to ${summary.lastDate ?? '-'}`,
		uniquePlayers: summary.uniquePlayers,
		topTimeControls: summary.topTimeControls,
	});

	return { ok: true, outputPath, stats, summary };
}
