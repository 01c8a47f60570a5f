import { resolvePipelineConfig, type PipelineConfig } from '../config';
import type { CanonicalGameRow, GameBatch } from '../games/types';
import { normalizeRecord } from '../normalize/normalizeRecord';

export type DatasetStats = {
	batchesProcessed: number;

	/** Records found across all batches (before normalization). */
	recordsFound: number;
	recordsRejected: number;

	/** Rows produced by the normalizer (before deduplication). */
	rowsExtracted: number;
	duplicatesRemoved: number;
	finalCount: number;
};

export type DatasetBuildResult = {
	rows: CanonicalGameRow[];
	stats: DatasetStats;
};

const SCOPE = 'DATASET';

/** Keep the first occurrence of each url (an empty url is a key like any other). */
export function dedupeByUrl(rows: readonly CanonicalGameRow[]): CanonicalGameRow[] {
	const seen = new Set<string>();
	const out: CanonicalGameRow[] = [];

	for (const row of rows) {
		if (seen.has(row.url)) continue;
		seen.add(row.url);
		out.push(row);
	}

	return out;
}

/** Stable sort by end_time ascending (returns a new array). */
export function sortByEndTime(rows: readonly CanonicalGameRow[]): CanonicalGameRow[] {
	return [...rows].sort((a, b) => a.end_time - b.end_time);
}

/**
 * Normalize every record of every batch, deduplicate by url and order by end_time.
 *
 * Rejected records are dropped and counted; they never fail the build.
 * Deduplication and sorting need the whole set, so this is not a streaming operation.
 */
export function buildDataset(
	batches: readonly GameBatch[],
	options: Partial<PipelineConfig> = {},
): DatasetBuildResult {
	const config = resolvePipelineConfig(options);
	const { logger } = config;

	const extracted: CanonicalGameRow[] = [];
	let recordsFound = 0;
	let recordsRejected = 0;

	for (const batch of batches) {
		let batchRows = 0;

		for (const raw of batch.games) {
			recordsFound++;

			const normalized = normalizeRecord(raw, config);
			if (!normalized.ok) {
				recordsRejected++;
				continue;
			}

			extracted.push(normalized.row);
			batchRows++;
		}

		logger.info(SCOPE, `Processed ${batchRows} games from ${batch.source}`, {
			source: batch.source,
			games: batch.games.length,
			extracted: batchRows,
		});
	}

	const unique = dedupeByUrl(extracted);
	const duplicatesRemoved = extracted.length - unique.length;
	if (duplicatesRemoved > 0) {
		logger.info(SCOPE, `Removed ${duplicatesRemoved} duplicate games`);
	}

	const rows = sortByEndTime(unique);

	const stats: DatasetStats = {
		batchesProcessed: batches.length,
		recordsFound,
		recordsRejected,
		rowsExtracted: extracted.length,
		duplicatesRemoved,
		finalCount: rows.length,
	};

	logger.info(SCOPE, `Successfully processed ${rows.length} unique games`, stats);

	return { rows, stats };
}
