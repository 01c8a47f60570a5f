import * as fs from 'node:fs/promises';

import {
	canonicalRowFromRecord,
	errorMessage,
	perspectiveTable,
	pipelineFail,
	projectPerspectives,
	tableToStringRows,
	type Logger,
	type PipelineResult,
} from 'chess-perspective-core';

import { parseCsv, stringifyCsv } from '../io/csv';
import { pathExists, writeFileAtomic } from '../io/files';

export type ExportPerspectivesParams = {
	inputPath: string;
	outputPath: string;

	/** Tracked usernames; empty or absent => the most frequent players. */
	subjects?: string[];
	logger: Logger;
};

export type ExportPerspectivesResult = PipelineResult<{
	outputPath: string;
	subjects: string[];
	rowCount: number;
}>;

const SCOPE = 'PERSPECTIVE';

export async function exportPerspectives(
	params: ExportPerspectivesParams,
): Promise<ExportPerspectivesResult> {
	const { inputPath, outputPath, logger } = params;

	if (!(await pathExists(inputPath))) {
		logger.error(SCOPE, `Input file not found: ${inputPath}`);
		return pipelineFail('SOURCE_MISSING', `Canonical dataset not found: ${inputPath}`, {
			inputPath,
		});
	}

	const text = await fs.readFile(inputPath, 'utf8');
	const rows = parseCsv(text).records.map(canonicalRowFromRecord);
	logger.info(SCOPE, `Loaded ${rows.length} games from ${inputPath}`);

	const subjects = params.subjects?.length ? params.subjects : undefined;
	const projected = projectPerspectives(rows, { logger, subjects });
	if (!projected.ok) return projected;

	const table = perspectiveTable(projected.rows);
	try {
		await writeFileAtomic(outputPath, stringifyCsv(table.columns, tableToStringRows(table)));
	} catch (err: unknown) {
		logger.error(SCOPE, `Failed to write ${outputPath}`, { error: errorMessage(err) });
		return pipelineFail('WRITE_FAILED', `Could not write ${outputPath}: ${errorMessage(err)}`);
	}

	logger.info(SCOPE, `Saved perspective data to ${outputPath}`);
	return {
		ok: true,
		outputPath,
		subjects: projected.subjects,
		rowCount: projected.rows.length,
	};
}
