import { resolvePipelineConfig, type PipelineConfig } from '../config';
import { pipelineFail, type PipelineResult } from '../errors';
import {
	DRAW_WINNER,
	type CanonicalGameRow,
	type PlayerColor,
	type ResultStatus,
	type SubjectPerspectiveRow,
} from '../games/types';
import { difficultyCategory } from './difficulty';
import { selectTopSubjects } from './subjects';

export type ProjectPerspectivesOptions = Partial<PipelineConfig> & {
	/** Tracked usernames (exact match). Defaults to the 5 most frequent usernames. */
	subjects?: Iterable<string>;
};

export type PerspectiveResult = PipelineResult<{
	rows: SubjectPerspectiveRow[];
	subjects: string[];
}>;

const SCOPE = 'PERSPECTIVE';

function resultStatusFor(winner: string, player: string): ResultStatus {
	if (winner === DRAW_WINNER) return 'Draw';
	if (winner !== '' && winner === player) return 'Win';
	return 'Loss';
}

/**
 * Re-project an objective (White/Black) row around one side.
 *
 * rating_diff flips sign relative to the canonical white-minus-black value when
 * the subject played Black.
 */
export function toPerspectiveRow(
	row: CanonicalGameRow,
	color: PlayerColor,
): SubjectPerspectiveRow {
	const isWhite = color === 'white';

	const player = isWhite ? row.white_username : row.black_username;
	const opponent = isWhite ? row.black_username : row.white_username;
	const playerRating = isWhite ? row.white_rating : row.black_rating;
	const opponentRating = isWhite ? row.black_rating : row.white_rating;

	const ratingDiff = playerRating - opponentRating;
	const resultStatus = resultStatusFor(row.winner, player);

	return {
		game_date: row.end_date,
		game_time: row.end_time,
		end_datetime: row.end_datetime,

		player_name: player,
		opponent_name: opponent,
		player_rating: playerRating,
		opponent_rating: opponentRating,
		rating_diff: ratingDiff,
		difficulty_category: difficultyCategory(ratingDiff),
		result_status: resultStatus,

		game_type: row.game_type,
		opening_name: row.opening_name,
		move_count: row.move_count,
		player_color: color,
		game_url: row.url,

		is_win: resultStatus === 'Win',
		is_loss: resultStatus === 'Loss',
		is_draw: resultStatus === 'Draw',
	};
}

/**
 * Emit one perspective row per tracked side (White first, then Black) of every game,
 * ordered by game_time ascending.
 *
 * Failures:
 * - DATASET_EMPTY: no input rows
 * - NO_SUBJECT_MATCH: no tracked subject played any of the games
 */
export function projectPerspectives(
	rows: readonly CanonicalGameRow[],
	options: ProjectPerspectivesOptions = {},
): PerspectiveResult {
	const { logger } = resolvePipelineConfig(options);

	if (rows.length === 0) {
		logger.warn(SCOPE, 'No canonical rows to project');
		return pipelineFail('DATASET_EMPTY', 'The canonical dataset has no rows.');
	}

	let subjects: string[];
	if (options.subjects) {
		subjects = [...new Set(options.subjects)];
	} else {
		subjects = selectTopSubjects(rows);
		logger.info(SCOPE, `No subjects provided. Auto-selected top players: ${subjects.join(', ')}`);
	}

	const tracked = new Set(subjects);
	const out: SubjectPerspectiveRow[] = [];

	for (const row of rows) {
		if (tracked.has(row.white_username)) out.push(toPerspectiveRow(row, 'white'));
		if (tracked.has(row.black_username)) out.push(toPerspectiveRow(row, 'black'));
	}

	if (out.length === 0) {
		logger.warn(SCOPE, 'No perspective rows generated. Check if subjects exist in the dataset.', {
			subjects,
		});
		return pipelineFail('NO_SUBJECT_MATCH', 'No tracked subject matched any game.', {
			subjects,
		});
	}

	out.sort((a, b) => a.game_time - b.game_time);

	logger.info(SCOPE, `Generated ${out.length} perspective rows from ${rows.length} games`);
	return { ok: true, rows: out, subjects };
}
