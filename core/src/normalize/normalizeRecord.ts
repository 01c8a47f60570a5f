import { resolvePipelineConfig, type PipelineConfig } from '../config';
import { errorMessage } from '../errors';
import type { CanonicalGameRow } from '../games/types';
import { EMPTY_NOTATION_INFO, parseNotation } from '../pgn/parseNotation';
import { classifyTimeControl } from './gameType';
import { outcomeFlags, resolveOutcome } from './outcome';
import { readRecordFields, type RecordFields } from './recordAccess';
import { deriveTimeFields } from './timeFields';

export type NormalizeRejectReason = 'MISSING_FIELDS' | 'INVALID_SHAPE' | 'UNEXPECTED_ERROR';

export type NormalizeResult =
	| { ok: true; row: CanonicalGameRow }
	| { ok: false; reason: NormalizeRejectReason; message: string };

const SCOPE = 'NORMALIZE';

function buildRow(fields: RecordFields, config: PipelineConfig): CanonicalGameRow {
	const { white, black } = fields;

	const time = deriveTimeFields(fields.end_time, config.timeZone);

	const notation = fields.pgn
		? parseNotation(fields.pgn, { logger: config.logger, debugId: fields.url })
		: EMPTY_NOTATION_INFO;

	const outcome = resolveOutcome({
		whiteUsername: white.username,
		blackUsername: black.username,
		whiteToken: white.result.toLowerCase(),
		blackToken: black.result.toLowerCase(),
		pgnResult: notation.result,
	});

	return {
		url: fields.url,
		white_username: white.username,
		black_username: black.username,
		white_rating: white.rating,
		black_rating: black.rating,
		rating_diff: white.rating - black.rating,

		end_time: fields.end_time,
		...time,

		time_control: fields.time_control,
		game_type: classifyTimeControl(fields.time_control),

		move_count: notation.moveCount,
		eco_code: notation.ecoCode,
		opening_name: notation.openingName,
		pgn_result: notation.result,

		winner: outcome.winner,
		result: outcome.result,
		result_category: outcome.result_category,
		...outcomeFlags(outcome.winner, white.username, black.username),

		pgn: fields.pgn,
	};
}

/**
 * Normalize one raw game record into a canonical row.
 *
 * Rejections are logged at WARN level and returned, never thrown:
 * - MISSING_FIELDS: white / black / end_time / pgn key absent
 * - INVALID_SHAPE: a player sub-record is not an object
 * - UNEXPECTED_ERROR: anything thrown while deriving fields (no partial rows)
 */
export function normalizeRecord(
	raw: unknown,
	options: Partial<PipelineConfig> = {},
): NormalizeResult {
	const config = resolvePipelineConfig(options);

	const access = readRecordFields(raw);
	if (!access.ok) {
		const message =
			access.reason === 'MISSING_FIELDS'
				? `Missing required fields: ${access.missing.join(', ')}`
				: `Invalid record shape: ${access.message}`;

		config.logger.warn(SCOPE, 'Record rejected', { reason: access.reason, message });
		return { ok: false, reason: access.reason, message };
	}

	try {
		return { ok: true, row: buildRow(access.fields, config) };
	} catch (err: unknown) {
		const message = `Error extracting game data: ${errorMessage(err)}`;
		config.logger.warn(SCOPE, 'Record rejected', {
			reason: 'UNEXPECTED_ERROR',
			message,
			url: access.fields.url,
		});
		return { ok: false, reason: 'UNEXPECTED_ERROR', message };
	}
}
