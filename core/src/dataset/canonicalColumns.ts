import type { CanonicalGameRow, GameType } from '../games/types';
import {
	parseBooleanCell,
	parseNullableCell,
	parseNumberCell,
	toCell,
	type StringRecord,
	type Table,
	type TableRecord,
} from './table';

/** Preferred column order of the persisted canonical dataset. */
export const CANONICAL_COLUMNS = [
	'end_date',
	'white_username',
	'black_username',
	'white_rating',
	'black_rating',
	'result',
	'winner',
	'result_category',
	'game_type',
	'opening_name',
	'eco_code',
	'move_count',
	'white_win',
	'black_win',
	'is_draw',
	'rating_diff',
	'year',
	'month',
	'time_control',
	'end_datetime',
	'end_time',
	'url',
] as const;

/** Raw notation text: never persisted (multi-line, quotes, brackets). */
export const NOTATION_COLUMN = 'pgn';

const GAME_TYPES: ReadonlySet<string> = new Set<GameType>([
	'bullet',
	'blitz',
	'rapid',
	'daily',
	'unknown',
]);

/**
 * Preferred columns first (when present), then any other column in its natural order.
 * The notation column is always dropped.
 */
export function orderCanonicalColumns(columns: readonly string[]): string[] {
	const present = new Set(columns);
	const preferred: string[] = CANONICAL_COLUMNS.filter((c) => present.has(c));
	const preferredSet = new Set<string>(CANONICAL_COLUMNS);
	const others = columns.filter((c) => !preferredSet.has(c) && c !== NOTATION_COLUMN);

	return [...preferred, ...others];
}

/** Row -> record, keeping the row's natural field order (notation included). */
export function canonicalRowToRecord(row: CanonicalGameRow): TableRecord {
	const record: TableRecord = {};
	for (const [key, value] of Object.entries(row)) {
		if (value === undefined) continue;
		record[key] = toCell(value);
	}
	return record;
}

/**
 * Persistable table for a canonical dataset.
 * Columns are the union of all record keys (first-seen order), then projected.
 */
export function canonicalTable(rows: readonly CanonicalGameRow[]): Table {
	const records = rows.map(canonicalRowToRecord);

	const seen = new Set<string>();
	const natural: string[] = [];
	for (const record of records) {
		for (const key of Object.keys(record)) {
			if (seen.has(key)) continue;
			seen.add(key);
			natural.push(key);
		}
	}

	const columns = orderCanonicalColumns(natural);
	for (const record of records) delete record[NOTATION_COLUMN];

	return { columns, records };
}

/** Read a persisted record back into a typed canonical row (the notation text is absent). */
export function canonicalRowFromRecord(record: StringRecord): CanonicalGameRow {
	const gameType = record['game_type'] ?? '';

	return {
		url: record['url'] ?? '',
		white_username: record['white_username'] ?? '',
		black_username: record['black_username'] ?? '',
		white_rating: parseNumberCell(record['white_rating']),
		black_rating: parseNumberCell(record['black_rating']),
		rating_diff: parseNumberCell(record['rating_diff']),

		end_time: parseNumberCell(record['end_time']),
		end_date: record['end_date'] ?? '',
		end_datetime: record['end_datetime'] ?? '',
		year: parseNumberCell(record['year']),
		month: record['month'] ?? '',

		time_control: record['time_control'] ?? '',
		game_type: isGameType(gameType) ? gameType : 'unknown',

		move_count: parseNumberCell(record['move_count']),
		eco_code: parseNullableCell(record['eco_code']),
		opening_name: parseNullableCell(record['opening_name']),
		pgn_result: parseNullableCell(record['pgn_result']),

		winner: record['winner'] ?? '',
		result: record['result'] ?? '',
		result_category: record['result_category'] ?? '',
		white_win: parseBooleanCell(record['white_win']),
		black_win: parseBooleanCell(record['black_win']),
		is_draw: parseBooleanCell(record['is_draw']),
	};
}

function isGameType(value: string): value is GameType {
	return GAME_TYPES.has(value);
}
