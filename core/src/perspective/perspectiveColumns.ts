import type { SubjectPerspectiveRow } from '../games/types';
import type { Table, TableRecord } from '../dataset/table';

export const PERSPECTIVE_COLUMNS = [
	'game_date',
	'game_time',
	'end_datetime',
	'player_name',
	'opponent_name',
	'player_rating',
	'opponent_rating',
	'rating_diff',
	'difficulty_category',
	'result_status',
	'game_type',
	'opening_name',
	'move_count',
	'player_color',
	'game_url',
	'is_win',
	'is_loss',
	'is_draw',
] as const satisfies readonly (keyof SubjectPerspectiveRow)[];

export function perspectiveTable(rows: readonly SubjectPerspectiveRow[]): Table {
	const records = rows.map((row) => {
		const record: TableRecord = {};
		for (const column of PERSPECTIVE_COLUMNS) record[column] = row[column];
		return record;
	});

	return { columns: [...PERSPECTIVE_COLUMNS], records };
}
