import type { CanonicalGameRow } from '../games/types';
import { createMemoryLogger } from '../logs/logger';
import { difficultyCategory } from '../perspective/difficulty';
import { PERSPECTIVE_COLUMNS, perspectiveTable } from '../perspective/perspectiveColumns';
import { projectPerspectives } from '../perspective/projectPerspectives';
import { selectTopSubjects } from '../perspective/subjects';

function row(partial: Partial<CanonicalGameRow>): CanonicalGameRow {
	return {
		url: 'https://www.chess.com/game/live/1',
		white_username: 'alice',
		black_username: 'bob',
		white_rating: 1500,
		black_rating: 1400,
		rating_diff: 100,
		end_time: 200,
		end_date: '1970-01-01',
		end_datetime: '1970-01-01 00:03:20',
		year: 1970,
		month: '1970-01',
		time_control: '300',
		game_type: 'blitz',
		move_count: 40,
		eco_code: 'B01',
		opening_name: 'Scandinavian Defense',
		pgn_result: '1-0',
		winner: 'alice',
		result: '1-0',
		result_category: 'resigned',
		white_win: true,
		black_win: false,
		is_draw: false,
		...partial,
	};
}

const GAME_1 = row({});
const GAME_2 = row({
	url: 'https://www.chess.com/game/live/2',
	white_username: 'carol',
	black_username: 'alice',
	white_rating: 1600,
	black_rating: 1550,
	rating_diff: 50,
	end_time: 100,
	winner: 'draw',
	result: '1/2-1/2',
	white_win: false,
	is_draw: true,
});

describe('difficultyCategory', () => {
	it.each([
		[250, 'Much Stronger'],
		[100, 'Much Stronger'],
		[99, 'Stronger'],
		[25, 'Stronger'],
		[24, 'Similar'],
		[0, 'Similar'],
		[-24, 'Similar'],
		[-25, 'Weaker'],
		[-99, 'Weaker'],
		[-100, 'Much Weaker'],
		[-101, 'Much Weaker'],
	])('%d -> %s', (diff, expected) => {
		expect(difficultyCategory(diff)).toBe(expected);
	});
});

describe('selectTopSubjects', () => {
	it('ranks by frequency, ties in first-encountered order', () => {
		expect(selectTopSubjects([GAME_1, GAME_2])).toEqual(['alice', 'carol', 'bob']);
		expect(selectTopSubjects([GAME_1, GAME_2], 2)).toEqual(['alice', 'carol']);
	});

	it('never selects an empty username', () => {
		const nameless = [
			row({ url: 'u1', white_username: '', black_username: '' }),
			row({ url: 'u2', white_username: '', black_username: 'bob' }),
			row({ url: 'u3', white_username: 'alice', black_username: '' }),
		];
		expect(selectTopSubjects(nameless)).toEqual(['alice', 'bob']);
	});
});

describe('projectPerspectives', () => {
	it('re-projects games around a tracked subject, ordered by game time', () => {
		const res = projectPerspectives([GAME_1, GAME_2], { subjects: ['alice'] });
		expect(res.ok).toBe(true);
		if (!res.ok) return;

		expect(res.rows).toEqual([
			{
				game_date: '1970-01-01',
				game_time: 100,
				end_datetime: '1970-01-01 00:03:20',
				player_name: 'alice',
				opponent_name: 'carol',
				player_rating: 1550,
				opponent_rating: 1600,
				rating_diff: -50,
				difficulty_category: 'Weaker',
				result_status: 'Draw',
				game_type: 'blitz',
				opening_name: 'Scandinavian Defense',
				move_count: 40,
				player_color: 'black',
				game_url: 'https://www.chess.com/game/live/2',
				is_win: false,
				is_loss: false,
				is_draw: true,
			},
			{
				game_date: '1970-01-01',
				game_time: 200,
				end_datetime: '1970-01-01 00:03:20',
				player_name: 'alice',
				opponent_name: 'bob',
				player_rating: 1500,
				opponent_rating: 1400,
				rating_diff: 100,
				difficulty_category: 'Much Stronger',
				result_status: 'Win',
				game_type: 'blitz',
				opening_name: 'Scandinavian Defense',
				move_count: 40,
				player_color: 'white',
				game_url: 'https://www.chess.com/game/live/1',
				is_win: true,
				is_loss: false,
				is_draw: false,
			},
		]);
	});

	it('emits two rows when both sides are tracked, White first', () => {
		const res = projectPerspectives([GAME_1], { subjects: ['bob', 'alice'] });
		if (!res.ok) throw new Error(res.error.message);

		expect(
			res.rows.map((r) => [r.player_name, r.player_color, r.rating_diff, r.result_status]),
		).toEqual([
			['alice', 'white', 100, 'Win'],
			['bob', 'black', -100, 'Loss'],
		]);
		expect(res.rows[1]?.difficulty_category).toBe('Much Weaker');
	});

	it('counts an unresolved game as a loss for both sides', () => {
		const unresolved = row({ winner: '', result: '1-0', white_win: false });
		const res = projectPerspectives([unresolved], { subjects: ['alice', 'bob'] });
		if (!res.ok) throw new Error(res.error.message);

		expect(res.rows.map((r) => r.result_status)).toEqual(['Loss', 'Loss']);
	});

	it('does not score an unresolved game as a win for a nameless side', () => {
		const unresolved = row({ white_username: '', winner: '', result: '1-0', white_win: false });
		const res = projectPerspectives([unresolved], { subjects: [''] });
		if (!res.ok) throw new Error(res.error.message);

		expect(res.rows.map((r) => [r.player_color, r.result_status, r.is_win])).toEqual([
			['white', 'Loss', false],
		]);
	});

	it('auto-selects the most frequent players', () => {
		const logger = createMemoryLogger();
		const res = projectPerspectives([GAME_1, GAME_2], { logger });
		if (!res.ok) throw new Error(res.error.message);

		expect(res.subjects).toEqual(['alice', 'carol', 'bob']);
		expect(res.rows.map((r) => `${r.game_time}:${r.player_name}`)).toEqual([
			'100:carol',
			'100:alice',
			'200:alice',
			'200:bob',
		]);
		expect(logger.entries.map((e) => e.message)).toEqual([
			'No subjects provided. Auto-selected top players: alice, carol, bob',
			'Generated 4 perspective rows from 2 games',
		]);
	});

	it('fails with DATASET_EMPTY on an empty dataset', () => {
		const res = projectPerspectives([], { subjects: ['alice'] });
		expect(res.ok).toBe(false);
		if (res.ok) return;
		expect(res.error.code).toBe('DATASET_EMPTY');
	});

	it('fails with NO_SUBJECT_MATCH when nobody tracked played', () => {
		const res = projectPerspectives([GAME_1], { subjects: ['Alice'] });
		expect(res.ok).toBe(false);
		if (res.ok) return;
		expect(res.error.code).toBe('NO_SUBJECT_MATCH');
		expect(res.error.details).toEqual({ subjects: ['Alice'] });
	});
});

describe('perspectiveTable', () => {
	it('uses the fixed column order', () => {
		const res = projectPerspectives([GAME_1], { subjects: ['alice'] });
		if (!res.ok) throw new Error(res.error.message);

		const table = perspectiveTable(res.rows);
		expect(table.columns).toEqual([...PERSPECTIVE_COLUMNS]);
		expect(table.records[0]?.['player_color']).toBe('white');
		expect(table.records[0]?.['is_win']).toBe(true);
	});
});
