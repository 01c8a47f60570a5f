import { createMemoryLogger } from '../logs/logger';
import { classifyTimeControl } from '../normalize/gameType';
import { normalizeRecord } from '../normalize/normalizeRecord';
import { OUTCOME_RULES, resolveOutcome } from '../normalize/outcome';
import { deriveTimeFields } from '../normalize/timeFields';

// 2023-11-14 22:13:20 UTC
const END_TIME = 1_700_000_000;

function rawGame(overrides: Record<string, unknown> = {}): Record<string, unknown> {
	return {
		url: 'https://www.chess.com/game/live/1001',
		end_time: END_TIME,
		time_control: '180+2',
		rated: true,
		white: { username: 'alice', rating: 1500, result: 'win' },
		black: { username: 'bob', rating: 1400, result: 'checkmated' },
		pgn: '[ECO "C20"]\n[Result "1-0"]\n\n1. e4 e5 1-0',
		...overrides,
	};
}

describe('normalizeRecord', () => {
	it('builds a canonical row', () => {
		const res = normalizeRecord(rawGame());
		expect(res.ok).toBe(true);
		if (!res.ok) return;

		expect(res.row).toEqual({
			url: 'https://www.chess.com/game/live/1001',
			white_username: 'alice',
			black_username: 'bob',
			white_rating: 1500,
			black_rating: 1400,
			rating_diff: 100,
			end_time: END_TIME,
			end_date: '2023-11-14',
			end_datetime: '2023-11-14 22:13:20',
			year: 2023,
			month: '2023-11',
			time_control: '180+2',
			game_type: 'bullet',
			move_count: 2,
			eco_code: 'C20',
			opening_name: null,
			pgn_result: '1-0',
			winner: 'alice',
			result: '1-0',
			result_category: 'checkmated',
			white_win: true,
			black_win: false,
			is_draw: false,
			pgn: '[ECO "C20"]\n[Result "1-0"]\n\n1. e4 e5 1-0',
		});
	});

	it('derives the calendar fields in the configured time zone', () => {
		const res = normalizeRecord(rawGame(), { timeZone: 'Asia/Tokyo' });
		if (!res.ok) throw new Error(res.message);

		expect(res.row.end_date).toBe('2023-11-15');
		expect(res.row.end_datetime).toBe('2023-11-15 07:13:20');
		expect(res.row.month).toBe('2023-11');
	});

	it('rejects records with missing required keys', () => {
		const logger = createMemoryLogger();
		const raw = rawGame();
		delete raw['white'];
		delete raw['end_time'];

		const res = normalizeRecord(raw, { logger });
		expect(res).toEqual({
			ok: false,
			reason: 'MISSING_FIELDS',
			message: 'Missing required fields: white, end_time',
		});
		expect(logger.entries.map((e) => `${e.level} ${e.scope} ${e.message}`)).toEqual([
			'WARN NORMALIZE Record rejected',
		]);
	});

	it('rejects values that are not records', () => {
		const res = normalizeRecord(null);
		expect(res.ok).toBe(false);
		if (res.ok) return;
		expect(res.message).toBe('Missing required fields: white, black, end_time, pgn');
	});

	it('rejects a player sub-record that is not an object', () => {
		const res = normalizeRecord(rawGame({ white: 'alice' }));
		expect(res.ok).toBe(false);
		if (res.ok) return;
		expect(res.reason).toBe('INVALID_SHAPE');
		expect(res.message.startsWith('Invalid record shape: white: ')).toBe(true);
	});

	it('applies defaults to optional and malformed fields', () => {
		const res = normalizeRecord({
			white: {},
			black: { username: 'bob', rating: 'n/a', result: 'win' },
			end_time: 'yesterday',
			pgn: null,
		});
		if (!res.ok) throw new Error(res.message);

		expect(res.row).toMatchObject({
			url: '',
			white_username: '',
			white_rating: 0,
			black_rating: 0,
			rating_diff: 0,
			end_time: 0,
			end_date: '',
			end_datetime: '',
			year: 0,
			month: '',
			time_control: '',
			game_type: 'unknown',
			move_count: 0,
			eco_code: null,
			winner: 'bob',
			result: '0-1',
			result_category: '',
			white_win: false,
			black_win: true,
		});
	});

	it('reads outcome tokens case-insensitively', () => {
		const res = normalizeRecord(
			rawGame({
				white: { username: 'alice', rating: 1500, result: 'Resigned' },
				black: { username: 'bob', rating: 1400, result: 'WIN' },
			}),
		);
		if (!res.ok) throw new Error(res.message);

		expect(res.row.winner).toBe('bob');
		expect(res.row.result).toBe('0-1');
		expect(res.row.result_category).toBe('resigned');
	});

	it('trusts the declared result when no side reports a win or draw', () => {
		const res = normalizeRecord(
			rawGame({
				white: { username: 'alice', rating: 1500, result: 'abandoned' },
				black: { username: 'bob', rating: 1400, result: 'abandoned' },
			}),
		);
		if (!res.ok) throw new Error(res.message);

		expect(res.row).toMatchObject({
			winner: '',
			result: '1-0',
			result_category: 'abandoned/abandoned',
			white_win: false,
			black_win: false,
			is_draw: false,
		});
	});

	it('gives the game to White when both sides report a win', () => {
		const res = normalizeRecord(
			rawGame({
				white: { username: 'alice', rating: 1500, result: 'win' },
				black: { username: 'bob', rating: 1400, result: 'win' },
			}),
		);
		if (!res.ok) throw new Error(res.message);

		expect(res.row).toMatchObject({
			winner: 'alice',
			result: '1-0',
			result_category: 'win',
			white_win: true,
			black_win: false,
			is_draw: false,
		});
	});

	it('scores a draw when only Black reports a draw token', () => {
		const res = normalizeRecord(
			rawGame({
				white: { username: 'alice', rating: 1500, result: 'timeout' },
				black: { username: 'bob', rating: 1400, result: 'timevsinsufficient' },
			}),
		);
		if (!res.ok) throw new Error(res.message);

		expect(res.row).toMatchObject({
			winner: 'draw',
			result: '1/2-1/2',
			result_category: 'timeout',
			is_draw: true,
		});
	});

	it('falls back to a draw without a declared result', () => {
		const res = normalizeRecord(
			rawGame({
				white: { username: 'alice', rating: 1500, result: 'abandoned' },
				black: { username: 'bob', rating: 1400, result: 'timeout' },
				pgn: '1. e4',
			}),
		);
		if (!res.ok) throw new Error(res.message);

		expect(res.row).toMatchObject({
			pgn_result: null,
			winner: 'draw',
			result: '1/2-1/2',
			result_category: 'abandoned/timeout',
			white_win: false,
			black_win: false,
			is_draw: true,
		});
	});

	it('flags draws', () => {
		const res = normalizeRecord(
			rawGame({
				white: { username: 'alice', rating: 1500, result: 'repetition' },
				black: { username: 'bob', rating: 1400, result: 'repetition' },
				pgn: '[Result "1/2-1/2"]\n\n1. e4 e5 1/2-1/2',
			}),
		);
		if (!res.ok) throw new Error(res.message);

		expect(res.row).toMatchObject({
			winner: 'draw',
			result: '1/2-1/2',
			result_category: 'repetition',
			white_win: false,
			black_win: false,
			is_draw: true,
		});
	});
});

describe('resolveOutcome', () => {
	const players = { whiteUsername: 'alice', blackUsername: 'bob', pgnResult: null };

	it.each([
		['win', 'win', 'white-win', 'alice', '1-0'],
		['resigned', 'win', 'black-win', 'bob', '0-1'],
		['agreed', 'agreed', 'draw-token', 'draw', '1/2-1/2'],
		['abandoned', 'abandoned', 'pgn-fallback', 'draw', '1/2-1/2'],
	])('%s/%s is decided by %s', (whiteToken, blackToken, rule, winner, result) => {
		expect(resolveOutcome({ ...players, whiteToken, blackToken }, OUTCOME_RULES)).toMatchObject({
			rule,
			winner,
			result,
		});
	});

	it('leaves the winner empty when the declared result is decisive', () => {
		const outcome = resolveOutcome({
			...players,
			whiteToken: 'abandoned',
			blackToken: 'abandoned',
			pgnResult: '0-1',
		});
		expect(outcome).toEqual({
			winner: '',
			result: '0-1',
			result_category: 'abandoned/abandoned',
			rule: 'pgn-fallback',
		});
	});
});

describe('classifyTimeControl', () => {
	it.each([
		['60', 'bullet'],
		['180', 'bullet'],
		['180+2', 'bullet'],
		['181', 'blitz'],
		['600', 'blitz'],
		['300+5', 'blitz'],
		['601', 'rapid'],
		['900+10', 'rapid'],
		['1/86400', 'daily'],
		['garbage', 'unknown'],
		['', 'unknown'],
	])('%s -> %s', (timeControl, expected) => {
		expect(classifyTimeControl(timeControl)).toBe(expected);
	});
});

describe('deriveTimeFields', () => {
	it('returns empty values for a zero timestamp', () => {
		expect(deriveTimeFields(0, 'UTC')).toEqual({
			end_date: '',
			end_datetime: '',
			year: 0,
			month: '',
		});
	});

	it('returns empty values for an unknown time zone', () => {
		expect(deriveTimeFields(END_TIME, 'Not/AZone').end_date).toBe('');
	});
});
