import { DRAW_WINNER, type GameResult } from '../games/types';

/**
 * Outcome resolution
 *
 * A priority-ordered chain of guarded rules: the first rule whose guard matches decides
 * winner / result / result_category. The order is part of the contract:
 * - White "win" is checked before Black "win" (both set => White wins).
 * - Draw tokens are checked before the PGN fallback.
 */

export type OutcomeInput = {
	whiteUsername: string;
	blackUsername: string;

	/** Outcome tokens, already lower-cased. */
	whiteToken: string;
	blackToken: string;

	/** Declared result from the notation text (Result tag), if any. */
	pgnResult: string | null;
};

export type Outcome = {
	/** Winner username, "draw", or "" when unresolved. */
	winner: string;
	result: GameResult;
	result_category: string;
};

export type OutcomeRule = {
	name: string;
	applies(input: OutcomeInput): boolean;
	resolve(input: OutcomeInput): Outcome;
};

export const WIN_TOKEN = 'win';
export const DRAW_RESULT = '1/2-1/2';

/** Chess.com draw tokens, plus their spelled-out forms. */
export const DRAW_TOKENS: ReadonlySet<string> = new Set([
	'agreed',
	'repetition',
	'stalemate',
	'insufficient',
	'insufficient material',
	'50move',
	'50-move',
	'50-move rule',
	'timevsinsufficient',
	'timeout vs insufficient material',
]);

export const OUTCOME_RULES: readonly OutcomeRule[] = [
	{
		name: 'white-win',
		applies: (i) => i.whiteToken === WIN_TOKEN,
		resolve: (i) => ({ winner: i.whiteUsername, result: '1-0', result_category: i.blackToken }),
	},
	{
		name: 'black-win',
		applies: (i) => i.blackToken === WIN_TOKEN,
		resolve: (i) => ({ winner: i.blackUsername, result: '0-1', result_category: i.whiteToken }),
	},
	{
		name: 'draw-token',
		applies: (i) => DRAW_TOKENS.has(i.whiteToken) || DRAW_TOKENS.has(i.blackToken),
		resolve: (i) => ({ winner: DRAW_WINNER, result: DRAW_RESULT, result_category: i.whiteToken }),
	},
	{
		// Neither side reports a win nor a draw token: trust the declared result when present.
		name: 'pgn-fallback',
		applies: () => true,
		resolve: (i) => {
			const result = i.pgnResult ? i.pgnResult : DRAW_RESULT;
			return {
				winner: result.includes(DRAW_RESULT) ? DRAW_WINNER : '',
				result,
				result_category: `${i.whiteToken}/${i.blackToken}`,
			};
		},
	},
];

/** Apply the rules in order; returns the outcome and the name of the rule that decided it. */
export function resolveOutcome(
	input: OutcomeInput,
	rules: readonly OutcomeRule[] = OUTCOME_RULES,
): Outcome & { rule: string } {
	for (const rule of rules) {
		if (rule.applies(input)) return { ...rule.resolve(input), rule: rule.name };
	}

	// OUTCOME_RULES ends with a catch-all; custom rule lists may not.
	return {
		winner: '',
		result: DRAW_RESULT,
		result_category: `${input.whiteToken}/${input.blackToken}`,
		rule: 'none',
	};
}

/**
 * Outcome flags. A winner only counts for a side when it is non-empty,
 * so an unresolved game never flags a nameless player as the winner.
 */
export function outcomeFlags(
	winner: string,
	whiteUsername: string,
	blackUsername: string,
): { white_win: boolean; black_win: boolean; is_draw: boolean } {
	return {
		white_win: winner !== '' && winner === whiteUsername,
		black_win: winner !== '' && winner === blackUsername,
		is_draw: winner === DRAW_WINNER,
	};
}
