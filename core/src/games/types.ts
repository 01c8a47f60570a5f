/**
 * Game dataset types.
 *
 * Three shapes flow through the pipeline:
 * - RawGameRecord: one game as found in a Chess.com monthly archive (loosely typed, read-only).
 * - CanonicalGameRow: one normalized game, objective snapshot (White/Black).
 * - SubjectPerspectiveRow: one game seen from a tracked subject (player/opponent).
 *
 * Column names are kept in snake_case on purpose: they are the persisted CSV headers.
 */

/** Side/color representation used across the pipeline (lowercase). */
export type PlayerColor = 'white' | 'black';

/** Speed buckets derived from the time-control descriptor. */
export type GameType = 'bullet' | 'blitz' | 'rapid' | 'daily' | 'unknown';

/**
 * Formal result.
 * Usually "1-0" | "0-1" | "1/2-1/2", but the fallback path may carry the PGN Result tag as-is.
 */
export type GameResult = '1-0' | '0-1' | '1/2-1/2' | (string & {});

export const DRAW_WINNER = 'draw';

export type RawGamePlayer = {
	username?: unknown;
	rating?: unknown;

	/** Outcome token, e.g. "win", "checkmated", "resigned", "timeout", "agreed"... */
	result?: unknown;

	[key: string]: unknown;
};

/**
 * A game record as served by the Chess.com public API (`games` array of a monthly archive).
 * Every field is optional at the type level: presence is checked by the normalizer.
 */
export type RawGameRecord = {
	white?: RawGamePlayer;
	black?: RawGamePlayer;
	end_time?: unknown;
	time_control?: unknown;
	url?: unknown;
	pgn?: unknown;

	[key: string]: unknown;
};

/** One monthly archive (one JSON file on disk). */
export type GameBatch = {
	/** Where the batch came from (file name); used for logging only. */
	source: string;
	games: readonly unknown[];
};

export type CanonicalGameRow = {
	// -------------------------------------------------------------------------
	// Identity
	// -------------------------------------------------------------------------
	url: string;
	white_username: string;
	black_username: string;
	white_rating: number;
	black_rating: number;

	/** white_rating - black_rating */
	rating_diff: number;

	// -------------------------------------------------------------------------
	// Time (derived from end_time, empty/zero when not convertible)
	// -------------------------------------------------------------------------
	end_time: number;
	end_date: string;
	end_datetime: string;
	year: number;
	month: string;

	time_control: string;
	game_type: GameType;

	// -------------------------------------------------------------------------
	// Notation-derived
	// -------------------------------------------------------------------------
	move_count: number;
	eco_code: string | null;
	opening_name: string | null;
	pgn_result: string | null;

	// -------------------------------------------------------------------------
	// Outcome
	// -------------------------------------------------------------------------
	/** Winner username, "draw", or "" when unresolved. */
	winner: string;
	result: GameResult;
	result_category: string;
	white_win: boolean;
	black_win: boolean;
	is_draw: boolean;

	/**
	 * Raw notation text.
	 * Kept in memory during processing, never written to the tabular output.
	 */
	pgn?: string;
};

export type ResultStatus = 'Win' | 'Draw' | 'Loss';

export type DifficultyCategory = 'Much Stronger' | 'Stronger' | 'Similar' | 'Weaker' | 'Much Weaker';

export type SubjectPerspectiveRow = {
	game_date: string;
	game_time: number;
	end_datetime: string;

	player_name: string;
	opponent_name: string;
	player_rating: number;
	opponent_rating: number;

	/** player_rating - opponent_rating (positive means the player is higher rated). */
	rating_diff: number;
	difficulty_category: DifficultyCategory;
	result_status: ResultStatus;

	game_type: GameType;
	opening_name: string | null;
	move_count: number;
	player_color: PlayerColor;
	game_url: string;

	is_win: boolean;
	is_loss: boolean;
	is_draw: boolean;
};
