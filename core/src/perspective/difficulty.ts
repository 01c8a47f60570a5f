import type { DifficultyCategory } from '../games/types';

/**
 * Bucket a player-relative rating difference (player minus opponent).
 * Evaluated top to bottom, first match wins:
 *   >= 100 Much Stronger, >= 25 Stronger, > -25 Similar, > -100 Weaker, else Much Weaker
 */
export function difficultyCategory(ratingDiff: number): DifficultyCategory {
	if (ratingDiff >= 100) return 'Much Stronger';
	if (ratingDiff >= 25) return 'Stronger';
	if (ratingDiff > -25) return 'Similar';
	if (ratingDiff > -100) return 'Weaker';
	return 'Much Weaker';
}
