import type { CanonicalGameRow } from '../games/types';

export const DEFAULT_SUBJECT_COUNT = 5;

/**
 * Most frequent usernames across both sides of the dataset.
 *
 * Frequencies are counted over the White column, then the Black column; ties keep
 * the order in which usernames were first encountered during that count.
 * Empty usernames are not counted.
 */
export function selectTopSubjects(
	rows: readonly CanonicalGameRow[],
	limit = DEFAULT_SUBJECT_COUNT,
): string[] {
	const counts = new Map<string, number>();
	const bump = (name: string) => {
		// Nameless players are never tracked.
		if (name) counts.set(name, (counts.get(name) ?? 0) + 1);
	};

	for (const row of rows) bump(row.white_username);
	for (const row of rows) bump(row.black_username);

	// Array.prototype.sort is stable: equal counts keep first-encountered order.
	return [...counts.entries()]
		.sort((a, b) => b[1] - a[1])
		.slice(0, limit)
		.map(([name]) => name);
}
