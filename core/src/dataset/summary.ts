import type { CanonicalGameRow } from '../games/types';

export type DatasetSummary = {
	totalGames: number;
	uniquePlayers: number;

	/** Earliest / latest non-empty end_date (null when no row has a date). */
	firstDate: string | null;
	lastDate: string | null;

	/** Most frequent time controls, most frequent first. */
	topTimeControls: Array<{ timeControl: string; games: number }>;
};

export function summarizeDataset(rows: readonly CanonicalGameRow[], topN = 5): DatasetSummary {
	const players = new Set<string>();
	const timeControls = new Map<string, number>();
	let firstDate: string | null = null;
	let lastDate: string | null = null;

	for (const row of rows) {
		players.add(row.white_username);
		players.add(row.black_username);

		timeControls.set(row.time_control, (timeControls.get(row.time_control) ?? 0) + 1);

		if (row.end_date) {
			if (firstDate === null || row.end_date < firstDate) firstDate = row.end_date;
			if (lastDate === null || row.end_date > lastDate) lastDate = row.end_date;
		}
	}

	const topTimeControls = [...timeControls.entries()]
		.map(([timeControl, games]) => ({ timeControl, games }))
		.sort((a, b) => b.games - a.games)
		.slice(0, topN);

	return {
		totalGames: rows.length,
		uniquePlayers: players.size,
		firstDate,
		lastDate,
		topTimeControls,
	};
}
