import * as fs from 'node:fs/promises';

import { z } from 'zod';

const PlayersFileSchema = z
	.object({
		players: z.array(z.string().trim().min(1)).min(1),
		startYear: z.number().int().optional(),
		endYear: z.number().int().optional(),
	})
	.refine(
		(f) => f.startYear === undefined || f.endYear === undefined || f.startYear <= f.endYear,
		{ message: 'startYear must not be after endYear', path: ['startYear'] },
	);

export type PlayersFile = z.infer<typeof PlayersFileSchema>;

/** Parse the players list used by `fetch-all`. Throws with the first problems listed. */
export function parsePlayersFile(json: unknown): PlayersFile {
	const parsed = PlayersFileSchema.safeParse(json);
	if (!parsed.success) {
		const problems = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
		throw new Error(`Invalid players file: ${problems.join('; ')}`);
	}
	return parsed.data;
}

export async function readPlayersFile(filePath: string): Promise<PlayersFile> {
	const text = await fs.readFile(filePath, 'utf8');
	return parsePlayersFile(JSON.parse(text));
}
