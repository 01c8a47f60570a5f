import { Chess } from 'chess.js';

import { silentLogger } from '../logs/logger';
import type { Logger } from '../logs/types';
import { errorMessage } from '../errors';
import { sanitizeSan, tokenizeMainline } from './movetext';
import { openingNameFromUrl } from './openingFromUrl';

export type PgnTags = Record<string, string>;

const TAG_PAIR_RE = /^\[(\w+)\s+"((?:[^"\\]|\\.)*)"\]$/;

/** Tag section (leading `[Name "value"]` and blank lines) and the movetext after it. */
function splitSections(text: string): { header: string[]; movetext: string } {
	const lines = text.replace(/^\uFEFF/, '').split(/\r?\n/);
	const bodyStart = lines.findIndex((line) => {
		const trimmed = line.trim();
		return trimmed.length > 0 && !trimmed.startsWith('[');
	});
	const cut = bodyStart === -1 ? lines.length : bodyStart;

	return { header: lines.slice(0, cut), movetext: lines.slice(cut).join('\n').trim() };
}

/**
 * Header tags of a game. `\"` and `\\` escapes are resolved, values are trimmed and
 * empty values are left out.
 */
export function parsePgnTags(text: string): PgnTags {
	const tags: PgnTags = {};

	for (const line of splitSections(text).header) {
		const m = TAG_PAIR_RE.exec(line.trim());
		if (!m) continue;

		const value = m[2].replace(/\\(["\\])/g, '$1').trim();
		if (value) tags[m[1]] = value;
	}

	return tags;
}

/** Everything after the tag section. */
export function extractMovetext(text: string): string {
	return splitSections(text).movetext;
}

export type NotationInfo = {
	/** Plies replayed from the mainline (best-effort, not authoritative). */
	moveCount: number;
	ecoCode: string | null;
	openingName: string | null;

	/** Declared result (PGN Result tag), e.g. "1-0", "1/2-1/2", "*". */
	result: string | null;
};

export const EMPTY_NOTATION_INFO: Readonly<NotationInfo> = Object.freeze({
	moveCount: 0,
	ecoCode: null,
	openingName: null,
	result: null,
});

/**
 * Replay SAN tokens with chess.js and count the plies that were applied.
 * Replay stops at the first token chess.js rejects (strict first, then permissive).
 *
 * Supports non-standard initial position if tags contain "FEN".
 */
export function countReplayablePlies(tags: PgnTags, sans: string[]): number {
	const startFen = tags['FEN'];
	const chess = startFen ? new Chess(startFen) : new Chess();

	let plies = 0;
	for (const raw of sans) {
		const san = sanitizeSan(raw);
		try {
			chess.move(san, { strict: true });
		} catch {
			try {
				chess.move(san, { strict: false });
			} catch {
				break;
			}
		}
		plies++;
	}

	return plies;
}

function resolveOpeningName(tags: PgnTags): string | null {
	const opening = tags['Opening'];
	if (opening) return opening;

	const ecoUrl = tags['ECOUrl'];
	return ecoUrl ? openingNameFromUrl(ecoUrl) : null;
}

/**
 * Extract structured metadata from a single game's notation text (tags + movetext).
 *
 * Never throws: empty input or any failure yields the zero value.
 */
export function parseNotation(
	text: string,
	options: { logger?: Logger; debugId?: string } = {},
): NotationInfo {
	const logger = options.logger ?? silentLogger;
	if (!text.trim()) return { ...EMPTY_NOTATION_INFO };

	try {
		const tags = parsePgnTags(text);
		const sans = tokenizeMainline(extractMovetext(text));

		return {
			moveCount: countReplayablePlies(tags, sans),
			ecoCode: tags['ECO'] ?? null,
			openingName: resolveOpeningName(tags),
			result: tags['Result'] ?? null,
		};
	} catch (err: unknown) {
		logger.warn('PGN', 'Error parsing PGN', {
			error: errorMessage(err),
			game: options.debugId,
		});
		return { ...EMPTY_NOTATION_INFO };
	}
}
