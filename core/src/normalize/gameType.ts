import type { GameType } from '../games/types';

const BASE_TIME_RE = /^(\d+)(?:\+(\d+))?$/;

/** Upper bounds (seconds of base time, inclusive). */
export const BULLET_MAX_SECONDS = 180;
export const BLITZ_MAX_SECONDS = 600;

/**
 * Classify a time-control descriptor.
 *
 * - "<base>" or "<base>+<increment>": bullet (<=180), blitz (<=600), rapid otherwise
 * - "1/86400" (days-per-move style): daily
 * - anything else: unknown
 */
export function classifyTimeControl(timeControl: string): GameType {
	const m = timeControl.trim().match(BASE_TIME_RE);
	if (m) {
		const base = Number(m[1]);
		if (base <= BULLET_MAX_SECONDS) return 'bullet';
		if (base <= BLITZ_MAX_SECONDS) return 'blitz';
		return 'rapid';
	}

	if (timeControl.includes('/')) return 'daily';
	return 'unknown';
}
