/**
 * Title-case a phrase: the first letter of each run of letters is upper-cased,
 * the following letters of the run are lower-cased.
 *
 * "queens pawn opening 3.nf3" -> "Queens Pawn Opening 3.Nf3"
 */
export function titleCase(value: string): string {
	let out = '';
	let prevIsLetter = false;

	for (const ch of value) {
		const isLetter = ch.toLowerCase() !== ch.toUpperCase();
		out += isLetter ? (prevIsLetter ? ch.toLowerCase() : ch.toUpperCase()) : ch;
		prevIsLetter = isLetter;
	}

	return out;
}

/**
 * Derive an opening name from an opening-reference URL (Chess.com `ECOUrl` tag).
 *
 * "https://www.chess.com/openings/Sicilian-Defense-Old-Sicilian...3.Nc3"
 *   -> "Sicilian Defense Old Sicilian 3.Nc3"
 *
 * Returns null when the URL has no usable final path segment.
 */
export function openingNameFromUrl(url: string): string | null {
	const withoutQuery = url.trim().split(/[?#]/)[0] ?? '';
	const path = withoutQuery.replace(/^[a-z][a-z0-9+.-]*:\/\/[^/]*/i, '');
	const segments = path.split('/').filter((s) => s.length > 0);
	if (segments.length === 0) return null;

	const last = segments[segments.length - 1] ?? '';

	const name = titleCase(last.replace(/-/g, ' ').replace(/\.\.\./g, ' ').trim());
	return name.length ? name : null;
}
