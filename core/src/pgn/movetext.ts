const RESULT_TOKENS = new Set(['1-0', '0-1', '1/2-1/2', '*']);

/**
 * Remove brace comments, rest-of-line comments and (nested) variations.
 * Unbalanced closing parentheses are ignored.
 */
function stripAnnotations(movetext: string): string {
	let out = '';
	let depth = 0;
	let inBrace = false;
	let inLineComment = false;

	for (const ch of movetext) {
		if (inLineComment) {
			if (ch === '\n') {
				inLineComment = false;
				out += ' ';
			}
			continue;
		}
		if (inBrace) {
			if (ch === '}') inBrace = false;
			continue;
		}
		if (ch === '{') {
			inBrace = true;
			out += ' ';
			continue;
		}
		if (ch === ';') {
			inLineComment = true;
			continue;
		}
		if (ch === '(') {
			depth++;
			continue;
		}
		if (ch === ')') {
			if (depth > 0) depth--;
			out += ' ';
			continue;
		}
		if (depth === 0) out += ch;
	}

	return out;
}

/**
 * Extract the mainline SAN tokens from a movetext section.
 *
 * Example: `1. e4 {[%clk 0:02:59.9]} 1... e5 2. Nf3 $1 (2. f4) 1-0` -> ["e4", "e5", "Nf3"]
 */
export function tokenizeMainline(movetext: string): string[] {
	const tokens: string[] = [];

	for (const raw of stripAnnotations(movetext).split(/\s+/)) {
		// "12." / "12..." / "12.e4" -> drop the move number prefix
		const token = raw.replace(/^\d+\.+/, '');
		if (!token) continue;
		if (token.startsWith('$')) continue;
		if (RESULT_TOKENS.has(token)) continue;

		tokens.push(token);
	}

	return tokens;
}

/** chess.js can reject SAN suffixes like "!" / "?" (e.g. "Nf3!"). "+" and "#" are kept. */
export function sanitizeSan(san: string): string {
	return san.replace(/[!?]+$/g, '');
}
