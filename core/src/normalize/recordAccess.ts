import { z } from 'zod';

/**
 * Optional-field accessor for raw Chess.com game records.
 *
 * This is the only place where loosely-typed input is read. Every field that may be
 * missing or malformed gets a named default here, so later derivation steps work on
 * plain typed values.
 */

export const REQUIRED_RECORD_FIELDS = ['white', 'black', 'end_time', 'pgn'] as const;

export const RECORD_DEFAULTS = {
	username: '',
	rating: 0,
	outcome: '',
	endTime: 0,
	timeControl: '',
	url: '',
	pgn: '',
} as const;

const PlayerSchema = z.object({
	username: z.string().catch(RECORD_DEFAULTS.username),
	rating: z.number().finite().catch(RECORD_DEFAULTS.rating),
	result: z.string().catch(RECORD_DEFAULTS.outcome),
});

const RecordSchema = z.object({
	white: PlayerSchema,
	black: PlayerSchema,
	end_time: z.number().finite().catch(RECORD_DEFAULTS.endTime),
	time_control: z.string().catch(RECORD_DEFAULTS.timeControl),
	url: z.string().catch(RECORD_DEFAULTS.url),
	pgn: z.string().catch(RECORD_DEFAULTS.pgn),
});

export type RecordFields = z.infer<typeof RecordSchema>;
export type PlayerFields = z.infer<typeof PlayerSchema>;

export type RecordAccessResult =
	| { ok: true; fields: RecordFields }
	| { ok: false; reason: 'MISSING_FIELDS'; missing: string[] }
	| { ok: false; reason: 'INVALID_SHAPE'; message: string };

function isPlainObject(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Required keys absent from the record (presence only, values are not inspected). */
export function missingRequiredFields(raw: unknown): string[] {
	if (!isPlainObject(raw)) return [...REQUIRED_RECORD_FIELDS];
	return REQUIRED_RECORD_FIELDS.filter((field) => !(field in raw));
}

/**
 * Validate required keys, then read every field with its default.
 * Player sub-records must be objects; their own fields are all optional.
 */
export function readRecordFields(raw: unknown): RecordAccessResult {
	const missing = missingRequiredFields(raw);
	if (missing.length > 0) return { ok: false, reason: 'MISSING_FIELDS', missing };

	const parsed = RecordSchema.safeParse(raw);
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		const where = issue?.path.join('.') || 'record';
		return {
			ok: false,
			reason: 'INVALID_SHAPE',
			message: `${where}: ${issue?.message ?? 'invalid value'}`,
		};
	}

	return { ok: true, fields: parsed.data };
}
