import { DateTime } from 'luxon';

export type TimeFields = {
	end_date: string;
	end_datetime: string;
	year: number;
	month: string;
};

export const EMPTY_TIME_FIELDS: Readonly<TimeFields> = Object.freeze({
	end_date: '',
	end_datetime: '',
	year: 0,
	month: '',
});

function toZonedDateTime(endTime: number, timeZone: string) {
	try {
		const dt = DateTime.fromSeconds(endTime, { zone: timeZone });
		return dt.isValid ? dt : null;
	} catch {
		return null;
	}
}

/**
 * Derive calendar fields from a Unix timestamp (seconds) in the given zone.
 * Falsy or non-convertible timestamps (out of range, unknown zone) give the empty values.
 */
export function deriveTimeFields(endTime: number, timeZone: string): TimeFields {
	if (!endTime) return { ...EMPTY_TIME_FIELDS };

	const dt = toZonedDateTime(endTime, timeZone);
	if (!dt) return { ...EMPTY_TIME_FIELDS };

	return {
		end_date: dt.toFormat('yyyy-MM-dd'),
		end_datetime: dt.toFormat('yyyy-MM-dd HH:mm:ss'),
		year: dt.year,
		month: dt.toFormat('yyyy-MM'),
	};
}
