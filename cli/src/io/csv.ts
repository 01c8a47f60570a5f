/**
 * Minimal CSV codec (RFC 4180 flavour).
 *
 * Writing: every value is quoted and embedded quotes are doubled, so commas,
 * quotes and newlines inside values survive a round trip.
 * Reading: quoted and unquoted fields, CRLF or LF line endings.
 */

import type { StringRecord } from 'chess-perspective-core';

export type CsvTable = {
	columns: string[];
	records: StringRecord[];
};

function quote(value: string): string {
	return `"${value.replace(/"/g, '""')}"`;
}

export function stringifyCsv(columns: readonly string[], rows: readonly string[][]): string {
	const lines = [columns.map(quote).join(',')];
	for (const row of rows) lines.push(row.map(quote).join(','));
	return `${lines.join('\n')}\n`;
}

/** Parse CSV text into rows of fields. A trailing newline does not produce an empty row. */
export function parseCsvRows(text: string): string[][] {
	const rows: string[][] = [];
	let row: string[] = [];
	let field = '';
	let inQuotes = false;
	let fieldStarted = false;

	const input = text.replace(/^\uFEFF/, '');

	for (let i = 0; i < input.length; i++) {
		const ch = input[i];

		if (inQuotes) {
			if (ch === '"') {
				if (input[i + 1] === '"') {
					field += '"';
					i++;
				} else {
					inQuotes = false;
				}
			} else {
				field += ch;
			}
			continue;
		}

		if (ch === '"') {
			inQuotes = true;
			fieldStarted = true;
		} else if (ch === ',') {
			row.push(field);
			field = '';
			fieldStarted = false;
		} else if (ch === '\n' || ch === '\r') {
			if (ch === '\r' && input[i + 1] === '\n') i++;
			row.push(field);
			rows.push(row);
			row = [];
			field = '';
			fieldStarted = false;
		} else {
			field += ch;
			fieldStarted = true;
		}
	}

	if (fieldStarted || row.length > 0) {
		row.push(field);
		rows.push(row);
	}

	return rows;
}

/** First row is the header. Missing trailing fields read as "". */
export function parseCsv(text: string): CsvTable {
	const [header, ...body] = parseCsvRows(text);
	if (!header) return { columns: [], records: [] };

	const records = body.map((fields) => {
		const record: StringRecord = {};
		header.forEach((column, idx) => {
			record[column] = fields[idx] ?? '';
		});
		return record;
	});

	return { columns: header, records };
}
