/**
 * Tabular codec helpers shared by the canonical and perspective datasets.
 *
 * Cells are typed in memory and encoded as plain strings for persistence:
 * - booleans: "true" / "false"
 * - null: ""
 * - numbers: decimal representation
 */

export type CellValue = string | number | boolean | null;

export type TableRecord = Record<string, CellValue>;

export type Table = {
	columns: string[];
	records: TableRecord[];
};

/** A persisted record, as read back from a delimited file. */
export type StringRecord = Record<string, string>;

export function formatCell(value: CellValue | undefined): string {
	if (value === null || value === undefined) return '';
	if (typeof value === 'boolean') return value ? 'true' : 'false';
	return String(value);
}

export function toCell(value: unknown): CellValue {
	if (value === null || value === undefined) return null;
	if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
		return value;
	}
	return String(value);
}

export function parseNumberCell(value: string | undefined): number {
	const s = (value ?? '').trim();
	if (!s) return 0;
	const n = Number(s);
	return Number.isFinite(n) ? n : 0;
}

export function parseBooleanCell(value: string | undefined): boolean {
	const s = (value ?? '').trim().toLowerCase();
	return s === 'true' || s === '1';
}

export function parseNullableCell(value: string | undefined): string | null {
	const s = value ?? '';
	return s.length ? s : null;
}

/** Encode typed records into string rows following `columns`. */
export function tableToStringRows(table: Table): string[][] {
	return table.records.map((record) => table.columns.map((column) => formatCell(record[column])));
}
