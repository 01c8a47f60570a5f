import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import { errorMessage, type Logger } from 'chess-perspective-core';

const SCOPE = 'FILES';

export async function pathExists(p: string): Promise<boolean> {
	try {
		await fs.access(p);
		return true;
	} catch {
		return false;
	}
}

export async function ensureDir(filePath: string): Promise<void> {
	await fs.mkdir(path.dirname(filePath), { recursive: true });
}

/**
 * Write through a temporary sibling file then rename, so readers never see
 * a half-written file.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
	await ensureDir(filePath);
	const tmp = `${filePath}.${process.pid}.${Date.now()}.tmp`;
	try {
		await fs.writeFile(tmp, content, 'utf8');
		await fs.rename(tmp, filePath);
	} catch (err: unknown) {
		await fs.rm(tmp, { force: true });
		throw err;
	}
}

/** JSON files of a directory (sorted by name). Missing directory => []. */
export async function listJsonFiles(dir: string): Promise<string[]> {
	if (!(await pathExists(dir))) return [];

	const entries = await fs.readdir(dir, { withFileTypes: true });
	return entries
		.filter((e) => e.isFile() && e.name.toLowerCase().endsWith('.json'))
		.map((e) => path.join(dir, e.name))
		.sort();
}

/** Parsed JSON, or null when the file is missing / unreadable / invalid (logged). */
export async function readJsonSafely(filePath: string, logger: Logger): Promise<unknown | null> {
	let text: string;
	try {
		text = await fs.readFile(filePath, 'utf8');
	} catch (err: unknown) {
		logger.error(SCOPE, `Error loading ${filePath}`, { error: errorMessage(err) });
		return null;
	}

	try {
		return JSON.parse(text);
	} catch (err: unknown) {
		logger.error(SCOPE, `Invalid JSON in ${filePath}`, { error: errorMessage(err) });
		return null;
	}
}

export async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
	await writeFileAtomic(filePath, `${JSON.stringify(data, null, 2)}\n`);
}
