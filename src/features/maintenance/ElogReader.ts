/**
 * Elog review - find per-package build logs Portage wrote recently
 */

import type { Dirent, Stats } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { Logger } from "../../utility/Logger.js";

export const DEFAULT_ELOG_WINDOW_MS = 24 * 60 * 60 * 1000;

export interface ElogEntry {
	path: string;
	mtimeMs: number;
}

export interface ElogScanOptions {
	now?: number;
	windowMs?: number;
}

async function directoryExists(dir: string): Promise<boolean> {
	try {
		return (await fs.stat(dir)).isDirectory();
	} catch (error) {
		if (isNotFound(error)) return false;
		throw error;
	}
}

function isNotFound(error: unknown): boolean {
	return error instanceof Error && "code" in error && error.code === "ENOENT";
}

async function* walkFiles(dir: string): AsyncGenerator<string> {
	let entries: Dirent[];
	try {
		entries = await fs.readdir(dir, { withFileTypes: true });
	} catch (error) {
		if (isNotFound(error)) return;
		throw error;
	}
	for (const entry of entries) {
		const entryPath = path.join(dir, entry.name);
		if (entry.isDirectory()) {
			yield* walkFiles(entryPath);
		} else if (entry.isFile()) {
			yield entryPath;
		}
	}
}

/**
 * Regular files under `dir` modified within the window, in directory
 * enumeration order. Resolves to null when the directory does not exist.
 */
export async function findRecentElogs(
	dir: string,
	options: ElogScanOptions = {},
): Promise<ElogEntry[] | null> {
	const { now = Date.now(), windowMs = DEFAULT_ELOG_WINDOW_MS } = options;

	if (!(await directoryExists(dir))) {
		return null;
	}

	const cutoff = now - windowMs;
	const recent: ElogEntry[] = [];
	for await (const filePath of walkFiles(dir)) {
		const stats = await statIfPresent(filePath);
		if (stats && stats.mtimeMs > cutoff) {
			recent.push({ path: filePath, mtimeMs: stats.mtimeMs });
		}
	}
	return recent;
}

// Portage may remove an elog while we walk the directory
async function statIfPresent(filePath: string): Promise<Stats | null> {
	try {
		return await fs.stat(filePath);
	} catch (error) {
		if (isNotFound(error)) return null;
		throw error;
	}
}

export function formatElogBlock(filePath: string, contents: string): string {
	return [
		"",
		`>>> Log filename: ${filePath}`,
		">>> Log start <<<",
		contents.replace(/\n$/, ""),
		">>> Log end <<<",
		"",
	].join("\n");
}

/**
 * The delimited block for one elog, or null when the file is gone
 */
export async function readElogBlock(entry: ElogEntry): Promise<string | null> {
	try {
		return formatElogBlock(entry.path, await fs.readFile(entry.path, "utf8"));
	} catch (error) {
		if (isNotFound(error)) return null;
		throw error;
	}
}

/**
 * Print every recent elog as a delimited block
 */
export async function printRecentElogs(dir: string, options: ElogScanOptions = {}): Promise<number> {
	console.log("Reading elogs");
	const entries = await findRecentElogs(dir, options);

	if (entries === null) {
		console.log("Elog directory does not exist.");
		return 0;
	}

	let printed = 0;
	for (const entry of entries) {
		const block = await readElogBlock(entry);
		if (block === null) {
			Logger.getInstance().debug(`Elog vanished before it was read: ${entry.path}`);
			continue;
		}
		console.log(block);
		printed++;
	}
	return printed;
}
