/**
 * @description Directory walking over extraction output.
 *
 * Provides recursive traversal and the on-disk inventory of an output
 * directory.
 *
 * @module filesystem
 */

import * as fs from "node:fs";
import * as path from "node:path";

/**
 * Entry information for directory walking.
 */
export interface WalkEntry {
	/** Full path to the entry. */
	path: string;
	/** Entry name (basename). */
	name: string;
	/** Whether entry is a directory. Symbolic links are never followed. */
	isDirectory: boolean;
}

/**
 * Callback for directory walking.
 * Return false to skip processing children of a directory.
 */
export type WalkCallback = (entry: WalkEntry) => boolean | void | Promise<boolean | void>;

/**
 * A file found beneath an output directory.
 */
export interface OutputFile {
	/** Path relative to the walked directory, "/"-separated. */
	path: string;
	/** Size in bytes. */
	size: number;
}

/**
 * Walk a directory recursively, calling the callback for each entry.
 *
 * @param directory - Directory to walk
 * @param callback - Callback for each entry
 */
export async function walkDirectory(directory: string, callback: WalkCallback): Promise<void> {
	const entries = await fs.promises.readdir(directory, { withFileTypes: true });

	for (const entry of entries) {
		const fullPath = path.join(directory, entry.name);
		const walkEntry: WalkEntry = {
			path: fullPath,
			name: entry.name,
			isDirectory: entry.isDirectory(),
		};

		const result = await callback(walkEntry);

		if (walkEntry.isDirectory && result !== false) {
			await walkDirectory(fullPath, callback);
		}
	}
}

/**
 * List every file beneath a directory with its size.
 *
 * @param directory - Directory to walk
 * @returns Files sorted by relative path; empty when the directory does not exist
 */
export async function listOutputFiles(directory: string): Promise<OutputFile[]> {
	if (!fs.existsSync(directory)) {
		return [];
	}

	const files: OutputFile[] = [];

	await walkDirectory(directory, async (entry) => {
		if (entry.isDirectory) {
			return;
		}
		const stats = await fs.promises.lstat(entry.path);
		files.push({
			path: path.relative(directory, entry.path).split(path.sep).join("/"),
			size: stats.size,
		});
	});

	return files.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}
