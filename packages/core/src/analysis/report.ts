/**
 * @title Analysis Reporter
 * @description Summary of an extraction result for display.
 *
 * Pure functions over an ExtractionResult: file inventory, totals and the
 * files whose names suggest sensitive or notable content.
 *
 * @module analysis
 */

import * as path from "node:path";
import { minimatch } from "minimatch";
import type { ArchiveFormat, ExtractionResult, ExtractionStatus, SkippedEntry } from "../archive/types.js";

/**
 * Rules for flagging interesting files.
 */
export interface InterestingFileRules {
	/** Substrings matched against the lower-cased file name. */
	keywords: readonly string[];
	/** Glob patterns matched against the path, case-insensitively. */
	patterns: readonly string[];
}

/**
 * Default rules for interesting files.
 */
export const DEFAULT_INTERESTING_RULES: Readonly<InterestingFileRules> = Object.freeze({
	keywords: Object.freeze([
		"key",
		"password",
		"passwd",
		"secret",
		"flag",
		"token",
		"credential",
		"private",
		"id_rsa",
		".pem",
		".env",
	]),
	patterns: Object.freeze(["*.pdf", "*.doc", "*.docx", "*.txt", "*.log", "*.key", "*.pem", "*.crt"]),
});

/**
 * One file in a summary.
 */
export interface FileSummary {
	path: string;
	size: number;
}

/**
 * Display-ready summary of an extraction.
 */
export interface ExtractionSummary {
	format: ArchiveFormat;
	status: ExtractionStatus;
	/** Number of file entries. */
	totalFiles: number;
	/** Sum of file sizes in bytes. */
	totalSize: number;
	/** Files sorted by path. */
	files: FileSummary[];
	/** Number of directory entries. */
	directories: number;
	/** Entries recorded but not extracted. */
	skipped: SkippedEntry[];
	/** Interesting file paths, in archive order. */
	interesting: string[];
	/** Extra detail for unsupported formats. */
	note?: string;
}

/**
 * Whether a file path matches the interesting-file rules.
 *
 * @param filePath - Entry path, "/"-separated
 * @param rules - Keywords and patterns to match
 */
export function isInteresting(filePath: string, rules: InterestingFileRules = DEFAULT_INTERESTING_RULES): boolean {
	const name = path.posix.basename(filePath).toLowerCase();

	if (rules.keywords.some((keyword) => keyword !== "" && name.includes(keyword.toLowerCase()))) {
		return true;
	}

	return rules.patterns.some((pattern) => minimatch(filePath, pattern, { nocase: true, matchBase: true, dot: true }));
}

/**
 * Summarise an extraction result.
 *
 * Sizes are bytes written for extracted archives and declared sizes for
 * analyzed ones.
 *
 * @param result - Result of extractArchive
 * @param rules - Interesting-file rules
 */
export function summariseExtraction(
	result: ExtractionResult,
	rules: InterestingFileRules = DEFAULT_INTERESTING_RULES,
): ExtractionSummary {
	const fileEntries = result.entries.filter((entry) => !entry.isDirectory);
	const sizeOf = (entry: (typeof fileEntries)[number]): number =>
		result.status === "extracted" ? entry.bytesWritten : entry.size;

	const files = fileEntries
		.map((entry) => ({ path: entry.path, size: sizeOf(entry) }))
		.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));

	return {
		format: result.format,
		status: result.status,
		totalFiles: fileEntries.length,
		totalSize: files.reduce((sum, file) => sum + file.size, 0),
		files,
		directories: result.entries.length - fileEntries.length,
		skipped: result.skipped,
		interesting: fileEntries.filter((entry) => isInteresting(entry.path, rules)).map((entry) => entry.path),
		note: result.note,
	};
}
