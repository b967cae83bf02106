/**
 * @title Archive Security Module
 * @description Shared security utilities for archive extraction.
 *
 * Provides entry path validation, the cumulative size budget and the
 * decompression-bomb heuristics used by every extractor.
 *
 * @module archive
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { PathTraversalError, SizeLimitError } from "../errors.js";
import type { ExtractionLimits } from "./types.js";

/** Default maximum extraction size: 100 MB. */
export const DEFAULT_MAX_SIZE = 100 * 1024 * 1024;

/** Maximum number of entries allowed in an archive. */
export const MAX_FILE_COUNT = 10_000;

/**
 * Default resource ceilings.
 */
export const DEFAULT_LIMITS: Readonly<ExtractionLimits> = Object.freeze({
	maxSize: DEFAULT_MAX_SIZE,
	maxEntries: MAX_FILE_COUNT,
	// The ratio check is off unless configured; the size budget bounds output.
	maxCompressionRatio: Number.POSITIVE_INFINITY,
});

/**
 * Fill in missing limits with the defaults.
 */
export function resolveLimits(limits?: Partial<ExtractionLimits>): ExtractionLimits {
	return {
		maxSize: limits?.maxSize ?? DEFAULT_LIMITS.maxSize,
		maxEntries: limits?.maxEntries ?? DEFAULT_LIMITS.maxEntries,
		maxCompressionRatio: limits?.maxCompressionRatio ?? DEFAULT_LIMITS.maxCompressionRatio,
	};
}

/**
 * Check an archive entry path for traversal attempts.
 *
 * Backslashes count as separators whatever the platform, so that
 * `..\\evil` is caught on POSIX too.
 *
 * @param entryPath - Entry path from the archive
 * @returns The normalised relative path, "/"-separated
 * @throws PathTraversalError if the path is absolute or climbs out
 */
export function checkPathTraversal(entryPath: string): string {
	if (entryPath.includes("\0")) {
		throw new PathTraversalError(entryPath, "contains a NUL byte");
	}

	const unified = entryPath.replace(/\\/g, "/");
	if (unified.startsWith("/") || /^[A-Za-z]:/.test(unified)) {
		throw new PathTraversalError(entryPath, "absolute paths are not allowed");
	}

	// Checked before normalising, which would fold "a/../b" into "b".
	if (unified.split("/").some((segment) => segment === "..")) {
		throw new PathTraversalError(entryPath, "contains a parent-directory segment");
	}

	return path.posix.normalize(unified);
}

/**
 * Whether `target` is `root` itself or lies beneath it.
 */
export function isWithinRoot(root: string, target: string): boolean {
	const relative = path.relative(root, target);
	return relative === "" || (relative !== ".." && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative));
}

/**
 * Validate an entry path and resolve it beneath the output root.
 *
 * Must be called for every entry immediately before it is written.
 *
 * @param entryPath - Entry path from the archive
 * @param outputRoot - Directory that must contain the result
 * @returns Absolute destination path
 * @throws PathTraversalError if the destination would escape the root
 */
export function resolveEntryPath(entryPath: string, outputRoot: string): string {
	const relative = checkPathTraversal(entryPath);
	const root = path.resolve(outputRoot);
	const target = path.resolve(root, relative);

	if (!isWithinRoot(root, target)) {
		throw new PathTraversalError(entryPath, "resolves outside the output directory");
	}

	return target;
}

/**
 * Confirm that an existing directory is still inside the output root once
 * symbolic links are followed.
 *
 * @param entryPath - Entry path being written, for the error message
 * @param directory - Existing directory the entry is written into
 * @param outputRoot - Output root directory
 * @throws PathTraversalError if a link redirects the directory elsewhere
 */
export async function assertRealPathWithinRoot(entryPath: string, directory: string, outputRoot: string): Promise<void> {
	const [realRoot, realDirectory] = await Promise.all([
		fs.promises.realpath(outputRoot),
		fs.promises.realpath(directory),
	]);

	if (!isWithinRoot(realRoot, realDirectory)) {
		throw new PathTraversalError(entryPath, "a symbolic link redirects it outside the output directory");
	}
}

/**
 * Cumulative counter of decompressed bytes for one extraction.
 */
export class SizeBudget {
	private used = 0;

	constructor(readonly limit: number) {}

	/** Bytes consumed so far. */
	get consumed(): number {
		return this.used;
	}

	/** Bytes still available before the limit is passed. */
	get remaining(): number {
		return Math.max(0, this.limit - this.used);
	}

	/**
	 * Account for bytes produced by an entry.
	 *
	 * @throws SizeLimitError once the total passes the limit
	 */
	consume(bytes: number, entryPath: string): void {
		this.used += bytes;

		if (this.used > this.limit) {
			throw new SizeLimitError(
				`Archive exceeds maximum size at "${entryPath}": ${formatSize(this.used)} > ${formatSize(this.limit)}`,
				this.limit,
			);
		}
	}
}

/**
 * Reject archives with more entries than allowed.
 */
export function checkEntryCount(count: number, maxEntries: number): void {
	if (count > maxEntries) {
		throw new SizeLimitError(
			`Archive contains too many entries: ${count} > ${maxEntries}. This may indicate a file bomb.`,
			maxEntries,
		);
	}
}

/**
 * Reject archives whose declared size is out of proportion to the payload.
 *
 * @param declaredSize - Sum of declared uncompressed entry sizes
 * @param payloadSize - Size of the archive bytes
 * @param maxRatio - Largest accepted ratio
 */
export function checkCompressionRatio(declaredSize: number, payloadSize: number, maxRatio: number): void {
	if (payloadSize <= 0) {
		return;
	}

	const ratio = declaredSize / payloadSize;
	if (ratio > maxRatio) {
		throw new SizeLimitError(
			`Suspicious compression ratio detected: ${ratio.toFixed(1)}:1. This may indicate a zip bomb.`,
			maxRatio,
		);
	}
}

/**
 * Format a byte count for display.
 *
 * @param bytes - Number of bytes
 * @returns Human-readable size string
 */
export function formatSize(bytes: number): string {
	if (bytes < 1024) {
		return `${bytes} B`;
	}
	if (bytes < 1024 * 1024) {
		return `${(bytes / 1024).toFixed(1)} KB`;
	}
	return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}
