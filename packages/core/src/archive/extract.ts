/**
 * Unified archive extraction.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { EmptyArchiveError, PathTraversalError, UnsupportedFormatError, wrapError } from "../errors.js";
import { openRar } from "./rar.js";
import {
	SizeBudget,
	assertRealPathWithinRoot,
	checkCompressionRatio,
	checkEntryCount,
	checkPathTraversal,
	resolveEntryPath,
	resolveLimits,
} from "./security.js";
import { sniffFormat } from "./sniff.js";
import { createTarReader } from "./tar.js";
import type {
	ArchiveEntry,
	ArchiveFormat,
	ArchiveReader,
	ExtractOptions,
	ExtractedEntry,
	ExtractionResult,
	ReaderFactory,
	UnpackProgressCallback,
} from "./types.js";
import { openZip } from "./zip.js";

/**
 * Reader for each archive format.
 */
const READERS: Readonly<Record<ArchiveFormat, ReaderFactory>> = {
	zip: openZip,
	tar: createTarReader("tar"),
	"tar.gz": createTarReader("tar.gz"),
	"tar.bz2": createTarReader("tar.bz2"),
	"tar.xz": createTarReader("tar.xz"),
	rar: openRar,
};

/**
 * An entry whose path has been validated, with its destination.
 */
interface PlannedEntry {
	entry: ArchiveEntry;
	/** Normalised relative path, without a trailing slash. */
	relativePath: string;
	/** False for directory entries that name the output root itself. */
	writable: boolean;
}

/**
 * Resolve the format to read a payload as.
 */
async function resolveFormat(
	payload: Buffer,
	forced: ArchiveFormat | undefined,
	onProgress?: UnpackProgressCallback,
): Promise<ArchiveFormat> {
	if (forced) {
		return forced;
	}

	onProgress?.({ phase: "detecting", message: "Detecting archive format..." });
	const tag = await sniffFormat(payload);
	if (tag === "unknown") {
		throw new UnsupportedFormatError("Unable to detect the archive format from the payload signature.", {
			suggestion: "Supported formats: zip, tar, tar.gz, tar.bz2, tar.xz (rar is detected only)",
		});
	}
	return tag;
}

/**
 * Validate every entry path before anything is read or written.
 */
function planEntries(entries: ArchiveEntry[], outputRoot: string): PlannedEntry[] {
	return entries.map((entry) => {
		const relativePath = checkPathTraversal(entry.path).replace(/\/+$/, "") || ".";
		const target = resolveEntryPath(entry.path, outputRoot);
		const isRoot = target === outputRoot;

		if (isRoot && !entry.isDirectory) {
			throw new PathTraversalError(entry.path, "a file cannot replace the output directory");
		}

		return { entry, relativePath, writable: !isRoot };
	});
}

/**
 * Read the data of every file entry through the cumulative size budget.
 */
async function readEntries(
	reader: ArchiveReader,
	plan: PlannedEntry[],
	maxSize: number,
	onProgress?: UnpackProgressCallback,
): Promise<Map<PlannedEntry, Buffer>> {
	const declared = new SizeBudget(maxSize);
	for (const item of plan) {
		declared.consume(item.entry.size, item.relativePath);
	}

	const actual = new SizeBudget(maxSize);
	const contents = new Map<PlannedEntry, Buffer>();

	for (const item of plan) {
		if (item.entry.isDirectory) {
			continue;
		}
		onProgress?.({ phase: "extracting", message: `Reading ${item.relativePath}`, path: item.relativePath });
		const data = await reader.extractEntry(item.entry, actual.remaining);
		actual.consume(data.length, item.relativePath);
		contents.set(item, data);
	}

	return contents;
}

async function isSymbolicLink(target: string): Promise<boolean> {
	try {
		return (await fs.promises.lstat(target)).isSymbolicLink();
	} catch (error) {
		if (error instanceof Error && "code" in error && error.code === "ENOENT") {
			return false;
		}
		throw error;
	}
}

/**
 * Write one validated entry beneath the output root.
 */
async function writeEntry(item: PlannedEntry, data: Buffer | undefined, outputRoot: string): Promise<ExtractedEntry> {
	const target = resolveEntryPath(item.entry.path, outputRoot);
	const result: ExtractedEntry = {
		path: item.relativePath,
		size: item.entry.size,
		isDirectory: item.entry.isDirectory,
		bytesWritten: 0,
		outputPath: target,
	};

	try {
		if (item.entry.isDirectory) {
			await fs.promises.mkdir(target, { recursive: true });
			await assertRealPathWithinRoot(item.entry.path, target, outputRoot);
			return result;
		}

		const parent = path.dirname(target);
		await fs.promises.mkdir(parent, { recursive: true });
		await assertRealPathWithinRoot(item.entry.path, parent, outputRoot);

		if (await isSymbolicLink(target)) {
			throw new PathTraversalError(item.entry.path, "the destination is a symbolic link");
		}

		const content = data ?? Buffer.alloc(0);
		await fs.promises.writeFile(target, content);
		result.bytesWritten = content.length;
		return result;
	} catch (error) {
		throw wrapError(error, `Failed to write "${item.relativePath}"`);
	}
}

/**
 * Extract an archive payload beneath an output directory.
 *
 * Extraction runs in three passes: every entry path is validated, then every
 * entry is read through the size budget, then entries are written. A failure
 * in the first two passes leaves the output directory untouched.
 *
 * @param payload - Decoded archive bytes
 * @param outputRoot - Directory that receives the entries
 * @param options - Extraction options
 * @returns Extraction result
 */
export async function extractArchive(
	payload: Buffer,
	outputRoot: string,
	options: ExtractOptions = {},
): Promise<ExtractionResult> {
	const { onProgress } = options;

	if (payload.length === 0) {
		throw new EmptyArchiveError();
	}

	const limits = resolveLimits(options.limits);
	const analyzeOnly = options.analyzeOnly ?? false;
	const root = path.resolve(outputRoot);
	const format = await resolveFormat(payload, options.format, onProgress);

	onProgress?.({ phase: "listing", message: `Reading ${format} archive...` });
	const reader = await READERS[format](payload, { password: options.password, analyzeOnly, limits });

	if (!reader.extractable) {
		return {
			format,
			status: "unsupported",
			outputRoot: root,
			entries: [],
			skipped: reader.listSkipped(),
			totalBytesWritten: 0,
			note: reader.note,
		};
	}

	const entries = reader.listEntries();
	const skipped = reader.listSkipped();
	checkEntryCount(entries.length + skipped.length, limits.maxEntries);
	checkCompressionRatio(
		entries.reduce((sum, entry) => sum + entry.size, 0),
		payload.length,
		limits.maxCompressionRatio,
	);

	const plan = planEntries(entries, root);

	if (analyzeOnly) {
		onProgress?.({ phase: "analyzing", message: `Validated ${plan.length} entries.` });
		return {
			format,
			status: "analyzed",
			outputRoot: root,
			entries: plan
				.filter((item) => item.writable)
				.map((item) => ({
					path: item.relativePath,
					size: item.entry.size,
					isDirectory: item.entry.isDirectory,
					bytesWritten: 0,
				})),
			skipped,
			totalBytesWritten: 0,
		};
	}

	const contents = await readEntries(reader, plan, limits.maxSize, onProgress);

	await fs.promises.mkdir(root, { recursive: true });

	const extracted: ExtractedEntry[] = [];
	for (const item of plan) {
		if (!item.writable) {
			continue;
		}
		extracted.push(await writeEntry(item, contents.get(item), root));
	}

	return {
		format,
		status: "extracted",
		outputRoot: root,
		entries: extracted,
		skipped,
		totalBytesWritten: extracted.reduce((sum, entry) => sum + entry.bytesWritten, 0),
	};
}
