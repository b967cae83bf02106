/**
 * TAR archive reading (plain, GZIP, BZIP2 and XZ) with security checks.
 */

import * as tar from "tar";
import { CorruptArchiveError, FormatMismatchError } from "../errors.js";
import { decompress } from "./decompress.js";
import { TAR_BLOCK_SIZE, inspectTarHeader, sniffSignature } from "./signatures.js";
import type {
	ArchiveEntry,
	ArchiveReader,
	CompressionCodec,
	ExtractionLimits,
	ReaderFactory,
	SkippedEntry,
} from "./types.js";

/**
 * TAR variants and the codec wrapped around each.
 */
export type TarFormat = "tar" | "tar.gz" | "tar.bz2" | "tar.xz";

const TAR_CODECS: Readonly<Record<TarFormat, CompressionCodec | undefined>> = {
	tar: undefined,
	"tar.gz": "gzip",
	"tar.bz2": "bzip2",
	"tar.xz": "xz",
};

/** Entry types written to disk; everything else is skipped. */
const EXTRACTABLE_TYPES: ReadonlySet<string> = new Set(["File", "OldFile", "ContiguousFile", "Directory"]);

interface TarRecord {
	entry: ArchiveEntry;
	chunks: Buffer[];
}

/**
 * Largest decompressed stream accepted: the size ceiling plus header and
 * padding blocks for the maximum number of entries.
 */
function decompressedLimit(limits: ExtractionLimits): number {
	return limits.maxSize + (limits.maxEntries + 1) * 2 * TAR_BLOCK_SIZE;
}

/**
 * Undo the compression layer, if any.
 */
async function unwrap(payload: Buffer, format: TarFormat, limits: ExtractionLimits): Promise<Buffer> {
	const codec = TAR_CODECS[format];
	if (!codec) {
		return payload;
	}

	if (sniffSignature(payload) !== codec) {
		throw new FormatMismatchError(format, `Payload is not a ${codec} stream.`);
	}

	return decompress(payload, codec, { limit: decompressedLimit(limits) });
}

/**
 * Parse every header of a TAR stream, buffering entry data.
 */
function parseTar(bytes: Buffer, format: TarFormat): Promise<{ records: TarRecord[]; skipped: SkippedEntry[] }> {
	return new Promise((resolve, reject) => {
		const records: TarRecord[] = [];
		const skipped: SkippedEntry[] = [];

		const parser = new tar.Parser({
			strict: true,
			onReadEntry: (entry) => {
				if (!EXTRACTABLE_TYPES.has(entry.type)) {
					skipped.push({
						path: entry.path,
						type: entry.type,
						reason: `unsupported entry type "${entry.type}"`,
					});
					entry.resume();
					return;
				}

				const record: TarRecord = {
					entry: {
						path: entry.path,
						size: entry.size,
						isDirectory: entry.type === "Directory",
					},
					chunks: [],
				};
				records.push(record);
				entry.on("data", (chunk: Buffer) => {
					record.chunks.push(chunk);
				});
			},
		});

		// Unknown type flags never reach onReadEntry.
		parser.on("ignoredEntry", (entry: tar.ReadEntry) => {
			skipped.push({ path: entry.path, type: entry.type, reason: `unsupported entry type "${entry.type}"` });
		});
		parser.on("error", (error: Error) => {
			reject(new CorruptArchiveError(format, `Invalid TAR archive: ${error.message}`, { cause: error }));
		});
		parser.on("end", () => {
			resolve({ records, skipped });
		});

		parser.end(bytes);
	});
}

/**
 * Open a TAR payload, decompressing it first when needed.
 *
 * Entry data is held in memory; the decompressed stream is bounded by the
 * configured size ceiling.
 *
 * @param format - TAR variant to read the payload as
 */
export function createTarReader(format: TarFormat): ReaderFactory {
	return async (payload, options) => {
		const bytes = await unwrap(payload, format, options.limits);

		const header = inspectTarHeader(bytes);
		if (header === "invalid") {
			throw new FormatMismatchError(
				format,
				TAR_CODECS[format]
					? `Decompressed ${TAR_CODECS[format]} stream is not a TAR archive.`
					: "Payload does not start with a TAR header.",
			);
		}

		const { records, skipped } = header === "empty" ? { records: [], skipped: [] } : await parseTar(bytes, format);
		const data = new Map(records.map((record) => [record.entry, record.chunks]));

		const reader: ArchiveReader = {
			format,
			extractable: true,
			listEntries: () => records.map((record) => record.entry),
			listSkipped: () => skipped,
			extractEntry: async (entry) => {
				const chunks = data.get(entry);
				if (!chunks) {
					throw new CorruptArchiveError(format, `Entry "${entry.path}" is not part of this archive.`);
				}
				return Buffer.concat(chunks);
			},
		};

		return reader;
	};
}
