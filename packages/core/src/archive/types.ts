/**
 * @title Archive Types
 * @description Data model shared by the sniffer, the extractors and the reporter.
 *
 * @module archive
 */

/**
 * Archive formats that can be detected or forced.
 */
export type ArchiveFormat = "zip" | "tar" | "tar.gz" | "tar.bz2" | "tar.xz" | "rar";

/**
 * Result of format detection. "unknown" when no signature matched.
 */
export type FormatTag = ArchiveFormat | "unknown";

/**
 * Every format a caller may force, in detection priority order.
 */
export const ARCHIVE_FORMATS: readonly ArchiveFormat[] = ["zip", "tar.gz", "tar.bz2", "tar.xz", "rar", "tar"];

/**
 * Stream compression wrapped around a TAR archive.
 */
export type CompressionCodec = "gzip" | "bzip2" | "xz";

/**
 * One file or directory record inside an archive.
 *
 * The path is untrusted archive metadata until it has been validated.
 */
export interface ArchiveEntry {
	/** Entry path as stored in the archive, with "/" separators. */
	path: string;
	/** Uncompressed size declared by the archive metadata. */
	size: number;
	/** Whether the entry is a directory. */
	isDirectory: boolean;
}

/**
 * An entry after extraction or listing.
 */
export interface ExtractedEntry extends ArchiveEntry {
	/** Bytes written to disk (0 in analyze-only mode and for directories). */
	bytesWritten: number;
	/** Absolute destination beneath the output root; absent when nothing was written. */
	outputPath?: string;
}

/**
 * An entry that was recognised but intentionally not extracted.
 */
export interface SkippedEntry {
	/** Entry path as stored in the archive. */
	path: string;
	/** Entry type reported by the archive (e.g. "SymbolicLink"). */
	type: string;
	/** Why the entry was skipped. */
	reason: string;
}

/**
 * Outcome of an extraction call.
 *
 * - "extracted": entries were written beneath the output root.
 * - "analyzed": entries were listed and validated, nothing was written.
 * - "unsupported": the format was recognised but cannot be extracted.
 */
export type ExtractionStatus = "extracted" | "analyzed" | "unsupported";

/**
 * Result of archive extraction.
 */
export interface ExtractionResult {
	/** Format the payload was read as. */
	format: ArchiveFormat;
	/** What happened to the entries. */
	status: ExtractionStatus;
	/** Directory that owns every written file. */
	outputRoot: string;
	/** Entries in archive order. */
	entries: ExtractedEntry[];
	/** Entries recorded but not extracted. */
	skipped: SkippedEntry[];
	/** Sum of bytes written across all entries. */
	totalBytesWritten: number;
	/** Extra information for "unsupported" results. */
	note?: string;
}

/**
 * Resource ceilings applied during extraction.
 */
export interface ExtractionLimits {
	/** Maximum cumulative decompressed bytes. */
	maxSize: number;
	/** Maximum number of entries in an archive. */
	maxEntries: number;
	/** Maximum ratio of declared uncompressed size to payload size. Unbounded by default. */
	maxCompressionRatio: number;
}

/**
 * Progress phases reported while unpacking.
 */
export type UnpackPhase = "decoding" | "detecting" | "listing" | "extracting" | "saving" | "analyzing";

/**
 * Progress callback for unpacking.
 */
export type UnpackProgressCallback = (progress: { phase: UnpackPhase; message: string; path?: string }) => void;

/**
 * Options for archive extraction.
 */
export interface ExtractOptions {
	/** Format to read the payload as; detected from its signature when omitted. */
	format?: ArchiveFormat;
	/** Password for encrypted entries. */
	password?: string;
	/** List and validate entries without writing anything. */
	analyzeOnly?: boolean;
	/** Resource ceilings; missing fields use the defaults. */
	limits?: Partial<ExtractionLimits>;
	/** Progress callback. */
	onProgress?: UnpackProgressCallback;
}

/**
 * Options passed to a format reader.
 */
export interface ReaderOptions {
	/** Password for encrypted entries. */
	password?: string;
	/** Whether entry data will be read at all. */
	analyzeOnly: boolean;
	/** Resolved resource ceilings. */
	limits: ExtractionLimits;
}

/**
 * Format-specific access to an archive's entries.
 */
export interface ArchiveReader {
	readonly format: ArchiveFormat;
	/** False when the format is recognised but cannot be extracted. */
	readonly extractable: boolean;
	/** Extra detail for formats that cannot be extracted. */
	readonly note?: string;
	/** Entries that can be extracted, in archive order. */
	listEntries(): ArchiveEntry[];
	/** Entries recognised but never extracted. */
	listSkipped(): SkippedEntry[];
	/**
	 * Read the full contents of an entry returned by listEntries.
	 *
	 * @param maxBytes - Fail with SizeLimitError once the entry produces more
	 *   bytes than this, whatever size it declares
	 */
	extractEntry(entry: ArchiveEntry, maxBytes?: number): Promise<Buffer>;
}

/**
 * Opens a payload as one archive format.
 */
export type ReaderFactory = (payload: Buffer, options: ReaderOptions) => Promise<ArchiveReader>;
