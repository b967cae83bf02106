/**
 * @title Format Sniffer
 * @description Classify a payload as one of the supported archive formats.
 *
 * Signatures are checked in priority order. Compressed streams are unwrapped
 * far enough to see whether a TAR header follows.
 *
 * @module archive
 */

import { UnsupportedFormatError } from "../errors.js";
import { CODEC_FORMATS, decompress } from "./decompress.js";
import { TAR_BLOCK_SIZE, inspectTarHeader, sniffSignature } from "./signatures.js";
import type { ArchiveFormat, FormatTag } from "./types.js";

/**
 * Names accepted for a forced format, case-insensitive.
 */
const FORMAT_ALIASES: Readonly<Record<string, ArchiveFormat>> = {
	zip: "zip",
	tar: "tar",
	"tar.gz": "tar.gz",
	tgz: "tar.gz",
	"tar.bz2": "tar.bz2",
	tbz2: "tar.bz2",
	"tar.xz": "tar.xz",
	txz: "tar.xz",
	rar: "rar",
};

/**
 * Parse a user-supplied format name.
 *
 * @param name - Format name such as "zip" or "tar.gz"
 * @returns The matching archive format
 * @throws UnsupportedFormatError for unknown names
 */
export function parseFormatTag(name: string): ArchiveFormat {
	const format = FORMAT_ALIASES[name.trim().toLowerCase()];
	if (!format) {
		throw new UnsupportedFormatError(`Unsupported archive format: "${name}"`, {
			suggestion: "Supported formats: zip, tar, tar.gz, tar.bz2, tar.xz, rar",
		});
	}
	return format;
}

/**
 * Detect the archive format of a payload.
 *
 * For GZIP, BZIP2 and XZ signatures only the first TAR block is inflated.
 * A stream whose content is clearly not TAR is "unknown"; a stream that
 * cannot be inflated keeps its tag so that extraction reports it as corrupt.
 *
 * @param payload - Decoded bytes
 * @returns The detected format tag
 */
export async function sniffFormat(payload: Buffer): Promise<FormatTag> {
	const signature = sniffSignature(payload);

	switch (signature) {
		case null:
			return "unknown";
		case "zip":
		case "rar":
		case "tar":
			return signature;
		case "gzip":
		case "bzip2":
		case "xz": {
			const tag = CODEC_FORMATS[signature];
			const head = await decompress(payload, signature, { limit: TAR_BLOCK_SIZE, truncate: true }).catch(
				() => undefined,
			);
			if (head === undefined) {
				// Undecodable streams keep their tag; the extractor reports the corruption.
				return tag;
			}
			return inspectTarHeader(head) === "invalid" ? "unknown" : tag;
		}
	}
}
