/**
 * Archive module exports.
 */

export * from "./types.js";

export { CODEC_FORMATS, type DecompressOptions, decompress } from "./decompress.js";

export { type Signature, type TarHeaderState, TAR_BLOCK_SIZE, inspectTarHeader, sniffSignature } from "./signatures.js";

export { parseFormatTag, sniffFormat } from "./sniff.js";

export {
	DEFAULT_MAX_SIZE,
	MAX_FILE_COUNT,
	DEFAULT_LIMITS,
	SizeBudget,
	resolveLimits,
	checkPathTraversal,
	isWithinRoot,
	resolveEntryPath,
	assertRealPathWithinRoot,
	checkEntryCount,
	checkCompressionRatio,
	formatSize,
} from "./security.js";

export { crc32 } from "./crc32.js";

export { ZipCryptoKeys, verifyZipCryptoPassword, ZIPCRYPTO_HEADER_LENGTH } from "./zipcrypto.js";

export { openZip } from "./zip.js";

export { type TarFormat, createTarReader } from "./tar.js";

export { openRar, rarVersion } from "./rar.js";

export { extractArchive } from "./extract.js";
