/**
 * @unpack64/core - Format detection and safe extraction of base64-encoded archives.
 *
 * This library provides functionality for:
 * - Base64 normalisation and strict decoding
 * - Archive format detection (magic numbers)
 * - ZIP and TAR-family extraction with path and size guards
 * - RAR detection
 * - Extraction summaries and configuration loading
 */

// Error exports
export {
	type ErrorCode,
	type Unpack64ErrorOptions,
	Unpack64Error,
	InvalidEncodingError,
	FormatMismatchError,
	EmptyArchiveError,
	CorruptArchiveError,
	PasswordRequiredError,
	PasswordIncorrectError,
	SecurityError,
	PathTraversalError,
	SizeLimitError,
	UnsupportedFormatError,
	ConfigError,
	CancellationError,
	isCancellationError,
	isUnpack64Error,
	getErrorMessage,
	wrapError,
} from "./errors.js";

// Encoding exports
export * from "./encoding/index.js";

// Archive exports
export * from "./archive/index.js";

// Analysis exports
export * from "./analysis/index.js";

// Config exports
export * from "./config/index.js";

// Filesystem exports
export * from "./filesystem/index.js";

// Pipeline exports
export {
	type UnpackOptions,
	type UnpackResult,
	type UnpackOutcome,
	EXTRACTED_DIRNAME,
	decodedFileName,
	unpackBase64,
	tryUnpackBase64,
} from "./pipeline.js";
