/**
 * @title Errors
 * @description Error types for @unpack64/core.
 *
 * Every failure of the decode, detect and extract pipeline surfaces as one of
 * these classes, each with a stable code for programmatic handling.
 *
 * @module errors
 */

/**
 * Machine-readable error codes.
 */
export type ErrorCode =
	| "INVALID_ENCODING"
	| "FORMAT_MISMATCH"
	| "EMPTY_ARCHIVE"
	| "CORRUPT_ARCHIVE"
	| "PASSWORD_REQUIRED"
	| "PASSWORD_INCORRECT"
	| "PATH_TRAVERSAL"
	| "SIZE_LIMIT_EXCEEDED"
	| "UNSUPPORTED_FORMAT"
	| "CONFIG_ERROR"
	| "CANCELLED"
	| "UNKNOWN_ERROR";

/**
 * Options for constructing an Unpack64Error.
 */
export interface Unpack64ErrorOptions {
	/** Suggestion for how to resolve the error. */
	suggestion?: string;
	/** Original error that caused this error. */
	cause?: unknown;
}

/**
 * Base error class for all unpack64 errors.
 */
export class Unpack64Error extends Error {
	/** Error code for programmatic handling. */
	readonly code: ErrorCode;
	/** Suggestion for how to resolve the error. */
	readonly suggestion?: string;

	constructor(message: string, code: ErrorCode, options?: Unpack64ErrorOptions) {
		super(message, { cause: options?.cause });
		this.name = "Unpack64Error";
		this.code = code;
		this.suggestion = options?.suggestion;

		// Maintain proper stack trace in V8 environments
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor);
		}
	}

	/**
	 * Format the error for display.
	 */
	format(): string {
		let result = `${this.name}: ${this.message}`;
		if (this.suggestion) {
			result += `\n  Suggestion: ${this.suggestion}`;
		}
		return result;
	}
}

/**
 * The input text could not be decoded as base64, even after cleaning.
 */
export class InvalidEncodingError extends Unpack64Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, "INVALID_ENCODING", {
			suggestion: "Check that the input contains standard base64 (A-Z, a-z, 0-9, +, /, =)",
			cause: options?.cause,
		});
		this.name = "InvalidEncodingError";
	}
}

/**
 * The payload does not have the structure of the requested format.
 */
export class FormatMismatchError extends Unpack64Error {
	/** Format the payload was expected to be. */
	readonly expected: string;

	constructor(expected: string, message: string) {
		super(message, "FORMAT_MISMATCH", {
			suggestion: "Omit the forced format to let the format be detected",
		});
		this.name = "FormatMismatchError";
		this.expected = expected;
	}
}

/**
 * The decoded payload is empty.
 */
export class EmptyArchiveError extends Unpack64Error {
	constructor(message = "Decoded payload is empty.") {
		super(message, "EMPTY_ARCHIVE");
		this.name = "EmptyArchiveError";
	}
}

/**
 * The archive is structurally broken or truncated.
 */
export class CorruptArchiveError extends Unpack64Error {
	/** Format being read when the corruption was found. */
	readonly archiveFormat: string;

	constructor(archiveFormat: string, message: string, options?: { cause?: unknown }) {
		super(message, "CORRUPT_ARCHIVE", { cause: options?.cause });
		this.name = "CorruptArchiveError";
		this.archiveFormat = archiveFormat;
	}
}

/**
 * An encrypted entry needs a password and none was supplied.
 */
export class PasswordRequiredError extends Unpack64Error {
	/** First encrypted entry that needed the password. */
	readonly entryPath: string;

	constructor(entryPath: string) {
		super(`Archive entry "${entryPath}" is encrypted and no password was supplied.`, "PASSWORD_REQUIRED", {
			suggestion: "Provide the archive password and retry",
		});
		this.name = "PasswordRequiredError";
		this.entryPath = entryPath;
	}
}

/**
 * The supplied password does not decrypt the archive.
 */
export class PasswordIncorrectError extends Unpack64Error {
	/** Entry the password was checked against. */
	readonly entryPath: string;

	constructor(entryPath: string, options?: { cause?: unknown }) {
		super(`Incorrect password for archive entry "${entryPath}".`, "PASSWORD_INCORRECT", {
			cause: options?.cause,
		});
		this.name = "PasswordIncorrectError";
		this.entryPath = entryPath;
	}
}

/**
 * Error related to security issues (path traversal, decompression bombs).
 */
export class SecurityError extends Unpack64Error {
	constructor(message: string, code: "PATH_TRAVERSAL" | "SIZE_LIMIT_EXCEEDED", options?: { cause?: unknown }) {
		super(message, code, { cause: options?.cause });
		this.name = "SecurityError";
	}
}

/**
 * An entry path would be written outside the output directory.
 */
export class PathTraversalError extends SecurityError {
	/** Entry path as stored in the archive. */
	readonly entryPath: string;

	constructor(entryPath: string, reason: string) {
		super(`Path traversal detected in archive entry "${entryPath}": ${reason}.`, "PATH_TRAVERSAL");
		this.name = "PathTraversalError";
		this.entryPath = entryPath;
	}
}

/**
 * Extraction would exceed a configured resource ceiling.
 */
export class SizeLimitError extends SecurityError {
	/** The configured ceiling. */
	readonly limit: number;

	constructor(message: string, limit: number) {
		super(message, "SIZE_LIMIT_EXCEEDED");
		this.name = "SizeLimitError";
		this.limit = limit;
	}
}

/**
 * The payload format is unknown, or known but not extractable.
 */
export class UnsupportedFormatError extends Unpack64Error {
	constructor(message: string, options?: Unpack64ErrorOptions) {
		super(message, "UNSUPPORTED_FORMAT", options);
		this.name = "UnsupportedFormatError";
	}
}

/**
 * Error when reading or validating configuration fails.
 */
export class ConfigError extends Unpack64Error {
	/** Path to the configuration file. */
	readonly configPath?: string;

	constructor(message: string, options?: { configPath?: string; cause?: unknown }) {
		super(message, "CONFIG_ERROR", {
			suggestion: options?.configPath ? `Check the configuration file at: ${options.configPath}` : undefined,
			cause: options?.cause,
		});
		this.name = "ConfigError";
		this.configPath = options?.configPath;
	}
}

/**
 * Error thrown when an operation is cancelled by the user.
 *
 * Use this instead of throwing a generic Error with a cancellation message,
 * so callers can reliably detect cancellation via instanceof rather than
 * fragile string matching.
 */
export class CancellationError extends Unpack64Error {
	override readonly code = "CANCELLED" as const;

	constructor(message = "Operation cancelled by the user.") {
		super(message, "CANCELLED");
		this.name = "CancellationError";
	}
}

/**
 * Check if an error is a CancellationError.
 */
export function isCancellationError(error: unknown): error is CancellationError {
	return error instanceof CancellationError;
}

/**
 * Check if an error is an Unpack64Error.
 */
export function isUnpack64Error(error: unknown): error is Unpack64Error {
	return error instanceof Unpack64Error;
}

/**
 * Extract a message from an unknown thrown value.
 */
export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap an unknown error as an Unpack64Error.
 */
export function wrapError(error: unknown, context?: string): Unpack64Error {
	if (isUnpack64Error(error)) {
		return error;
	}

	const contextPrefix = context ? `${context}: ` : "";

	return new Unpack64Error(`${contextPrefix}${getErrorMessage(error)}`, "UNKNOWN_ERROR", { cause: error });
}
