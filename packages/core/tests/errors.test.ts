import { describe, it, expect } from "vitest";
import {
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
	isUnpack64Error,
	isCancellationError,
	getErrorMessage,
	wrapError,
} from "../src/errors.js";

describe("Unpack64Error", () => {
	it("creates error with message and code", () => {
		const error = new Unpack64Error("Test message", "UNKNOWN_ERROR");

		expect(error.message).toBe("Test message");
		expect(error.code).toBe("UNKNOWN_ERROR");
		expect(error.name).toBe("Unpack64Error");
		expect(error.suggestion).toBeUndefined();
	});

	it("creates error with suggestion and cause", () => {
		const cause = new Error("root");
		const error = new Unpack64Error("Test", "UNKNOWN_ERROR", { suggestion: "Try this instead", cause });

		expect(error.suggestion).toBe("Try this instead");
		expect(error.cause).toBe(cause);
	});

	it("formats error without suggestion", () => {
		const error = new Unpack64Error("Test message", "UNKNOWN_ERROR");

		expect(error.format()).toBe("Unpack64Error: Test message");
	});

	it("formats error with suggestion", () => {
		const error = new Unpack64Error("Test message", "UNKNOWN_ERROR", { suggestion: "Try this" });

		expect(error.format()).toBe("Unpack64Error: Test message\n  Suggestion: Try this");
	});

	it("is instanceof Error", () => {
		expect(new Unpack64Error("Test", "UNKNOWN_ERROR") instanceof Error).toBe(true);
	});
});

describe("error kinds", () => {
	it("assigns a fixed code to each kind", () => {
		expect(new InvalidEncodingError("bad").code).toBe("INVALID_ENCODING");
		expect(new FormatMismatchError("zip", "bad").code).toBe("FORMAT_MISMATCH");
		expect(new EmptyArchiveError().code).toBe("EMPTY_ARCHIVE");
		expect(new CorruptArchiveError("tar", "bad").code).toBe("CORRUPT_ARCHIVE");
		expect(new PasswordRequiredError("a.txt").code).toBe("PASSWORD_REQUIRED");
		expect(new PasswordIncorrectError("a.txt").code).toBe("PASSWORD_INCORRECT");
		expect(new PathTraversalError("../a", "climbs").code).toBe("PATH_TRAVERSAL");
		expect(new SizeLimitError("big", 10).code).toBe("SIZE_LIMIT_EXCEEDED");
		expect(new UnsupportedFormatError("rar").code).toBe("UNSUPPORTED_FORMAT");
		expect(new ConfigError("bad").code).toBe("CONFIG_ERROR");
		expect(new CancellationError().code).toBe("CANCELLED");
	});

	it("uses a default message for empty archives", () => {
		expect(new EmptyArchiveError().message).toBe("Decoded payload is empty.");
	});

	it("names the entry in password errors", () => {
		const required = new PasswordRequiredError("secret.txt");
		const incorrect = new PasswordIncorrectError("secret.txt");

		expect(required.entryPath).toBe("secret.txt");
		expect(required.message).toBe('Archive entry "secret.txt" is encrypted and no password was supplied.');
		expect(incorrect.message).toBe('Incorrect password for archive entry "secret.txt".');
	});

	it("makes path traversal and size limits security errors", () => {
		const traversal = new PathTraversalError("../../etc/passwd", "contains a parent-directory segment");

		expect(traversal).toBeInstanceOf(SecurityError);
		expect(traversal.name).toBe("PathTraversalError");
		expect(traversal.message).toBe(
			'Path traversal detected in archive entry "../../etc/passwd": contains a parent-directory segment.',
		);
		expect(new SizeLimitError("big", 10)).toBeInstanceOf(SecurityError);
		expect(new SizeLimitError("big", 10).limit).toBe(10);
	});

	it("keeps format() callable on corrupt-archive errors", () => {
		const error = new CorruptArchiveError("zip", "bad");

		expect(error.archiveFormat).toBe("zip");
		expect(error.format()).toBe("CorruptArchiveError: bad");
		expect(wrapError(error).format()).toBe("CorruptArchiveError: bad");
	});

	it("records the expected format of a mismatch", () => {
		const error = new FormatMismatchError("tar.gz", "Not gzip");

		expect(error.expected).toBe("tar.gz");
		expect(error.suggestion).toBe("Omit the forced format to let the format be detected");
	});
});

describe("ConfigError", () => {
	it("creates error with config path", () => {
		const error = new ConfigError("Invalid value", { configPath: "/path/to/unpack64.yml" });

		expect(error.name).toBe("ConfigError");
		expect(error.configPath).toBe("/path/to/unpack64.yml");
		expect(error.suggestion).toBe("Check the configuration file at: /path/to/unpack64.yml");
	});

	it("works without config path", () => {
		const error = new ConfigError("Invalid value");

		expect(error.configPath).toBeUndefined();
		expect(error.suggestion).toBeUndefined();
	});
});

describe("isUnpack64Error", () => {
	it("returns true for subclasses", () => {
		expect(isUnpack64Error(new CorruptArchiveError("zip", "Test"))).toBe(true);
		expect(isUnpack64Error(new PathTraversalError("a", "b"))).toBe(true);
	});

	it("returns false for regular Error and non-errors", () => {
		expect(isUnpack64Error(new Error("Test"))).toBe(false);
		expect(isUnpack64Error("string")).toBe(false);
		expect(isUnpack64Error(null)).toBe(false);
		expect(isUnpack64Error(undefined)).toBe(false);
	});
});

describe("isCancellationError", () => {
	it("detects cancellation only", () => {
		expect(isCancellationError(new CancellationError())).toBe(true);
		expect(isCancellationError(new Error("Operation cancelled by the user."))).toBe(false);
	});

	it("keeps the code of errors that are not cancellations", () => {
		const describeFailure = (error: Unpack64Error): string =>
			isCancellationError(error) ? "cancelled" : `${error.code}: ${error.message}`;

		expect(describeFailure(new CancellationError())).toBe("cancelled");
		expect(describeFailure(new ConfigError("bad"))).toBe("CONFIG_ERROR: bad");
	});
});

describe("getErrorMessage", () => {
	it("reads messages from errors and other values", () => {
		expect(getErrorMessage(new Error("boom"))).toBe("boom");
		expect(getErrorMessage("plain")).toBe("plain");
		expect(getErrorMessage(42)).toBe("42");
	});
});

describe("wrapError", () => {
	it("returns Unpack64Error unchanged", () => {
		const original = new CorruptArchiveError("zip", "Original");

		expect(wrapError(original)).toBe(original);
	});

	it("wraps regular Error", () => {
		const wrapped = wrapError(new Error("Test error"));

		expect(wrapped instanceof Unpack64Error).toBe(true);
		expect(wrapped.message).toBe("Test error");
		expect(wrapped.code).toBe("UNKNOWN_ERROR");
	});

	it("adds context prefix", () => {
		const wrapped = wrapError(new Error("Failed"), "Write");

		expect(wrapped.message).toBe("Write: Failed");
	});
});
