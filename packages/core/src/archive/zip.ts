/**
 * @title ZIP Archive Reader
 * @description ZIP archive reading with security checks.
 *
 * Includes protection against symbolic links, truncated central
 * directories and wrong passwords for ZipCrypto-encrypted entries.
 *
 * @module archive
 */

import * as unzipper from "unzipper";
import {
	CorruptArchiveError,
	FormatMismatchError,
	PasswordIncorrectError,
	PasswordRequiredError,
	PathTraversalError,
	SizeLimitError,
	UnsupportedFormatError,
	getErrorMessage,
} from "../errors.js";
import { crc32 } from "./crc32.js";
import { formatSize } from "./security.js";
import { sniffSignature } from "./signatures.js";
import type { ArchiveEntry, ArchiveReader, ReaderFactory, ReaderOptions } from "./types.js";
import { ZIPCRYPTO_HEADER_LENGTH, verifyZipCryptoPassword } from "./zipcrypto.js";

const EOCD_SIGNATURE = 0x06054b50;
const EOCD_LENGTH = 22;
const MAX_COMMENT_LENGTH = 0xffff;
const LOCAL_HEADER_SIGNATURE = 0x04034b50;
const LOCAL_HEADER_LENGTH = 30;

/** General purpose flag bits. */
const FLAG_ENCRYPTED = 0x1;
const FLAG_DATA_DESCRIPTOR = 0x8;

/** Compression method used by WinZip AES encryption. */
const METHOD_AES = 99;

type ZipFile = Awaited<ReturnType<typeof unzipper.Open.buffer>>["files"][number];

interface EndOfCentralDirectory {
	entryCount: number;
}

/**
 * Locate and bounds-check the end of central directory record.
 *
 * @throws CorruptArchiveError if it is missing or points past the payload
 */
function readEndOfCentralDirectory(payload: Buffer): EndOfCentralDirectory {
	const lowest = Math.max(0, payload.length - EOCD_LENGTH - MAX_COMMENT_LENGTH);

	for (let offset = payload.length - EOCD_LENGTH; offset >= lowest; offset -= 1) {
		if (payload.readUInt32LE(offset) !== EOCD_SIGNATURE) {
			continue;
		}

		const entryCount = payload.readUInt16LE(offset + 10);
		const directorySize = payload.readUInt32LE(offset + 12);
		const directoryOffset = payload.readUInt32LE(offset + 16);

		// ZIP64 archives carry the real values elsewhere.
		const zip64 = entryCount === 0xffff || directorySize === 0xffffffff || directoryOffset === 0xffffffff;
		if (!zip64 && directoryOffset + directorySize > offset) {
			throw new CorruptArchiveError(
				"zip",
				"ZIP central directory lies outside the archive; the archive is truncated.",
			);
		}

		return { entryCount };
	}

	throw new CorruptArchiveError(
		"zip",
		"ZIP end of central directory record not found; the archive is truncated or damaged.",
	);
}

/**
 * Whether an entry is a symbolic link.
 *
 * The Unix mode is stored in the upper 16 bits of externalFileAttributes.
 */
function isSymlink(file: ZipFile): boolean {
	const unixMode = (file.externalFileAttributes >>> 16) & 0xffff;
	return (unixMode & 0o170000) === 0o120000;
}

function isEncrypted(file: ZipFile): boolean {
	return (file.flags & FLAG_ENCRYPTED) !== 0;
}

/**
 * Check a password against the encryption header that follows the local
 * file header of an entry.
 */
function checkPassword(payload: Buffer, file: ZipFile, password: string): void {
	const offset = file.offsetToLocalFileHeader;
	if (offset + LOCAL_HEADER_LENGTH > payload.length || payload.readUInt32LE(offset) !== LOCAL_HEADER_SIGNATURE) {
		throw new CorruptArchiveError("zip", `Local header of "${file.path}" is missing.`);
	}

	const flags = payload.readUInt16LE(offset + 6);
	const modifiedTime = payload.readUInt16LE(offset + 10);
	const crc = payload.readUInt32LE(offset + 14);
	const nameLength = payload.readUInt16LE(offset + 26);
	const extraLength = payload.readUInt16LE(offset + 28);
	const dataStart = offset + LOCAL_HEADER_LENGTH + nameLength + extraLength;

	const header = payload.subarray(dataStart, dataStart + ZIPCRYPTO_HEADER_LENGTH);
	if (header.length < ZIPCRYPTO_HEADER_LENGTH) {
		throw new CorruptArchiveError("zip", `Encryption header of "${file.path}" is truncated.`);
	}

	const checkByte = (flags & FLAG_DATA_DESCRIPTOR) !== 0 ? modifiedTime >>> 8 : crc >>> 24;
	if (!verifyZipCryptoPassword(header, password, checkByte)) {
		throw new PasswordIncorrectError(file.path);
	}
}

/**
 * Reject entries that can never be extracted safely or at all.
 */
function validateFile(file: ZipFile, options: ReaderOptions): void {
	if (isSymlink(file)) {
		throw new PathTraversalError(file.path, "symbolic links are not permitted");
	}

	if (!isEncrypted(file)) {
		return;
	}

	if (file.compressionMethod === METHOD_AES) {
		throw new UnsupportedFormatError(`Archive entry "${file.path}" uses AES encryption, which is not supported.`, {
			suggestion: "Re-create the archive with standard ZIP encryption",
		});
	}

	if (options.password === undefined && !options.analyzeOnly) {
		throw new PasswordRequiredError(file.path);
	}
}

/**
 * Map a failure from reading entry data to a typed error.
 */
function readError(file: ZipFile, error: unknown): Error {
	const message = getErrorMessage(error);
	if (message.includes("MISSING_PASSWORD")) {
		return new PasswordRequiredError(file.path);
	}
	if (message.includes("BAD_PASSWORD")) {
		return new PasswordIncorrectError(file.path, { cause: error });
	}
	return new CorruptArchiveError("zip", `Failed to read "${file.path}": ${message}`, { cause: error });
}

/**
 * Inflate an entry, abandoning it once it produces more than `maxBytes`.
 *
 * The declared size is not trusted: the check counts inflated bytes.
 */
function readEntryData(file: ZipFile, password: string | undefined, maxBytes: number): Promise<Buffer> {
	return new Promise((resolve, reject) => {
		const chunks: Buffer[] = [];
		let total = 0;
		let settled = false;
		const stream = file.stream(password);

		stream.on("data", (chunk: Buffer) => {
			if (settled) {
				return;
			}
			total += chunk.length;
			if (total > maxBytes) {
				settled = true;
				stream.destroy();
				reject(
					new SizeLimitError(
						`Archive entry "${file.path}" inflates past the remaining size budget of ${formatSize(maxBytes)}`,
						maxBytes,
					),
				);
				return;
			}
			chunks.push(chunk);
		});

		stream.on("error", (error: unknown) => {
			if (settled) {
				return;
			}
			settled = true;
			reject(readError(file, error));
		});

		stream.on("end", () => {
			if (settled) {
				return;
			}
			settled = true;
			resolve(Buffer.concat(chunks));
		});
	});
}

function emptyReader(): ArchiveReader {
	return {
		format: "zip",
		extractable: true,
		listEntries: () => [],
		listSkipped: () => [],
		extractEntry: async (entry) => {
			throw new CorruptArchiveError("zip", `Entry "${entry.path}" is not part of this archive.`);
		},
	};
}

/**
 * Open a ZIP payload.
 *
 * Every entry is validated while opening: symbolic links and AES entries
 * are rejected, and a missing password is reported before anything is read.
 */
export const openZip: ReaderFactory = async (payload, options) => {
	if (sniffSignature(payload) !== "zip") {
		throw new FormatMismatchError("zip", "Payload does not start with a ZIP signature.");
	}

	const { entryCount } = readEndOfCentralDirectory(payload);
	if (entryCount === 0) {
		return emptyReader();
	}

	const directory = await unzipper.Open.buffer(payload).catch((error: unknown) => {
		throw new CorruptArchiveError("zip", `Invalid ZIP archive: ${getErrorMessage(error)}`, { cause: error });
	});

	const files = new Map<ArchiveEntry, ZipFile>();
	for (const file of directory.files) {
		validateFile(file, options);
		files.set(
			{
				path: file.path,
				size: file.uncompressedSize,
				isDirectory: file.type === "Directory",
			},
			file,
		);
	}

	return {
		format: "zip",
		extractable: true,
		listEntries: () => [...files.keys()],
		listSkipped: () => [],
		extractEntry: async (entry, maxBytes = Number.POSITIVE_INFINITY) => {
			const file = files.get(entry);
			if (!file) {
				throw new CorruptArchiveError("zip", `Entry "${entry.path}" is not part of this archive.`);
			}

			if (isEncrypted(file)) {
				if (options.password === undefined) {
					throw new PasswordRequiredError(file.path);
				}
				checkPassword(payload, file, options.password);
			}

			const data = await readEntryData(file, options.password, maxBytes);
			if (crc32(data) !== file.crc32) {
				throw new CorruptArchiveError("zip", `CRC-32 mismatch in "${file.path}"; the entry data is damaged.`);
			}
			return data;
		},
	};
};
