/**
 * @title Stream Decompression
 * @description GZIP, BZIP2 and XZ decoding into a canonical TAR byte stream.
 *
 * Every codec is abandoned as soon as its output passes the limit. BZIP2 is
 * decoded block by block into a counting output.
 *
 * @module archive
 */

import * as zlib from "node:zlib";
import Bunzip from "seek-bzip";
import { createXZDecoder } from "xz-compat";
import { CorruptArchiveError, SizeLimitError, getErrorMessage } from "../errors.js";
import { formatSize } from "./security.js";
import type { ArchiveFormat, CompressionCodec } from "./types.js";

/**
 * TAR format produced by each codec.
 */
export const CODEC_FORMATS: Readonly<Record<CompressionCodec, ArchiveFormat>> = {
	gzip: "tar.gz",
	bzip2: "tar.bz2",
	xz: "tar.xz",
};

/**
 * Options for decompression.
 */
export interface DecompressOptions {
	/** Maximum number of output bytes. */
	limit: number;
	/** Return the first `limit` bytes instead of failing on longer output. */
	truncate?: boolean;
}

/**
 * The part of a streaming decoder this module relies on.
 */
interface StreamingDecoder {
	on(event: "data", listener: (chunk: Buffer) => void): unknown;
	on(event: "error", listener: (error: Error) => void): unknown;
	on(event: "end", listener: () => void): unknown;
	end(chunk: Buffer): unknown;
	destroy?(): unknown;
}

function corrupt(codec: CompressionCodec, error: unknown): CorruptArchiveError {
	return new CorruptArchiveError(CODEC_FORMATS[codec], `Invalid ${codec} stream: ${getErrorMessage(error)}`, {
		cause: error,
	});
}

function tooLarge(codec: CompressionCodec, limit: number): SizeLimitError {
	return new SizeLimitError(`Decompressed ${codec} stream exceeds maximum size of ${formatSize(limit)}`, limit);
}

/**
 * Feed the whole input to a decoder and collect its output within the limit.
 */
function collect(
	decoder: StreamingDecoder,
	input: Buffer,
	codec: CompressionCodec,
	options: DecompressOptions,
): Promise<Buffer> {
	return new Promise((resolve, reject) => {
		const chunks: Buffer[] = [];
		let total = 0;
		let settled = false;

		decoder.on("data", (chunk) => {
			if (settled) {
				return;
			}
			chunks.push(chunk);
			total += chunk.length;

			if (total > options.limit) {
				settled = true;
				decoder.destroy?.();
				if (options.truncate) {
					resolve(Buffer.concat(chunks).subarray(0, options.limit));
				} else {
					reject(tooLarge(codec, options.limit));
				}
			}
		});

		decoder.on("error", (error) => {
			if (settled) {
				return;
			}
			settled = true;
			reject(corrupt(codec, error));
		});

		decoder.on("end", () => {
			if (settled) {
				return;
			}
			settled = true;
			resolve(Buffer.concat(chunks));
		});

		decoder.end(input);
	});
}

/** Size of each output chunk collected from the BZIP2 decoder. */
const BZIP2_CHUNK_SIZE = 64 * 1024;

/** Stops the BZIP2 decoder once the output is full. */
class OutputFull extends Error {}

/**
 * Byte sink for seek-bzip that refuses to grow past a limit.
 */
class BoundedOutput {
	private readonly chunks: Buffer[] = [];
	private current = Buffer.alloc(BZIP2_CHUNK_SIZE);
	private used = 0;
	private total = 0;

	constructor(private readonly limit: number) {}

	writeByte(byte: number): void {
		if (this.total === this.limit) {
			throw new OutputFull();
		}
		if (this.used === this.current.length) {
			this.chunks.push(this.current);
			this.current = Buffer.alloc(BZIP2_CHUNK_SIZE);
			this.used = 0;
		}
		this.current[this.used] = byte;
		this.used += 1;
		this.total += 1;
	}

	toBuffer(): Buffer {
		return Buffer.concat([...this.chunks, this.current.subarray(0, this.used)]);
	}
}

function bunzip(input: Buffer, options: DecompressOptions): Buffer {
	const output = new BoundedOutput(options.limit);
	try {
		Bunzip.decode(input, output);
	} catch (error) {
		if (!(error instanceof OutputFull)) {
			throw corrupt("bzip2", error);
		}
		if (!options.truncate) {
			throw tooLarge("bzip2", options.limit);
		}
	}

	return output.toBuffer();
}

/**
 * Decompress a GZIP, BZIP2 or XZ stream.
 *
 * @param input - Compressed bytes
 * @param codec - Compression codec
 * @param options - Output limit
 * @returns Decompressed bytes
 * @throws CorruptArchiveError if the stream is malformed
 * @throws SizeLimitError if the output passes the limit and `truncate` is not set
 */
export async function decompress(input: Buffer, codec: CompressionCodec, options: DecompressOptions): Promise<Buffer> {
	switch (codec) {
		case "gzip":
			return collect(zlib.createGunzip(), input, codec, options);
		case "xz":
			return collect(createXZDecoder(), input, codec, options);
		case "bzip2":
			return bunzip(input, options);
	}
}
