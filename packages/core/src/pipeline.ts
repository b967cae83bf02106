/**
 * @title Unpack Pipeline
 * @description Decode, detect, persist and extract a base64 payload.
 *
 * @module pipeline
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { type ExtractionSummary, type InterestingFileRules, summariseExtraction } from "./analysis/report.js";
import { extractArchive } from "./archive/extract.js";
import { sniffFormat } from "./archive/sniff.js";
import type { ExtractOptions, ExtractionResult, FormatTag } from "./archive/types.js";
import { decodeBase64 } from "./encoding/base64.js";
import { EmptyArchiveError, UnsupportedFormatError, type Unpack64Error, wrapError } from "./errors.js";

/** Directory beneath the output directory that receives extracted entries. */
export const EXTRACTED_DIRNAME = "extracted";

/**
 * Options for unpacking base64 text.
 */
export interface UnpackOptions extends ExtractOptions {
	/** Directory that receives the saved archive and the extracted entries. */
	outputDir: string;
	/** Save the decoded bytes beside the extracted entries. */
	keepArchive?: boolean;
	/** Rules for flagging interesting files in the summary. */
	interesting?: InterestingFileRules;
}

/**
 * Result of unpacking base64 text.
 */
export interface UnpackResult {
	/** Size of the decoded payload in bytes. */
	payloadSize: number;
	/** Where the decoded bytes were saved, when kept. */
	archivePath?: string;
	/** Extraction result. */
	extraction: ExtractionResult;
	/** Display-ready summary of the extraction. */
	summary: ExtractionSummary;
}

/**
 * Outcome of tryUnpackBase64.
 */
export type UnpackOutcome = { ok: true; result: UnpackResult } | { ok: false; error: Unpack64Error };

/**
 * File name used when saving decoded bytes of the given format.
 */
export function decodedFileName(format: FormatTag): string {
	return format === "unknown" ? "decoded_data.bin" : `decoded_archive.${format}`;
}

async function saveDecoded(payload: Buffer, format: FormatTag, outputDir: string): Promise<string> {
	await fs.promises.mkdir(outputDir, { recursive: true });
	const archivePath = path.join(outputDir, decodedFileName(format));
	await fs.promises.writeFile(archivePath, payload);
	return archivePath;
}

/**
 * Decode base64 text and extract the archive it holds.
 *
 * The decoded bytes are saved before extraction starts, so they survive an
 * extraction failure. Entries are written to `<outputDir>/extracted`.
 *
 * @param text - Base64 text, possibly with whitespace or a prefix
 * @param options - Unpack options
 * @returns Unpack result
 * @throws Unpack64Error subclasses for every failure
 */
export async function unpackBase64(text: string, options: UnpackOptions): Promise<UnpackResult> {
	const { onProgress } = options;

	onProgress?.({ phase: "decoding", message: "Decoding base64 input..." });
	const payload = decodeBase64(text);
	if (payload.length === 0) {
		throw new EmptyArchiveError();
	}

	let format: FormatTag;
	if (options.format) {
		format = options.format;
	} else {
		onProgress?.({ phase: "detecting", message: "Detecting archive format..." });
		format = await sniffFormat(payload);
	}

	let archivePath: string | undefined;
	if (options.keepArchive) {
		onProgress?.({ phase: "saving", message: `Saving decoded ${format === "unknown" ? "data" : "archive"}...` });
		archivePath = await saveDecoded(payload, format, options.outputDir);
	}

	if (format === "unknown") {
		throw new UnsupportedFormatError("Unable to detect the archive format from the payload signature.", {
			suggestion: "Supported formats: zip, tar, tar.gz, tar.bz2, tar.xz (rar is detected only)",
		});
	}

	const extraction = await extractArchive(payload, path.join(options.outputDir, EXTRACTED_DIRNAME), {
		format,
		password: options.password,
		analyzeOnly: options.analyzeOnly,
		limits: options.limits,
		onProgress,
	});

	return {
		payloadSize: payload.length,
		archivePath,
		extraction,
		summary: summariseExtraction(extraction, options.interesting),
	};
}

/**
 * Like unpackBase64, but every failure is returned as a value.
 */
export async function tryUnpackBase64(text: string, options: UnpackOptions): Promise<UnpackOutcome> {
	try {
		return { ok: true, result: await unpackBase64(text, options) };
	} catch (error) {
		return { ok: false, error: wrapError(error) };
	}
}
