import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import type { UnpackPhase } from "../src/archive/types.js";
import {
	CorruptArchiveError,
	EmptyArchiveError,
	InvalidEncodingError,
	UnsupportedFormatError,
} from "../src/errors.js";
import { listOutputFiles } from "../src/filesystem/walk.js";
import { EXTRACTED_DIRNAME, decodedFileName, tryUnpackBase64, unpackBase64 } from "../src/pipeline.js";
import { buildZip, makeTempDir, readFixture } from "./helpers/archives.js";

/** Base64 of a ZIP local header with nothing after it. */
const TRUNCATED_ZIP = "UEsDBBQAAAAIAA==";

function wrapLines(text: string, width = 76): string {
	const lines: string[] = [];
	for (let offset = 0; offset < text.length; offset += width) {
		lines.push(text.slice(offset, offset + width));
	}
	return lines.join("\n");
}

describe("decodedFileName", () => {
	it("names saved archives by format", () => {
		expect(decodedFileName("zip")).toBe("decoded_archive.zip");
		expect(decodedFileName("tar.gz")).toBe("decoded_archive.tar.gz");
		expect(decodedFileName("unknown")).toBe("decoded_data.bin");
	});
});

describe("unpackBase64", () => {
	let outputDir: string;
	const zip = buildZip([
		{ name: "flag.txt", data: "FLAG{test}\n" },
		{ name: "images/", directory: true },
		{ name: "images/cat.png", data: "not really a png" },
	]);

	beforeEach(() => {
		outputDir = makeTempDir("pipeline-test-");
	});

	afterEach(() => {
		fs.rmSync(outputDir, { recursive: true, force: true });
	});

	it("extracts into the extracted directory and summarises", async () => {
		const result = await unpackBase64(wrapLines(zip.toString("base64")), { outputDir });

		expect(result.payloadSize).toBe(zip.length);
		expect(result.archivePath).toBeUndefined();
		expect(result.extraction.outputRoot).toBe(path.join(outputDir, EXTRACTED_DIRNAME));
		expect(result.summary).toEqual({
			format: "zip",
			status: "extracted",
			totalFiles: 2,
			totalSize: 27,
			files: [
				{ path: "flag.txt", size: 11 },
				{ path: "images/cat.png", size: 16 },
			],
			directories: 1,
			skipped: [],
			interesting: ["flag.txt"],
			note: undefined,
		});
		expect(fs.readdirSync(outputDir)).toEqual([EXTRACTED_DIRNAME]);
	});

	it("saves the decoded archive when asked", async () => {
		const result = await unpackBase64(zip.toString("base64"), { outputDir, keepArchive: true });

		const archivePath = path.join(outputDir, "decoded_archive.zip");
		expect(result.archivePath).toBe(archivePath);
		expect(fs.readFileSync(archivePath).equals(zip)).toBe(true);
	});

	it("accepts a data URI prefix", async () => {
		const result = await unpackBase64(`data:application/zip;base64,${zip.toString("base64")}`, { outputDir });

		expect(result.summary.totalFiles).toBe(2);
	});

	it("reports progress phases in order", async () => {
		const phases: UnpackPhase[] = [];
		await unpackBase64(zip.toString("base64"), {
			outputDir,
			keepArchive: true,
			onProgress: ({ phase }) => {
				if (phases[phases.length - 1] !== phase) {
					phases.push(phase);
				}
			},
		});

		expect(phases).toEqual(["decoding", "detecting", "saving", "listing", "extracting"]);
	});

	it("does not detect a forced format", async () => {
		const phases: UnpackPhase[] = [];
		await unpackBase64(zip.toString("base64"), {
			outputDir,
			format: "zip",
			onProgress: ({ phase }) => phases.push(phase),
		});

		expect(phases).not.toContain("detecting");
	});

	it("lists without writing in analyze-only mode", async () => {
		const result = await unpackBase64(zip.toString("base64"), { outputDir, analyzeOnly: true });

		expect(result.extraction.status).toBe("analyzed");
		expect(result.summary.files).toEqual([
			{ path: "flag.txt", size: 11 },
			{ path: "images/cat.png", size: 16 },
		]);
		expect(await listOutputFiles(path.join(outputDir, EXTRACTED_DIRNAME))).toEqual([]);
	});

	it("extracts an XZ-compressed TAR fixture", async () => {
		const result = await unpackBase64(readFixture("sample.tar.xz.b64"), { outputDir });

		expect(result.summary.format).toBe("tar.xz");
		expect(result.summary.files).toEqual([
			{ path: "hello.txt", size: 14 },
			{ path: "notes/todo.md", size: 7 },
		]);
		expect(fs.readFileSync(path.join(outputDir, EXTRACTED_DIRNAME, "hello.txt"), "utf-8")).toBe("Hello, world!\n");
	});

	it("saves undetectable data before failing", async () => {
		const text = Buffer.from("just some text").toString("base64");

		await expect(unpackBase64(text, { outputDir, keepArchive: true })).rejects.toThrow(UnsupportedFormatError);
		expect(fs.readFileSync(path.join(outputDir, "decoded_data.bin"), "utf-8")).toBe("just some text");
	});

	it("keeps the saved archive when extraction fails", async () => {
		await expect(unpackBase64(TRUNCATED_ZIP, { outputDir, keepArchive: true })).rejects.toThrow(
			CorruptArchiveError,
		);
		expect(fs.statSync(path.join(outputDir, "decoded_archive.zip")).size).toBe(10);
		expect(fs.existsSync(path.join(outputDir, EXTRACTED_DIRNAME))).toBe(false);
	});

	it("rejects input without base64 characters", async () => {
		await expect(unpackBase64(" \n\t ", { outputDir })).rejects.toThrow(EmptyArchiveError);
	});

	it("rejects input that cannot be decoded", async () => {
		await expect(unpackBase64("Q", { outputDir })).rejects.toThrow(InvalidEncodingError);
	});
});

describe("tryUnpackBase64", () => {
	let outputDir: string;

	beforeEach(() => {
		outputDir = makeTempDir("pipeline-try-test-");
	});

	afterEach(() => {
		fs.rmSync(outputDir, { recursive: true, force: true });
	});

	it("returns the error code of a corrupt archive", async () => {
		const outcome = await tryUnpackBase64(TRUNCATED_ZIP, { outputDir });

		expect(outcome.ok).toBe(false);
		expect(outcome.ok ? undefined : outcome.error.code).toBe("CORRUPT_ARCHIVE");
	});

	it("returns the result on success", async () => {
		const zip = buildZip([{ name: "a.txt", data: "a" }]);
		const outcome = await tryUnpackBase64(zip.toString("base64"), { outputDir });

		expect(outcome.ok).toBe(true);
		expect(outcome.ok ? outcome.result.summary.totalFiles : 0).toBe(1);
	});
});
