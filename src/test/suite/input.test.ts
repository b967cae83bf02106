import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { PassThrough } from "node:stream";
import { readInput } from "../../utils/input.js";

describe("readInput", () => {
	let tempDir: string;

	beforeEach(() => {
		tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "input-test-"));
	});

	afterEach(() => {
		fs.rmSync(tempDir, { recursive: true, force: true });
	});

	it("reads standard input for -", async () => {
		const stdin = new PassThrough();
		stdin.end("UEsFBgAAAAAAAAAAAAAAAAAAAAAAAA==\n");

		expect(await readInput("-", stdin, tempDir)).toEqual({
			kind: "stdin",
			text: "UEsFBgAAAAAAAAAAAAAAAAAAAAAAAA==\n",
		});
	});

	it("reads an existing file relative to the working directory", async () => {
		fs.writeFileSync(path.join(tempDir, "payload.b64"), "SGVsbG8=\n");

		expect(await readInput("payload.b64", new PassThrough(), tempDir)).toEqual({
			kind: "file",
			text: "SGVsbG8=\n",
			filePath: path.join(tempDir, "payload.b64"),
		});
	});

	it("treats anything else as base64 text", async () => {
		expect(await readInput("SGVsbG8=", new PassThrough(), tempDir)).toEqual({ kind: "literal", text: "SGVsbG8=" });
	});

	it("treats a directory name as base64 text", async () => {
		fs.mkdirSync(path.join(tempDir, "abcd"));

		expect(await readInput("abcd", new PassThrough(), tempDir)).toEqual({ kind: "literal", text: "abcd" });
	});

	it("treats text too long for a file name as base64 text", async () => {
		const text = "A".repeat(5000);

		expect(await readInput(text, new PassThrough(), tempDir)).toEqual({ kind: "literal", text });
	});
});
