import * as fs from "node:fs";
import * as path from "node:path";
import { text } from "node:stream/consumers";
import { STDIN_INPUT } from "../constants.js";

/**
 * Where the base64 text came from.
 */
export type InputKind = "stdin" | "file" | "literal";

/**
 * Base64 text read from the input source.
 */
export interface InputText {
	kind: InputKind;
	text: string;
	/** Resolved file path, for file input. */
	filePath?: string;
}

/** Errors that mean the source does not name a readable path. */
const NOT_A_PATH = new Set(["ENOENT", "ENAMETOOLONG", "ENOTDIR", "EINVAL"]);

async function isFile(candidate: string): Promise<boolean> {
	try {
		return (await fs.promises.stat(candidate)).isFile();
	} catch (error) {
		if (error instanceof Error && "code" in error && typeof error.code === "string" && NOT_A_PATH.has(error.code)) {
			return false;
		}
		throw error;
	}
}

/**
 * Reads base64 text from the input source.
 *
 * "-" reads standard input to its end. A path to an existing file is read as
 * UTF-8. Any other value is the base64 text itself.
 *
 * @param source - The --input value.
 * @param stdin - Stream read for "-".
 * @param cwd - Directory relative paths are resolved against.
 * @returns The text and where it came from.
 */
export async function readInput(
	source: string,
	stdin: NodeJS.ReadableStream = process.stdin,
	cwd: string = process.cwd(),
): Promise<InputText> {
	if (source === STDIN_INPUT) {
		return { kind: "stdin", text: await text(stdin) };
	}

	const filePath = path.resolve(cwd, source);
	if (source.trim() !== "" && (await isFile(filePath))) {
		return { kind: "file", text: await fs.promises.readFile(filePath, "utf-8"), filePath };
	}

	return { kind: "literal", text: source };
}
