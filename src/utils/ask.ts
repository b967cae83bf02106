import * as readline from "node:readline/promises";
import { Writable } from "node:stream";
import { CancellationError } from "@unpack64/core";

/**
 * Streams used to ask the user a question.
 */
export interface PromptStreams {
	input: NodeJS.ReadableStream & { isTTY?: boolean };
	output: NodeJS.WritableStream;
}

/**
 * Whether the user can be asked for a password.
 *
 * @param streams - The terminal streams.
 * @param inputIsData - Whether standard input carried the base64 text.
 * @returns True when standard input is a terminal that did not carry the data.
 */
export function canPrompt(streams: PromptStreams, inputIsData: boolean): boolean {
	return !inputIsData && streams.input.isTTY === true;
}

/**
 * Output that discards everything readline echoes back.
 */
function mutedOutput(): Writable {
	return new Writable({
		write(_chunk, _encoding, callback) {
			callback();
		},
	});
}

/**
 * Prompts the user for the password of an encrypted archive.
 *
 * The prompt goes to the output stream. The typed characters are not echoed:
 * the terminal is switched to raw mode and readline echoes into a muted
 * stream.
 *
 * @param entryPath - The encrypted entry that needed the password.
 * @param streams - The terminal streams.
 * @returns The password typed by the user.
 * @throws CancellationError if the answer is empty or the input closes.
 */
export async function askPassword(entryPath: string, streams: PromptStreams): Promise<string> {
	const rl = readline.createInterface({
		input: streams.input,
		output: mutedOutput(),
		terminal: true,
		historySize: 0,
	});
	const controller = new AbortController();
	rl.once("close", () => controller.abort());

	streams.output.write(`Password for "${entryPath}": `);
	try {
		const answer = await rl.question("", { signal: controller.signal });
		if (answer === "") {
			throw new CancellationError("Password entry cancelled.");
		}
		return answer;
	} catch (error) {
		if (controller.signal.aborted) {
			throw new CancellationError("Password entry cancelled.");
		}
		throw error;
	} finally {
		rl.close();
		streams.output.write("\n");
	}
}
