import {
	PasswordRequiredError,
	type UnpackOptions,
	type UnpackResult,
	formatSize,
	unpackBase64,
} from "@unpack64/core";
import { type Logger, logProgress } from "../utils/log.js";

/**
 * Options for the unpack command.
 */
export interface UnpackCommandOptions extends Omit<UnpackOptions, "onProgress"> {
	logger: Logger;
	/** Asks for a password when an encrypted archive was given none. */
	askPassword?: (entryPath: string) => Promise<string>;
}

/**
 * Decodes base64 text and extracts the archive it holds.
 *
 * When the archive needs a password that was not supplied and a prompt is
 * available, the user is asked once and extraction is run again.
 *
 * @param text - The base64 text.
 * @param options - Command options.
 * @returns The unpack result.
 */
export async function unpackCommand(text: string, options: UnpackCommandOptions): Promise<UnpackResult> {
	const { logger, askPassword, ...unpackOptions } = options;
	const onProgress = logProgress(logger);

	logger.info(`Base64 data length: ${text.length} characters.`);

	let result: UnpackResult;
	try {
		result = await unpackBase64(text, { ...unpackOptions, onProgress });
	} catch (error) {
		if (!(error instanceof PasswordRequiredError) || unpackOptions.password !== undefined || !askPassword) {
			throw error;
		}
		logger.warn(error.message);
		const password = await askPassword(error.entryPath);
		result = await unpackBase64(text, { ...unpackOptions, password, onProgress });
	}

	logger.info(`Decoded ${formatSize(result.payloadSize)} as ${result.summary.format}.`);
	if (result.archivePath) {
		logger.info(`Saved decoded archive: ${result.archivePath}.`);
	}

	return result;
}
