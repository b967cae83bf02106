import pino, { type DestinationStream, type Logger as PinoLogger } from "pino";
import type { LogLevel, UnpackProgressCallback } from "@unpack64/core";
import { UNPACK64_NAME } from "../constants.js";

/**
 * Logger used by the command-line application.
 */
export type Logger = PinoLogger;

/**
 * Creates the application logger.
 *
 * Records go to stderr so that stdout carries only the summary.
 *
 * @param level - Lowest level that is written.
 * @param destination - Stream that receives the records. Defaults to stderr.
 * @returns The logger.
 */
export function createLogger(level: LogLevel, destination: DestinationStream = pino.destination(2)): Logger {
	return pino({ level, base: { name: UNPACK64_NAME } }, destination);
}

/**
 * Returns a progress callback that logs every pipeline event at debug level.
 *
 * @param logger - The logger to write to.
 * @returns The progress callback.
 */
export function logProgress(logger: Logger): UnpackProgressCallback {
	return ({ phase, message, path }) => {
		logger.debug({ phase, path }, message);
	};
}
