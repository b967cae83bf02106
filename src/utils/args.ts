import { parseArgs } from "node:util";
import {
	type ArchiveFormat,
	type LogLevel,
	getErrorMessage,
	isUnpack64Error,
	parseFormatTag,
	parseLogLevel,
	parseSize,
} from "@unpack64/core";
import { DEFAULT_OUTPUT_DIR, STDIN_INPUT, UNPACK64_NAME } from "../constants.js";

/**
 * Usage text printed by --help and after usage errors.
 */
export const USAGE = `Usage: ${UNPACK64_NAME} [options]

Decode base64-encoded archives and extract them safely.

Options:
  -i, --input <source>    Base64 source: "-" for stdin, a file path, or literal text (default: "-")
  -o, --output <dir>      Output directory (default: "${DEFAULT_OUTPUT_DIR}")
      --format <format>   Skip detection: zip, tar, tar.gz, tar.bz2, tar.xz or rar
      --password <pw>     Password for encrypted ZIP archives
      --keep              Save the decoded archive in the output directory
      --analyze-only      List and validate entries without extracting (implies --keep)
      --config <file>     Configuration file (default: unpack64.yml in the working directory)
      --max-size <size>   Maximum total extracted size, e.g. 100MB
      --log-level <level> error, warn, info or debug
  -h, --help              Show this help
      --version           Show the version`;

/**
 * Parsed command-line options.
 */
export interface CliOptions {
	input: string;
	output: string;
	format?: ArchiveFormat;
	password?: string;
	keep: boolean;
	analyzeOnly: boolean;
	configPath?: string;
	maxSize?: number;
	logLevel?: LogLevel;
	help: boolean;
	version: boolean;
}

/**
 * The command line could not be parsed.
 */
export class UsageError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, { cause: options?.cause });
		this.name = "UsageError";
	}
}

function parseValue<T>(parse: () => T): T {
	try {
		return parse();
	} catch (error) {
		if (isUnpack64Error(error)) {
			throw new UsageError(error.message, { cause: error });
		}
		throw error;
	}
}

function readArgs(args: string[]) {
	try {
		return parseArgs({
			args,
			strict: true,
			allowPositionals: false,
			options: {
				input: { type: "string", short: "i" },
				output: { type: "string", short: "o" },
				format: { type: "string" },
				password: { type: "string" },
				keep: { type: "boolean" },
				"analyze-only": { type: "boolean" },
				config: { type: "string" },
				"max-size": { type: "string" },
				"log-level": { type: "string" },
				help: { type: "boolean", short: "h" },
				version: { type: "boolean" },
			},
		});
	} catch (error) {
		throw new UsageError(getErrorMessage(error), { cause: error });
	}
}

/**
 * Parses command-line arguments.
 *
 * @param args - Arguments after the program name.
 * @returns The parsed options.
 * @throws UsageError for unknown options, missing values or invalid values.
 */
export function parseCliArgs(args: string[]): CliOptions {
	const { values } = readArgs(args);
	const format = values.format;
	const maxSize = values["max-size"];
	const logLevel = values["log-level"];
	const analyzeOnly = values["analyze-only"] ?? false;

	return {
		input: values.input ?? STDIN_INPUT,
		output: values.output ?? DEFAULT_OUTPUT_DIR,
		format: format === undefined ? undefined : parseValue(() => parseFormatTag(format)),
		password: values.password,
		keep: (values.keep ?? false) || analyzeOnly,
		analyzeOnly,
		configPath: values.config,
		maxSize: maxSize === undefined ? undefined : parseValue(() => parseSize(maxSize, "--max-size")),
		logLevel: logLevel === undefined ? undefined : parseValue(() => parseLogLevel(logLevel, "--log-level")),
		help: values.help ?? false,
		version: values.version ?? false,
	};
}
