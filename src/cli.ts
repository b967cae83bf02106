import * as path from "node:path";
import { type Unpack64Config, type ExtractionLimits, isCancellationError, loadConfig, wrapError } from "@unpack64/core";
import type { DestinationStream } from "pino";
import { unpackCommand } from "./commands/unpack.js";
import { EXIT_FAILURE, EXIT_SUCCESS, EXIT_USAGE, UNPACK64_VERSION } from "./constants.js";
import { type CliOptions, USAGE, UsageError, parseCliArgs } from "./utils/args.js";
import { askPassword, canPrompt } from "./utils/ask.js";
import { readInput } from "./utils/input.js";
import { type Logger, createLogger } from "./utils/log.js";
import { formatSummary } from "./utils/summary.js";

/**
 * Process streams and environment used by the command-line application.
 */
export interface CliIO {
	stdin: NodeJS.ReadableStream & { isTTY?: boolean };
	stdout: NodeJS.WritableStream;
	stderr: NodeJS.WritableStream;
	env: NodeJS.ProcessEnv;
	cwd: string;
	/** Receives log records. Defaults to stderr. */
	logDestination?: DestinationStream;
}

function writeLines(stream: NodeJS.WritableStream, lines: string[]): void {
	stream.write(`${lines.join("\n")}\n`);
}

function resolveConfig(options: CliOptions, io: CliIO): Unpack64Config {
	const limits: Partial<ExtractionLimits> | undefined =
		options.maxSize === undefined ? undefined : { maxSize: options.maxSize };

	return loadConfig({
		cwd: io.cwd,
		configPath: options.configPath,
		env: io.env,
		overrides: { limits, logLevel: options.logLevel },
	});
}

async function run(options: CliOptions, io: CliIO, logger: Logger, config: Unpack64Config): Promise<number> {
	const input = await readInput(options.input, io.stdin, io.cwd);
	logger.info(
		input.kind === "stdin"
			? "Reading base64 data from stdin."
			: input.kind === "file"
				? `Reading base64 data from file: ${input.filePath}.`
				: "Using base64 data given on the command line.",
	);

	const outputDir = path.resolve(io.cwd, options.output);
	const prompt = canPrompt({ input: io.stdin, output: io.stderr }, input.kind === "stdin");

	const result = await unpackCommand(input.text, {
		outputDir,
		format: options.format,
		password: options.password,
		keepArchive: options.keep,
		analyzeOnly: options.analyzeOnly,
		limits: config.limits,
		interesting: config.interesting,
		logger,
		askPassword: prompt ? (entryPath) => askPassword(entryPath, { input: io.stdin, output: io.stderr }) : undefined,
	});

	writeLines(io.stdout, formatSummary(result));

	if (result.extraction.status === "unsupported") {
		logger.error(result.extraction.note ?? `Extraction of ${result.extraction.format} archives is not supported.`);
		return EXIT_FAILURE;
	}

	logger.info(`Process complete. Output directory: ${outputDir}.`);
	return EXIT_SUCCESS;
}

/**
 * Runs the command-line application.
 *
 * @param args - Arguments after the program name.
 * @param io - Process streams and environment.
 * @returns The exit code.
 */
export async function runCli(args: string[], io: CliIO): Promise<number> {
	let options: CliOptions;
	try {
		options = parseCliArgs(args);
	} catch (error) {
		if (error instanceof UsageError) {
			writeLines(io.stderr, [`Error: ${error.message}`, "", USAGE]);
			return EXIT_USAGE;
		}
		throw error;
	}

	if (options.help) {
		writeLines(io.stdout, [USAGE]);
		return EXIT_SUCCESS;
	}
	if (options.version) {
		writeLines(io.stdout, [UNPACK64_VERSION]);
		return EXIT_SUCCESS;
	}

	let config: Unpack64Config;
	try {
		config = resolveConfig(options, io);
	} catch (error) {
		writeLines(io.stderr, [wrapError(error).format()]);
		return EXIT_FAILURE;
	}

	const logger = createLogger(config.logLevel, io.logDestination ?? io.stderr);

	try {
		return await run(options, io, logger, config);
	} catch (error) {
		const failure = wrapError(error);
		if (isCancellationError(failure)) {
			logger.warn(failure.message);
		} else {
			logger.error({ code: failure.code, suggestion: failure.suggestion }, failure.message);
		}
		return EXIT_FAILURE;
	}
}

/**
 * Entry point used by the executable.
 */
export async function main(): Promise<void> {
	process.exitCode = await runCli(process.argv.slice(2), {
		stdin: process.stdin,
		stdout: process.stdout,
		stderr: process.stderr,
		env: process.env,
		cwd: process.cwd(),
	});
}
