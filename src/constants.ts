/**
 * Program name used in usage text and log records.
 */
export const UNPACK64_NAME = "unpack64";

/**
 * Program version reported by --version.
 */
export const UNPACK64_VERSION = "0.1.0";

/**
 * Input source that reads base64 text from standard input.
 */
export const STDIN_INPUT = "-";

/**
 * Default output directory.
 */
export const DEFAULT_OUTPUT_DIR = "extracted_files";

/**
 * Number of files listed in the summary before the rest are counted.
 */
export const SUMMARY_FILE_LIMIT = 20;

/**
 * Exit codes.
 */
export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;
