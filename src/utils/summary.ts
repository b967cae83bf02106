import { type UnpackResult, formatSize } from "@unpack64/core";
import { SUMMARY_FILE_LIMIT } from "../constants.js";

/**
 * Renders the extraction summary printed on stdout.
 *
 * @param result - The unpack result.
 * @param fileLimit - Number of files listed before the rest are counted.
 * @returns The summary lines.
 */
export function formatSummary(result: UnpackResult, fileLimit = SUMMARY_FILE_LIMIT): string[] {
	const { summary, extraction } = result;
	const lines = [`Detected format: ${summary.format}`, `Decoded payload: ${formatSize(result.payloadSize)}`];

	if (result.archivePath) {
		lines.push(`Saved archive: ${result.archivePath}`);
	}

	if (summary.status === "unsupported") {
		lines.push(summary.note ?? `Extraction of ${summary.format} archives is not supported.`);
		return lines;
	}

	lines.push(
		summary.status === "extracted"
			? `Extracted to: ${extraction.outputRoot}`
			: "Analyze-only mode: nothing was extracted.",
		"",
		"Extraction summary:",
		`  Total files: ${summary.totalFiles}`,
		`  Total size: ${formatSize(summary.totalSize)}`,
	);

	if (summary.directories > 0) {
		lines.push(`  Directories: ${summary.directories}`);
	}

	if (summary.files.length > 0) {
		lines.push(summary.status === "extracted" ? "  Files extracted:" : "  Files:");
		for (const file of summary.files.slice(0, fileLimit)) {
			lines.push(`    - ${file.path} (${formatSize(file.size)})`);
		}
		if (summary.files.length > fileLimit) {
			lines.push(`    ... and ${summary.files.length - fileLimit} more files`);
		}
	}

	if (summary.skipped.length > 0) {
		lines.push("  Skipped entries:");
		for (const entry of summary.skipped) {
			lines.push(`    - ${entry.path} (${entry.reason})`);
		}
	}

	if (summary.interesting.length > 0) {
		lines.push("", "Potentially interesting files:");
		for (const filePath of summary.interesting) {
			lines.push(`  - ${filePath}`);
		}
	}

	return lines;
}
