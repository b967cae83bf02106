/**
 * Analysis module exports.
 */

export {
	type InterestingFileRules,
	type FileSummary,
	type ExtractionSummary,
	DEFAULT_INTERESTING_RULES,
	isInteresting,
	summariseExtraction,
} from "./report.js";
