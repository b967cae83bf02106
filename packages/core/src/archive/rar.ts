/**
 * RAR detection. Entries are never listed or extracted.
 */

import { FormatMismatchError, UnsupportedFormatError } from "../errors.js";
import { matchesAt } from "./signatures.js";
import type { ReaderFactory } from "./types.js";

const RAR_MAGIC = [0x52, 0x61, 0x72, 0x21, 0x1a, 0x07] as const;

/**
 * RAR generation named by the bytes after "Rar!".
 */
export function rarVersion(payload: Uint8Array): "4.x" | "5.x" | null {
	if (matchesAt(payload, 0, [...RAR_MAGIC, 0x01, 0x00])) {
		return "5.x";
	}
	if (matchesAt(payload, 0, [...RAR_MAGIC, 0x00])) {
		return "4.x";
	}
	return null;
}

/**
 * Confirm a RAR signature and report that the archive cannot be extracted.
 */
export const openRar: ReaderFactory = async (payload) => {
	if (!matchesAt(payload, 0, RAR_MAGIC.slice(0, 4))) {
		throw new FormatMismatchError("rar", "Payload does not start with a RAR signature.");
	}

	const version = rarVersion(payload);

	return {
		format: "rar",
		extractable: false,
		note: version
			? `RAR ${version} archive detected; extraction is not supported.`
			: "RAR archive detected; extraction is not supported.",
		listEntries: () => [],
		listSkipped: () => [],
		extractEntry: async (entry) => {
			throw new UnsupportedFormatError(`Cannot read "${entry.path}": RAR extraction is not supported.`);
		},
	};
};
