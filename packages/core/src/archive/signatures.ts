/**
 * @title Format Signatures
 * @description Magic numbers and header checks for the supported formats.
 *
 * @module archive
 */

/**
 * What a signature says about the bytes that follow it.
 */
export type Signature = "zip" | "gzip" | "bzip2" | "xz" | "rar" | "tar";

interface SignatureRule {
	signature: Signature;
	offset: number;
	bytes: readonly number[];
}

/** Size of one TAR block (and of a TAR header). */
export const TAR_BLOCK_SIZE = 512;

/**
 * Signatures in priority order.
 */
const SIGNATURE_RULES: readonly SignatureRule[] = [
	{ signature: "zip", offset: 0, bytes: [0x50, 0x4b, 0x03, 0x04] },
	{ signature: "zip", offset: 0, bytes: [0x50, 0x4b, 0x05, 0x06] },
	{ signature: "zip", offset: 0, bytes: [0x50, 0x4b, 0x07, 0x08] },
	{ signature: "gzip", offset: 0, bytes: [0x1f, 0x8b] },
	{ signature: "bzip2", offset: 0, bytes: [0x42, 0x5a, 0x68] },
	{ signature: "xz", offset: 0, bytes: [0xfd, 0x37, 0x7a, 0x58, 0x5a] },
	{ signature: "rar", offset: 0, bytes: [0x52, 0x61, 0x72, 0x21] },
	{ signature: "tar", offset: 257, bytes: [0x75, 0x73, 0x74, 0x61, 0x72] },
];

/**
 * Whether `bytes` holds `expected` starting at `offset`.
 */
export function matchesAt(bytes: Uint8Array, offset: number, expected: readonly number[]): boolean {
	if (bytes.length < offset + expected.length) {
		return false;
	}
	return expected.every((value, index) => bytes[offset + index] === value);
}

/**
 * Classify bytes by their leading signature alone.
 *
 * @param bytes - Raw payload
 * @returns The first matching signature, or null
 */
export function sniffSignature(bytes: Uint8Array): Signature | null {
	for (const rule of SIGNATURE_RULES) {
		if (matchesAt(bytes, rule.offset, rule.bytes)) {
			return rule.signature;
		}
	}
	return null;
}

/**
 * State of the first TAR header block.
 *
 * - "valid": a ustar magic or a correct header checksum.
 * - "empty": an all-zero block, i.e. an archive with no entries.
 * - "invalid": anything else, including input shorter than one block.
 */
export type TarHeaderState = "valid" | "empty" | "invalid";

/**
 * Inspect the first 512 bytes as a TAR header.
 */
export function inspectTarHeader(bytes: Uint8Array): TarHeaderState {
	if (bytes.length < TAR_BLOCK_SIZE) {
		return "invalid";
	}

	const block = bytes.subarray(0, TAR_BLOCK_SIZE);
	if (block.every((byte) => byte === 0)) {
		return "empty";
	}
	if (matchesAt(block, 257, [0x75, 0x73, 0x74, 0x61, 0x72])) {
		return "valid";
	}

	const stored = Number.parseInt(Buffer.from(block.subarray(148, 156)).toString("latin1").replace(/[\0 ]+/g, ""), 8);
	if (Number.isNaN(stored)) {
		return "invalid";
	}

	// The checksum field itself counts as eight spaces.
	let computed = 8 * 0x20;
	for (let i = 0; i < TAR_BLOCK_SIZE; i += 1) {
		if (i < 148 || i >= 156) {
			computed += block[i];
		}
	}

	return stored === computed ? "valid" : "invalid";
}
