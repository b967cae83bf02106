/**
 * @title Base64 Normaliser
 * @description Cleaning and strict decoding of base64 text.
 *
 * Input may be wrapped in a `data:` URI header or a `base64:` token and
 * broken by whitespace or other stray characters. Those are removed, the
 * text is padded to a multiple of four, and the result must then be valid
 * standard base64.
 *
 * @module encoding
 */

import { InvalidEncodingError } from "../errors.js";

/** Leading tokens that are removed before the alphabet filter. */
const PREFIX_PATTERNS: readonly RegExp[] = [/^data:(?:[^,]*,)?/i, /^base64:/i];

const WHITESPACE = /\s+/g;

const OUTSIDE_ALPHABET = /[^A-Za-z0-9+/=]/g;

const STRICT_BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * Remove a recognised prefix token, if any.
 */
function stripPrefix(text: string): string {
	for (const pattern of PREFIX_PATTERNS) {
		if (pattern.test(text)) {
			return text.replace(pattern, "");
		}
	}
	return text;
}

/**
 * Clean base64 text into its canonical padded form.
 *
 * Applying this twice gives the same result as applying it once, and the
 * result does not depend on where whitespace appeared in the input.
 *
 * @param text - Raw base64 text
 * @returns Text containing only alphabet characters, padded to a multiple of four
 */
export function normaliseBase64(text: string): string {
	let cleaned = stripPrefix(text.replace(WHITESPACE, ""));
	cleaned = cleaned.replace(OUTSIDE_ALPHABET, "");

	const missing = cleaned.length % 4;
	if (missing !== 0) {
		cleaned += "=".repeat(4 - missing);
	}

	return cleaned;
}

/**
 * Decode base64 text into raw bytes.
 *
 * @param text - Raw base64 text
 * @returns Decoded payload (empty when the text holds no base64 characters)
 * @throws InvalidEncodingError if the cleaned text is not valid base64
 */
export function decodeBase64(text: string): Buffer {
	const cleaned = normaliseBase64(text);

	if (!STRICT_BASE64.test(cleaned)) {
		const data = cleaned.replace(/=+$/, "");
		let detail: string;
		if (data.includes("=")) {
			detail = `padding character at position ${data.indexOf("=")} is not at the end`;
		} else if (data.length % 4 === 1) {
			detail = `${data.length} data characters cannot form complete bytes`;
		} else {
			detail = "too many padding characters";
		}
		throw new InvalidEncodingError(`Input is not valid base64: ${detail}.`);
	}

	return Buffer.from(cleaned, "base64");
}
