/**
 * Encoding module exports.
 */

export { normaliseBase64, decodeBase64 } from "./base64.js";
