/**
 * CRC-32 (IEEE 802.3) as used by ZIP.
 */

const TABLE = (() => {
	const table = new Uint32Array(256);
	for (let i = 0; i < 256; i += 1) {
		let c = i;
		for (let k = 0; k < 8; k += 1) {
			c = (c & 1) !== 0 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
		}
		table[i] = c >>> 0;
	}
	return table;
})();

/**
 * Advance a raw (non-inverted) CRC register by one byte.
 */
export function crc32Step(crc: number, byte: number): number {
	return (TABLE[(crc ^ byte) & 0xff] ^ (crc >>> 8)) >>> 0;
}

/**
 * CRC-32 of a byte sequence.
 */
export function crc32(data: Uint8Array): number {
	let crc = 0xffffffff;
	for (const byte of data) {
		crc = crc32Step(crc, byte);
	}
	return (crc ^ 0xffffffff) >>> 0;
}
