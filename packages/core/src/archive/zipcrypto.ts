/**
 * @title ZipCrypto
 * @description Traditional PKWARE encryption key schedule.
 *
 * Used to check a password against an entry's 12-byte encryption header
 * before any entry data is read.
 *
 * @module archive
 */

import { crc32Step } from "./crc32.js";

/** Length of the encryption header preceding each encrypted entry. */
export const ZIPCRYPTO_HEADER_LENGTH = 12;

/**
 * Running key state for one encrypted entry.
 */
export class ZipCryptoKeys {
	private key0 = 0x12345678;
	private key1 = 0x23456789;
	private key2 = 0x34567890;

	constructor(password: string) {
		for (const byte of Buffer.from(password, "utf8")) {
			this.update(byte);
		}
	}

	update(plainByte: number): void {
		this.key0 = crc32Step(this.key0, plainByte);
		this.key1 = (Math.imul((this.key1 + (this.key0 & 0xff)) >>> 0, 134775813) + 1) >>> 0;
		this.key2 = crc32Step(this.key2, this.key1 >>> 24);
	}

	/** Next keystream byte. */
	streamByte(): number {
		const temp = (this.key2 | 2) & 0xffff;
		return (Math.imul(temp, temp ^ 1) >>> 8) & 0xff;
	}

	decrypt(data: Uint8Array): Buffer {
		const out = Buffer.alloc(data.length);
		for (let i = 0; i < data.length; i += 1) {
			out[i] = data[i] ^ this.streamByte();
			this.update(out[i]);
		}
		return out;
	}
}

/**
 * Check a password against an entry's encryption header.
 *
 * The last decrypted header byte must equal the check byte: the high byte
 * of the entry CRC, or of the modification time when the entry uses a
 * data descriptor.
 *
 * @param header - The 12 encrypted header bytes
 * @param password - Candidate password
 * @param checkByte - Expected value of the last decrypted byte
 */
export function verifyZipCryptoPassword(header: Uint8Array, password: string, checkByte: number): boolean {
	const plain = new ZipCryptoKeys(password).decrypt(header.subarray(0, ZIPCRYPTO_HEADER_LENGTH));
	return plain[ZIPCRYPTO_HEADER_LENGTH - 1] === (checkByte & 0xff);
}
