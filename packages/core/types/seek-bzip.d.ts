declare module "seek-bzip" {
	/** Receives decoded bytes one at a time. */
	interface BunzipOutputStream {
		writeByte(byte: number): void;
	}

	interface Bunzip {
		/** Decode a complete bzip2 stream into a new buffer. */
		decode(input: Buffer): Buffer;
		/** Decode a complete bzip2 stream into an output stream. */
		decode(input: Buffer, output: BunzipOutputStream, multistream?: boolean): void;
	}

	const Bunzip: Bunzip;
	export = Bunzip;
}
