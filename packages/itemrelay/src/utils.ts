const textEncoder = new TextEncoder();

/**
 * Number of bytes `value` occupies when encoded as UTF-8.
 */
export function utf8ByteLength(value: string): number {
	return textEncoder.encode(value).byteLength;
}
