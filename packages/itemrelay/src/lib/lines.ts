import { DecodeError } from "../error.js";
import { utf8ByteLength } from "../utils.js";

/**
 * Re-chunk text into lines, without their `\n` (and any trailing `\r`).
 * A final line without a newline is emitted when the input ends.
 *
 * @throws {DecodeError} If a line grows beyond `maxLength` UTF-8 bytes.
 */
export async function* splitLines(
	chunks: AsyncIterable<string>,
	maxLength: number,
): AsyncGenerator<string, void, undefined> {
	let buffer = "";
	for await (const chunk of chunks) {
		buffer += chunk;
		let newline = buffer.indexOf("\n");
		while (newline !== -1) {
			yield stripCarriageReturn(buffer.slice(0, newline));
			buffer = buffer.slice(newline + 1);
			newline = buffer.indexOf("\n");
		}
		if (utf8ByteLength(buffer) > maxLength) {
			throw new DecodeError({
				message: `Get item failed. Response line exceeds limit of ${maxLength} bytes`,
			});
		}
	}
	if (buffer.length > 0) {
		yield stripCarriageReturn(buffer);
	}
}

function stripCarriageReturn(line: string): string {
	return line.endsWith("\r") ? line.slice(0, -1) : line;
}
