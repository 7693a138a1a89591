import { base64 } from "@scure/base";
import { DecodeError } from "../error.js";
import type { Item } from "../types.js";

export function encodeToBase64(bytes: Uint8Array): string {
	return base64.encode(bytes);
}

export function decodeFromBase64(value: string): Uint8Array {
	return base64.decode(value);
}

/**
 * Decode the payload of an item that was set with `ItemInput.bytes()`.
 *
 * @throws {DecodeError} If the payload is not valid base64.
 */
export function decodePayload(item: Item): Uint8Array {
	try {
		return decodeFromBase64(item.payload);
	} catch (error) {
		throw new DecodeError({
			message: `Payload of item in portal "${item.portalId}" is not base64`,
			cause: error,
		});
	}
}
