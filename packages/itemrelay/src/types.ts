/**
 * itemrelay SDK types
 *
 * Public types use camelCase field names. The wire format (flat lowercase
 * names such as `portalid`) lives in `lib/wire.ts`.
 */

import { encodeToBase64 } from "./lib/base64.js";

// =============================================================================
// Portals and Items
// =============================================================================

/**
 * Reference to a portal: a named channel items are set into and fetched from.
 */
export interface PortalRef {
	readonly portalId: string;
}

/**
 * Item delivered by the service.
 */
export interface Item {
	readonly portalId: string;
	/** Opaque payload, as it was set. */
	readonly payload: string;
	/** Ingestion time assigned by the service, in milliseconds since the Unix epoch. */
	readonly serverTimestamp: number;
}

/**
 * Item to be set into a portal.
 * Use `ItemInput.string()` or `ItemInput.bytes()` to construct instances.
 */
export interface ItemInput {
	readonly portalId: string;
	readonly payload: string;
}

/**
 * Factory functions for creating ItemInput instances.
 */
export namespace ItemInput {
	export function string(params: {
		readonly portalId: string;
		readonly payload: string;
	}): ItemInput {
		return { portalId: params.portalId, payload: params.payload };
	}

	/**
	 * Create an item from binary data. The payload is base64-encoded;
	 * use {@link decodePayload} on the receiving side.
	 */
	export function bytes(params: {
		readonly portalId: string;
		readonly payload: Uint8Array;
	}): ItemInput {
		return {
			portalId: params.portalId,
			payload: encodeToBase64(params.payload),
		};
	}
}

// =============================================================================
// Get Input
// =============================================================================

/**
 * How a `getItem` call polls the service.
 *
 * - `probe`: one request, returns whatever is pending (possibly nothing).
 * - `watch`: re-polls until at least one item arrives, then returns that batch.
 * - `stream`: re-polls indefinitely until the consumer stops iterating.
 */
export type GetMode = "probe" | "watch" | "stream";

export const GET_MODES: ReadonlyArray<GetMode> = ["probe", "watch", "stream"];

/**
 * Delivery order hint forwarded to the service.
 *
 * - `LIFO`: newest item first; old items may be skipped (default).
 * - `FIFO`: strive to deliver every item.
 */
export type Schedule = "LIFO" | "FIFO";

/**
 * Input for `getItem`.
 */
export interface GetItemInput {
	readonly portals: ReadonlyArray<PortalRef>;
	/** @default "probe" */
	readonly mode?: GetMode;
	/**
	 * Maximum age in milliseconds, measured when the item is received.
	 * Older items are discarded; an item exactly `cutoff` ms old is kept.
	 * When unset, items of any age are returned.
	 */
	readonly cutoff?: number;
	/** @default "LIFO" */
	readonly schedule?: Schedule;
}

// =============================================================================
// Limits
// =============================================================================

/**
 * Maximum size of a serialized JSON message accepted by the service (64 KiB).
 * Applies to request bodies, to each payload, and to each response document.
 */
export const MAX_SERIALIZED_BYTES = 65536;
