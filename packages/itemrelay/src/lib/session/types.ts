import type { FetchLike, RequestOptions } from "../../common.js";
import type { Credentials } from "../../credentials.js";
import type { RelayEndpoints } from "../../endpoints.js";
import type { GetItemInput, Item, ItemInput } from "../../types.js";
import type { PollerConfig } from "../poller.js";

/**
 * Scheduling model of a session.
 *
 * - `serial`: one round trip in flight at a time; each response is read whole
 *   before its items are handed out.
 * - `concurrent`: several round trips may be in flight; responses are decoded
 *   and handed out as they stream in.
 */
export type SessionKind = "serial" | "concurrent";

/**
 * A logged-in session against the item-exchange service.
 *
 * Sessions are opened by {@link ItemRelay.openSession} (or scoped with
 * {@link ItemRelay.withSession}) and must be closed. After `close()`, every
 * operation fails with `UseAfterCloseError`, including further pulls on a
 * sequence returned by `getItem` before the close.
 *
 * A session is meant for one logical operation at a time. Interleaving a
 * `stream` sequence with other calls from unrelated tasks needs external
 * serialization to give meaningful results.
 *
 * @example
 * ```ts
 * const session = await relay.openSession();
 * try {
 *   await session.setItem([ItemInput.string({ portalId: "lobby", payload: "hi" })]);
 *   for await (const item of session.getItem({ portals: [{ portalId: "lobby" }] })) {
 *     console.log(item.payload);
 *   }
 * } finally {
 *   await session.close();
 * }
 * ```
 */
export interface ItemSession extends AsyncDisposable {
	readonly kind: SessionKind;
	/** Server timestamp returned by login, in milliseconds since the Unix epoch. */
	readonly loginTime: number;
	/**
	 * Set a batch of items in one request. The batch succeeds or fails as a whole.
	 *
	 * @throws {ValidationError} Before any request, if the batch is malformed or too large.
	 * @throws {TransportError} On network failure, non-success status or timeout.
	 * @throws {UseAfterCloseError} If the session is closed.
	 */
	setItem(
		items: ReadonlyArray<ItemInput>,
		options?: RequestOptions,
	): Promise<void>;
	/**
	 * Get items from the given portals. Input is validated immediately; requests
	 * are only issued as the returned sequence is pulled, one round per pull at most.
	 *
	 * @throws {ValidationError} Immediately, if the input is malformed.
	 * @throws {UseAfterCloseError} Immediately, if the session is closed.
	 */
	getItem(input: GetItemInput, options?: RequestOptions): AsyncIterable<Item>;
	/**
	 * Close the session, aborting any request or poll in progress. Idempotent.
	 */
	close(): Promise<void>;
	isClosed(): boolean;
	/** Number of round trips currently holding a request slot. */
	inFlight(): number;
}

/**
 * Resolved configuration shared by both session kinds.
 */
export interface SessionConfig {
	readonly credentials: Credentials;
	readonly endpoints: RelayEndpoints;
	readonly fetch: FetchLike;
	readonly requestTimeoutMillis: number;
	readonly maxConcurrentRequests: number;
	readonly maxSerializedBytes: number;
	readonly poll: PollerConfig;
}
