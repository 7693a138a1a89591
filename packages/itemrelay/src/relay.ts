import createDebug from "debug";
import {
	DEFAULT_MAX_CONCURRENT_REQUESTS,
	DEFAULT_MAX_POLL_DELAY_MILLIS,
	DEFAULT_MIN_POLL_DELAY_MILLIS,
	DEFAULT_REQUEST_TIMEOUT_MILLIS,
	type ItemRelayOptions,
	RelayEnvironment,
	type RequestOptions,
} from "./common.js";
import { type Credentials, resolveCredentials } from "./credentials.js";
import { RelayEndpoints } from "./endpoints.js";
import { ConfigurationError } from "./error.js";
import { ConcurrentSession } from "./lib/session/concurrent/index.js";
import { SerialSession } from "./lib/session/serial/index.js";
import type {
	ItemSession,
	SessionConfig,
	SessionKind,
} from "./lib/session/types.js";
import { MAX_SERIALIZED_BYTES } from "./types.js";

const debug = createDebug("itemrelay:relay");

export interface SessionOptions extends RequestOptions {
	/**
	 * Scheduling model of the session.
	 * @default "concurrent"
	 */
	kind?: SessionKind;
}

/**
 * Top-level client for the item-exchange service.
 *
 * - Resolves credentials and connection settings once, at construction.
 * - Opens logged-in sessions through which items are set and fetched.
 *
 * @example
 * ```ts
 * const relay = new ItemRelay({ credentialsFile: "relay.env" });
 * await relay.withSession(async (session) => {
 *   await session.setItem([ItemInput.string({ portalId: "lobby", payload: "hi" })]);
 *   for await (const item of session.getItem({ portals: [{ portalId: "lobby" }], mode: "watch" })) {
 *     console.log(item.payload);
 *   }
 * });
 * ```
 */
export class ItemRelay {
	private readonly config: SessionConfig;

	public readonly endpoints: RelayEndpoints;

	/**
	 * Create a client.
	 *
	 * @throws {MissingCredentialsError} If no source supplies credentials.
	 * @throws {ConfigurationError} If credentials, files or settings are invalid.
	 */
	constructor(options: ItemRelayOptions = {}) {
		const env = options.env ?? process.env;
		const { source, ...credentials } = resolveCredentials(
			{
				accountId: options.accountId,
				apiKey: options.apiKey,
				credentialsFile: options.credentialsFile,
			},
			env,
		);

		this.endpoints =
			options.endpoints instanceof RelayEndpoints
				? options.endpoints
				: RelayEndpoints.merge(
						options.endpoints,
						options.connectionFile === undefined
							? undefined
							: RelayEnvironment.parseFile(options.connectionFile),
						RelayEnvironment.parse(env),
					);

		const minDelayMillis =
			options.poll?.minDelayMillis ?? DEFAULT_MIN_POLL_DELAY_MILLIS;
		const maxDelayMillis = Math.max(
			options.poll?.maxDelayMillis ?? DEFAULT_MAX_POLL_DELAY_MILLIS,
			minDelayMillis,
		);

		this.config = {
			credentials: Object.freeze(credentials),
			endpoints: this.endpoints,
			fetch: options.fetch ?? ((url, init) => fetch(url, init)),
			requestTimeoutMillis: positive(
				"requestTimeoutMillis",
				options.requestTimeoutMillis ?? DEFAULT_REQUEST_TIMEOUT_MILLIS,
			),
			maxConcurrentRequests: positiveInteger(
				"maxConcurrentRequests",
				options.maxConcurrentRequests ?? DEFAULT_MAX_CONCURRENT_REQUESTS,
			),
			maxSerializedBytes: positiveInteger(
				"maxSerializedBytes",
				options.maxSerializedBytes ?? MAX_SERIALIZED_BYTES,
			),
			poll: {
				minDelayMillis: nonNegative("poll.minDelayMillis", minDelayMillis),
				maxDelayMillis,
				clock: options.clock ?? Date.now,
			},
		};
		debug(
			"client ready: credentials from %s, get endpoint %s",
			source,
			this.endpoints.getUrl,
		);
	}

	/** Credentials the client logs in with. */
	get credentials(): Credentials {
		return this.config.credentials;
	}

	/**
	 * Log in and open a session. The caller must close it; prefer
	 * {@link ItemRelay.withSession} where the session's use fits in one callback.
	 *
	 * @throws {TransportError} If login fails.
	 */
	public async openSession(options: SessionOptions = {}): Promise<ItemSession> {
		const { kind = "concurrent", ...requestOptions } = options;
		debug("opening %s session", kind);
		return kind === "serial"
			? SerialSession.open(this.config, requestOptions)
			: ConcurrentSession.open(this.config, requestOptions);
	}

	/**
	 * Open a session, run `fn` with it, and close it however `fn` ends.
	 */
	public async withSession<T>(
		fn: (session: ItemSession) => Promise<T>,
		options?: SessionOptions,
	): Promise<T> {
		const session = await this.openSession(options);
		try {
			return await fn(session);
		} finally {
			await session.close();
		}
	}
}

function nonNegative(name: string, value: number): number {
	if (!Number.isFinite(value) || value < 0) {
		throw new ConfigurationError({
			message: `${name} must be a non-negative number (got ${value})`,
		});
	}
	return value;
}

function positive(name: string, value: number): number {
	if (!Number.isFinite(value) || value <= 0) {
		throw new ConfigurationError({
			message: `${name} must be a positive number (got ${value})`,
		});
	}
	return value;
}

function positiveInteger(name: string, value: number): number {
	if (!Number.isInteger(value) || value < 1) {
		throw new ConfigurationError({
			message: `${name} must be a positive integer (got ${value})`,
		});
	}
	return value;
}
