import type { RelayEndpoints, RelayEndpointsInit } from "./endpoints.js";
import { readEnvFile } from "./lib/env-file.js";

/**
 * The subset of `fetch` the SDK calls. Defaults to the global `fetch`.
 */
export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

/**
 * Backoff between get rounds that returned no items, in `watch` and `stream` mode.
 */
export type PollConfig = {
	/**
	 * Delay after the first empty round.
	 * @default 50
	 */
	minDelayMillis?: number;
	/**
	 * The delay doubles after each further empty round, up to this value.
	 * @default 1000
	 */
	maxDelayMillis?: number;
};

export const DEFAULT_REQUEST_TIMEOUT_MILLIS = 10_000;
export const DEFAULT_MAX_CONCURRENT_REQUESTS = 25;
export const DEFAULT_MIN_POLL_DELAY_MILLIS = 50;
export const DEFAULT_MAX_POLL_DELAY_MILLIS = 1000;

/**
 * Configuration for constructing the top-level `ItemRelay` client.
 *
 * Credentials are taken from `accountId`/`apiKey`, else `credentialsFile`,
 * else the `ACCOUNT_ID`/`API_KEY` environment variables.
 */
export type ItemRelayOptions = {
	accountId?: string;
	apiKey?: string;
	/** `KEY=VALUE` file defining `ACCOUNT_ID` and `API_KEY`. Must exist when given. */
	credentialsFile?: string;
	/**
	 * `KEY=VALUE` file defining any of `LOGIN_URL`, `SET_URL`, `GET_URL`.
	 * Must exist when given.
	 */
	connectionFile?: string;
	/**
	 * Endpoint URLs. Take precedence over `connectionFile`, which takes precedence
	 * over the environment.
	 */
	endpoints?: RelayEndpoints | RelayEndpointsInit;
	/**
	 * Maximum time in milliseconds to wait on the network for a single round trip.
	 * @default 10000
	 */
	requestTimeoutMillis?: number;
	/**
	 * Maximum number of requests a concurrent session keeps in flight.
	 * Serial sessions always keep at most one.
	 * @default 25
	 */
	maxConcurrentRequests?: number;
	/**
	 * Size limit in bytes for serialized requests, payloads and response documents.
	 * @default 65536
	 */
	maxSerializedBytes?: number;
	poll?: PollConfig;
	/** Environment read for credentials and endpoints. @default process.env */
	env?: NodeJS.ProcessEnv;
	fetch?: FetchLike;
	/** Clock used for cutoff filtering, in milliseconds since the Unix epoch. */
	clock?: () => number;
};

/**
 * Per-request options that apply to all SDK operations.
 */
export type RequestOptions = {
	/**
	 * Optional abort signal to cancel the operation.
	 */
	signal?: AbortSignal;
};

export class RelayEnvironment {
	/**
	 * Read endpoint overrides from `LOGIN_URL`, `SET_URL` and `GET_URL`.
	 */
	public static parse(
		env: Record<string, string | undefined> = process.env,
	): RelayEndpointsInit {
		const config: RelayEndpointsInit = {};
		if (env.LOGIN_URL) {
			config.loginUrl = env.LOGIN_URL;
		}
		if (env.SET_URL) {
			config.setUrl = env.SET_URL;
		}
		if (env.GET_URL) {
			config.getUrl = env.GET_URL;
		}
		return config;
	}

	/**
	 * Read endpoint overrides from a connection file.
	 *
	 * @throws {ConfigurationError} If the file cannot be read.
	 */
	public static parseFile(path: string): RelayEndpointsInit {
		return RelayEnvironment.parse(readEnvFile(path, "Connection"));
	}
}
