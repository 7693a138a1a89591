/**
 * Where an error originated: raised locally by the SDK, or reported by the service.
 */
export type ErrorOrigin = "sdk" | "server";

export type RelayErrorInit = {
	message: string;
	code?: string;
	status?: number;
	origin?: ErrorOrigin;
	cause?: unknown;
};

/**
 * Base class of every error thrown by the SDK.
 *
 * - `code` is a stable machine-readable identifier when one is known
 *   (e.g. `TIMEOUT`, `ABORTED`, or the service's own error code).
 * - `status` is the HTTP status, or a pseudo-status for local failures
 *   (408 for timeouts, 400 for rejected input).
 */
export class RelayError extends Error {
	public readonly code?: string;
	public readonly status?: number;
	public readonly origin: ErrorOrigin;

	constructor({ message, code, status, origin = "sdk", cause }: RelayErrorInit) {
		super(message, cause === undefined ? undefined : { cause });
		this.name = "RelayError";
		this.code = code;
		this.status = status;
		this.origin = origin;
	}
}

/** Invalid or incomplete client configuration. Never retried. */
export class ConfigurationError extends RelayError {
	constructor(init: RelayErrorInit) {
		super({ code: "CONFIGURATION", ...init });
		this.name = "ConfigurationError";
	}
}

/** No source supplied an account id and API key. */
export class MissingCredentialsError extends ConfigurationError {
	constructor(message = "No credentials found") {
		super({
			message:
				`${message}. Pass accountId and apiKey, name a credentials file, ` +
				"or set ACCOUNT_ID and API_KEY.",
			code: "MISSING_CREDENTIALS",
		});
		this.name = "MissingCredentialsError";
	}
}

/** Outgoing request rejected before it reached the network. */
export class ValidationError extends RelayError {
	constructor(init: RelayErrorInit) {
		super({ code: "INVALID_ARGUMENT", status: 400, ...init });
		this.name = "ValidationError";
	}
}

/** Network failure, non-success HTTP status, timeout or caller abort. */
export class TransportError extends RelayError {
	/** URL of the request that failed. */
	public readonly url?: string;

	constructor(init: RelayErrorInit & { url?: string }) {
		const { url, ...rest } = init;
		super(rest);
		this.name = "TransportError";
		this.url = url;
	}
}

/** The service answered with something that is not a valid response. */
export class DecodeError extends RelayError {
	constructor(init: RelayErrorInit) {
		super({ code: "INVALID_RESPONSE", status: 502, ...init });
		this.name = "DecodeError";
	}
}

/** Operation attempted on a session that has been closed. */
export class UseAfterCloseError extends RelayError {
	constructor(operation: string) {
		super({
			message: `Cannot ${operation}: session is closed`,
			code: "SESSION_CLOSED",
		});
		this.name = "UseAfterCloseError";
	}
}

/**
 * Build a {@link TransportError} from a non-success HTTP response.
 *
 * `serverMessage` is the message parsed from the service's error body, if any.
 */
export function makeServerError(
	operation: string,
	url: string,
	status: number,
	serverMessage?: string,
	serverCode?: number,
): TransportError {
	return new TransportError({
		message: serverMessage
			? `${operation} failed. ${serverMessage}`
			: `${operation} failed. Code: ${status}`,
		code: serverCode === undefined ? undefined : String(serverCode),
		status,
		origin: "server",
		url,
	});
}

/**
 * Normalize anything thrown underneath the SDK into a {@link RelayError}.
 */
export function relayError(error: unknown, url?: string): RelayError {
	if (error instanceof RelayError) {
		return error;
	}
	const message = error instanceof Error ? error.message : String(error);
	return new TransportError({
		message: `Request failed: ${message}`,
		code: "NETWORK",
		cause: error,
		url,
	});
}
