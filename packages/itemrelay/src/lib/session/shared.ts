import createDebug from "debug";
import type { RequestOptions } from "../../common.js";
import {
	makeServerError,
	RelayError,
	relayError,
	TransportError,
	UseAfterCloseError,
} from "../../error.js";
import { decodeErrorBody } from "../codec.js";
import type { Limiter } from "../limiter.js";
import { type LinkedSignal, linkSignals } from "../signal.js";
import type { SessionConfig } from "./types.js";

const debug = createDebug("itemrelay:session");

export const DEFAULT_USER_AGENT = "itemrelay-typescript/0.1.0";

/**
 * Cancellation and timeout bookkeeping for one round trip.
 *
 * The signal aborts when the session closes, when the caller's signal aborts,
 * or when the timeout fires. The timeout only runs between `arm()` and
 * `disarm()`, so time spent by the consumer between reads does not count.
 */
export class RequestScope {
	private readonly timeoutController = new AbortController();
	private readonly linked: LinkedSignal;
	private timer: ReturnType<typeof setTimeout> | undefined;
	private timedOut = false;

	constructor(
		private readonly operation: string,
		private readonly url: string,
		private readonly timeoutMillis: number,
		private readonly sessionSignal: AbortSignal,
		private readonly callerSignal?: AbortSignal,
	) {
		this.linked = linkSignals([
			sessionSignal,
			callerSignal,
			this.timeoutController.signal,
		]);
	}

	get signal(): AbortSignal {
		return this.linked.signal;
	}

	arm(): void {
		this.disarm();
		this.timer = setTimeout(() => {
			this.timedOut = true;
			this.timeoutController.abort();
		}, this.timeoutMillis);
	}

	disarm(): void {
		if (this.timer !== undefined) {
			clearTimeout(this.timer);
			this.timer = undefined;
		}
	}

	dispose(): void {
		this.disarm();
		this.linked.dispose();
	}

	/**
	 * Translate whatever a round trip threw into the SDK's error taxonomy.
	 */
	toError(error: unknown): RelayError {
		if (error instanceof RelayError) {
			return error;
		}
		if (this.sessionSignal.aborted) {
			return new UseAfterCloseError(this.operation.toLowerCase());
		}
		if (this.timedOut) {
			return new TransportError({
				message: `${this.operation} failed. No response within ${this.timeoutMillis}ms`,
				code: "TIMEOUT",
				status: 408,
				cause: error,
				url: this.url,
			});
		}
		if (this.callerSignal?.aborted) {
			return new TransportError({
				message: `${this.operation} aborted`,
				code: "ABORTED",
				cause: this.callerSignal.reason,
				url: this.url,
			});
		}
		return relayError(error, this.url);
	}
}

/**
 * Translate an error that ended a get sequence. Once the session is closed
 * every failure reads as `UseAfterCloseError`; a caller abort that surfaced
 * outside a round trip (e.g. during a backoff sleep) becomes `ABORTED`.
 */
export function pollError(
	error: unknown,
	closed: boolean,
	url: string,
	options?: RequestOptions,
): RelayError {
	if (closed) {
		return error instanceof UseAfterCloseError
			? error
			: new UseAfterCloseError("get item");
	}
	if (error instanceof RelayError) {
		return error;
	}
	if (options?.signal?.aborted) {
		return new TransportError({
			message: "Get item aborted",
			code: "ABORTED",
			cause: options.signal.reason,
			url,
		});
	}
	return relayError(error, url);
}

/**
 * POST a JSON body and return the response if its status is 200.
 *
 * @throws {TransportError} For any other status; 400 and 401 carry the service's message.
 */
export async function post(
	config: SessionConfig,
	operation: string,
	url: string,
	body: string,
	signal: AbortSignal,
	cookie?: string,
): Promise<Response> {
	const headers: Record<string, string> = {
		"content-type": "application/json",
		accept: "application/json",
		"user-agent": DEFAULT_USER_AGENT,
	};
	if (cookie) {
		headers.cookie = cookie;
	}
	debug("%s POST %s (%d bytes)", operation, url, body.length);
	const response = await config.fetch(url, {
		method: "POST",
		headers,
		body,
		signal,
	});
	if (response.status === 200) {
		return response;
	}

	debug("%s failed: status=%d", operation, response.status);
	if (response.status === 400 || response.status === 401) {
		const { message, code } = decodeErrorBody(await response.text());
		throw makeServerError(operation, url, response.status, message, code);
	}
	await response.body?.cancel();
	throw makeServerError(operation, url, response.status);
}

/**
 * Run one buffered round trip under `limiter`: wait for a slot, POST, read the
 * whole body and hand it to `read`. The slot is released before returning.
 */
export async function exchange<T>(
	config: SessionConfig,
	limiter: Limiter,
	scope: RequestScope,
	request: { operation: string; url: string; body: string; cookie?: string },
	read: (text: string, response: Response) => T,
): Promise<T> {
	try {
		const release = await limiter.acquire(scope.signal);
		try {
			scope.arm();
			const response = await post(
				config,
				request.operation,
				request.url,
				request.body,
				scope.signal,
				request.cookie,
			);
			const text = await response.text();
			scope.disarm();
			return read(text, response);
		} finally {
			release();
		}
	} catch (error) {
		throw scope.toError(error);
	} finally {
		scope.dispose();
	}
}

/**
 * `cookie` header value replaying the cookies set by a response, if any.
 */
export function cookieFrom(response: Response): string | undefined {
	const cookies = response.headers
		.getSetCookie()
		.map((cookie) => cookie.split(";")[0]?.trim())
		.filter((pair): pair is string => !!pair);
	return cookies.length > 0 ? cookies.join("; ") : undefined;
}
