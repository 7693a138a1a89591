import createDebug from "debug";
import type { RequestOptions } from "../../../common.js";
import { DecodeError, UseAfterCloseError } from "../../../error.js";
import type { GetItemInput, Item, ItemInput } from "../../../types.js";
import {
	decodeItems,
	decodeLogin,
	encodeGetRequest,
	encodeLogin,
	encodeSetRequest,
	resolveGetInput,
	type ResolvedGetInput,
} from "../../codec.js";
import { Limiter } from "../../limiter.js";
import { splitLines } from "../../lines.js";
import { pollItems } from "../../poller.js";
import { linkSignals } from "../../signal.js";
import {
	cookieFrom,
	exchange,
	pollError,
	post,
	RequestScope,
} from "../shared.js";
import type { ItemSession, SessionConfig } from "../types.js";

const debug = createDebug("itemrelay:session:concurrent");

/**
 * Session that lets several round trips overlap.
 *
 * Up to `maxConcurrentRequests` requests are in flight at once; further calls
 * wait for a slot in FIFO order. Get responses are decoded line by line as they
 * stream in, and every read is a point where other tasks can run. A get round
 * keeps its slot until its body is exhausted or the consumer stops iterating.
 */
export class ConcurrentSession implements ItemSession {
	public readonly kind = "concurrent" as const;
	private readonly limiter: Limiter;
	private readonly closeController = new AbortController();
	private closed = false;
	private cookie: string | undefined;
	private _loginTime = 0;

	/**
	 * Log in and return an open session.
	 *
	 * @throws {TransportError} If login fails.
	 */
	static async open(
		config: SessionConfig,
		options?: RequestOptions,
	): Promise<ConcurrentSession> {
		const session = new ConcurrentSession(config);
		try {
			await session.login(options);
		} catch (error) {
			await session.close();
			throw error;
		}
		return session;
	}

	private constructor(private readonly config: SessionConfig) {
		this.limiter = new Limiter(config.maxConcurrentRequests);
	}

	get loginTime(): number {
		return this._loginTime;
	}

	private async login(options?: RequestOptions): Promise<void> {
		const url = this.config.endpoints.loginUrl;
		const { loginTime, cookie } = await exchange(
			this.config,
			this.limiter,
			this.scope("Login", url, options),
			{ operation: "Login", url, body: encodeLogin(this.config.credentials) },
			(text, response) => ({
				loginTime: decodeLogin(text),
				cookie: cookieFrom(response),
			}),
		);
		this._loginTime = loginTime;
		this.cookie = cookie;
		debug("logged in, server time %d", loginTime);
	}

	async setItem(
		items: ReadonlyArray<ItemInput>,
		options?: RequestOptions,
	): Promise<void> {
		this.ensureOpen("set item");
		const body = encodeSetRequest(items, this.config.maxSerializedBytes);
		const url = this.config.endpoints.setUrl;
		await exchange(
			this.config,
			this.limiter,
			this.scope("Set item", url, options),
			{ operation: "Set item", url, body, cookie: this.cookie },
			() => undefined,
		);
		debug("set %d item(s)", items.length);
	}

	getItem(input: GetItemInput, options?: RequestOptions): AsyncIterable<Item> {
		this.ensureOpen("get item");
		const resolved = resolveGetInput(input);
		const body = encodeGetRequest(resolved, this.config.maxSerializedBytes);
		return this.poll(resolved, body, options);
	}

	private async *poll(
		input: ResolvedGetInput,
		body: string,
		options?: RequestOptions,
	): AsyncGenerator<Item, void, undefined> {
		const linked = linkSignals([this.closeController.signal, options?.signal]);
		try {
			yield* pollItems(
				() => this.round(body, options),
				input,
				this.config.poll,
				linked.signal,
			);
		} catch (error) {
			throw pollError(error, this.closed, this.config.endpoints.getUrl, options);
		} finally {
			linked.dispose();
		}
	}

	/**
	 * One streamed get round. Each document is yielded as soon as its line has
	 * been read; returning early cancels the body and frees the slot.
	 */
	private async *round(
		body: string,
		options?: RequestOptions,
	): AsyncGenerator<ReadonlyArray<Item>, void, undefined> {
		this.ensureOpen("get item");
		const url = this.config.endpoints.getUrl;
		const scope = this.scope("Get item", url, options);
		let release: (() => void) | undefined;
		let cancelBody: (() => Promise<void>) | undefined;
		let drained = false;

		try {
			let response: Response;
			try {
				release = await this.limiter.acquire(scope.signal);
				scope.arm();
				response = await post(
					this.config,
					"Get item",
					url,
					body,
					scope.signal,
					this.cookie,
				);
				scope.disarm();
			} catch (error) {
				throw scope.toError(error);
			}

			if (!response.body) {
				drained = true;
				throw new DecodeError({ message: "Get item failed. Empty response" });
			}
			const bodyReader = response.body.getReader();
			cancelBody = () => bodyReader.cancel();

			const decoder = new TextDecoder();
			const chunks = async function* () {
				while (true) {
					let result: Awaited<ReturnType<typeof bodyReader.read>>;
					scope.arm();
					try {
						result = await bodyReader.read();
					} catch (error) {
						drained = true;
						throw scope.toError(error);
					} finally {
						scope.disarm();
					}
					if (result.done) {
						drained = true;
						const rest = decoder.decode();
						if (rest.length > 0) {
							yield rest;
						}
						return;
					}
					yield decoder.decode(result.value, { stream: true });
				}
			};

			let documents = 0;
			for await (const line of splitLines(
				chunks(),
				this.config.maxSerializedBytes,
			)) {
				if (line.trim().length === 0) {
					continue;
				}
				documents++;
				yield decodeItems(line, this.config.maxSerializedBytes);
			}
			if (documents === 0) {
				throw new DecodeError({ message: "Get item failed. Empty response" });
			}
		} finally {
			// The consumer stopped early or a document failed to decode. An aborted
			// body is already torn down.
			if (cancelBody && !drained && !scope.signal.aborted) {
				await cancelBody();
			}
			release?.();
			scope.dispose();
		}
	}

	async close(): Promise<void> {
		if (this.closed) {
			return;
		}
		this.closed = true;
		debug(
			"closing, %d request(s) in flight, %d waiting",
			this.limiter.inUse(),
			this.limiter.pending(),
		);
		this.closeController.abort();
	}

	isClosed(): boolean {
		return this.closed;
	}

	inFlight(): number {
		return this.limiter.inUse();
	}

	async [Symbol.asyncDispose](): Promise<void> {
		await this.close();
	}

	private scope(
		operation: string,
		url: string,
		options?: RequestOptions,
	): RequestScope {
		return new RequestScope(
			operation,
			url,
			this.config.requestTimeoutMillis,
			this.closeController.signal,
			options?.signal,
		);
	}

	private ensureOpen(operation: string): void {
		if (this.closed) {
			throw new UseAfterCloseError(operation);
		}
	}
}
