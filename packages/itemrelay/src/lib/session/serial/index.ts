import createDebug from "debug";
import type { RequestOptions } from "../../../common.js";
import { UseAfterCloseError } from "../../../error.js";
import type { GetItemInput, Item, ItemInput } from "../../../types.js";
import {
	decodeItemsBody,
	decodeLogin,
	encodeGetRequest,
	encodeLogin,
	encodeSetRequest,
	resolveGetInput,
	type ResolvedGetInput,
} from "../../codec.js";
import { Limiter } from "../../limiter.js";
import { pollItems } from "../../poller.js";
import { linkSignals } from "../../signal.js";
import { cookieFrom, exchange, pollError, RequestScope } from "../shared.js";
import type { ItemSession, SessionConfig } from "../types.js";

const debug = createDebug("itemrelay:session:serial");

/**
 * Session that performs one round trip at a time.
 *
 * Every request (login, set, each get round) goes through a single-flight
 * queue and its response is read whole before the call completes, so each
 * operation occupies the session until its round trip is done. The queue is
 * released before the items of a get round are handed to the consumer, which
 * may therefore call `setItem` between pulls.
 */
export class SerialSession implements ItemSession {
	public readonly kind = "serial" as const;
	private readonly limiter = new Limiter(1);
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
	): Promise<SerialSession> {
		const session = new SerialSession(config);
		try {
			await session.login(options);
		} catch (error) {
			await session.close();
			throw error;
		}
		return session;
	}

	private constructor(private readonly config: SessionConfig) {}

	get loginTime(): number {
		return this._loginTime;
	}

	private async login(options?: RequestOptions): Promise<void> {
		const url = this.config.endpoints.loginUrl;
		const scope = this.scope("Login", url, options);
		const { loginTime, cookie } = await exchange(
			this.config,
			this.limiter,
			scope,
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

	private async *round(
		body: string,
		options?: RequestOptions,
	): AsyncGenerator<ReadonlyArray<Item>, void, undefined> {
		this.ensureOpen("get item");
		const url = this.config.endpoints.getUrl;
		const items = await exchange(
			this.config,
			this.limiter,
			this.scope("Get item", url, options),
			{ operation: "Get item", url, body, cookie: this.cookie },
			(text) => decodeItemsBody(text, this.config.maxSerializedBytes),
		);
		yield items;
	}

	async close(): Promise<void> {
		if (this.closed) {
			return;
		}
		this.closed = true;
		debug("closing, %d request(s) in flight", this.limiter.inUse());
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
