import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { ItemRelayOptions } from "../common.js";
import {
	DecodeError,
	TransportError,
	UseAfterCloseError,
	ValidationError,
} from "../error.js";
import { ItemInput } from "../index.js";
import { sleep } from "../lib/sleep.js";
import type { ItemSession } from "../lib/session/types.js";
import { ItemRelay } from "../relay.js";
import {
	collect,
	FakeItemService,
	json,
	take,
	TEST_ENDPOINTS,
} from "./fake-service.js";

const T = 1_700_000_000_000;

const makeRelay = (
	service: FakeItemService,
	overrides: ItemRelayOptions = {},
) =>
	new ItemRelay({
		accountId: "acct",
		apiKey: "test-secret",
		env: {},
		endpoints: TEST_ENDPOINTS,
		fetch: service.fetch,
		poll: { minDelayMillis: 5, maxDelayMillis: 20 },
		...overrides,
	});

const lobby = [{ portalId: "lobby" }];

const errorOf = (promise: Promise<unknown>): Promise<unknown> =>
	promise.then(
		() => {
			throw new Error("expected promise to reject");
		},
		(error: unknown) => error,
	);

describe.each(["serial", "concurrent"] as const)("%s session", (kind) => {
	let service: FakeItemService;
	let relay: ItemRelay;
	let session: ItemSession;

	beforeEach(async () => {
		service = new FakeItemService(() => T);
		service.loginTimestamp = 1234;
		relay = makeRelay(service);
		session = await relay.openSession({ kind });
	});

	afterEach(async () => {
		await session.close();
	});

	it("logs in with the account credentials", () => {
		expect(session.kind).toBe(kind);
		expect(session.loginTime).toBe(1234);
		expect(service.requests[0]).toEqual({
			route: "login",
			body: { accountid: "acct", apikey: "test-secret" },
			headers: {
				accept: "application/json",
				"content-type": "application/json",
				"user-agent": "itemrelay-typescript/0.1.0",
			},
		});
	});

	it("returns what was set through a probe", async () => {
		await session.setItem([
			ItemInput.string({ portalId: "lobby", payload: "first" }),
			ItemInput.string({ portalId: "lobby", payload: "second" }),
		]);

		const items = await collect(session.getItem({ portals: lobby }));

		expect(items).toEqual([
			{ portalId: "lobby", payload: "first", serverTimestamp: T },
			{ portalId: "lobby", payload: "second", serverTimestamp: T },
		]);
		expect(service.requests.at(-1)?.body).toEqual({
			portals: [{ portalid: "lobby" }],
			mode: "probe",
		});
		expect(service.pending("lobby")).toBe(0);
	});

	it("returns an empty sequence for an empty portal", async () => {
		expect(await collect(session.getItem({ portals: lobby }))).toEqual([]);
		expect(service.count("get")).toBe(1);
	});

	it("discards items older than the cutoff", async () => {
		service.seed("lobby", "old", T - 1000);
		service.seed("lobby", "new", T - 100);
		const clocked = await makeRelay(service, { clock: () => T }).openSession({
			kind,
		});
		try {
			const items = await collect(
				clocked.getItem({ portals: lobby, cutoff: 500 }),
			);
			expect(items.map((item) => item.payload)).toEqual(["new"]);
			expect(service.pending("lobby")).toBe(0);
		} finally {
			await clocked.close();
		}
	});

	it("watch re-polls until another session sets an item", async () => {
		const producer = await relay.openSession({ kind });
		try {
			const events: string[] = [];
			const consumer = collect(
				session.getItem({ portals: lobby, mode: "watch" }),
			).then((items) => {
				events.push("watch finished");
				return items;
			});
			await sleep(30);
			expect(events).toEqual([]);

			events.push("set issued");
			await producer.setItem([
				ItemInput.string({ portalId: "lobby", payload: "hello" }),
			]);

			expect((await consumer).map((item) => item.payload)).toEqual(["hello"]);
			expect(events).toEqual(["set issued", "watch finished"]);
			expect(service.count("get")).toBeGreaterThan(1);
		} finally {
			await producer.close();
		}
	});

	it("stream issues one round per pull and stops when the consumer does", async () => {
		service.perRoundLimit = 1;
		for (const payload of ["1", "2", "3", "4", "5"]) {
			service.seed("lobby", payload, T);
		}

		const items = await take(
			session.getItem({ portals: lobby, mode: "stream" }),
			3,
		);

		expect(items.map((item) => item.payload)).toEqual(["1", "2", "3"]);
		expect(service.count("get")).toBe(3);
		await sleep(30);
		expect(service.count("get")).toBe(3);
		expect(service.pending("lobby")).toBe(2);
		expect(session.inFlight()).toBe(0);
	});

	it("judges a batch's age when it arrives, not when each item is pulled", async () => {
		let now = T;
		service.seed("lobby", "a", T);
		service.seed("lobby", "b", T);
		const clocked = await makeRelay(service, { clock: () => now }).openSession({
			kind,
		});
		try {
			const iterator = clocked
				.getItem({ portals: lobby, cutoff: 500 })
				[Symbol.asyncIterator]();

			expect((await iterator.next()).value).toMatchObject({ payload: "a" });
			now = T + 600;
			expect((await iterator.next()).value).toMatchObject({ payload: "b" });
			expect(await iterator.next()).toEqual({ done: true, value: undefined });
		} finally {
			await clocked.close();
		}
	});

	it("accepts setItem between pulls of a stream", async () => {
		service.seed("lobby", "a", T);
		const iterator = session
			.getItem({ portals: lobby, mode: "stream" })
			[Symbol.asyncIterator]();

		expect((await iterator.next()).value).toEqual({
			portalId: "lobby",
			payload: "a",
			serverTimestamp: T,
		});
		await session.setItem([
			ItemInput.string({ portalId: "lobby", payload: "b" }),
		]);
		expect((await iterator.next()).value).toEqual({
			portalId: "lobby",
			payload: "b",
			serverTimestamp: T,
		});
		await iterator.return?.();
	});

	it("forwards a FIFO schedule", async () => {
		await collect(session.getItem({ portals: lobby, schedule: "FIFO" }));
		expect(service.requests.at(-1)?.body).toEqual({
			portals: [{ portalid: "lobby" }],
			mode: "probe",
			schedule: "FIFO",
		});
	});

	it("fails every operation after close", async () => {
		const pending = session.getItem({ portals: lobby, mode: "stream" });
		await session.close();
		await session.close();

		expect(session.isClosed()).toBe(true);
		await expect(
			session.setItem([ItemInput.string({ portalId: "lobby", payload: "x" })]),
		).rejects.toThrow(UseAfterCloseError);
		expect(() => session.getItem({ portals: lobby })).toThrow(
			"Cannot get item: session is closed",
		);
		await expect(collect(pending)).rejects.toThrow(UseAfterCloseError);
		expect(service.count("get")).toBe(0);
	});

	it("ends a stream with UseAfterCloseError when closed during backoff", async () => {
		const slow = await makeRelay(service, {
			poll: { minDelayMillis: 10_000, maxDelayMillis: 10_000 },
		}).openSession({ kind });
		const sequence = collect(slow.getItem({ portals: lobby, mode: "stream" }));
		await sleep(20);
		expect(service.count("get")).toBe(1);

		await slow.close();

		await expect(sequence).rejects.toThrow(UseAfterCloseError);
		expect(service.count("get")).toBe(1);
	});

	it("reports the service's message for 401", async () => {
		service.reply(
			"set",
			json(
				{ error: { errorgroup: 1, errorcode: 7, errormessage: "Invalid API key" } },
				401,
			),
		);

		const error = await errorOf(
			session.setItem([ItemInput.string({ portalId: "lobby", payload: "x" })]),
		);

		expect(error).toBeInstanceOf(TransportError);
		expect(error).toMatchObject({
			message: "Set item failed. Invalid API key",
			status: 401,
			code: "7",
			origin: "server",
			url: TEST_ENDPOINTS.setUrl,
		});
	});

	it("reports the status code for other failures", async () => {
		service.reply("set", new Response("oops", { status: 500 }));

		const error = await errorOf(
			session.setItem([ItemInput.string({ portalId: "lobby", payload: "x" })]),
		);

		expect(error).toBeInstanceOf(TransportError);
		expect(error).toMatchObject({
			message: "Set item failed. Code: 500",
			status: 500,
		});
	});

	it("wraps network failures", async () => {
		service.reply("set", new TypeError("fetch failed"));

		const error = await errorOf(
			session.setItem([ItemInput.string({ portalId: "lobby", payload: "x" })]),
		);

		expect(error).toBeInstanceOf(TransportError);
		expect(error).toMatchObject({
			message: "Request failed: fetch failed",
			code: "NETWORK",
		});
	});

	it("surfaces a failed stream round at the next pull", async () => {
		service.reply(
			"get",
			json({
				items: [{ portalid: "lobby", payload: "a", servertimestamp: T }],
			}),
		);
		service.reply("get", new Response("unavailable", { status: 503 }));
		const iterator = session
			.getItem({ portals: lobby, mode: "stream" })
			[Symbol.asyncIterator]();

		expect((await iterator.next()).value).toMatchObject({ payload: "a" });
		await expect(iterator.next()).rejects.toThrow("Get item failed. Code: 503");
		expect(await iterator.next()).toEqual({ done: true, value: undefined });
		expect(session.inFlight()).toBe(0);
	});

	it("rejects a response that is not JSON", async () => {
		service.reply("get", new Response("<html>", { status: 200 }));

		const error = await errorOf(collect(session.getItem({ portals: lobby })));

		expect(error).toBeInstanceOf(DecodeError);
		expect(error).toMatchObject({
			message: "Get item failed. Response is not valid JSON",
		});
	});

	it("times out a request the service never answers", async () => {
		const impatient = await makeRelay(service, {
			requestTimeoutMillis: 20,
		}).openSession({ kind });
		service.reply("set", "hang");
		try {
			const error = await errorOf(
				impatient.setItem([
					ItemInput.string({ portalId: "lobby", payload: "x" }),
				]),
			);
			expect(error).toBeInstanceOf(TransportError);
			expect(error).toMatchObject({
				message: "Set item failed. No response within 20ms",
				code: "TIMEOUT",
				status: 408,
			});
			expect(impatient.inFlight()).toBe(0);
		} finally {
			await impatient.close();
		}
	});

	it("validates input before sending anything", async () => {
		await expect(session.setItem([])).rejects.toThrow(ValidationError);
		expect(() => session.getItem({ portals: [] })).toThrow(ValidationError);
		expect(() =>
			session.getItem({ portals: lobby, cutoff: -1 }),
		).toThrow(ValidationError);
		expect(service.count("set")).toBe(0);
		expect(service.count("get")).toBe(0);
	});

	it("does not send when the caller's signal is already aborted", async () => {
		const controller = new AbortController();
		controller.abort();

		const setError = await errorOf(
			session.setItem([ItemInput.string({ portalId: "lobby", payload: "x" })], {
				signal: controller.signal,
			}),
		);
		const getError = await errorOf(
			collect(session.getItem({ portals: lobby }, { signal: controller.signal })),
		);

		expect(setError).toMatchObject({
			message: "Set item aborted",
			code: "ABORTED",
		});
		expect(getError).toMatchObject({
			message: "Get item aborted",
			code: "ABORTED",
		});
		expect(service.count("set")).toBe(0);
		expect(service.count("get")).toBe(0);
	});

	it("limits the number of requests in flight", async () => {
		service.reply("set", "hang");
		service.reply("set", "hang");
		const controller = new AbortController();
		const options = { signal: controller.signal };
		const item = [ItemInput.string({ portalId: "lobby", payload: "x" })];

		const first = errorOf(session.setItem(item, options));
		const second = errorOf(session.setItem(item, options));
		await sleep(10);

		const expected = kind === "serial" ? 1 : 2;
		expect(session.inFlight()).toBe(expected);
		expect(service.count("set")).toBe(expected);

		controller.abort();
		expect(await first).toMatchObject({ code: "ABORTED" });
		expect(await second).toMatchObject({ code: "ABORTED" });
		expect(session.inFlight()).toBe(0);
	});

	it("delivers every item exactly once across interleaved calls", async () => {
		const payloads = Array.from({ length: 10 }, (_, i) => `item-${i}`);
		await Promise.all(
			payloads.map((payload) =>
				session.setItem([ItemInput.string({ portalId: "lobby", payload })]),
			),
		);

		const batches = await Promise.all(
			[0, 1, 2].map(() => collect(session.getItem({ portals: lobby }))),
		);

		const received = batches.flat().map((item) => item.payload);
		expect(received.sort()).toEqual([...payloads].sort());
		expect(session.inFlight()).toBe(0);
	});
});

describe("openSession", () => {
	it("rejects when login fails", async () => {
		const service = new FakeItemService();
		service.reply(
			"login",
			json(
				{ error: { errorgroup: 1, errorcode: 3, errormessage: "Unknown account" } },
				401,
			),
		);

		const error = await errorOf(makeRelay(service).openSession());

		expect(error).toBeInstanceOf(TransportError);
		expect(error).toMatchObject({
			message: "Login failed. Unknown account",
			status: 401,
		});
	});

	it("opens a concurrent session by default", async () => {
		const service = new FakeItemService();
		const session = await makeRelay(service).openSession();
		expect(session.kind).toBe("concurrent");
		await session.close();
	});
});

describe("concurrent session", () => {
	it("decodes a response of several documents, one per line", async () => {
		const service = new FakeItemService();
		const session = await makeRelay(service).openSession({
			kind: "concurrent",
		});
		service.reply(
			"get",
			new Response(
				[
					JSON.stringify({
						items: [{ portalid: "lobby", payload: "1", servertimestamp: 1 }],
					}),
					"",
					JSON.stringify({
						items: [{ portalid: "lobby", payload: "2", servertimestamp: 2 }],
					}),
					"",
				].join("\r\n"),
			),
		);

		const items = await collect(session.getItem({ portals: lobby }));

		expect(items.map((item) => item.payload)).toEqual(["1", "2"]);
		await session.close();
	});

	it("rejects a response line above the size limit", async () => {
		const service = new FakeItemService();
		const session = await makeRelay(service, {
			maxSerializedBytes: 64,
		}).openSession({ kind: "concurrent" });
		service.reply(
			"get",
			json({
				items: [{ portalid: "lobby", payload: "x".repeat(100), servertimestamp: 1 }],
			}),
		);

		await expect(
			collect(session.getItem({ portals: lobby })),
		).rejects.toThrow(DecodeError);
		expect(session.inFlight()).toBe(0);
		await session.close();
	});
});
