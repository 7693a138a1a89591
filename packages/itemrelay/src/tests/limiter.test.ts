import { describe, expect, it } from "vitest";
import { Limiter } from "../lib/limiter.js";

describe("Limiter", () => {
	it("hands out up to `permits` slots at once", async () => {
		const limiter = new Limiter(2);
		const first = await limiter.acquire();
		await limiter.acquire();
		expect(limiter.inUse()).toBe(2);

		let third = false;
		const waiting = limiter.acquire().then((release) => {
			third = true;
			return release;
		});
		await Promise.resolve();
		expect(third).toBe(false);
		expect(limiter.pending()).toBe(1);

		first();
		const release = await waiting;
		expect(third).toBe(true);
		expect(limiter.inUse()).toBe(2);
		expect(limiter.pending()).toBe(0);
		release();
		expect(limiter.inUse()).toBe(1);
	});

	it("serves waiters in arrival order", async () => {
		const limiter = new Limiter(1);
		const release = await limiter.acquire();
		const order: string[] = [];
		const a = limiter.acquire().then((next) => {
			order.push("a");
			next();
		});
		const b = limiter.acquire().then((next) => {
			order.push("b");
			next();
		});
		release();
		await Promise.all([a, b]);
		expect(order).toEqual(["a", "b"]);
		expect(limiter.inUse()).toBe(0);
	});

	it("ignores a second release", async () => {
		const limiter = new Limiter(1);
		const release = await limiter.acquire();
		release();
		release();
		expect(limiter.inUse()).toBe(0);
		await limiter.acquire();
		expect(limiter.inUse()).toBe(1);
	});

	it("stops waiting when the signal aborts", async () => {
		const limiter = new Limiter(1);
		await limiter.acquire();
		const controller = new AbortController();
		const reason = new Error("gave up");
		const waiting = limiter.acquire(controller.signal);
		controller.abort(reason);
		await expect(waiting).rejects.toBe(reason);
		expect(limiter.pending()).toBe(0);
	});

	it("rejects an aborted signal without taking a permit", async () => {
		const limiter = new Limiter(1);
		const controller = new AbortController();
		const reason = new Error("already aborted");
		controller.abort(reason);
		await expect(limiter.acquire(controller.signal)).rejects.toBe(reason);
		expect(limiter.inUse()).toBe(0);
	});

	it("needs at least one permit", () => {
		expect(() => new Limiter(0)).toThrow(RangeError);
	});
});
