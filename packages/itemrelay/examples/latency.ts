/**
 * End-to-end latency: one session keeps setting timestamped items while
 * another streams them back and prints the running mean.
 *
 * The producer reads credentials from `relay_set.env`, the consumer from
 * `relay_get.env`, so the two sides may use different accounts.
 */
import { ItemInput, ItemRelay, RelayError } from "../src/index.js";

const PORTAL = "latency";
const ITEMS = 100;
const INTERVAL_MILLIS = 100;
const SETTLE_MILLIS = 1000;

const wait = (ms: number) =>
	new Promise<void>((resolve) => setTimeout(resolve, ms));

async function produce(done: AbortController): Promise<void> {
	const relay = new ItemRelay({ credentialsFile: "relay_set.env" });
	try {
		await relay.withSession(async (session) => {
			for (let i = 0; i < ITEMS; i++) {
				await session.setItem([
					ItemInput.string({
						portalId: PORTAL,
						payload: String(Date.now()),
					}),
				]);
				await wait(INTERVAL_MILLIS);
			}
		});
		// Give the last items time to arrive.
		await wait(SETTLE_MILLIS);
	} finally {
		done.abort();
	}
}

async function consume(done: AbortSignal): Promise<void> {
	const relay = new ItemRelay({ credentialsFile: "relay_get.env" });
	let mean = 0;
	let count = 0;
	try {
		await relay.withSession(async (session) => {
			// cutoff drops items left over from a previous run
			const items = session.getItem(
				{ portals: [{ portalId: PORTAL }], mode: "stream", cutoff: 500 },
				{ signal: done },
			);
			for await (const item of items) {
				const latency = Date.now() - Number(item.payload);
				count++;
				mean += (latency - mean) / count;
				console.log(
					`#${count}: latency ${latency} ms, mean ${mean.toFixed(1)} ms`,
				);
			}
		});
	} catch (error) {
		if (error instanceof RelayError && error.code === "ABORTED") {
			return;
		}
		throw error;
	}
}

const done = new AbortController();
await Promise.all([produce(done), consume(done.signal)]);
