import createDebug from "debug";
import type { GetMode, Item } from "../types.js";
import { Backoff, sleep } from "./sleep.js";

const debug = createDebug("itemrelay:poller");

/**
 * One get round: a single request producing one batch per response document,
 * each as soon as it has been received. Implemented by the session variants.
 */
export type PollRound = () => AsyncIterable<ReadonlyArray<Item>>;

export interface PollerConfig {
	readonly minDelayMillis: number;
	readonly maxDelayMillis: number;
	/** Milliseconds since the Unix epoch; read once per received batch. */
	readonly clock: () => number;
}

/**
 * `true` unless the item is more than `cutoff` milliseconds old at `now`.
 * An item exactly `cutoff` milliseconds old is kept.
 */
export function isFresh(item: Item, now: number, cutoff?: number): boolean {
	if (cutoff === undefined) {
		return true;
	}
	return now - item.serverTimestamp <= cutoff;
}

/**
 * Drive get rounds according to `mode` and yield the fresh items of each
 * round, in response order.
 *
 * - `probe`: one round.
 * - `watch`: rounds until one yields at least one fresh item, then stops
 *   after that round. Rounds whose items are all stale count as empty.
 * - `stream`: rounds forever; only the consumer ends the sequence.
 *
 * Each pull issues at most one round. Nothing is fetched ahead of the consumer.
 * Empty rounds are followed by a backoff sleep that aborts with `signal`.
 * An error from a round is thrown at the pull that hit it and ends the sequence.
 */
export async function* pollItems(
	round: PollRound,
	options: { readonly mode: GetMode; readonly cutoff?: number },
	config: PollerConfig,
	signal?: AbortSignal,
): AsyncGenerator<Item, void, undefined> {
	const { mode, cutoff } = options;
	const backoff = new Backoff(config.minDelayMillis, config.maxDelayMillis);
	let rounds = 0;

	while (true) {
		rounds++;
		let delivered = 0;
		let discarded = 0;
		for await (const batch of round()) {
			// Age is measured on arrival, not when the consumer pulls.
			const now = config.clock();
			const fresh = batch.filter((item) => isFresh(item, now, cutoff));
			discarded += batch.length - fresh.length;
			delivered += fresh.length;
			yield* fresh;
		}
		debug(
			"%s round %d: delivered=%d discarded=%d",
			mode,
			rounds,
			delivered,
			discarded,
		);

		if (mode === "probe") {
			return;
		}
		if (delivered > 0) {
			if (mode === "watch") {
				return;
			}
			backoff.reset();
			continue;
		}

		const delay = backoff.next();
		debug("%s round %d empty, sleeping %dms", mode, rounds, delay);
		await sleep(delay, signal);
	}
}
