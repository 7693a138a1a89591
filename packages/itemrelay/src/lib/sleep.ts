/**
 * Resolve after `ms` milliseconds, or reject with `signal.reason` as soon as
 * `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise((resolve, reject) => {
		if (signal?.aborted) {
			reject(signal.reason);
			return;
		}
		const onAbort = () => {
			clearTimeout(timer);
			reject(signal?.reason);
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve();
		}, ms);
		signal?.addEventListener("abort", onAbort, { once: true });
	});
}

/**
 * Exponential backoff: `min`, `2 * min`, `4 * min`, ... capped at `max`.
 */
export class Backoff {
	private current: number;

	constructor(
		private readonly minDelayMillis: number,
		private readonly maxDelayMillis: number,
	) {
		this.current = minDelayMillis;
	}

	/** Delay to wait now; doubles the next one. */
	next(): number {
		const delay = this.current;
		this.current = Math.min(this.current * 2, this.maxDelayMillis);
		return delay;
	}

	reset(): void {
		this.current = this.minDelayMillis;
	}
}
