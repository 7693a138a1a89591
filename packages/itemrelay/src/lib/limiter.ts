/**
 * Counting semaphore handing out permits in FIFO order.
 *
 * With one permit it is a single-flight queue.
 */
export class Limiter {
	private available: number;
	private readonly waiters: Array<() => void> = [];

	constructor(public readonly permits: number) {
		if (!Number.isInteger(permits) || permits < 1) {
			throw new RangeError(`Limiter needs at least one permit (got ${permits})`);
		}
		this.available = permits;
	}

	/**
	 * Wait for a permit. The returned function gives it back; calling it more
	 * than once has no further effect.
	 *
	 * Rejects with `signal.reason` if `signal` aborts while waiting.
	 */
	async acquire(signal?: AbortSignal): Promise<() => void> {
		signal?.throwIfAborted();
		if (this.available > 0) {
			this.available--;
		} else {
			await new Promise<void>((resolve, reject) => {
				const waiter = () => {
					signal?.removeEventListener("abort", onAbort);
					resolve();
				};
				const onAbort = () => {
					const index = this.waiters.indexOf(waiter);
					if (index !== -1) {
						this.waiters.splice(index, 1);
					}
					reject(signal?.reason);
				};
				signal?.addEventListener("abort", onAbort, { once: true });
				this.waiters.push(waiter);
			});
		}
		let released = false;
		return () => {
			if (released) return;
			released = true;
			const next = this.waiters.shift();
			if (next) {
				// Hand the permit straight to the next waiter.
				next();
			} else {
				this.available++;
			}
		};
	}

	/** Permits currently held. */
	inUse(): number {
		return this.permits - this.available;
	}

	/** Tasks waiting for a permit. */
	pending(): number {
		return this.waiters.length;
	}
}
