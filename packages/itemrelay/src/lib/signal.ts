/**
 * A signal that aborts when any of the given signals aborts.
 * `dispose()` detaches it from its sources.
 */
export interface LinkedSignal {
	readonly signal: AbortSignal;
	dispose(): void;
}

export function linkSignals(
	signals: ReadonlyArray<AbortSignal | undefined>,
): LinkedSignal {
	const controller = new AbortController();
	const cleanups: Array<() => void> = [];
	for (const source of signals) {
		if (!source) continue;
		if (source.aborted) {
			controller.abort(source.reason);
			break;
		}
		const onAbort = () => controller.abort(source.reason);
		source.addEventListener("abort", onAbort, { once: true });
		cleanups.push(() => source.removeEventListener("abort", onAbort));
	}
	return {
		signal: controller.signal,
		dispose: () => {
			for (const cleanup of cleanups.splice(0)) {
				cleanup();
			}
		},
	};
}
