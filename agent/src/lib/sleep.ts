/**
 * Sleep that can be cut short by an AbortSignal.
 *
 * Resolves `true` when the full delay elapsed, `false` when aborted.
 * Never rejects, callers check their own stop flags.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
	return new Promise((resolve) => {
		if (signal?.aborted) {
			resolve(false);
			return;
		}

		const onAbort = () => {
			clearTimeout(timer);
			resolve(false);
		};

		const timer = setTimeout(() => {
			signal?.removeEventListener('abort', onAbort);
			resolve(true);
		}, ms);

		signal?.addEventListener('abort', onAbort, { once: true });
	});
}

export type SleepFn = typeof sleep;
