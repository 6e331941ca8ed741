export const DEFAULT_BASE_DELAY_SEC = 120;
export const DEFAULT_PHASE_SEC = 60;

/**
 * Seconds to sleep after a cycle so wake-ups stay on a fixed phase relative
 * to the process start instead of drifting by each cycle's duration:
 *
 *   baseDelaySec - ((nowMs - startMs) / 1000 mod phaseSec)
 *
 * With the defaults a cycle that ends 5 s after start sleeps 115 s.
 */
export function nextDelaySec(
	startMs: number,
	nowMs: number,
	baseDelaySec: number = DEFAULT_BASE_DELAY_SEC,
	phaseSec: number = DEFAULT_PHASE_SEC
): number {
	const elapsedSec = (nowMs - startMs) / 1000;
	return baseDelaySec - (((elapsedSec % phaseSec) + phaseSec) % phaseSec);
}

/**
 * Resolves after `ms`, or as soon as `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise(resolve => {
		if (signal?.aborted) return resolve();

		const timer = setTimeout(done, ms);

		function done(): void {
			clearTimeout(timer);
			signal?.removeEventListener("abort", done);
			resolve();
		}

		signal?.addEventListener("abort", done, { once: true });
	});
}
