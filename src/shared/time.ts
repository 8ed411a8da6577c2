/**
 * Injectable clock and abortable sleep.
 *
 * Domain code reads time through Clock.now() (epoch milliseconds) so tests
 * can pin every timestamp the transition engine writes.
 */

export interface Clock {
	now(): number;
}

export const SystemClock: Clock = {
	now: () => Date.now(),
};

/** Controllable clock for deterministic tests. */
export class FakeClock implements Clock {
	private time: number;

	constructor(startMs = 0) {
		this.time = startMs;
	}

	now(): number {
		return this.time;
	}

	advance(ms: number): void {
		this.time += ms;
	}

	set(ms: number): void {
		this.time = ms;
	}
}

export const Duration = {
	ms: (n: number) => n,
	seconds: (n: number) => n * 1_000,
	minutes: (n: number) => n * 60_000,
	hours: (n: number) => n * 3_600_000,
} as const;

/**
 * Wait `ms` milliseconds. Resolves early, without throwing, when `signal`
 * aborts, so loops can check the signal right after waking.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	if (ms <= 0 || signal?.aborted) return Promise.resolve();
	return new Promise((resolve) => {
		const onAbort = (): void => {
			clearTimeout(timer);
			resolve();
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve();
		}, ms);
		signal?.addEventListener("abort", onAbort, { once: true });
	});
}

/** Epoch ms to ISO-8601, passing null through. */
export function toIsoOrNull(ms: number | null): string | null {
	return ms === null ? null : new Date(ms).toISOString();
}

/** ISO-8601 (or any Date-parsable string) to epoch ms, passing null through. */
export function fromIsoOrNull(iso: string | null): number | null {
	if (iso === null) return null;
	const ms = Date.parse(iso);
	return Number.isNaN(ms) ? null : ms;
}

/** "YYYY-MM-DD HH:MM" in UTC, or the fallback for missing timestamps. */
export function formatTimestamp(ms: number | null, fallback = "Unknown"): string {
	if (ms === null) return fallback;
	return new Date(ms).toISOString().slice(0, 16).replace("T", " ");
}
