import { describe, expect, it, vi } from "vitest";
import {
	Duration,
	FakeClock,
	SystemClock,
	formatTimestamp,
	fromIsoOrNull,
	sleep,
	toIsoOrNull,
} from "./time.js";

describe("Clock", () => {
	it("SystemClock returns current time", () => {
		const before = Date.now();
		const now = SystemClock.now();
		expect(now).toBeGreaterThanOrEqual(before);
		expect(now).toBeLessThanOrEqual(Date.now());
	});

	it("FakeClock advances and sets", () => {
		const clock = new FakeClock(100);
		clock.advance(50);
		expect(clock.now()).toBe(150);
		clock.set(10);
		expect(clock.now()).toBe(10);
	});

	it("Duration converts units", () => {
		expect(Duration.seconds(2)).toBe(2_000);
		expect(Duration.minutes(1)).toBe(60_000);
		expect(Duration.hours(1)).toBe(3_600_000);
	});
});

describe("sleep", () => {
	it("resolves after the delay", async () => {
		vi.useFakeTimers();
		try {
			let done = false;
			const p = sleep(1000).then(() => {
				done = true;
			});
			await vi.advanceTimersByTimeAsync(999);
			expect(done).toBe(false);
			await vi.advanceTimersByTimeAsync(1);
			await p;
			expect(done).toBe(true);
		} finally {
			vi.useRealTimers();
		}
	});

	it("resolves early when the signal aborts", async () => {
		const controller = new AbortController();
		const p = sleep(60_000, controller.signal);
		controller.abort();
		await expect(p).resolves.toBeUndefined();
	});

	it("resolves immediately for an already aborted signal", async () => {
		await expect(sleep(60_000, AbortSignal.abort())).resolves.toBeUndefined();
	});
});

describe("timestamp helpers", () => {
	it("converts between epoch ms and ISO strings", () => {
		expect(toIsoOrNull(0)).toBe("1970-01-01T00:00:00.000Z");
		expect(fromIsoOrNull("1970-01-01T00:00:01.500Z")).toBe(1500);
		expect(toIsoOrNull(null)).toBeNull();
		expect(fromIsoOrNull(null)).toBeNull();
	});

	it("maps unparsable strings to null", () => {
		expect(fromIsoOrNull("yesterday-ish")).toBeNull();
	});

	it("formats for display in UTC", () => {
		expect(formatTimestamp(Date.UTC(2024, 0, 2, 3, 4, 5))).toBe("2024-01-02 03:04");
		expect(formatTimestamp(null, "Never")).toBe("Never");
	});
});
