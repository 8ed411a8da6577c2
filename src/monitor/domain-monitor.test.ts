import { describe, expect, it, vi } from "vitest";
import { domainRows } from "../domain/stats.js";
import { DomainStatus, Verdict } from "../domain/types.js";
import { silentLogger } from "../lib/logger/index.js";
import { formatAvailabilityAlert, formatStatusReport } from "../notify/format.js";
import type { NotificationSink } from "../notify/types.js";
import type { DomainAvailabilityProbe } from "../probe/types.js";
import { FakeClock } from "../shared/time.js";
import { MemoryStateStore } from "../store/memory-state-store.js";
import {
	AlertOutcome,
	type CycleSummary,
	DomainMonitor,
	type MonitorSettings,
} from "./domain-monitor.js";
import { MonitorPhase } from "./phase-machine.js";

const T0 = 1_700_000_000_000;
const ALERTS = "-100alerts";
const REPORTS = "-100reports";

type Answer = Verdict | Error;

/** Answers from a table; unknown domains are Unavailable. */
function fakeProber(answers: Record<string, Answer>, delayMs = 0) {
	const calls: string[] = [];
	let inFlight = 0;
	let maxInFlight = 0;
	const prober: DomainAvailabilityProbe = {
		async probe(domain: string): Promise<Verdict> {
			calls.push(domain);
			inFlight++;
			maxInFlight = Math.max(maxInFlight, inFlight);
			try {
				if (delayMs > 0) await new Promise((resolve) => setTimeout(resolve, delayMs));
				const answer = answers[domain] ?? Verdict.Unavailable;
				if (answer instanceof Error) throw answer;
				return answer;
			} finally {
				inFlight--;
			}
		},
	};
	return { prober, calls, maxInFlight: () => maxInFlight };
}

function recordingSink(
	results: boolean[] = [],
): NotificationSink & { sent: Array<[string, string]> } {
	const sent: Array<[string, string]> = [];
	return {
		sent,
		async send(text: string, channelId: string): Promise<boolean> {
			sent.push([channelId, text]);
			return results.shift() ?? true;
		},
	};
}

async function createMonitor(options: {
	domains: string[];
	answers?: Record<string, Answer>;
	sink?: ReturnType<typeof recordingSink>;
	settings?: Partial<MonitorSettings>;
	delayMs?: number;
	store?: MemoryStateStore;
}) {
	const clock = new FakeClock(T0);
	const store = options.store ?? new MemoryStateStore({ clock, logger: silentLogger() });
	for (const domain of options.domains) {
		await store.addDomain(domain);
	}
	const probe = fakeProber(options.answers ?? {}, options.delayMs);
	const sink = options.sink ?? recordingSink();
	const settings: MonitorSettings = {
		checkIntervalMs: 1,
		reportEveryCycles: 100,
		maxConcurrentProbes: 4,
		alertChannelId: ALERTS,
		reportChannelId: REPORTS,
		...options.settings,
	};
	const monitor = new DomainMonitor({
		store,
		prober: probe.prober,
		sink,
		settings,
		clock,
		logger: silentLogger(),
	});
	return { monitor, store, sink, probe, clock, settings };
}

describe("DomainMonitor.runCycle", () => {
	it("alerts once for a newly available domain", async () => {
		const { monitor, store, sink } = await createMonitor({
			domains: ["a.com", "b.com"],
			answers: { "a.com": Verdict.Available },
		});

		const summary = await monitor.runCycle();

		expect(summary).toEqual({
			cycle: 1,
			checked: 2,
			available: 1,
			alertsSent: 1,
			alertsFailed: 0,
			errors: 0,
			reportDelivered: null,
			durationMs: 0,
		});
		expect(sink.sent).toEqual([[ALERTS, formatAvailabilityAlert("a.com", T0)]]);
		expect(store.snapshot().domains["a.com"]).toEqual({
			status: DomainStatus.Available,
			lastCheckedAt: T0,
			lastStatusChangeAt: T0,
			firstAvailableAt: T0,
			notificationSent: true,
		});
		expect(store.snapshot().domains["b.com"]?.status).toBe(DomainStatus.Unavailable);
	});

	it("stops probing a domain once it has been alerted", async () => {
		const { monitor, probe, sink } = await createMonitor({
			domains: ["a.com", "b.com"],
			answers: { "a.com": Verdict.Available },
		});

		await monitor.runCycle();
		const second = await monitor.runCycle();

		expect(second.cycle).toBe(2);
		expect(probe.calls.filter((d) => d === "a.com")).toHaveLength(1);
		expect(probe.calls.filter((d) => d === "b.com")).toHaveLength(2);
		expect(sink.sent).toHaveLength(1);
	});

	it("re-opens the gate when the alert is not delivered", async () => {
		const sink = recordingSink([false]);
		const { monitor, store } = await createMonitor({
			domains: ["a.com"],
			answers: { "a.com": Verdict.Available },
			sink,
		});

		const first = await monitor.runCycle();

		expect(first.alertsFailed).toBe(1);
		expect(store.snapshot().domains["a.com"]?.notificationSent).toBe(false);
		expect(store.snapshot().domains["a.com"]?.status).toBe(DomainStatus.Available);

		const second = await monitor.runCycle();

		expect(second.alertsSent).toBe(1);
		expect(sink.sent).toHaveLength(2);
		expect(store.snapshot().domains["a.com"]?.notificationSent).toBe(true);
	});

	it("sends the status report on every Nth cycle", async () => {
		const { monitor, store, sink } = await createMonitor({
			domains: ["b.com"],
			settings: { reportEveryCycles: 2 },
		});

		const first = await monitor.runCycle();
		const second = await monitor.runCycle();

		expect(first.reportDelivered).toBeNull();
		expect(second.reportDelivered).toBe(true);
		expect(sink.sent).toEqual([
			[
				REPORTS,
				formatStatusReport({
					cycle: 2,
					at: T0,
					stats: store.stats(),
					rows: domainRows(store.snapshot()),
					reportEveryCycles: 2,
				}),
			],
		]);
	});

	it("keeps at most maxConcurrentProbes probes in flight", async () => {
		const { monitor, probe } = await createMonitor({
			domains: ["a.com", "b.com", "c.com", "d.com", "e.com"],
			settings: { maxConcurrentProbes: 2 },
			delayMs: 5,
		});

		const summary = await monitor.runCycle();

		expect(summary.checked).toBe(5);
		expect(probe.maxInFlight()).toBe(2);
	});

	it("counts a failing domain without aborting the cycle", async () => {
		const { monitor, store } = await createMonitor({
			domains: ["a.com", "broken.com"],
			answers: { "a.com": Verdict.Available, "broken.com": new Error("boom") },
		});

		const summary = await monitor.runCycle();

		expect(summary.errors).toBe(1);
		expect(summary.checked).toBe(1);
		expect(summary.alertsSent).toBe(1);
		expect(store.snapshot().domains["broken.com"]?.status).toBe(DomainStatus.Unknown);
	});

	it("still alerts when the store cannot save", async () => {
		const { monitor, store, sink } = await createMonitor({
			domains: ["a.com"],
			answers: { "a.com": Verdict.Available },
		});
		store.setWriteFailure(true);

		const summary = await monitor.runCycle();

		expect(summary.alertsSent).toBe(1);
		expect(sink.sent).toHaveLength(1);
		expect(store.snapshot().totalChecks).toBe(1);
	});

	it("emits cycle and domain events", async () => {
		const { monitor } = await createMonitor({
			domains: ["a.com"],
			answers: { "a.com": Verdict.Available },
		});
		const started = vi.fn();
		const checked = vi.fn();
		const available = vi.fn();
		const completed = vi.fn();
		monitor
			.on("cycle_started", started)
			.on("domain_checked", checked)
			.on("domain_available", available)
			.on("cycle_completed", completed);

		const summary = await monitor.runCycle();

		expect(started).toHaveBeenCalledWith(1, 1);
		expect(checked).toHaveBeenCalledWith({
			domain: "a.com",
			verdict: Verdict.Available,
			alert: AlertOutcome.Sent,
		});
		expect(available).toHaveBeenCalledWith("a.com");
		expect(completed).toHaveBeenCalledWith(summary);
	});

	it("ends a cycle Sleeping and wakes for the next", async () => {
		const { monitor } = await createMonitor({ domains: [] });

		await monitor.runCycle();
		expect(monitor.phase().phase).toBe(MonitorPhase.Sleeping);

		const summary = await monitor.runCycle();
		expect(summary.cycle).toBe(2);
		expect(summary.checked).toBe(0);
	});
});

class FlakyStore extends MemoryStateStore {
	failures = 1;

	override domainsToCheck(): string[] {
		if (this.failures > 0) {
			this.failures--;
			throw new Error("selection failed");
		}
		return super.domainsToCheck();
	}
}

describe("DomainMonitor cycle failures", () => {
	it("moves to Sleeping with the reason and recovers next cycle", async () => {
		const store = new FlakyStore({ clock: new FakeClock(T0), logger: silentLogger() });
		const { monitor } = await createMonitor({ domains: ["a.com"], store });

		await expect(monitor.runCycle()).rejects.toThrow("selection failed");
		expect(monitor.phase()).toMatchObject({
			phase: MonitorPhase.Sleeping,
			metadata: { type: "failed", reason: "selection failed" },
		});

		const summary = await monitor.runCycle();
		expect(summary).toMatchObject({ cycle: 2, checked: 1 });
	});
});

describe("DomainMonitor.run", () => {
	it("loops until the signal aborts, then stops", async () => {
		const { monitor, store } = await createMonitor({ domains: ["a.com"] });
		const controller = new AbortController();
		const summaries: CycleSummary[] = [];
		monitor.on("cycle_completed", (summary) => {
			summaries.push(summary);
			if (summaries.length === 3) controller.abort();
		});

		await monitor.run(controller.signal);

		expect(summaries.map((s) => s.cycle)).toEqual([1, 2, 3]);
		expect(store.snapshot().totalChecks).toBe(3);
		expect(monitor.phase().phase).toBe(MonitorPhase.Stopped);
		await expect(monitor.run(new AbortController().signal)).rejects.toThrow(
			"Monitor already stopped",
		);
	});

	it("survives a failing cycle", async () => {
		const store = new FlakyStore({ clock: new FakeClock(T0), logger: silentLogger() });
		const { monitor } = await createMonitor({ domains: ["a.com"], store });
		const controller = new AbortController();
		const failed = vi.fn();
		monitor.on("cycle_failed", failed);
		monitor.on("cycle_completed", () => controller.abort());

		await monitor.run(controller.signal);

		expect(failed).toHaveBeenCalledTimes(1);
		expect(store.snapshot().totalChecks).toBe(2);
	});
});
