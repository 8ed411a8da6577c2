/**
 * DomainMonitor — the monitoring cycle driver.
 *
 * One cycle: bump the persisted cycle counter, select every domain not yet
 * alerted, probe them through a bounded semaphore, feed each verdict to the
 * store as it arrives, alert on a new Available streak, and send a status
 * report every `reportEveryCycles` cycles. `run()` repeats this with a fixed
 * pause until its signal aborts.
 *
 * Nothing in a cycle is allowed to end the loop: a domain that throws is
 * logged and counted, and a cycle that throws is logged and retried after
 * the next pause.
 */

import { domainRows } from "../domain/stats.js";
import { DomainStatus, type Verdict } from "../domain/types.js";
import { Semaphore } from "../lib/concurrency/semaphore.js";
import { TypedEmitter } from "../lib/events/index.js";
import type { Logger } from "../lib/logger/index.js";
import { formatAvailabilityAlert, formatStatusReport } from "../notify/format.js";
import type { NotificationSink } from "../notify/types.js";
import type { DomainAvailabilityProbe } from "../probe/types.js";
import type { WatchConfig } from "../shared/config.js";
import { SystemError, toError } from "../shared/errors.js";
import { type Clock, SystemClock, sleep } from "../shared/time.js";
import type { StateStore } from "../store/state-store.js";
import {
	MonitorPhase,
	MonitorPhaseMachine,
	type PhaseSnapshot,
	type PhaseTransition,
} from "./phase-machine.js";

export type MonitorSettings = Pick<
	WatchConfig,
	| "checkIntervalMs"
	| "reportEveryCycles"
	| "maxConcurrentProbes"
	| "alertChannelId"
	| "reportChannelId"
>;

export const AlertOutcome = {
	None: "none",
	Sent: "sent",
	Failed: "failed",
} as const;

export type AlertOutcome = (typeof AlertOutcome)[keyof typeof AlertOutcome];

export interface DomainCheck {
	readonly domain: string;
	readonly verdict: Verdict;
	readonly alert: AlertOutcome;
}

export interface CycleSummary {
	readonly cycle: number;
	readonly checked: number;
	readonly available: number;
	readonly alertsSent: number;
	readonly alertsFailed: number;
	/** Domains whose check threw */
	readonly errors: number;
	/** null when this cycle was not a report cycle */
	readonly reportDelivered: boolean | null;
	readonly durationMs: number;
}

export type MonitorEvents = {
	cycle_started: (cycle: number, domains: number) => void;
	domain_checked: (check: DomainCheck) => void;
	domain_available: (domain: string) => void;
	notification_failed: (domain: string) => void;
	report_sent: (cycle: number, delivered: boolean) => void;
	cycle_completed: (summary: CycleSummary) => void;
	cycle_failed: (error: Error) => void;
};

export interface DomainMonitorDeps {
	readonly store: StateStore;
	readonly prober: DomainAvailabilityProbe;
	readonly sink: NotificationSink;
	readonly settings: MonitorSettings;
	readonly logger: Logger;
	readonly clock?: Clock;
}

type CheckResult = DomainCheck | { readonly domain: string; readonly error: Error };

export class DomainMonitor extends TypedEmitter<MonitorEvents> {
	private readonly store: StateStore;
	private readonly prober: DomainAvailabilityProbe;
	private readonly sink: NotificationSink;
	private readonly settings: MonitorSettings;
	private readonly clock: Clock;
	private readonly log: Logger;
	private readonly phases: MonitorPhaseMachine;
	private readonly probeSlots: Semaphore;

	constructor(deps: DomainMonitorDeps) {
		super();
		this.store = deps.store;
		this.prober = deps.prober;
		this.sink = deps.sink;
		this.settings = deps.settings;
		this.clock = deps.clock ?? SystemClock;
		this.log = deps.logger.child({ module: "monitor" });
		this.phases = new MonitorPhaseMachine(this.clock);
		this.probeSlots = new Semaphore(deps.settings.maxConcurrentProbes);
	}

	phase(): PhaseSnapshot {
		return this.phases.snapshot();
	}

	async run(signal: AbortSignal): Promise<void> {
		if (this.phases.phase() === MonitorPhase.Stopped) {
			throw new SystemError("Monitor already stopped");
		}
		this.log.info(
			{
				intervalMs: this.settings.checkIntervalMs,
				reportEveryCycles: this.settings.reportEveryCycles,
			},
			"monitor started",
		);

		while (!signal.aborted) {
			try {
				await this.runCycle();
			} catch (error: unknown) {
				const cause = toError(error);
				this.log.error({ err: cause }, "monitoring cycle failed");
				this.emit("cycle_failed", cause);
			}
			await sleep(this.settings.checkIntervalMs, signal);
		}

		this.advance({ type: "stop" });
		this.log.info("monitor stopped");
	}

	/** Run one full cycle. A cycle started while Sleeping cuts the pause short. */
	async runCycle(): Promise<CycleSummary> {
		if (this.phases.phase() === MonitorPhase.Sleeping) {
			this.advance({ type: "wake" });
		}
		const startedAt = this.clock.now();

		const { value: cycle, persisted } = await this.store.beginCycle();
		if (!persisted) {
			this.log.warn({ cycle }, "cycle counter not saved");
		}
		this.advance({ type: "begin_cycle", cycle });

		try {
			const domains = this.store.domainsToCheck();
			this.advance({ type: "domains_selected", count: domains.length });
			this.log.info({ cycle, domains: domains.length }, "cycle started");
			this.emit("cycle_started", cycle, domains.length);

			const results = await Promise.all(
				domains.map((domain) => this.probeSlots.run(() => this.checkDomain(domain))),
			);
			this.advance({ type: "checks_done" });

			const reportDelivered =
				cycle % this.settings.reportEveryCycles === 0 ? await this.sendReport(cycle) : null;
			this.advance({ type: "report_done" });

			const summary = summarize(cycle, results, reportDelivered, this.clock.now() - startedAt);
			this.log.info({ ...summary }, "cycle completed");
			this.emit("cycle_completed", summary);
			return summary;
		} catch (error: unknown) {
			const failed = this.phases.transition({ type: "fail", reason: toError(error).message });
			if (!failed.ok) {
				this.log.warn({ phase: failed.error.from }, failed.error.message);
			}
			throw error;
		}
	}

	private async checkDomain(domain: string): Promise<CheckResult> {
		try {
			const verdict = await this.prober.probe(domain);
			const receipt = await this.store.recordVerdict(domain, verdict);
			if (!receipt.persisted) {
				this.log.warn({ domain }, "verdict applied but not saved");
			}
			if (receipt.changed) {
				this.log.info({ domain, status: verdict }, "status changed");
			} else {
				this.log.debug({ domain, status: verdict }, "status unchanged");
			}

			const alert = receipt.shouldNotify
				? await this.alert(domain, receipt.entry.firstAvailableAt)
				: AlertOutcome.None;
			const check: DomainCheck = { domain, verdict, alert };
			this.emit("domain_checked", check);
			return check;
		} catch (error: unknown) {
			const cause = toError(error);
			this.log.error({ domain, err: cause }, "domain check failed");
			return { domain, error: cause };
		}
	}

	private async alert(domain: string, streakStartedAt: number | null): Promise<AlertOutcome> {
		const text = formatAvailabilityAlert(domain, this.clock.now());
		const delivered = await this.sink.send(text, this.settings.alertChannelId);
		if (delivered) {
			this.log.info({ domain }, "availability alert sent");
			this.emit("domain_available", domain);
			return AlertOutcome.Sent;
		}

		// The gate was closed by recordVerdict; re-open it so the next cycle retries.
		const released = await this.store.releaseNotification(domain, streakStartedAt);
		this.log.warn(
			{ domain, released: released.value, persisted: released.persisted },
			"availability alert not delivered; will retry next cycle",
		);
		this.emit("notification_failed", domain);
		return AlertOutcome.Failed;
	}

	private async sendReport(cycle: number): Promise<boolean> {
		const text = formatStatusReport({
			cycle,
			at: this.clock.now(),
			stats: this.store.stats(),
			rows: domainRows(this.store.snapshot()),
			reportEveryCycles: this.settings.reportEveryCycles,
		});
		const delivered = await this.sink.send(text, this.settings.reportChannelId);
		if (delivered) {
			this.log.info({ cycle }, "status report sent");
		} else {
			this.log.warn({ cycle }, "status report not delivered");
		}
		this.emit("report_sent", cycle, delivered);
		return delivered;
	}

	private advance(t: PhaseTransition): void {
		const result = this.phases.transition(t);
		if (!result.ok) {
			throw new SystemError(result.error.message, {
				kind: result.error.kind,
				from: result.error.from,
				transition: result.error.transition,
			});
		}
	}
}

function summarize(
	cycle: number,
	results: readonly CheckResult[],
	reportDelivered: boolean | null,
	durationMs: number,
): CycleSummary {
	let checked = 0;
	let available = 0;
	let alertsSent = 0;
	let alertsFailed = 0;
	let errors = 0;
	for (const result of results) {
		if ("error" in result) {
			errors++;
			continue;
		}
		checked++;
		if (result.verdict === DomainStatus.Available) available++;
		if (result.alert === AlertOutcome.Sent) alertsSent++;
		if (result.alert === AlertOutcome.Failed) alertsFailed++;
	}
	return { cycle, checked, available, alertsSent, alertsFailed, errors, reportDelivered, durationMs };
}
