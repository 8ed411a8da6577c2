/**
 * MonitorPhaseMachine — validated phase FSM for one monitoring cycle.
 *
 * Idle -> Selecting -> Checking -> Reporting -> Sleeping -> Idle, with a
 * `fail` edge from any in-cycle phase to Sleeping and a terminal Stopped.
 * History is bounded (last N transitions) for debugging.
 */

import { type Result, err, ok } from "../shared/result.js";
import { type Clock, SystemClock } from "../shared/time.js";

export const MonitorPhase = {
	Idle: "idle",
	Selecting: "selecting",
	Checking: "checking",
	Reporting: "reporting",
	Sleeping: "sleeping",
	Stopped: "stopped",
} as const;

export type MonitorPhase = (typeof MonitorPhase)[keyof typeof MonitorPhase];

export type PhaseTransition =
	| { readonly type: "begin_cycle"; readonly cycle: number }
	| { readonly type: "domains_selected"; readonly count: number }
	| { readonly type: "checks_done" }
	| { readonly type: "report_done" }
	| { readonly type: "wake" }
	| { readonly type: "fail"; readonly reason: string }
	| { readonly type: "stop" };

export type PhaseMetadata =
	| { readonly type: "none" }
	| { readonly type: "cycle"; readonly cycle: number }
	| { readonly type: "checking"; readonly cycle: number; readonly domains: number }
	| { readonly type: "failed"; readonly reason: string };

export interface PhaseSnapshot {
	readonly phase: MonitorPhase;
	readonly enteredAt: number;
	readonly metadata: PhaseMetadata;
}

export interface PhaseHistoryEntry {
	readonly from: MonitorPhase;
	readonly to: MonitorPhase;
	readonly transition: PhaseTransition["type"];
	readonly timestamp: number;
}

export const PhaseErrorKind = {
	InvalidTransition: "invalid_transition",
	AlreadyStopped: "already_stopped",
} as const;

export type PhaseErrorKind = (typeof PhaseErrorKind)[keyof typeof PhaseErrorKind];

export interface PhaseError {
	readonly kind: PhaseErrorKind;
	readonly message: string;
	readonly from: MonitorPhase;
	readonly transition: PhaseTransition["type"];
}

const MAX_HISTORY = 100;

const IN_CYCLE: ReadonlySet<MonitorPhase> = new Set<MonitorPhase>([
	MonitorPhase.Selecting,
	MonitorPhase.Checking,
	MonitorPhase.Reporting,
]);

export class MonitorPhaseMachine {
	private current: MonitorPhase = MonitorPhase.Idle;
	private currentEnteredAt: number;
	private currentMetadata: PhaseMetadata = { type: "none" };
	private readonly transitions: PhaseHistoryEntry[] = [];
	private readonly clock: Clock;

	constructor(clock: Clock = SystemClock) {
		this.clock = clock;
		this.currentEnteredAt = clock.now();
	}

	// ── Queries ────────────────────────────────────────────────────

	phase(): MonitorPhase {
		return this.current;
	}

	snapshot(): PhaseSnapshot {
		return { phase: this.current, enteredAt: this.currentEnteredAt, metadata: this.currentMetadata };
	}

	/** Time spent in the current phase (ms) */
	timeInPhase(): number {
		return this.clock.now() - this.currentEnteredAt;
	}

	/** Bounded transition history (most recent last) */
	history(): readonly PhaseHistoryEntry[] {
		return this.transitions;
	}

	// ── Transitions ────────────────────────────────────────────────

	transition(t: PhaseTransition): Result<MonitorPhase, PhaseError> {
		const from = this.current;

		if (from === MonitorPhase.Stopped) {
			return err({
				kind: PhaseErrorKind.AlreadyStopped,
				message: "Monitor already stopped",
				from,
				transition: t.type,
			});
		}

		const result = this.validateTransition(from, t);
		if (!result.ok) return result;

		const { phase, metadata } = result.value;
		this.recordTransition(from, phase, t.type);
		this.current = phase;
		this.currentEnteredAt = this.clock.now();
		this.currentMetadata = metadata;
		return ok(phase);
	}

	// ── Validation ─────────────────────────────────────────────────

	private validateTransition(
		from: MonitorPhase,
		t: PhaseTransition,
	): Result<{ phase: MonitorPhase; metadata: PhaseMetadata }, PhaseError> {
		switch (t.type) {
			case "begin_cycle":
				if (from === MonitorPhase.Idle) {
					return ok({ phase: MonitorPhase.Selecting, metadata: { type: "cycle", cycle: t.cycle } });
				}
				break;

			case "domains_selected":
				if (from === MonitorPhase.Selecting) {
					const cycle = this.currentMetadata.type === "cycle" ? this.currentMetadata.cycle : 0;
					return ok({
						phase: MonitorPhase.Checking,
						metadata: { type: "checking", cycle, domains: t.count },
					});
				}
				break;

			case "checks_done":
				if (from === MonitorPhase.Checking) {
					return ok({ phase: MonitorPhase.Reporting, metadata: { type: "none" } });
				}
				break;

			case "report_done":
				if (from === MonitorPhase.Reporting) {
					return ok({ phase: MonitorPhase.Sleeping, metadata: { type: "none" } });
				}
				break;

			case "wake":
				if (from === MonitorPhase.Sleeping) {
					return ok({ phase: MonitorPhase.Idle, metadata: { type: "none" } });
				}
				break;

			case "fail":
				if (IN_CYCLE.has(from)) {
					return ok({ phase: MonitorPhase.Sleeping, metadata: { type: "failed", reason: t.reason } });
				}
				break;

			case "stop":
				return ok({ phase: MonitorPhase.Stopped, metadata: { type: "none" } });
		}

		return err({
			kind: PhaseErrorKind.InvalidTransition,
			message: `Cannot transition from ${from} via ${t.type}`,
			from,
			transition: t.type,
		});
	}

	private recordTransition(
		from: MonitorPhase,
		to: MonitorPhase,
		transition: PhaseTransition["type"],
	): void {
		if (this.transitions.length >= MAX_HISTORY) {
			this.transitions.shift();
		}
		this.transitions.push({ from, to, transition, timestamp: this.clock.now() });
	}
}
