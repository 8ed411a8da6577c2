/**
 * Watched-domain model.
 *
 * One DomainEntry per watched domain, keyed by the lower-cased name.
 * Timestamps are epoch milliseconds (null until first set).
 *
 * Invariants held by every mutation in ./transition.ts:
 * - notificationSent implies status === Available
 * - firstAvailableAt is non-null iff the domain has been Available at least
 *   once since it was added
 */

// ── Status ───────────────────────────────────────────────────────────

export const DomainStatus = {
	/** Never probed, or reset by an operator */
	Unknown: "unknown",
	/** Last probe said the name can be registered */
	Available: "available",
	/** Last probe said the name is taken (or could not tell) */
	Unavailable: "unavailable",
} as const;

export type DomainStatus = (typeof DomainStatus)[keyof typeof DomainStatus];

/** What a single probe concluded. Probe failures already collapse to Unavailable. */
export type Verdict = typeof DomainStatus.Available | typeof DomainStatus.Unavailable;

export const Verdict = {
	Available: DomainStatus.Available,
	Unavailable: DomainStatus.Unavailable,
} as const;

// ── Entries ──────────────────────────────────────────────────────────

export interface DomainEntry {
	readonly status: DomainStatus;
	/** Set on every probe, changed or not */
	readonly lastCheckedAt: number | null;
	/** Set only when `status` changes value */
	readonly lastStatusChangeAt: number | null;
	/** Set when a new Available streak starts; never cleared by reset */
	readonly firstAvailableAt: number | null;
	/** Notification gate for the current Available streak */
	readonly notificationSent: boolean;
}

export interface TrackerState {
	readonly domains: Readonly<Record<string, DomainEntry>>;
	/** Monotonic count of monitoring cycles started, persisted at each cycle start */
	readonly totalChecks: number;
	/** Refreshed on every save */
	readonly lastUpdatedAt: number | null;
}

export function createDomainEntry(): DomainEntry {
	return {
		status: DomainStatus.Unknown,
		lastCheckedAt: null,
		lastStatusChangeAt: null,
		firstAvailableAt: null,
		notificationSent: false,
	};
}

export function emptyTrackerState(): TrackerState {
	return { domains: {}, totalChecks: 0, lastUpdatedAt: null };
}

/** Available and already alerted: the monitor leaves these alone until a reset. */
export function isAlerted(entry: DomainEntry): boolean {
	return entry.status === DomainStatus.Available && entry.notificationSent;
}

/** Own-key lookup, so names like `constructor` never hit Object.prototype. */
export function entryFor(state: TrackerState, domain: string): DomainEntry | undefined {
	return Object.hasOwn(state.domains, domain) ? state.domains[domain] : undefined;
}
