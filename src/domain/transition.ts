/**
 * Status transition engine — the notification gate.
 *
 * Pure functions over DomainEntry. Given the persisted entry and a fresh
 * verdict they compute the next entry and whether an alert must fire, so
 * that each contiguous Available streak alerts exactly once.
 */

import { type DomainEntry, DomainStatus, type Verdict } from "./types.js";

export interface TransitionOutcome {
	readonly entry: DomainEntry;
	/** Fire the availability alert for this streak */
	readonly shouldNotify: boolean;
	/** `status` took a new value on this call */
	readonly changed: boolean;
}

/**
 * Fold one probe verdict into an entry.
 *
 * - `lastCheckedAt` always moves to `now`.
 * - A status change stamps `lastStatusChangeAt`.
 * - Entering Available starts a new streak: `firstAvailableAt = now` and the
 *   gate opens, then closes immediately with `shouldNotify = true`.
 * - Staying Available notifies only if the gate is still open (a previous
 *   send failed and was released).
 * - Becoming or staying Unavailable never notifies and re-arms the gate.
 */
export function applyVerdict(entry: DomainEntry, verdict: Verdict, now: number): TransitionOutcome {
	const changed = verdict !== entry.status;

	if (verdict === DomainStatus.Unavailable) {
		return {
			entry: {
				...entry,
				status: DomainStatus.Unavailable,
				lastCheckedAt: now,
				lastStatusChangeAt: changed ? now : entry.lastStatusChangeAt,
				notificationSent: false,
			},
			shouldNotify: false,
			changed,
		};
	}

	const gateOpen = changed || !entry.notificationSent;
	return {
		entry: {
			...entry,
			status: DomainStatus.Available,
			lastCheckedAt: now,
			lastStatusChangeAt: changed ? now : entry.lastStatusChangeAt,
			firstAvailableAt: changed ? now : entry.firstAvailableAt,
			notificationSent: true,
		},
		shouldNotify: gateOpen,
		changed,
	};
}

/**
 * Re-open the gate after an alert could not be delivered, so the next cycle
 * re-probes the domain and retries. Only applies while the same streak is
 * still current; anything else returns the entry untouched.
 */
export function releaseNotification(entry: DomainEntry, streakStartedAt: number | null): DomainEntry {
	if (
		entry.status !== DomainStatus.Available ||
		!entry.notificationSent ||
		entry.firstAvailableAt !== streakStartedAt
	) {
		return entry;
	}
	return { ...entry, notificationSent: false };
}

/**
 * Operator reset: back to Unknown with the gate re-armed so the monitor
 * checks the domain again. `firstAvailableAt` is history and stays.
 */
export function resetEntry(entry: DomainEntry, now: number): DomainEntry {
	return {
		...entry,
		status: DomainStatus.Unknown,
		notificationSent: false,
		lastStatusChangeAt: now,
	};
}
