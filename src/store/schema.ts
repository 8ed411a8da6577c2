/**
 * On-disk layout of the tracker state.
 *
 * Timestamps are ISO-8601 strings in the file and epoch milliseconds in
 * memory; the conversion happens here and nowhere else.
 */

import { normalizeDomain } from "../domain/domain-name.js";
import { type DomainEntry, DomainStatus, type TrackerState } from "../domain/types.js";
import { type ValidationError, validate, z } from "../lib/validation/index.js";
import { type Result, map } from "../shared/result.js";
import { fromIsoOrNull, toIsoOrNull } from "../shared/time.js";

const isoTimestamp = z.string().datetime({ offset: true }).nullable();

const persistedEntrySchema = z.object({
	status: z.enum([DomainStatus.Unknown, DomainStatus.Available, DomainStatus.Unavailable]),
	lastCheckedAt: isoTimestamp,
	lastStatusChangeAt: isoTimestamp,
	firstAvailableAt: isoTimestamp,
	notificationSent: z.boolean(),
});

export const persistedStateSchema = z.object({
	domains: z.record(persistedEntrySchema),
	totalChecks: z.number().int().nonnegative(),
	lastUpdatedAt: isoTimestamp,
});

export type PersistedEntry = z.infer<typeof persistedEntrySchema>;
export type PersistedState = z.infer<typeof persistedStateSchema>;

export function encodeState(state: TrackerState): PersistedState {
	const domains = Object.fromEntries(
		Object.entries(state.domains).map(([domain, entry]): [string, PersistedEntry] => [
			domain,
			{
				status: entry.status,
				lastCheckedAt: toIsoOrNull(entry.lastCheckedAt),
				lastStatusChangeAt: toIsoOrNull(entry.lastStatusChangeAt),
				firstAvailableAt: toIsoOrNull(entry.firstAvailableAt),
				notificationSent: entry.notificationSent,
			},
		]),
	);
	return {
		domains,
		totalChecks: state.totalChecks,
		lastUpdatedAt: toIsoOrNull(state.lastUpdatedAt),
	};
}

/**
 * Validate and convert parsed JSON into a TrackerState.
 * Keys are re-normalized and a stray `notificationSent` on a non-Available
 * entry is dropped, so a hand-edited file cannot break the gate invariant.
 */
export function decodeState(raw: unknown): Result<TrackerState, ValidationError> {
	return map(validate(persistedStateSchema, raw), (persisted) => {
		const domains = Object.fromEntries(
			Object.entries(persisted.domains).map(([domain, entry]): [string, DomainEntry] => [
				normalizeDomain(domain),
				{
					status: entry.status,
					lastCheckedAt: fromIsoOrNull(entry.lastCheckedAt),
					lastStatusChangeAt: fromIsoOrNull(entry.lastStatusChangeAt),
					firstAvailableAt: fromIsoOrNull(entry.firstAvailableAt),
					notificationSent: entry.notificationSent && entry.status === DomainStatus.Available,
				},
			]),
		);
		return {
			domains,
			totalChecks: persisted.totalChecks,
			lastUpdatedAt: fromIsoOrNull(persisted.lastUpdatedAt),
		};
	});
}

export function serializeState(state: TrackerState): string {
	return `${JSON.stringify(encodeState(state), null, 2)}\n`;
}
