import { type DomainEntry, DomainStatus, type TrackerState } from "./types.js";

export interface DomainStats {
	readonly total: number;
	readonly available: number;
	readonly unavailable: number;
	readonly unknown: number;
	readonly totalChecks: number;
	readonly lastUpdatedAt: number | null;
}

/** One row of the /list output or the status report. */
export interface DomainRow {
	readonly domain: string;
	readonly entry: DomainEntry;
}

export function computeStats(state: TrackerState): DomainStats {
	let available = 0;
	let unavailable = 0;
	let unknown = 0;
	for (const entry of Object.values(state.domains)) {
		if (entry.status === DomainStatus.Available) available++;
		else if (entry.status === DomainStatus.Unavailable) unavailable++;
		else unknown++;
	}
	return {
		total: available + unavailable + unknown,
		available,
		unavailable,
		unknown,
		totalChecks: state.totalChecks,
		lastUpdatedAt: state.lastUpdatedAt,
	};
}

/** Rows sorted by domain name, optionally filtered by status. */
export function domainRows(
	state: TrackerState,
	filter: (entry: DomainEntry) => boolean = () => true,
): DomainRow[] {
	return Object.entries(state.domains)
		.filter(([, entry]) => filter(entry))
		.sort(([a], [b]) => a.localeCompare(b))
		.map(([domain, entry]) => ({ domain, entry }));
}
