export {
	DomainStatus,
	Verdict,
	type DomainEntry,
	type TrackerState,
	createDomainEntry,
	emptyTrackerState,
	isAlerted,
	entryFor,
} from "./types.js";

export {
	type TransitionOutcome,
	applyVerdict,
	releaseNotification,
	resetEntry,
} from "./transition.js";

export { normalizeDomain, validateDomain } from "./domain-name.js";

export { type DomainStats, type DomainRow, computeStats, domainRows } from "./stats.js";
