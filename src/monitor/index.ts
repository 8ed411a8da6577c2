export {
	MonitorPhase,
	MonitorPhaseMachine,
	PhaseErrorKind,
	type PhaseTransition,
	type PhaseMetadata,
	type PhaseSnapshot,
	type PhaseHistoryEntry,
	type PhaseError,
} from "./phase-machine.js";

export {
	DomainMonitor,
	AlertOutcome,
	type DomainCheck,
	type CycleSummary,
	type MonitorEvents,
	type MonitorSettings,
	type DomainMonitorDeps,
} from "./domain-monitor.js";
