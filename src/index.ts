// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type Result,
	ok,
	err,
	map,
	type Clock,
	SystemClock,
	FakeClock,
	Duration,
	sleep,
	formatTimestamp,
	type WatchConfig,
	type LoadedConfig,
	type Env,
	DEFAULT_WATCH_CONFIG,
	configFromEnv,
	Secret,
	type FetchFn,
	WatchError,
	ErrorCategory,
	ProbeTimeoutError,
	ProbeNetworkError,
	ProbeUnclassifiedError,
	LookupNotFoundError,
	StoreIOError,
	NotificationDeliveryError,
	CommandErrorKind,
	CommandValidationError,
	ConfigError,
	SystemError,
	classifyProbeError,
	isCommandValidationError,
	isConfigError,
	isLookupNotFound,
} from "./shared/index.js";

// ── Infrastructure ───────────────────────────────────────────────────
export { type Logger, type LogLevel, createLogger, silentLogger } from "./lib/logger/index.js";
export { ValidationError, validate } from "./lib/validation/index.js";
export { TypedEmitter, type EventMap } from "./lib/events/index.js";
export { Semaphore, withTimeout } from "./lib/concurrency/index.js";

// ── Domain Model ─────────────────────────────────────────────────────
export {
	DomainStatus,
	Verdict,
	type DomainEntry,
	type TrackerState,
	type TransitionOutcome,
	applyVerdict,
	releaseNotification,
	resetEntry,
	normalizeDomain,
	validateDomain,
	type DomainStats,
	type DomainRow,
	computeStats,
	domainRows,
} from "./domain/index.js";

// ── State Store ──────────────────────────────────────────────────────
export {
	type StateStore,
	type MutationReceipt,
	type VerdictReceipt,
	FileStateStore,
	MemoryStateStore,
	decodeState,
	serializeState,
} from "./store/index.js";

// ── Availability Probe ───────────────────────────────────────────────
export {
	type DomainAvailabilityProbe,
	type DomainLookup,
	type ProbeReport,
	ProbeStage,
	AvailabilityProber,
	createAvailabilityProber,
	RdapLookup,
	WhoisLookup,
	classifyLookupResponse,
} from "./probe/index.js";

// ── Notifications ────────────────────────────────────────────────────
export {
	type NotificationSink,
	TelegramBotApi,
	TelegramNotificationSink,
	formatAvailabilityAlert,
	formatStatusReport,
} from "./notify/index.js";

// ── Commands ─────────────────────────────────────────────────────────
export {
	type IncomingCommand,
	type CommandSource,
	type ParsedCommand,
	parseCommand,
	CommandProcessor,
	CommandLoop,
	TelegramCommandSource,
} from "./commands/index.js";

// ── Monitor ──────────────────────────────────────────────────────────
export {
	DomainMonitor,
	MonitorPhase,
	MonitorPhaseMachine,
	type CycleSummary,
	type MonitorEvents,
	type MonitorSettings,
} from "./monitor/index.js";

// ── Application ──────────────────────────────────────────────────────
export { DomainWatchApp, type DomainWatchParts } from "./app/domain-watch-app.js";
export { runCli, type CliDeps } from "./cli.js";
