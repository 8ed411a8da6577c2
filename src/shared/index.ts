export { type Result, ok, err, map } from "./result.js";

export {
	ErrorCategory,
	WatchError,
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
	toError,
	isCommandValidationError,
	isConfigError,
	isLookupNotFound,
} from "./errors.js";

export {
	type Clock,
	SystemClock,
	FakeClock,
	Duration,
	sleep,
	toIsoOrNull,
	fromIsoOrNull,
	formatTimestamp,
} from "./time.js";

export {
	type WatchConfig,
	type LoadedConfig,
	type Env,
	DEFAULT_WATCH_CONFIG,
	configFromEnv,
} from "./config.js";

export { Secret } from "./secret.js";
export { type FetchFn, defaultFetch } from "./fetch.js";
