/**
 * WatchError hierarchy — structured error classification.
 *
 * Every error carries a category (retryable, non-retryable, fatal). Only
 * fatal errors may stop the process, and only during startup; everything the
 * monitor or the command loop meets at runtime is logged and absorbed.
 */

/** Error severity categories. */
export const ErrorCategory = {
	Retryable: "retryable",
	NonRetryable: "non_retryable",
	Fatal: "fatal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/** Options for constructing WatchError subclasses with optional cause chain. */
interface WatchErrorOptions {
	readonly cause?: unknown;
}

type ErrorContext = Record<string, unknown> & WatchErrorOptions;

/** Base error class for the watcher, with category-based retry semantics. */
export class WatchError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;
	readonly hint: string | undefined;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: ErrorContext = {},
		hint?: string,
	) {
		super(message);
		const { cause, ...rest } = context;
		this.name = "WatchError";
		this.category = category;
		this.code = code;
		this.context = rest;
		this.hint = hint;
		if (cause !== undefined) this.cause = cause;
	}

	get isRetryable(): boolean {
		return this.category === ErrorCategory.Retryable;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			...(this.hint !== undefined && { hint: this.hint }),
			retryable: this.isRetryable,
			context: this.context,
		};
	}
}

// ── Probe errors ─────────────────────────────────────────────────────

/** A WHOIS or RDAP lookup did not answer within its deadline. */
export class ProbeTimeoutError extends WatchError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "PROBE_TIMEOUT", ErrorCategory.Retryable, context);
		this.name = "ProbeTimeoutError";
	}
}

/** Socket or HTTP transport failure during a lookup. */
export class ProbeNetworkError extends WatchError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "PROBE_NETWORK_ERROR", ErrorCategory.Retryable, context);
		this.name = "ProbeNetworkError";
	}
}

/** Any other lookup failure the prober cannot place. */
export class ProbeUnclassifiedError extends WatchError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "PROBE_UNCLASSIFIED", ErrorCategory.NonRetryable, context);
		this.name = "ProbeUnclassifiedError";
	}
}

/**
 * The registry answered that it has no record of the domain.
 * Not a failure from the watcher's point of view: it means "available".
 */
export class LookupNotFoundError extends WatchError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "LOOKUP_NOT_FOUND", ErrorCategory.NonRetryable, context);
		this.name = "LookupNotFoundError";
	}
}

// ── Store errors ─────────────────────────────────────────────────────

/** Reading or writing the state file failed. */
export class StoreIOError extends WatchError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "STORE_IO_ERROR", ErrorCategory.Retryable, context);
		this.name = "StoreIOError";
	}
}

// ── Notification errors ──────────────────────────────────────────────

/** A messaging-channel request was rejected, timed out or never acknowledged. */
export class NotificationDeliveryError extends WatchError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "NOTIFICATION_DELIVERY_ERROR", ErrorCategory.Retryable, context);
		this.name = "NotificationDeliveryError";
	}
}

// ── Command errors ───────────────────────────────────────────────────

export const CommandErrorKind = {
	InvalidDomain: "invalid_domain",
	DuplicateDomain: "duplicate_domain",
	DomainNotFound: "domain_not_found",
	MissingArgument: "missing_argument",
} as const;

export type CommandErrorKind = (typeof CommandErrorKind)[keyof typeof CommandErrorKind];

/** A command was rejected; the message is shown to the operator as-is. */
export class CommandValidationError extends WatchError {
	readonly kind: CommandErrorKind;

	constructor(kind: CommandErrorKind, message: string, context: ErrorContext = {}) {
		super(message, "COMMAND_VALIDATION_ERROR", ErrorCategory.NonRetryable, context);
		this.name = "CommandValidationError";
		this.kind = kind;
	}

	override toJSON(): Record<string, unknown> {
		return { ...super.toJSON(), kind: this.kind };
	}
}

// ── Startup errors ───────────────────────────────────────────────────

/** Fatal error for invalid or missing configuration. */
export class ConfigError extends WatchError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "CONFIG_ERROR", ErrorCategory.Fatal, context);
		this.name = "ConfigError";
	}
}

/** Fatal error for unexpected internal failures. */
export class SystemError extends WatchError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "SYSTEM_ERROR", ErrorCategory.Fatal, context);
		this.name = "SystemError";
	}
}

// ── Classification helpers ───────────────────────────────────────────

const NETWORK_CODES = new Set(["ECONNREFUSED", "ENOTFOUND", "ECONNRESET", "EPIPE", "EHOSTUNREACH"]);

/**
 * Place an unknown lookup failure in the probe taxonomy.
 * WatchErrors pass through untouched.
 */
export function classifyProbeError(error: unknown): WatchError {
	if (error instanceof WatchError) return error;
	if (error instanceof Error) {
		const msg = error.message.toLowerCase();
		const code = isErrnoException(error) ? error.code : undefined;

		if (code === "ETIMEDOUT" || error.name === "TimeoutError" || error.name === "AbortError") {
			return new ProbeTimeoutError(error.message, { cause: error });
		}
		if (code !== undefined && NETWORK_CODES.has(code)) {
			return new ProbeNetworkError(error.message, { cause: error, code });
		}
		if (msg.includes("timeout") || msg.includes("timed out")) {
			return new ProbeTimeoutError(error.message, { cause: error });
		}
		if (msg.includes("fetch failed") || msg.includes("socket") || msg.includes("network")) {
			return new ProbeNetworkError(error.message, { cause: error });
		}
		return new ProbeUnclassifiedError(error.message, { cause: error });
	}
	return new ProbeUnclassifiedError(String(error), { cause: error });
}

/** Normalize anything thrown into an Error, keeping Errors as they are. */
export function toError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error));
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
	return err instanceof Error && "code" in err;
}

// ── Type guards ──────────────────────────────────────────────────────

export function isCommandValidationError(e: unknown): e is CommandValidationError {
	return e instanceof CommandValidationError;
}

export function isConfigError(e: unknown): e is ConfigError {
	return e instanceof ConfigError;
}

export function isLookupNotFound(e: unknown): e is LookupNotFoundError {
	return e instanceof LookupNotFoundError;
}
