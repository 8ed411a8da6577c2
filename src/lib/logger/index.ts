/**
 * Logger — structured logging backed by pino.
 *
 * Values marked `__opaque: true` (the bot token wrapper) serialize as
 * "[REDACTED]", and configured paths are censored, so a stray `{ token }`
 * binding never reaches the log stream.
 */

import pino from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export interface LoggerConfig {
	readonly level: LogLevel;
	readonly redactPaths?: readonly string[];
	/** Custom sink for the JSON lines; defaults to stdout. */
	readonly destination?: { write(msg: string): void };
}

type LogMethod = {
	(msg: string): void;
	(obj: Record<string, unknown>, msg: string): void;
};

export interface Logger {
	trace: LogMethod;
	debug: LogMethod;
	info: LogMethod;
	warn: LogMethod;
	error: LogMethod;
	fatal: LogMethod;
	child(bindings: Record<string, unknown>): Logger;
}

const REDACTED = "[REDACTED]";
const DEFAULT_REDACT_PATHS = ["token", "*.token", "telegramToken"];

// ── Opaque values ───────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null;
}

function isOpaque(value: unknown): boolean {
	return isRecord(value) && value["__opaque"] === true;
}

function redactOpaque(obj: Record<string, unknown>): Record<string, unknown> {
	const result: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		result[key] = isOpaque(value) ? REDACTED : value;
	}
	return result;
}

// ── Factory ─────────────────────────────────────────────────────────

function method(target: pino.Logger, level: LogLevel): LogMethod {
	return (msgOrObj: unknown, msg?: string): void => {
		if (isRecord(msgOrObj)) {
			const payload = isOpaque(msgOrObj) ? { value: REDACTED } : redactOpaque(msgOrObj);
			target[level](payload, msg ?? "");
		} else {
			target[level](String(msgOrObj ?? ""));
		}
	};
}

function wrapPino(target: pino.Logger): Logger {
	return {
		trace: method(target, "trace"),
		debug: method(target, "debug"),
		info: method(target, "info"),
		warn: method(target, "warn"),
		error: method(target, "error"),
		fatal: method(target, "fatal"),
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(target.child(redactOpaque(bindings)));
		},
	};
}

/**
 * Creates a Logger backed by pino.
 *
 * @example
 * ```ts
 * const log = createLogger({ level: "info" }).child({ module: "monitor" });
 * log.info({ domain: "example.com" }, "domain available");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const options: pino.LoggerOptions = {
		level: config.level,
		redact: {
			paths: [...DEFAULT_REDACT_PATHS, ...(config.redactPaths ?? [])],
			censor: REDACTED,
		},
		serializers: { err: pino.stdSerializers.err },
	};

	if (config.destination) {
		const sink = config.destination;
		const stream: pino.DestinationStream = {
			write(chunk: string): void {
				sink.write(chunk);
			},
		};
		return wrapPino(pino(options, stream));
	}
	return wrapPino(pino(options));
}

/** A logger that drops everything; handy default for tests and library use. */
export function silentLogger(): Logger {
	return wrapPino(pino({ level: "silent" }));
}
