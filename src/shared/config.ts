/**
 * Watcher configuration: plain values handed to every component at
 * construction time.
 *
 * Environment variables (all prefixed DOMAIN_WATCH_):
 *   TELEGRAM_TOKEN         bot token (required)
 *   ALERT_CHAT_ID          channel receiving "domain available" alerts (required)
 *   REPORT_CHAT_ID         channel receiving periodic status reports (required)
 *   ALLOWED_CHAT_IDS       comma-separated command allow-list (default: both channels)
 *   CHECK_INTERVAL_MS      pause between monitoring cycles (default 60000)
 *   REPORT_EVERY_CYCLES    status report period in cycles (default 120)
 *   PRIMARY_TIMEOUT_MS     RDAP lookup deadline (default 10000)
 *   SECONDARY_TIMEOUT_MS   WHOIS lookup deadline (default 20000)
 *   NOTIFY_TIMEOUT_MS      Telegram request deadline (default 15000)
 *   MAX_CONCURRENT_PROBES  probes in flight per cycle (default 8)
 *   COMMAND_POLL_TIMEOUT_S long-poll window for commands (default 30)
 *   STATE_FILE             path of the JSON state file (default domain_state.json)
 *   DEFAULT_DOMAINS        comma-separated domains seeded into a new state file
 *   LOG_LEVEL              trace | debug | info | warn | error | fatal (default info)
 */

import type { LogLevel } from "../lib/logger/index.js";
import { ConfigError } from "./errors.js";
import { type Result, err, ok } from "./result.js";
import { Secret } from "./secret.js";
import { Duration } from "./time.js";

export interface WatchConfig {
	readonly checkIntervalMs: number;
	/** Status report goes out on every cycle number divisible by this. */
	readonly reportEveryCycles: number;
	readonly primaryTimeoutMs: number;
	readonly secondaryTimeoutMs: number;
	readonly notifyTimeoutMs: number;
	readonly maxConcurrentProbes: number;
	readonly commandPollTimeoutSec: number;
	readonly stateFile: string;
	/** Only used when the state file does not exist yet. */
	readonly defaultDomains: readonly string[];
	readonly alertChannelId: string;
	readonly reportChannelId: string;
	readonly allowedChannelIds: readonly string[];
	readonly logLevel: LogLevel;
}

export const DEFAULT_WATCH_CONFIG: Omit<
	WatchConfig,
	"alertChannelId" | "reportChannelId" | "allowedChannelIds"
> = {
	checkIntervalMs: Duration.seconds(60),
	reportEveryCycles: 120,
	primaryTimeoutMs: Duration.seconds(10),
	secondaryTimeoutMs: Duration.seconds(20),
	notifyTimeoutMs: Duration.seconds(15),
	maxConcurrentProbes: 8,
	commandPollTimeoutSec: 30,
	stateFile: "domain_state.json",
	defaultDomains: [],
	logLevel: "info",
};

/** Everything needed to boot: the config plus the secret kept out of it. */
export interface LoadedConfig {
	readonly config: WatchConfig;
	readonly telegramToken: Secret;
}

export type Env = Readonly<Record<string, string | undefined>>;

type NumericKey =
	| "checkIntervalMs"
	| "reportEveryCycles"
	| "primaryTimeoutMs"
	| "secondaryTimeoutMs"
	| "notifyTimeoutMs"
	| "maxConcurrentProbes"
	| "commandPollTimeoutSec";

/** Longest delay setTimeout honours; larger values fire almost at once. */
export const MAX_TIMER_MS = 2_147_483_647;
const MAX_POLL_TIMEOUT_SEC = 3_600;

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];
const PREFIX = "DOMAIN_WATCH_";

/**
 * Build the config from environment variables.
 * Returns err(ConfigError) for a missing required value, a malformed number,
 * or a number above its ceiling.
 */
export function configFromEnv(env: Env = process.env): Result<LoadedConfig, ConfigError> {
	const read = (key: string): string | undefined => {
		const raw = env[PREFIX + key]?.trim();
		return raw === undefined || raw.length === 0 ? undefined : raw;
	};

	const rawToken = read("TELEGRAM_TOKEN");
	if (rawToken === undefined) {
		return err(new ConfigError(`${PREFIX}TELEGRAM_TOKEN is required`));
	}
	const alertChannelId = read("ALERT_CHAT_ID");
	if (alertChannelId === undefined) {
		return err(new ConfigError(`${PREFIX}ALERT_CHAT_ID is required`));
	}
	const reportChannelId = read("REPORT_CHAT_ID");
	if (reportChannelId === undefined) {
		return err(new ConfigError(`${PREFIX}REPORT_CHAT_ID is required`));
	}

	const logLevel = read("LOG_LEVEL") ?? DEFAULT_WATCH_CONFIG.logLevel;
	if (!isLogLevel(logLevel)) {
		return err(
			new ConfigError(`Invalid ${PREFIX}LOG_LEVEL: "${logLevel}"`, {
				allowed: LOG_LEVELS,
			}),
		);
	}

	const numbers: Array<[string, NumericKey, number]> = [
		["CHECK_INTERVAL_MS", "checkIntervalMs", MAX_TIMER_MS],
		["REPORT_EVERY_CYCLES", "reportEveryCycles", Number.MAX_SAFE_INTEGER],
		["PRIMARY_TIMEOUT_MS", "primaryTimeoutMs", MAX_TIMER_MS],
		["SECONDARY_TIMEOUT_MS", "secondaryTimeoutMs", MAX_TIMER_MS],
		["NOTIFY_TIMEOUT_MS", "notifyTimeoutMs", MAX_TIMER_MS],
		["MAX_CONCURRENT_PROBES", "maxConcurrentProbes", Number.MAX_SAFE_INTEGER],
		["COMMAND_POLL_TIMEOUT_S", "commandPollTimeoutSec", MAX_POLL_TIMEOUT_SEC],
	];
	const parsed: { [K in NumericKey]?: number } = {};
	for (const [envKey, configKey, max] of numbers) {
		const raw = read(envKey);
		if (raw === undefined) continue;
		const value = strictParseInt(raw);
		if (Number.isNaN(value) || value <= 0) {
			return err(
				new ConfigError(`Invalid ${PREFIX}${envKey}: "${raw}" must be a positive integer`),
			);
		}
		if (value > max) {
			return err(new ConfigError(`Invalid ${PREFIX}${envKey}: "${raw}" must be at most ${max}`));
		}
		parsed[configKey] = value;
	}

	const allowed = splitList(read("ALLOWED_CHAT_IDS"));

	return ok({
		telegramToken: Secret.seal(rawToken),
		config: {
			...DEFAULT_WATCH_CONFIG,
			...parsed,
			stateFile: read("STATE_FILE") ?? DEFAULT_WATCH_CONFIG.stateFile,
			defaultDomains: splitList(read("DEFAULT_DOMAINS")).map((d) => d.toLowerCase()),
			alertChannelId,
			reportChannelId,
			allowedChannelIds: allowed.length > 0 ? allowed : [alertChannelId, reportChannelId],
			logLevel,
		},
	});
}

function isLogLevel(value: string): value is LogLevel {
	return (LOG_LEVELS as readonly string[]).includes(value);
}

function strictParseInt(raw: string): number {
	const parsed = Number.parseInt(raw, 10);
	if (Number.isNaN(parsed) || String(parsed) !== raw.trim()) {
		return Number.NaN;
	}
	return parsed;
}

function splitList(raw: string | undefined): string[] {
	if (raw === undefined) return [];
	return raw
		.split(",")
		.map((s) => s.trim())
		.filter((s) => s.length > 0);
}
