/**
 * Command-line surface: `domain-watch run | check <domain> | help`.
 *
 * `runCli` never calls process.exit; it resolves to the exit code so the
 * entry point and the tests decide what to do with it.
 */

import { Command, CommanderError, InvalidArgumentError } from "commander";
import { DomainWatchApp } from "./app/domain-watch-app.js";
import { validateDomain } from "./domain/domain-name.js";
import { type Logger, createLogger } from "./lib/logger/index.js";
import { createAvailabilityProber } from "./probe/availability-prober.js";
import type { ProbeTimeouts } from "./probe/types.js";
import { DEFAULT_WATCH_CONFIG, type Env, configFromEnv } from "./shared/config.js";
import type { FetchFn } from "./shared/fetch.js";

export const VERSION = "0.1.0";

export interface CliDeps {
	readonly env: Env;
	readonly stdout: (text: string) => void;
	readonly stderr: (text: string) => void;
	/** Aborted on SIGINT/SIGTERM by the entry point. */
	readonly signal: AbortSignal;
	readonly fetchFn?: FetchFn;
	readonly logger?: Logger;
}

interface CheckOptions {
	readonly timeout?: number;
}

export async function runCli(argv: readonly string[], deps: CliDeps): Promise<number> {
	let exitCode = 0;

	const program = new Command()
		.name("domain-watch")
		.description("Watch domain names and alert a Telegram channel when one becomes available")
		.version(VERSION)
		.exitOverride()
		.configureOutput({ writeOut: deps.stdout, writeErr: deps.stderr });

	program
		.command("run")
		.description("monitor the watched domains and answer bot commands until interrupted")
		.action(async () => {
			exitCode = await runWatch(deps);
		});

	program
		.command("check")
		.description("probe one domain once and print the verdict")
		.argument("<domain>", "domain name to probe")
		.option("--timeout <ms>", "deadline for each lookup stage", parsePositiveInt)
		.action(async (domain: string, options: CheckOptions) => {
			exitCode = await checkOnce(domain, options, deps);
		});

	try {
		await program.parseAsync([...argv]);
	} catch (error: unknown) {
		if (error instanceof CommanderError) return error.exitCode;
		throw error;
	}
	return exitCode;
}

async function runWatch(deps: CliDeps): Promise<number> {
	const loaded = configFromEnv(deps.env);
	if (!loaded.ok) {
		deps.stderr(`${loaded.error.message}\n`);
		return 1;
	}
	const logger = deps.logger ?? createLogger({ level: loaded.value.config.logLevel });
	const app = await DomainWatchApp.create(loaded.value, { logger, fetchFn: deps.fetchFn });
	await app.run(deps.signal);
	return 0;
}

async function checkOnce(raw: string, options: CheckOptions, deps: CliDeps): Promise<number> {
	const domain = validateDomain(raw);
	if (!domain.ok) {
		deps.stderr(`${domain.error.message}\n`);
		return 1;
	}

	const timeouts: ProbeTimeouts = {
		primaryMs: options.timeout ?? DEFAULT_WATCH_CONFIG.primaryTimeoutMs,
		secondaryMs: options.timeout ?? DEFAULT_WATCH_CONFIG.secondaryTimeoutMs,
	};
	const logger = deps.logger ?? createLogger({ level: "warn", destination: { write: deps.stderr } });
	const prober = createAvailabilityProber({ timeouts, logger, fetchFn: deps.fetchFn });

	const report = await prober.explain(domain.value);
	deps.stdout(`${report.domain}: ${report.verdict} (${report.stage}: ${report.reason})\n`);
	return 0;
}

function parsePositiveInt(value: string): number {
	const parsed = Number.parseInt(value, 10);
	if (Number.isNaN(parsed) || parsed <= 0 || String(parsed) !== value) {
		throw new InvalidArgumentError("must be a positive integer");
	}
	return parsed;
}
