/**
 * The monitor and the command loop, sharing one store.
 *
 * `create()` builds the production graph from a loaded config; the
 * constructor takes finished parts so tests can hand in fakes.
 */

import { CommandLoop, type CommandLoopPauses } from "../commands/command-loop.js";
import { CommandProcessor } from "../commands/processor.js";
import { TelegramCommandSource } from "../commands/telegram-source.js";
import type { CommandSource } from "../commands/types.js";
import { type Logger, createLogger } from "../lib/logger/index.js";
import { DomainMonitor } from "../monitor/domain-monitor.js";
import { TelegramBotApi } from "../notify/telegram-api.js";
import { TelegramNotificationSink } from "../notify/telegram-sink.js";
import type { NotificationSink } from "../notify/types.js";
import { createAvailabilityProber } from "../probe/availability-prober.js";
import type { DomainAvailabilityProbe } from "../probe/types.js";
import type { LoadedConfig, WatchConfig } from "../shared/config.js";
import { toError } from "../shared/errors.js";
import type { FetchFn } from "../shared/fetch.js";
import { type Clock, SystemClock } from "../shared/time.js";
import { FileStateStore } from "../store/file-state-store.js";
import type { StateStore } from "../store/state-store.js";

export interface DomainWatchParts {
	readonly config: WatchConfig;
	readonly store: StateStore;
	readonly prober: DomainAvailabilityProbe;
	readonly sink: NotificationSink;
	readonly source: CommandSource;
	readonly logger: Logger;
	readonly clock?: Clock;
	readonly commandPauses?: Partial<CommandLoopPauses>;
}

export interface CreateAppOptions {
	readonly logger?: Logger;
	readonly fetchFn?: FetchFn;
	readonly clock?: Clock;
}

export class DomainWatchApp {
	readonly store: StateStore;
	readonly monitor: DomainMonitor;
	readonly commands: CommandLoop;
	private readonly log: Logger;

	constructor(parts: DomainWatchParts) {
		const { config } = parts;
		this.store = parts.store;
		this.log = parts.logger.child({ module: "app" });
		this.monitor = new DomainMonitor({
			store: parts.store,
			prober: parts.prober,
			sink: parts.sink,
			settings: config,
			logger: parts.logger,
			clock: parts.clock,
		});
		this.commands = new CommandLoop({
			source: parts.source,
			processor: new CommandProcessor({
				store: parts.store,
				allowedChannelIds: config.allowedChannelIds,
				logger: parts.logger,
			}),
			sink: parts.sink,
			logger: parts.logger,
			pauses: parts.commandPauses,
		});
	}

	static async create(
		loaded: LoadedConfig,
		options: CreateAppOptions = {},
	): Promise<DomainWatchApp> {
		const { config } = loaded;
		const clock = options.clock ?? SystemClock;
		const logger = options.logger ?? createLogger({ level: config.logLevel });

		const store = await FileStateStore.open(
			{ filePath: config.stateFile, defaultDomains: config.defaultDomains },
			{ clock, logger },
		);
		const api = new TelegramBotApi({
			token: loaded.telegramToken,
			requestTimeoutMs: config.notifyTimeoutMs,
			fetchFn: options.fetchFn,
		});

		return new DomainWatchApp({
			config,
			store,
			prober: createAvailabilityProber({
				timeouts: {
					primaryMs: config.primaryTimeoutMs,
					secondaryMs: config.secondaryTimeoutMs,
				},
				logger,
				fetchFn: options.fetchFn,
			}),
			sink: new TelegramNotificationSink(api, logger),
			source: new TelegramCommandSource(api, config.commandPollTimeoutSec),
			logger,
			clock,
		});
	}

	/**
	 * Run both loops until `signal` aborts. If either loop dies the other is
	 * stopped too and the error is rethrown.
	 */
	async run(signal: AbortSignal): Promise<void> {
		const controller = new AbortController();
		const stop = (): void => controller.abort();
		signal.addEventListener("abort", stop, { once: true });
		if (signal.aborted) stop();

		const guard = async (name: string, loop: Promise<void>): Promise<void> => {
			try {
				await loop;
			} catch (error: unknown) {
				this.log.fatal({ err: toError(error), loop: name }, "loop crashed; shutting down");
				stop();
				throw error;
			}
		};

		this.log.info("domain watch started");
		const results = await Promise.allSettled([
			guard("monitor", this.monitor.run(controller.signal)),
			guard("commands", this.commands.run(controller.signal)),
		]);
		signal.removeEventListener("abort", stop);
		await this.store.flush();
		this.log.info("domain watch stopped");

		const failure = results.find((r): r is PromiseRejectedResult => r.status === "rejected");
		if (failure !== undefined) throw failure.reason;
	}
}
