/**
 * Poll, answer, repeat until the signal aborts.
 *
 * Polling failures back off (5 s, then 30 s after five in a row) and never
 * end the loop. A command that fails is logged and the rest of its batch is
 * still handled.
 */

import type { Logger } from "../lib/logger/index.js";
import type { NotificationSink } from "../notify/types.js";
import { toError } from "../shared/errors.js";
import { Duration, sleep } from "../shared/time.js";
import type { CommandProcessor } from "./processor.js";
import type { CommandSource, IncomingCommand } from "./types.js";

export interface CommandLoopPauses {
	/** After every successful poll */
	readonly idleMs: number;
	readonly errorMs: number;
	/** After `maxConsecutiveErrors` failed polls in a row */
	readonly backoffMs: number;
	readonly maxConsecutiveErrors: number;
}

export const DEFAULT_COMMAND_LOOP_PAUSES: CommandLoopPauses = {
	idleMs: Duration.seconds(1),
	errorMs: Duration.seconds(5),
	backoffMs: Duration.seconds(30),
	maxConsecutiveErrors: 5,
};

export interface CommandLoopDeps {
	readonly source: CommandSource;
	readonly processor: CommandProcessor;
	readonly sink: NotificationSink;
	readonly logger: Logger;
	readonly pauses?: Partial<CommandLoopPauses>;
}

export class CommandLoop {
	private readonly source: CommandSource;
	private readonly processor: CommandProcessor;
	private readonly sink: NotificationSink;
	private readonly log: Logger;
	private readonly pauses: CommandLoopPauses;

	constructor(deps: CommandLoopDeps) {
		this.source = deps.source;
		this.processor = deps.processor;
		this.sink = deps.sink;
		this.log = deps.logger.child({ module: "command-loop" });
		this.pauses = { ...DEFAULT_COMMAND_LOOP_PAUSES, ...deps.pauses };
	}

	async run(signal: AbortSignal): Promise<void> {
		this.log.info("command loop started");
		let consecutiveErrors = 0;

		while (!signal.aborted) {
			let commands: IncomingCommand[];
			try {
				commands = await this.source.poll(signal);
			} catch (error: unknown) {
				if (signal.aborted) break;
				consecutiveErrors++;
				this.log.error({ err: toError(error), consecutiveErrors }, "command poll failed");
				if (consecutiveErrors >= this.pauses.maxConsecutiveErrors) {
					this.log.warn(
						{ consecutiveErrors, pauseMs: this.pauses.backoffMs },
						"too many consecutive poll errors; backing off",
					);
					consecutiveErrors = 0;
					await sleep(this.pauses.backoffMs, signal);
				} else {
					await sleep(this.pauses.errorMs, signal);
				}
				continue;
			}

			consecutiveErrors = 0;
			for (const command of commands) {
				await this.dispatch(command);
			}
			await sleep(this.pauses.idleMs, signal);
		}

		this.log.info("command loop stopped");
	}

	/** Handle one command and send its reply to the channel it came from. */
	async dispatch(command: IncomingCommand): Promise<void> {
		try {
			const reply = await this.processor.handle(command);
			if (reply === null) return;
			const delivered = await this.sink.send(reply, command.channelId);
			if (!delivered) {
				this.log.warn({ channelId: command.channelId }, "command reply not delivered");
			}
		} catch (error: unknown) {
			this.log.error(
				{ err: toError(error), channelId: command.channelId },
				"command handling failed",
			);
		}
	}
}
