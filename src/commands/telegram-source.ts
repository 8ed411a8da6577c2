import type { TelegramBotApi } from "../notify/telegram-api.js";
import type { CommandSource, IncomingCommand } from "./types.js";

/**
 * CommandSource over Bot API long polling. Keeps the update offset so each
 * update is delivered once; non-text updates are skipped.
 */
export class TelegramCommandSource implements CommandSource {
	private readonly api: TelegramBotApi;
	private readonly pollTimeoutSec: number;
	private offset: number | undefined;

	constructor(api: TelegramBotApi, pollTimeoutSec: number) {
		this.api = api;
		this.pollTimeoutSec = pollTimeoutSec;
	}

	/** Offset the next poll will send. */
	nextOffset(): number | undefined {
		return this.offset;
	}

	async poll(signal: AbortSignal): Promise<IncomingCommand[]> {
		const result = await this.api.getUpdates(this.offset, this.pollTimeoutSec, signal);
		if (!result.ok) throw result.error;

		const commands: IncomingCommand[] = [];
		for (const update of result.value) {
			this.offset = Math.max(this.offset ?? 0, update.update_id + 1);
			const message = update.message;
			if (message?.text !== undefined) {
				commands.push({ channelId: String(message.chat.id), rawText: message.text });
			}
		}
		return commands;
	}
}
