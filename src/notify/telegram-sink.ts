import type { Logger } from "../lib/logger/index.js";
import { chunkMessage } from "./format.js";
import type { TelegramBotApi } from "./telegram-api.js";
import type { NotificationSink } from "./types.js";

/** NotificationSink over the Bot API. Long texts go out as several messages. */
export class TelegramNotificationSink implements NotificationSink {
	private readonly api: TelegramBotApi;
	private readonly log: Logger;

	constructor(api: TelegramBotApi, logger: Logger) {
		this.api = api;
		this.log = logger.child({ module: "notify" });
	}

	async send(text: string, channelId: string): Promise<boolean> {
		for (const chunk of chunkMessage(text)) {
			const result = await this.api.sendMessage(channelId, chunk);
			if (!result.ok) {
				this.log.warn({ channelId, err: result.error }, "message delivery failed");
				return false;
			}
		}
		this.log.debug({ channelId, length: text.length }, "message delivered");
		return true;
	}
}
