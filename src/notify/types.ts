/** Outbound messaging capability. */
export interface NotificationSink {
	/**
	 * Deliver `text` (Telegram HTML) to a channel.
	 * Resolves false on any failure; never rejects.
	 */
	send(text: string, channelId: string): Promise<boolean>;
}
