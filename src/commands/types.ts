/** One message from the command channel. */
export interface IncomingCommand {
	readonly channelId: string;
	readonly rawText: string;
}

/** Yields commands as they arrive. */
export interface CommandSource {
	/**
	 * Wait for the next batch (possibly empty). Rejects on transport failure;
	 * the command loop backs off and polls again.
	 */
	poll(signal: AbortSignal): Promise<IncomingCommand[]>;
}
