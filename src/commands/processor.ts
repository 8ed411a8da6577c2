/**
 * CommandProcessor — turns one incoming message into one reply.
 *
 * Reads and writes go straight to the StateStore, which serializes them with
 * the monitor's own updates. Rejections come back as reply text; nothing here
 * throws for bad input.
 */

import { domainRows } from "../domain/stats.js";
import type { Logger } from "../lib/logger/index.js";
import { CommandErrorKind, type CommandValidationError } from "../shared/errors.js";
import type { CommandMutation, StateStore } from "../store/state-store.js";
import { CommandVerb, type DomainVerb, parseCommand } from "./parser.js";
import { HELP_TEXT, Replies, formatDomainList, formatStatusSummary } from "./replies.js";
import type { IncomingCommand } from "./types.js";

export interface CommandProcessorDeps {
	readonly store: StateStore;
	readonly allowedChannelIds: readonly string[];
	readonly logger: Logger;
}

export class CommandProcessor {
	private readonly store: StateStore;
	private readonly allowed: ReadonlySet<string>;
	private readonly log: Logger;

	constructor(deps: CommandProcessorDeps) {
		this.store = deps.store;
		this.allowed = new Set(deps.allowedChannelIds);
		this.log = deps.logger.child({ module: "commands" });
	}

	isAuthorized(channelId: string): boolean {
		return this.allowed.has(channelId);
	}

	/** Reply text for the message, or null when nothing should be sent back. */
	async handle(command: IncomingCommand): Promise<string | null> {
		if (!this.isAuthorized(command.channelId)) {
			this.log.warn({ channelId: command.channelId }, "command from unauthorized channel dropped");
			return null;
		}

		const parsed = parseCommand(command.rawText);
		if (parsed === null) return null;
		this.log.debug({ channelId: command.channelId, verb: parsed.verb }, "command received");

		switch (parsed.verb) {
			case CommandVerb.Add:
			case CommandVerb.Remove:
			case CommandVerb.Reset:
				if (parsed.argument === null) return Replies.usage(parsed.verb);
				return this.mutate(parsed.verb, parsed.argument);
			case CommandVerb.List:
				return formatDomainList(domainRows(this.store.snapshot()));
			case CommandVerb.Status:
				return formatStatusSummary(this.store.stats());
			case CommandVerb.Help:
				return HELP_TEXT;
			case "unknown":
				return Replies.unknown();
		}
	}

	private async mutate(verb: DomainVerb, argument: string): Promise<string> {
		const run: Record<DomainVerb, (raw: string) => CommandMutation> = {
			add: (raw) => this.store.addDomain(raw),
			remove: (raw) => this.store.removeDomain(raw),
			reset: (raw) => this.store.resetDomain(raw),
		};
		const result = await run[verb](argument);

		if (!result.ok) return rejectionReply(verb, argument, result.error);

		const { value: domain, persisted } = result.value;
		this.log.info({ domain, verb, persisted }, `domain ${verb} applied`);
		const reply =
			verb === CommandVerb.Add
				? Replies.added(domain)
				: verb === CommandVerb.Remove
					? Replies.removed(domain)
					: Replies.reset(domain);
		return persisted ? reply : `${reply}\n${Replies.notSaved()}`;
	}
}

function rejectionReply(verb: DomainVerb, argument: string, error: CommandValidationError): string {
	const domain = typeof error.context["domain"] === "string" ? error.context["domain"] : argument;
	switch (error.kind) {
		case CommandErrorKind.InvalidDomain:
			return Replies.invalidDomain();
		case CommandErrorKind.DuplicateDomain:
			return Replies.duplicate(domain);
		case CommandErrorKind.DomainNotFound:
			return verb === CommandVerb.Reset ? Replies.resetUnknown(domain) : Replies.notInList(domain);
		case CommandErrorKind.MissingArgument:
			return Replies.usage(verb);
	}
}
