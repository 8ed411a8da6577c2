export type { IncomingCommand, CommandSource } from "./types.js";
export {
	CommandVerb,
	type DomainVerb,
	type InfoVerb,
	type ParsedCommand,
	parseCommand,
} from "./parser.js";
export { Replies, HELP_TEXT, formatDomainList, formatStatusSummary } from "./replies.js";
export { CommandProcessor, type CommandProcessorDeps } from "./processor.js";
export { TelegramCommandSource } from "./telegram-source.js";
export {
	CommandLoop,
	type CommandLoopDeps,
	type CommandLoopPauses,
	DEFAULT_COMMAND_LOOP_PAUSES,
} from "./command-loop.js";
