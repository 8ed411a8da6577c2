export const CommandVerb = {
	Add: "add",
	Remove: "remove",
	Reset: "reset",
	List: "list",
	Status: "status",
	Help: "help",
} as const;

export type CommandVerb = (typeof CommandVerb)[keyof typeof CommandVerb];

export type DomainVerb = typeof CommandVerb.Add | typeof CommandVerb.Remove | typeof CommandVerb.Reset;
export type InfoVerb = typeof CommandVerb.List | typeof CommandVerb.Status | typeof CommandVerb.Help;

export type ParsedCommand =
	| { readonly verb: DomainVerb; readonly argument: string | null }
	| { readonly verb: InfoVerb }
	| { readonly verb: "unknown"; readonly name: string };

const DOMAIN_VERBS: ReadonlySet<string> = new Set<DomainVerb>([
	CommandVerb.Add,
	CommandVerb.Remove,
	CommandVerb.Reset,
]);

const INFO_VERBS: ReadonlySet<string> = new Set<InfoVerb>([
	CommandVerb.List,
	CommandVerb.Status,
	CommandVerb.Help,
]);

function isDomainVerb(name: string): name is DomainVerb {
	return DOMAIN_VERBS.has(name);
}

function isInfoVerb(name: string): name is InfoVerb {
	return INFO_VERBS.has(name);
}

/**
 * Parse `/verb[@bot] [argument]`. Returns null for text that is not a
 * command at all. The verb is case-insensitive; only the first argument is
 * kept.
 */
export function parseCommand(rawText: string): ParsedCommand | null {
	const text = rawText.trim();
	if (!text.startsWith("/")) return null;

	const [head = "", argument] = text.split(/\s+/);
	const name = head.slice(1).split("@")[0]?.toLowerCase() ?? "";

	if (isDomainVerb(name)) return { verb: name, argument: argument ?? null };
	if (isInfoVerb(name)) return { verb: name };
	return { verb: "unknown", name };
}
