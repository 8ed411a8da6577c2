import type { Verdict } from "../domain/types.js";

/** What a registry lookup returned: the raw reply plus normalized fields. */
export interface LookupResponse {
	readonly text: string;
	/** Keys lower-cased with `_` separators (`creation_date`, `registrar`, ...). */
	readonly fields: Readonly<Record<string, unknown>>;
}

/** One registry protocol (RDAP, WHOIS). May throw; the prober classifies failures. */
export interface DomainLookup {
	readonly name: string;
	lookup(domain: string, signal: AbortSignal): Promise<LookupResponse>;
}

export interface ProbeTimeouts {
	readonly primaryMs: number;
	readonly secondaryMs: number;
}

export const ProbeStage = {
	Primary: "primary",
	Secondary: "secondary",
} as const;

export type ProbeStage = (typeof ProbeStage)[keyof typeof ProbeStage];

/** Verdict plus how it was reached, for logs and the `check` command. */
export interface ProbeReport {
	readonly domain: string;
	readonly verdict: Verdict;
	readonly stage: ProbeStage;
	readonly reason: string;
}

/** Never rejects: every failure degrades to a definite verdict. */
export interface DomainAvailabilityProbe {
	probe(domain: string): Promise<Verdict>;
}
