/**
 * Classification tables for registry replies. Matching is a case-insensitive
 * substring test, first rule wins.
 */

import { Verdict } from "../domain/types.js";

export interface TextRule {
	readonly pattern: string;
	readonly verdict: Verdict;
}

/** Primary-lookup error messages that mean the registry has no such domain. */
export const PRIMARY_NOT_FOUND_RULES: readonly TextRule[] = [
	{ pattern: "domain not found", verdict: Verdict.Available },
	{ pattern: "negative_answer_404", verdict: Verdict.Available },
	{ pattern: "not found", verdict: Verdict.Available },
	{ pattern: "no matching record", verdict: Verdict.Available },
	{ pattern: "does not exist", verdict: Verdict.Available },
];

/** Any of these with a non-empty value means somebody holds the name. */
export const REGISTRATION_INDICATOR_KEYS: readonly string[] = [
	"created",
	"creation_date",
	"registered",
	"registrar",
	"domain_name",
	"expires",
	"expiry_date",
	"updated",
	"status",
];

/** Reply text that means the name is free. */
export const AVAILABLE_TEXT_RULES: readonly TextRule[] = [
	{ pattern: "no match", verdict: Verdict.Available },
	{ pattern: "not found", verdict: Verdict.Available },
	{ pattern: "no data found", verdict: Verdict.Available },
	{ pattern: "not exist", verdict: Verdict.Available },
	{ pattern: "no entries found", verdict: Verdict.Available },
	{ pattern: "no matching record", verdict: Verdict.Available },
	{ pattern: "available", verdict: Verdict.Available },
	{ pattern: "not registered", verdict: Verdict.Available },
	{ pattern: "no such domain", verdict: Verdict.Available },
	{ pattern: "domain not found", verdict: Verdict.Available },
];

/** Verdict when nothing above matched. Ambiguity never raises an alert. */
export const DEFAULT_VERDICT: Verdict = Verdict.Unavailable;
