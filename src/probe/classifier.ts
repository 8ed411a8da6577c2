import { Verdict } from "../domain/types.js";
import { isLookupNotFound } from "../shared/errors.js";
import {
	AVAILABLE_TEXT_RULES,
	DEFAULT_VERDICT,
	PRIMARY_NOT_FOUND_RULES,
	REGISTRATION_INDICATOR_KEYS,
	type TextRule,
} from "./rules.js";
import type { LookupResponse } from "./types.js";

export interface Classification {
	readonly verdict: Verdict;
	readonly reason: string;
}

export function matchRule(text: string, rules: readonly TextRule[]): TextRule | undefined {
	const haystack = text.toLowerCase();
	return rules.find((rule) => haystack.includes(rule.pattern));
}

/**
 * A primary-lookup failure that already answers the question, or null when
 * the secondary lookup should be tried.
 */
export function classifyPrimaryError(error: unknown): Classification | null {
	if (isLookupNotFound(error)) {
		return { verdict: Verdict.Available, reason: "registry has no record" };
	}
	const message = error instanceof Error ? error.message : String(error);
	const rule = matchRule(message, PRIMARY_NOT_FOUND_RULES);
	return rule ? { verdict: rule.verdict, reason: `lookup error matched "${rule.pattern}"` } : null;
}

function isPresent(value: unknown): boolean {
	if (value === null || value === undefined) return false;
	if (typeof value === "string") return value.trim().length > 0;
	if (Array.isArray(value)) return value.some(isPresent);
	return true;
}

/** First registration-indicator key carrying a value, if any. */
export function findRegistrationIndicator(
	fields: Readonly<Record<string, unknown>>,
): string | undefined {
	return REGISTRATION_INDICATOR_KEYS.find((key) => isPresent(fields[key]));
}

/** Registration fields first, then the reply text, then the default. */
export function classifyLookupResponse(response: LookupResponse): Classification {
	const indicator = findRegistrationIndicator(response.fields);
	if (indicator !== undefined) {
		return { verdict: Verdict.Unavailable, reason: `registration field "${indicator}" present` };
	}
	const rule = matchRule(response.text, AVAILABLE_TEXT_RULES);
	if (rule) {
		return { verdict: rule.verdict, reason: `reply matched "${rule.pattern}"` };
	}
	return { verdict: DEFAULT_VERDICT, reason: "no rule matched" };
}
