import { CommandErrorKind, CommandValidationError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";

const FORBIDDEN = /[\s/\\?#]/;

/** Store key form of a domain: trimmed and lower-cased. */
export function normalizeDomain(raw: string): string {
	return raw.trim().toLowerCase();
}

/**
 * Loose syntax check for operator input: catches a missing dot, spaces and
 * URL fragments. Whether the name really exists is for the registry lookups.
 */
export function validateDomain(raw: string): Result<string, CommandValidationError> {
	const domain = normalizeDomain(raw);
	if (domain.length === 0) {
		return err(invalid(raw, "domain is empty"));
	}
	if (!domain.includes(".")) {
		return err(invalid(raw, "domain must contain a dot"));
	}
	if (FORBIDDEN.test(domain)) {
		return err(invalid(raw, "domain contains whitespace or a path character"));
	}
	return ok(domain);
}

function invalid(raw: string, reason: string): CommandValidationError {
	return new CommandValidationError(CommandErrorKind.InvalidDomain, `Invalid domain: ${reason}`, {
		input: raw,
	});
}
