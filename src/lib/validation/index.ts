/**
 * Validation wrapper — zod schemas checked into Result<T, ValidationError>.
 *
 * Used at the two edges where untrusted JSON enters: the state file and the
 * Telegram Bot API responses. Schemas import `z` from here.
 */

import { z } from "zod";
import { ErrorCategory, WatchError } from "../../shared/errors.js";
import { type Result, err, ok } from "../../shared/result.js";

export { z };

export interface ValidationIssue {
	readonly path: readonly (string | number)[];
	readonly message: string;
}

export class ValidationError extends WatchError {
	readonly issues: readonly ValidationIssue[];

	constructor(message: string, issues: readonly ValidationIssue[]) {
		super(message, "VALIDATION_FAILED", ErrorCategory.NonRetryable, { issues });
		this.name = "ValidationError";
		this.issues = issues;
	}

	/** "domains.example.com.status: Invalid enum value" style summary. */
	describe(): string {
		return this.issues
			.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
			.join("; ");
	}
}

export function validate<T>(schema: z.ZodType<T>, data: unknown): Result<T, ValidationError> {
	const result = schema.safeParse(data);
	if (result.success) {
		return ok(result.data);
	}
	const issues: ValidationIssue[] = result.error.issues.map((i) => ({
		path: i.path.filter((p): p is string | number => typeof p !== "symbol"),
		message: i.message,
	}));
	return err(new ValidationError("Validation failed", issues));
}
