/**
 * Validation wrapper — thin abstraction over Zod that returns Result<T, ValidationError>.
 *
 * Domain code imports `{ z }` from here rather than from "zod" directly, so the
 * dependency stays behind one import path.
 */

import { z } from "zod";
import { AdapterError, ErrorCategory } from "../../shared/errors.js";
import { err, ok } from "../../shared/result.js";
import type { Result } from "../../shared/result.js";

export { z };

/** A single validation failure with the path to the invalid field and a message. */
export interface ValidationIssue {
	readonly path: readonly (string | number)[];
	readonly message: string;
}

/** Configuration-category error containing one or more validation issues. */
export class ValidationError extends AdapterError {
	readonly issues: readonly ValidationIssue[];

	constructor(message: string, issues: readonly ValidationIssue[]) {
		super(message, "VALIDATION_FAILED", ErrorCategory.Configuration, {
			issues: issues.map(formatIssue),
		});
		this.name = "ValidationError";
		this.issues = issues;
	}
}

function formatIssue(issue: ValidationIssue): string {
	return issue.path.length === 0 ? issue.message : `${issue.path.join(".")}: ${issue.message}`;
}

/**
 * Validate data against a Zod schema, returning a Result instead of throwing.
 * @param label - Prefix for the error message, e.g. "adapter config"
 */
export function validate<S extends z.ZodTypeAny>(
	schema: S,
	data: unknown,
	label = "input",
): Result<z.output<S>, ValidationError> {
	const result = schema.safeParse(data);
	if (result.success) {
		return ok(result.data);
	}
	const issues: ValidationIssue[] = result.error.issues.map((i) => ({
		path: i.path.filter((p): p is string | number => typeof p !== "symbol"),
		message: i.message,
	}));
	const summary = issues.map(formatIssue).join("; ");
	return err(new ValidationError(`Invalid ${label}: ${summary}`, issues));
}
