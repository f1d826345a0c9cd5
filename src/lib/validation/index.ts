/**
 * Validation wrapper over Zod returning Result<T, ValidationError>.
 *
 * Exchange responses, candle messages, database rows and the environment all
 * enter the domain through `validate`. `z` is re-exported so schema modules
 * import it from here and not from "zod".
 */

import { z } from "zod";
import { ErrorCategory, TradingError } from "../../shared/errors.js";
import { err, ok } from "../../shared/result.js";
import type { Result } from "../../shared/result.js";

export { z };

export interface ValidationIssue {
	readonly path: readonly (string | number)[];
	readonly message: string;
}

/** Payload did not match the expected shape. Non-retryable. */
export class ValidationError extends TradingError {
	readonly issues: readonly ValidationIssue[];

	constructor(message: string, issues: readonly ValidationIssue[], context: Record<string, unknown> = {}) {
		super(message, "VALIDATION_FAILED", ErrorCategory.NonRetryable, context);
		this.name = "ValidationError";
		this.issues = issues;
	}
}

function describeIssues(issues: readonly ValidationIssue[]): string {
	return issues.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message)).join("; ");
}

/**
 * Parse `data` with `schema`. The error message lists each failing path.
 * @param label names the payload in the error message, e.g. "clearinghouseState"
 */
export function validate<S extends z.ZodTypeAny>(
	schema: S,
	data: unknown,
	label = "payload",
): Result<z.output<S>, ValidationError> {
	const result = schema.safeParse(data);
	if (result.success) {
		return ok(result.data);
	}
	const issues: ValidationIssue[] = result.error.issues.map((i) => ({
		path: i.path.filter((p): p is string | number => typeof p !== "symbol"),
		message: i.message,
	}));
	return err(new ValidationError(`Invalid ${label}: ${describeIssues(issues)}`, issues, { label }));
}

/** JSON.parse followed by `validate`; a syntax error becomes a ValidationError too. */
export function parseJson<S extends z.ZodTypeAny>(
	schema: S,
	text: string,
	label = "payload",
): Result<z.output<S>, ValidationError> {
	let data: unknown;
	try {
		data = JSON.parse(text);
	} catch (e) {
		const message = e instanceof Error ? e.message : String(e);
		return err(new ValidationError(`Invalid ${label}: not JSON (${message})`, [{ path: [], message }], { label }));
	}
	return validate(schema, data, label);
}
