/**
 * Exception classes for the intake checker
 *
 */

import type { ZodError } from "zod";

/** Render each zod issue as `path: message`. */
export function formatZodIssues(error: ZodError): string[] {
	return error.errors.map((e) => `${e.path.join(".") || "(root)"}: ${e.message}`);
}

export class IntakeError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "IntakeError";
	}
}

/** Raised before any network call when settings or inputs are unusable. */
export class ConfigurationError extends IntakeError {
	constructor(message: string) {
		super(message);
		this.name = "ConfigurationError";
	}
}

export class ServiceError extends IntakeError {
	/** Exception raised when the hosted agent service errors, fails a task or times out. */
	public readonly statusCode: number;
	public readonly taskId?: string | null;

	constructor(
		message: string,
		statusCode: number = 502,
		taskId?: string | null,
	) {
		super(message);
		this.name = "ServiceError";
		this.statusCode = statusCode;
		this.taskId = taskId;
	}
}

export class ValidationError extends IntakeError {
	/** Exception raised when the agent's answer does not match the result schema. */
	public readonly issues: string[];

	constructor(message: string, issues: string[] = []) {
		super(issues.length > 0 ? `${message}: ${issues.join(", ")}` : message);
		this.name = "ValidationError";
		this.issues = issues;
	}

	static fromZodError(message: string, error: ZodError): ValidationError {
		return new ValidationError(message, formatZodIssues(error));
	}
}
