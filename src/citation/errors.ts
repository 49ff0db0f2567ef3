import type { ValidationErrors } from "./types.js";

export interface ValidationSummary {
	/** Messages not tied to one input, such as missing or disallowed fields. */
	general: string[];
	/** Messages to show next to the input they concern. */
	fields: Record<string, string>;
}

export function describeValidationErrors(errors: ValidationErrors): ValidationSummary {
	const fields: Record<string, string> = {};
	for (const [field, message] of Object.entries(errors.fieldErrors)) {
		if (message !== undefined) fields[field] = message;
	}
	return {
		general: errors.schemaErrors.map((error) => error.message),
		fields,
	};
}

/** One-line summary, e.g. for an error envelope's `message`. */
export function summarizeValidationErrors(errors: ValidationErrors): string {
	const { general, fields } = describeValidationErrors(errors);
	const parts = [...general, ...Object.entries(fields).map(([field, message]) => `${field}: ${message}`)];
	return parts.join("; ");
}
