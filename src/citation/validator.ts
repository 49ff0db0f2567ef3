import { z } from "zod";
import { createCitationSchemas } from "./fields.js";
import { diffCitations } from "./diff.js";
import {
	type CitationField,
	type CitationKind,
	FIELD_REQUIREMENTS,
	allowedFields,
	isCitationField,
} from "./kinds.js";
import type {
	FieldErrors,
	NormalizedCitation,
	RawCitationInput,
	SchemaError,
	UpdateResult,
	ValidationOptions,
	ValidationResult,
} from "./types.js";

/** Turn a normalized record back into boundary input (`year: null` for "no date"). */
export function citationToInput(citation: NormalizedCitation): RawCitationInput {
	const { kind: _kind, year, ...fields } = citation;
	return { ...fields, year: year.kind === "known" ? year.value : null };
}

function presentEntries(input: RawCitationInput): RawCitationInput {
	return Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined));
}

function pick(input: RawCitationInput, fields: readonly string[]): RawCitationInput {
	return Object.fromEntries(Object.entries(input).filter(([key]) => fields.includes(key)));
}

function schemaFor(
	kind: CitationKind,
	options: ValidationOptions,
): z.ZodType<NormalizedCitation, z.ZodTypeDef, unknown> {
	return createCitationSchemas(options)[kind];
}

function formatFieldList(fields: readonly string[]): string {
	return fields.join(", ");
}

/**
 * Validate and normalize field data for one citation kind.
 *
 * Every problem is collected in one pass: unknown keys, missing required keys
 * and per-field format errors are reported together. With `prior`, the input
 * is an update: prior values the target kind accepts fill in what the input
 * leaves out, and a kind change must satisfy the new kind's requirements.
 */
export function validateCitation(
	kind: CitationKind,
	input: RawCitationInput,
	prior?: NormalizedCitation,
	options: ValidationOptions = {},
): ValidationResult {
	const { kind: suppliedKind, ...supplied } = presentEntries(input);
	const inherited = prior ? pick(citationToInput(prior), allowedFields(kind)) : {};
	const merged = { ...inherited, ...supplied, kind };

	// `kind` is not a field; one inside the field map is reported, not applied.
	const invalid: string[] = suppliedKind === undefined ? [] : ["kind"];

	const parsed = schemaFor(kind, options).safeParse(merged);
	if (parsed.success && invalid.length === 0) {
		return { ok: true, citation: parsed.data };
	}

	const missing = new Set<CitationField>();
	const fieldErrors: FieldErrors = {};
	const issues = parsed.success ? [] : parsed.error.issues;

	for (const issue of issues) {
		if (issue.code === z.ZodIssueCode.unrecognized_keys) {
			invalid.push(...issue.keys);
			continue;
		}
		const [field] = issue.path;
		if (typeof field !== "string" || !isCitationField(field)) {
			continue;
		}
		if (issue.code === z.ZodIssueCode.invalid_type && issue.received === z.ZodParsedType.undefined) {
			missing.add(field);
		} else {
			fieldErrors[field] ??= issue.message;
		}
	}

	const schemaErrors: SchemaError[] = [];
	const missingFields = FIELD_REQUIREMENTS[kind].required.filter((field) => missing.has(field));

	if (missingFields.length > 0) {
		if (prior && prior.kind !== kind) {
			schemaErrors.push({
				code: "KIND_CHANGE_UNSATISFIED",
				from: prior.kind,
				to: kind,
				fields: missingFields,
				message: `Changing type from ${prior.kind} to ${kind} requires additional fields: ${formatFieldList(missingFields)}`,
			});
		} else {
			schemaErrors.push({
				code: "MISSING_REQUIRED_FIELDS",
				kind,
				fields: missingFields,
				message: `Missing required ${kind} fields: ${formatFieldList(missingFields)}`,
			});
		}
	}

	if (invalid.length > 0) {
		const keyOrder = Object.keys(input);
		invalid.sort((a, b) => keyOrder.indexOf(a) - keyOrder.indexOf(b));
		const valid = [...allowedFields(kind)].sort();
		schemaErrors.push({
			code: "FIELDS_NOT_VALID_FOR_KIND",
			kind,
			fields: invalid,
			message: `Invalid fields for ${kind}: ${formatFieldList(invalid)}. Valid fields: ${formatFieldList(valid)}`,
		});
	}

	return { ok: false, errors: { schemaErrors, fieldErrors } };
}

export interface CitationUpdate {
	/** Target kind; defaults to the prior record's kind. */
	kind?: CitationKind;
	fields: RawCitationInput;
}

/** Apply an update to a normalized record and report which fields actually changed. */
export function updateCitation(
	prior: NormalizedCitation,
	update: CitationUpdate,
	options: ValidationOptions = {},
): UpdateResult {
	const result = validateCitation(update.kind ?? prior.kind, update.fields, prior, options);
	if (!result.ok) {
		return result;
	}
	return { ok: true, citation: result.citation, changes: diffCitations(prior, result.citation) };
}
