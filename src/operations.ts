import { z } from "zod";
import {
	CITATION_KINDS,
	FIELD_REQUIREMENTS,
	type NormalizedCitation,
	type ValidationErrors,
	type ValidationOptions,
	describeValidationErrors,
	summarizeValidationErrors,
	updateCitation,
	validateCitation,
} from "./citation/index.js";
import type { Config } from "./config.js";
import {
	BIBLIOGRAPHY_ORDERS,
	type BibliographyOrder,
	CITATION_STYLES,
	type CitationStyle,
	assembleBibliography,
	renderCitation,
} from "./formatting/index.js";
import type { ToolResponseEnvelope } from "./types.js";

export interface EngineSettings {
	validation: ValidationOptions;
	defaultStyle: CitationStyle;
	bibliographyOrder: BibliographyOrder;
}

export function engineSettings(config: Config): EngineSettings {
	return {
		validation: { yearUpperSlack: config.YEAR_UPPER_SLACK },
		defaultStyle: config.DEFAULT_STYLE,
		bibliographyOrder: config.BIBLIOGRAPHY_ORDER,
	};
}

// --- Request shapes, shared by the MCP tools and the JSON routes ---

export const kindSchema = z.enum(CITATION_KINDS).describe("Citation kind");
export const styleSchema = z.enum(CITATION_STYLES).describe("Bibliographic style");
export const orderSchema = z.enum(BIBLIOGRAPHY_ORDERS).describe("Bibliography ordering policy");
export const fieldsSchema = z
	.record(z.string(), z.unknown())
	.describe("Citation fields by name; year may be null for 'no date'");

export const citationInputSchema = z.object({ kind: kindSchema, fields: fieldsSchema });

export const validateRequestShape = { kind: kindSchema, fields: fieldsSchema };
export const updateRequestShape = {
	original: citationInputSchema.describe("The citation as previously stored"),
	kind: kindSchema.optional().describe("New kind; omit to keep the original's"),
	fields: fieldsSchema,
};
export const formatRequestShape = {
	style: styleSchema.optional(),
	kind: kindSchema,
	fields: fieldsSchema,
};
export const bibliographyRequestShape = {
	style: styleSchema.optional(),
	order: orderSchema.optional(),
	citations: z.array(citationInputSchema).describe("Citations in the order they were added"),
};

export type ValidateRequest = z.infer<z.ZodObject<typeof validateRequestShape>>;
export type UpdateRequest = z.infer<z.ZodObject<typeof updateRequestShape>>;
export type FormatRequest = z.infer<z.ZodObject<typeof formatRequestShape>>;
export type BibliographyRequest = z.infer<z.ZodObject<typeof bibliographyRequestShape>>;

// --- Operations ---

function validationFailure(
	code: "VALIDATION_FAILED" | "INVALID_ORIGINAL",
	errors: ValidationErrors,
): ToolResponseEnvelope {
	return {
		valid: false,
		metadata: null,
		error: {
			code,
			message: summarizeValidationErrors(errors),
			details: { ...describeValidationErrors(errors), errors: errors.schemaErrors },
		},
	};
}

export function validateOperation(
	request: ValidateRequest,
	settings: EngineSettings,
): ToolResponseEnvelope {
	const result = validateCitation(request.kind, request.fields, undefined, settings.validation);
	if (!result.ok) {
		return validationFailure("VALIDATION_FAILED", result.errors);
	}
	return { valid: true, metadata: { citation: result.citation }, error: null };
}

export function updateOperation(
	request: UpdateRequest,
	settings: EngineSettings,
): ToolResponseEnvelope {
	const original = validateCitation(
		request.original.kind,
		request.original.fields,
		undefined,
		settings.validation,
	);
	if (!original.ok) {
		return validationFailure("INVALID_ORIGINAL", original.errors);
	}

	const result = updateCitation(
		original.citation,
		{ kind: request.kind, fields: request.fields },
		settings.validation,
	);
	if (!result.ok) {
		return validationFailure("VALIDATION_FAILED", result.errors);
	}
	return {
		valid: true,
		metadata: { citation: result.citation, changes: result.changes },
		error: null,
	};
}

export function formatOperation(
	request: FormatRequest,
	settings: EngineSettings,
): ToolResponseEnvelope {
	const style = request.style ?? settings.defaultStyle;
	const result = validateCitation(request.kind, request.fields, undefined, settings.validation);
	if (!result.ok) {
		return validationFailure("VALIDATION_FAILED", result.errors);
	}
	return {
		valid: true,
		metadata: { style, formatted: renderCitation(style, result.citation) },
		error: null,
	};
}

export function bibliographyOperation(
	request: BibliographyRequest,
	settings: EngineSettings,
): ToolResponseEnvelope {
	const style = request.style ?? settings.defaultStyle;
	const order = request.order ?? settings.bibliographyOrder;

	const citations: NormalizedCitation[] = [];
	const failures: Array<{ index: number; general: string[]; fields: Record<string, string> }> = [];

	request.citations.forEach((input, index) => {
		const result = validateCitation(input.kind, input.fields, undefined, settings.validation);
		if (result.ok) {
			citations.push(result.citation);
		} else {
			failures.push({ index, ...describeValidationErrors(result.errors) });
		}
	});

	if (failures.length > 0) {
		return {
			valid: false,
			metadata: null,
			error: {
				code: "VALIDATION_FAILED",
				message: `${failures.length} of ${request.citations.length} citations failed validation (indexes ${failures.map((f) => f.index).join(", ")})`,
				details: { citations: failures },
			},
		};
	}

	const bibliography = assembleBibliography(style, citations, { order });
	return {
		valid: true,
		metadata: {
			style: bibliography.style,
			order: bibliography.order,
			entries: bibliography.entries,
		},
		error: null,
	};
}

export function describeKindsOperation(): ToolResponseEnvelope {
	return {
		valid: true,
		metadata: {
			kinds: Object.fromEntries(
				CITATION_KINDS.map((kind) => [
					kind,
					{
						required: [...FIELD_REQUIREMENTS[kind].required],
						optional: [...FIELD_REQUIREMENTS[kind].optional],
					},
				]),
			),
			styles: [...CITATION_STYLES],
		},
		error: null,
	};
}
