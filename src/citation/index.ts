export { normalizeAuthors, type AuthorListError, type AuthorListResult } from "./authors.js";
export { diffCitations } from "./diff.js";
export { describeValidationErrors, summarizeValidationErrors, type ValidationSummary } from "./errors.js";
export {
	CITATION_FIELDS,
	CITATION_KINDS,
	FIELD_REQUIREMENTS,
	type CitationField,
	type CitationKind,
	type FieldRequirements,
	allowedFields,
} from "./kinds.js";
export type {
	ArticleCitation,
	BookCitation,
	CitationByKind,
	CitationChanges,
	FieldErrors,
	NormalizedCitation,
	PublicationYear,
	RawCitationInput,
	ReportCitation,
	SchemaError,
	UpdateResult,
	ValidationErrors,
	ValidationOptions,
	ValidationResult,
	WebsiteCitation,
} from "./types.js";
export { citationToInput, type CitationUpdate, updateCitation, validateCitation } from "./validator.js";
