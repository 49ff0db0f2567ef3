import type { CitationField, CitationKind } from "./kinds.js";

/** Publication year: a value, or a deliberate "no date" (distinct from omission). */
export type PublicationYear = { kind: "known"; value: number } | { kind: "unknown" };

/** Untyped field map as received at the boundary. */
export type RawCitationInput = Record<string, unknown>;

interface CitationCore {
	title: string;
	authors: string[];
	year: PublicationYear;
}

export interface BookCitation extends CitationCore {
	kind: "book";
	publisher: string;
	place: string;
	edition: number;
}

export interface ArticleCitation extends CitationCore {
	kind: "article";
	journal: string;
	volume: number;
	issue: string;
	pages: string;
	doi: string;
}

export interface WebsiteCitation extends CitationCore {
	kind: "website";
	publisher: string;
	url: string;
	accessDate: string;
}

export interface ReportCitation extends CitationCore {
	kind: "report";
	publisher: string;
	url: string;
	place: string;
}

export interface CitationByKind {
	book: BookCitation;
	article: ArticleCitation;
	website: WebsiteCitation;
	report: ReportCitation;
}

export type NormalizedCitation = CitationByKind[CitationKind];

export type SchemaError =
	| {
			code: "MISSING_REQUIRED_FIELDS";
			kind: CitationKind;
			fields: CitationField[];
			message: string;
	  }
	| {
			code: "FIELDS_NOT_VALID_FOR_KIND";
			kind: CitationKind;
			fields: string[];
			message: string;
	  }
	| {
			code: "KIND_CHANGE_UNSATISFIED";
			from: CitationKind;
			to: CitationKind;
			fields: CitationField[];
			message: string;
	  };

export type FieldErrors = Partial<Record<CitationField, string>>;

export interface ValidationErrors {
	schemaErrors: SchemaError[];
	fieldErrors: FieldErrors;
}

export type ValidationResult =
	| { ok: true; citation: NormalizedCitation }
	| { ok: false; errors: ValidationErrors };

export interface CitationChanges {
	kindChanged: boolean;
	changed: CitationField[];
	removed: CitationField[];
}

export type UpdateResult =
	| { ok: true; citation: NormalizedCitation; changes: CitationChanges }
	| { ok: false; errors: ValidationErrors };

export interface ValidationOptions {
	/** Year used as the upper bound for `year`. Defaults to the clock's year. */
	currentYear?: number;
	/** Extra years tolerated past `currentYear` (forthcoming works). */
	yearUpperSlack?: number;
}
