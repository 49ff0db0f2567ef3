export const CITATION_KINDS = ["book", "article", "website", "report"] as const;
export type CitationKind = (typeof CITATION_KINDS)[number];

export const CITATION_FIELDS = [
	"title",
	"authors",
	"year",
	"publisher",
	"place",
	"edition",
	"journal",
	"volume",
	"issue",
	"pages",
	"doi",
	"url",
	"accessDate",
] as const;
export type CitationField = (typeof CITATION_FIELDS)[number];

export interface FieldRequirements {
	required: readonly CitationField[];
	optional: readonly CitationField[];
}

/**
 * Which fields each kind accepts. Order of `required` is the order missing
 * fields are reported in.
 */
export const FIELD_REQUIREMENTS: Record<CitationKind, FieldRequirements> = {
	book: {
		required: ["title", "authors", "year", "publisher", "place", "edition"],
		optional: [],
	},
	article: {
		required: ["title", "authors", "year", "journal", "volume", "issue", "pages", "doi"],
		optional: [],
	},
	website: {
		required: ["title", "authors", "year", "publisher", "url", "accessDate"],
		optional: [],
	},
	report: {
		required: ["title", "authors", "year", "publisher", "url", "place"],
		optional: [],
	},
};

export function isCitationField(value: string): value is CitationField {
	return (CITATION_FIELDS as readonly string[]).includes(value);
}

export function allowedFields(kind: CitationKind): CitationField[] {
	const { required, optional } = FIELD_REQUIREMENTS[kind];
	return [...required, ...optional];
}
