import type { NormalizedCitation } from "../citation/types.js";
import { renderCitation } from "./dispatcher.js";
import { splitName } from "./shared.js";
import type { BibliographyOrder, CitationStyle } from "./types.js";

export interface Bibliography {
	style: CitationStyle;
	order: BibliographyOrder;
	entries: string[];
}

export interface AssembleOptions {
	/** "input" keeps the caller's order; "author" sorts by first author, year, then title. */
	order?: BibliographyOrder;
}

function compareText(a: string, b: string): number {
	return a.localeCompare(b, "en", { sensitivity: "base" });
}

function leadSurname(citation: NormalizedCitation): string {
	const [first] = citation.authors;
	return first === undefined ? "" : splitName(first).surname;
}

// Undated works sort after dated ones by the same author.
function yearKey(citation: NormalizedCitation): number {
	return citation.year.kind === "known" ? citation.year.value : Number.POSITIVE_INFINITY;
}

export function compareByAuthor(a: NormalizedCitation, b: NormalizedCitation): number {
	return (
		compareText(leadSurname(a), leadSurname(b)) ||
		yearKey(a) - yearKey(b) ||
		compareText(a.title, b.title)
	);
}

export function assembleBibliography(
	style: CitationStyle,
	citations: readonly NormalizedCitation[],
	options: AssembleOptions = {},
): Bibliography {
	const order = options.order ?? "input";
	// Array.prototype.sort is stable, so ties keep their input order.
	const ordered = order === "author" ? [...citations].sort(compareByAuthor) : citations;
	return {
		style,
		order,
		entries: ordered.map((citation) => renderCitation(style, citation)),
	};
}
