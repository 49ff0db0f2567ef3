import type { PublicationYear } from "../citation/types.js";
import { escapeMarkup } from "./markup.js";

export const NO_DATE = "n.d.";

export interface PersonName {
	surname: string;
	given: string[];
}

/** "Mary Ann Evans" → surname "Evans", given ["Mary", "Ann"]; one-word names have no given names. */
export function splitName(name: string): PersonName {
	const parts = name.trim().split(/\s+/);
	const surname = parts.pop() ?? "";
	return { surname, given: parts };
}

export interface AuthorListStyle {
	/** Renders the first author. */
	lead: (name: string) => string;
	/** Renders the second author of a two-author list. */
	second: (name: string) => string;
	conjunction: string;
	etAl: string;
}

/**
 * One author renders alone, two are joined by the style's conjunction, and
 * three or more collapse to the first author plus "et al.". Output is escaped.
 */
export function formatAuthorList(authors: readonly string[], style: AuthorListStyle): string {
	const [first, second] = authors;
	if (first === undefined) return "";
	const lead = escapeMarkup(style.lead(first));
	if (authors.length === 1 || second === undefined) return lead;
	if (authors.length === 2) return `${lead}${style.conjunction}${escapeMarkup(style.second(second))}`;
	return `${lead}${style.etAl}`;
}

export function yearText(year: PublicationYear): string {
	return year.kind === "known" ? String(year.value) : NO_DATE;
}

export function ordinal(value: number): string {
	const lastTwo = value % 100;
	if (lastTwo >= 11 && lastTwo <= 13) return `${value}th`;
	switch (value % 10) {
		case 1:
			return `${value}st`;
		case 2:
			return `${value}nd`;
		case 3:
			return `${value}rd`;
		default:
			return `${value}th`;
	}
}

export function editionText(edition: number): string {
	return `${ordinal(edition)} ed.`;
}

/** "1-3, 5-7" → "1–3, 5–7" (en dash). */
export function pageRangeText(pages: string): string {
	return pages.replace(/-/g, "–");
}

export function doiLink(doi: string): string {
	return `https://doi.org/${doi}`;
}

export interface CalendarDate {
	year: number;
	month: number;
	day: number;
}

/** Split a validated YYYY-MM-DD string; month is 1-based. */
export function parseIsoDate(value: string): CalendarDate {
	const [year, month, day] = value.split("-").map(Number);
	return { year, month, day };
}
