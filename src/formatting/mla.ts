import type {
	ArticleCitation,
	BookCitation,
	ReportCitation,
	WebsiteCitation,
} from "../citation/types.js";
import { escapeMarkup, italic, punctuate } from "./markup.js";
import {
	doiLink,
	editionText,
	formatAuthorList,
	pageRangeText,
	parseIsoDate,
	splitName,
	yearText,
} from "./shared.js";
import { titleCase } from "./text-case.js";
import type { StyleRenderers } from "./types.js";

// MLA abbreviates months longer than four letters.
const MONTHS = [
	"Jan.",
	"Feb.",
	"Mar.",
	"Apr.",
	"May",
	"June",
	"July",
	"Aug.",
	"Sept.",
	"Oct.",
	"Nov.",
	"Dec.",
];

/** "Mary Ann Evans" → "Evans, Mary Ann" */
export function mlaInvertedName(name: string): string {
	const { surname, given } = splitName(name);
	return given.length > 0 ? `${surname}, ${given.join(" ")}` : surname;
}

export function mlaAuthors(authors: readonly string[]): string {
	return formatAuthorList(authors, {
		lead: mlaInvertedName,
		second: (name) => name,
		conjunction: ", and ",
		etAl: ", et al.",
	});
}

/** "2024-03-05" → "5 Mar. 2024" */
export function mlaAccessDate(isoDate: string): string {
	const { year, month, day } = parseIsoDate(isoDate);
	return `${day} ${MONTHS[month - 1]} ${year}`;
}

function quotedTitle(title: string): string {
	return `"${punctuate(escapeMarkup(titleCase(title)))}"`;
}

function renderBook(citation: BookCitation): string {
	return [
		punctuate(mlaAuthors(citation.authors)),
		punctuate(italic(titleCase(citation.title))),
		`${editionText(citation.edition)},`,
		`${escapeMarkup(citation.place)}: ${escapeMarkup(citation.publisher)},`,
		punctuate(yearText(citation.year)),
	].join(" ");
}

function renderArticle(citation: ArticleCitation): string {
	const container = [
		italic(titleCase(citation.journal)),
		`vol. ${citation.volume}`,
		`no. ${escapeMarkup(citation.issue)}`,
		yearText(citation.year),
		`pp. ${pageRangeText(citation.pages)}`,
	].join(", ");
	return [
		punctuate(mlaAuthors(citation.authors)),
		quotedTitle(citation.title),
		`${container}.`,
		punctuate(escapeMarkup(doiLink(citation.doi))),
	].join(" ");
}

function renderWebsite(citation: WebsiteCitation): string {
	return [
		punctuate(mlaAuthors(citation.authors)),
		quotedTitle(citation.title),
		`${italic(titleCase(citation.publisher))},`,
		`${yearText(citation.year)},`,
		punctuate(escapeMarkup(citation.url)),
		`Accessed ${mlaAccessDate(citation.accessDate)}.`,
	].join(" ");
}

function renderReport(citation: ReportCitation): string {
	return [
		punctuate(mlaAuthors(citation.authors)),
		punctuate(italic(titleCase(citation.title))),
		`${escapeMarkup(citation.place)}: ${escapeMarkup(citation.publisher)},`,
		`${yearText(citation.year)},`,
		punctuate(escapeMarkup(citation.url)),
	].join(" ");
}

export const mlaRenderers: StyleRenderers = {
	book: renderBook,
	article: renderArticle,
	website: renderWebsite,
	report: renderReport,
};
