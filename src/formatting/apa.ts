import type {
	ArticleCitation,
	BookCitation,
	PublicationYear,
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
import { sentenceCase } from "./text-case.js";
import type { StyleRenderers } from "./types.js";

const MONTHS = [
	"January",
	"February",
	"March",
	"April",
	"May",
	"June",
	"July",
	"August",
	"September",
	"October",
	"November",
	"December",
];

/** "Jean-Paul" → "J.-P.", "Mary" → "M." */
function initialsOf(givenName: string): string {
	return givenName
		.split("-")
		.map((part) => part.match(/\p{L}/u)?.[0]?.toUpperCase())
		.filter((initial): initial is string => initial !== undefined)
		.map((initial) => `${initial}.`)
		.join("-");
}

/** "John Ronald Tolkien" → "Tolkien, J. R." */
export function apaName(name: string): string {
	const { surname, given } = splitName(name);
	const initials = given.map(initialsOf).filter(Boolean);
	return initials.length > 0 ? `${surname}, ${initials.join(" ")}` : surname;
}

export function apaAuthors(authors: readonly string[]): string {
	return formatAuthorList(authors, {
		lead: apaName,
		second: apaName,
		conjunction: ", &amp; ",
		etAl: ", et al.",
	});
}

function apaYear(year: PublicationYear): string {
	return `(${yearText(year)}).`;
}

/** "2024-03-05" → "March 5, 2024" */
export function apaRetrievalDate(isoDate: string): string {
	const { year, month, day } = parseIsoDate(isoDate);
	return `${MONTHS[month - 1]} ${day}, ${year}`;
}

function publisherWithPlace(place: string, publisher: string): string {
	return punctuate(`${escapeMarkup(place)}: ${escapeMarkup(publisher)}`);
}

function renderBook(citation: BookCitation): string {
	return [
		apaAuthors(citation.authors),
		apaYear(citation.year),
		`${italic(sentenceCase(citation.title))} (${editionText(citation.edition)}).`,
		publisherWithPlace(citation.place, citation.publisher),
	].join(" ");
}

function renderArticle(citation: ArticleCitation): string {
	const source = `${italic(citation.journal)}, ${italic(String(citation.volume))}(${escapeMarkup(citation.issue)}), ${pageRangeText(citation.pages)}.`;
	return [
		apaAuthors(citation.authors),
		apaYear(citation.year),
		punctuate(escapeMarkup(sentenceCase(citation.title))),
		source,
		escapeMarkup(doiLink(citation.doi)),
	].join(" ");
}

function renderWebsite(citation: WebsiteCitation): string {
	return [
		apaAuthors(citation.authors),
		apaYear(citation.year),
		punctuate(italic(sentenceCase(citation.title))),
		punctuate(escapeMarkup(citation.publisher)),
		`Retrieved ${apaRetrievalDate(citation.accessDate)}, from ${escapeMarkup(citation.url)}`,
	].join(" ");
}

function renderReport(citation: ReportCitation): string {
	return [
		apaAuthors(citation.authors),
		apaYear(citation.year),
		`${italic(sentenceCase(citation.title))} [Report].`,
		publisherWithPlace(citation.place, citation.publisher),
		escapeMarkup(citation.url),
	].join(" ");
}

export const apaRenderers: StyleRenderers = {
	book: renderBook,
	article: renderArticle,
	website: renderWebsite,
	report: renderReport,
};
