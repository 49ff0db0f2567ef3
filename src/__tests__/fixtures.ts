import type {
	ArticleCitation,
	BookCitation,
	ReportCitation,
	WebsiteCitation,
} from "../citation/index.js";

/** Boundary input for one citation of each kind; all of them validate. */
export const rawBook = {
	title: "the hobbit: there and back again",
	authors: ["John Ronald Tolkien"],
	year: 1937,
	publisher: "Allen & Unwin",
	place: "London",
	edition: 1,
};

export const rawArticle = {
	title: "Deep learning for JSON parsing",
	authors: ["Ada Lovelace", "Charles Babbage"],
	year: 2021,
	journal: "Journal of Data Systems",
	volume: 12,
	issue: "3",
	pages: "45-67",
	doi: "10.1234/jds.2021.003",
};

export const rawWebsite = {
	title: "Caring for houseplants",
	authors: ["Mary Ann Evans", "Grace Hopper", "Alan Turing"],
	year: null,
	publisher: "Green Thumb Weekly",
	url: "https://example.com/plants",
	accessDate: "2024-03-05",
};

export const rawReport = {
	title: "Annual water quality review",
	authors: ["Grace Hopper"],
	year: 2019,
	publisher: "City Water Board",
	url: "https://example.org/report.pdf",
	place: "Springfield",
};

export const book: BookCitation = {
	kind: "book",
	...rawBook,
	year: { kind: "known", value: 1937 },
};

export const article: ArticleCitation = {
	kind: "article",
	...rawArticle,
	year: { kind: "known", value: 2021 },
};

export const website: WebsiteCitation = {
	kind: "website",
	...rawWebsite,
	year: { kind: "unknown" },
};

export const report: ReportCitation = {
	kind: "report",
	...rawReport,
	year: { kind: "known", value: 2019 },
};

export const expectedApa = {
	book: "Tolkien, J. R. (1937). <i>The hobbit: There and back again</i> (1st ed.). London: Allen &amp; Unwin.",
	article:
		"Lovelace, A., &amp; Babbage, C. (2021). Deep learning for JSON parsing. <i>Journal of Data Systems</i>, <i>12</i>(3), 45–67. https://doi.org/10.1234/jds.2021.003",
	website:
		"Evans, M. A., et al. (n.d.). <i>Caring for houseplants</i>. Green Thumb Weekly. Retrieved March 5, 2024, from https://example.com/plants",
	report:
		"Hopper, G. (2019). <i>Annual water quality review</i> [Report]. Springfield: City Water Board. https://example.org/report.pdf",
};

export const expectedMla = {
	book: "Tolkien, John Ronald. <i>The Hobbit: There and Back Again</i>. 1st ed., London: Allen &amp; Unwin, 1937.",
	article:
		'Lovelace, Ada, and Charles Babbage. "Deep Learning for JSON Parsing." <i>Journal of Data Systems</i>, vol. 12, no. 3, 2021, pp. 45–67. https://doi.org/10.1234/jds.2021.003.',
	website:
		'Evans, Mary Ann, et al. "Caring for Houseplants." <i>Green Thumb Weekly</i>, n.d., https://example.com/plants. Accessed 5 Mar. 2024.',
	report:
		"Hopper, Grace. <i>Annual Water Quality Review</i>. Springfield: City Water Board, 2019, https://example.org/report.pdf.",
};
