import { describe, expect, it } from "vitest";
import { rawArticle, rawBook } from "../../__tests__/fixtures.js";
import {
	type CitationKind,
	type NormalizedCitation,
	type RawCitationInput,
	validateCitation,
} from "../../citation/index.js";
import { renderCitation } from "../dispatcher.js";

function validated(kind: CitationKind, fields: RawCitationInput): NormalizedCitation {
	const result = validateCitation(kind, fields, undefined, { currentYear: 2024 });
	if (!result.ok) throw new Error("fixture should validate");
	return result.citation;
}

function occurrences(text: string, part: string): number {
	return text.split(part).length - 1;
}

const twoAuthorBook = {
	...rawBook,
	title: "pride and prejudice",
	authors: ["Jane Austen", "Charlotte Bronte"],
	year: 1813,
	publisher: "T. Egerton",
	place: "London",
	edition: 2,
};

const threeAuthorArticle = {
	...rawArticle,
	authors: ["Ada Lovelace", "Charles Babbage", "Alan Turing"],
};

describe("book with two authors", () => {
	const citation = validated("book", twoAuthorBook);

	it("renders in APA with an ampersand and an italic title", () => {
		expect(renderCitation("apa", citation)).toBe(
			"Austen, J., &amp; Bronte, C. (1813). <i>Pride and prejudice</i> (2nd ed.). London: T. Egerton.",
		);
	});

	it("renders in MLA with 'and' and an italic title", () => {
		expect(renderCitation("mla", citation)).toBe(
			"Austen, Jane, and Charlotte Bronte. <i>Pride and Prejudice</i>. 2nd ed., London: T. Egerton, 1813.",
		);
	});

	it("includes every required field exactly once in both styles", () => {
		for (const style of ["apa", "mla"] as const) {
			const rendered = renderCitation(style, citation);
			expect(occurrences(rendered, "Austen")).toBe(1);
			expect(occurrences(rendered, "Bronte")).toBe(1);
			expect(occurrences(rendered, "1813")).toBe(1);
			expect(occurrences(rendered, "T. Egerton")).toBe(1);
			expect(occurrences(rendered, "London")).toBe(1);
			expect(occurrences(rendered, "2nd ed.")).toBe(1);
			expect(occurrences(rendered.toLowerCase(), "pride and prejudice")).toBe(1);
		}
	});
});

describe("article with three authors", () => {
	const citation = validated("article", threeAuthorArticle);

	it("names only the first author plus et al. in APA", () => {
		expect(renderCitation("apa", citation)).toBe(
			"Lovelace, A., et al. (2021). Deep learning for JSON parsing. <i>Journal of Data Systems</i>, <i>12</i>(3), 45–67. https://doi.org/10.1234/jds.2021.003",
		);
	});

	it("names only the first author plus et al. in MLA", () => {
		expect(renderCitation("mla", citation)).toBe(
			'Lovelace, Ada, et al. "Deep Learning for JSON Parsing." <i>Journal of Data Systems</i>, vol. 12, no. 3, 2021, pp. 45–67. https://doi.org/10.1234/jds.2021.003.',
		);
	});
});

describe("determinism", () => {
	it("gives the same output for repeated validate-then-render", () => {
		for (const style of ["apa", "mla"] as const) {
			const first = renderCitation(style, validated("article", threeAuthorArticle));
			const second = renderCitation(style, validated("article", threeAuthorArticle));
			expect(second).toBe(first);
		}
	});
});
