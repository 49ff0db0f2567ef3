import { describe, expect, it } from "vitest";
import { article, book, website } from "../../__tests__/fixtures.js";
import { diffCitations } from "../diff.js";
import { updateCitation } from "../validator.js";

const options = { currentYear: 2024 };

describe("updateCitation", () => {
	it("inherits unchanged fields and reports what changed", () => {
		const result = updateCitation(book, { fields: { edition: 2 } }, options);
		expect(result.ok).toBe(true);
		if (!result.ok) return;
		expect(result.citation).toEqual({ ...book, edition: 2 });
		expect(result.changes).toEqual({ kindChanged: false, changed: ["edition"], removed: [] });
	});

	it("reports no changes when values are re-supplied as they were", () => {
		const result = updateCitation(
			book,
			{ fields: { authors: ["John Ronald Tolkien"], year: 1937 } },
			options,
		);
		expect(result.ok && result.changes).toEqual({ kindChanged: false, changed: [], removed: [] });
	});

	it("round-trips a record whose page numbers exceed double precision", () => {
		const long = { ...article, pages: "1-1000000000000000000000" };
		const result = updateCitation(long, { fields: { issue: "4" } }, options);
		expect(result.ok).toBe(true);
		if (!result.ok) return;
		expect(result.citation).toEqual({ ...long, issue: "4" });
		expect(result.changes.changed).toEqual(["issue"]);
	});

	it("rejects fields the current kind does not accept", () => {
		const result = updateCitation(book, { fields: { url: "https://example.com" } }, options);
		expect(result.ok).toBe(false);
		if (result.ok) return;
		expect(result.errors.schemaErrors[0]?.code).toBe("FIELDS_NOT_VALID_FOR_KIND");
	});

	it("names the fields a kind change still needs", () => {
		const result = updateCitation(website, { kind: "report", fields: {} }, options);
		expect(result.ok).toBe(false);
		if (result.ok) return;
		expect(result.errors.schemaErrors).toEqual([
			{
				code: "KIND_CHANGE_UNSATISFIED",
				from: "website",
				to: "report",
				fields: ["place"],
				message: "Changing type from website to report requires additional fields: place",
			},
		]);
	});

	it("drops fields the new kind does not accept", () => {
		const result = updateCitation(website, { kind: "report", fields: { place: "Springfield" } }, options);
		expect(result.ok).toBe(true);
		if (!result.ok) return;
		expect(result.citation).toEqual({
			kind: "report",
			title: "Caring for houseplants",
			authors: ["Mary Ann Evans", "Grace Hopper", "Alan Turing"],
			year: { kind: "unknown" },
			publisher: "Green Thumb Weekly",
			url: "https://example.com/plants",
			place: "Springfield",
		});
		expect(result.changes).toEqual({
			kindChanged: true,
			changed: ["place"],
			removed: ["accessDate"],
		});
	});
});

describe("diffCitations", () => {
	it("compares years by value", () => {
		const changes = diffCitations(book, { ...book, year: { kind: "unknown" } });
		expect(changes.changed).toEqual(["year"]);
	});

	it("compares author lists entry by entry", () => {
		const changes = diffCitations(book, { ...book, authors: ["John Ronald Tolkien", "Christopher Tolkien"] });
		expect(changes.changed).toEqual(["authors"]);
	});
});
