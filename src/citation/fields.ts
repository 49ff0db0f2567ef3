import { z } from "zod";
import { normalizeAuthors } from "./authors.js";
import type { CitationKind } from "./kinds.js";
import type { CitationByKind, PublicationYear, ValidationOptions } from "./types.js";

export const MAX_TITLE_LENGTH = 500;
export const MAX_PUBLISHER_LENGTH = 200;
export const MAX_JOURNAL_LENGTH = 200;
export const MAX_ISSUE_LENGTH = 50;
export const MAX_PLACE_LENGTH = 100;
export const MAX_PAGES_LENGTH = 50;
export const MAX_DOI_LENGTH = 300;
export const MAX_URL_LENGTH = 2000;

const PLACE_PATTERN = /^[\p{L}\p{M}\s'’.,-]+$/u;
const PAGES_PATTERN = /^\d+-\d+(?:\s*,\s*\d+-\d+)*$/;
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const DOI_PATTERN = /^10\.\d{4,9}\/\S+$/;
const HTTP_URL_PATTERN = /^https?:\/\//i;

const PAGES_FORMAT_MESSAGE =
	"Pages must be in format 'start-end' or multiple ranges like '1-3, 5-7' (e.g., '123-145' or '1-3, 5-7')";
const ACCESS_DATE_MESSAGE = "Access date must be in YYYY-MM-DD format";

/** Issue raised for a required key with no value; the validator reads these as "missing". */
function requiredIssue(ctx: z.RefinementCtx, expected: z.ZodParsedType): void {
	ctx.addIssue({
		code: z.ZodIssueCode.invalid_type,
		expected,
		received: z.ZodParsedType.undefined,
		message: "Required",
	});
}

function nonEmptyText(label: string, max: number) {
	const empty = `${label} must be a non-empty string`;
	return z
		.string({ invalid_type_error: empty })
		.trim()
		.min(1, empty)
		.max(max, `${label} exceeds maximum length of ${max} characters`);
}

function positiveInteger(label: string) {
	const message = `${label} must be a positive integer`;
	return z.number({ invalid_type_error: message }).int(message).positive(message);
}

// Page numbers stay strings: the pattern allows runs longer than a double holds exactly.
function splitRanges(pages: string): Array<[string, string]> {
	return pages.split(",").map((range) => {
		const [start = "", end = ""] = range.trim().split("-");
		return [start, end];
	});
}

function comparePageNumbers(a: string, b: string): number {
	const left = a.replace(/^0+(?=\d)/, "");
	const right = b.replace(/^0+(?=\d)/, "");
	if (left.length !== right.length) return left.length - right.length;
	return left < right ? -1 : left > right ? 1 : 0;
}

export function isCalendarDate(value: string): boolean {
	if (!DATE_PATTERN.test(value)) return false;
	const [year, month, day] = value.split("-").map(Number);
	// setUTCFullYear, unlike Date.UTC, leaves years 0-99 alone.
	const date = new Date(0);
	date.setUTCFullYear(year, month - 1, day);
	return (
		date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day
	);
}

export function maxPublicationYear(options: ValidationOptions = {}): number {
	const currentYear = options.currentYear ?? new Date().getFullYear();
	return currentYear + (options.yearUpperSlack ?? 0);
}

/** One schema per field; each reports its own problems independently of the others. */
export function createFieldSchemas(options: ValidationOptions = {}) {
	const maxYear = maxPublicationYear(options);

	return {
		title: nonEmptyText("Title", MAX_TITLE_LENGTH),
		publisher: nonEmptyText("Publisher", MAX_PUBLISHER_LENGTH),
		journal: nonEmptyText("Journal", MAX_JOURNAL_LENGTH),
		issue: nonEmptyText("Issue", MAX_ISSUE_LENGTH),
		place: nonEmptyText("Place", MAX_PLACE_LENGTH).regex(
			PLACE_PATTERN,
			"Place names can only contain letters, spaces, hyphens, apostrophes, periods, and commas",
		),

		authors: z.unknown().transform((value, ctx): string[] => {
			if (value === undefined) {
				requiredIssue(ctx, z.ZodParsedType.array);
				return z.NEVER;
			}
			const result = normalizeAuthors(value);
			if (!result.ok) {
				ctx.addIssue({ code: z.ZodIssueCode.custom, message: result.error.message });
				return z.NEVER;
			}
			return result.authors;
		}),

		// null is the explicit "no date" sentinel; an absent key is missing.
		year: z.unknown().transform((value, ctx): PublicationYear => {
			if (value === undefined) {
				requiredIssue(ctx, z.ZodParsedType.number);
				return z.NEVER;
			}
			if (value === null) return { kind: "unknown" };
			if (typeof value !== "number" || !Number.isInteger(value)) {
				ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Year must be an integer or null" });
				return z.NEVER;
			}
			if (value < 0 || value > maxYear) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					message: `Year must be a non-negative integer not exceeding ${maxYear}`,
				});
				return z.NEVER;
			}
			return { kind: "known", value };
		}),

		volume: positiveInteger("Volume"),
		edition: positiveInteger("Edition"),

		pages: z
			.string({ invalid_type_error: "Pages must be a string" })
			.trim()
			.max(MAX_PAGES_LENGTH, `Pages exceeds maximum length of ${MAX_PAGES_LENGTH} characters`)
			.regex(PAGES_PATTERN, PAGES_FORMAT_MESSAGE)
			.superRefine((pages, ctx) => {
				if (!PAGES_PATTERN.test(pages)) return;
				for (const [start, end] of splitRanges(pages)) {
					if (comparePageNumbers(start, end) > 0) {
						ctx.addIssue({
							code: z.ZodIssueCode.custom,
							message: `Page range ${start}-${end} must not run backwards`,
						});
					}
				}
			})
			.transform((pages) =>
				splitRanges(pages)
					.map(([start, end]) => `${start}-${end}`)
					.join(", "),
			),

		accessDate: z
			.string({ invalid_type_error: ACCESS_DATE_MESSAGE })
			.trim()
			.refine(isCalendarDate, ACCESS_DATE_MESSAGE),

		doi: z
			.string({ invalid_type_error: "DOI must be a string" })
			.trim()
			.max(MAX_DOI_LENGTH, `DOI exceeds maximum length of ${MAX_DOI_LENGTH} characters`)
			.regex(DOI_PATTERN, "Invalid DOI format (expected: 10.xxxx/xxxx)"),

		url: z
			.string({ invalid_type_error: "URL must be a string" })
			.trim()
			.max(MAX_URL_LENGTH, `URL exceeds maximum length of ${MAX_URL_LENGTH} characters`)
			.url("Invalid URL format")
			.refine((url) => HTTP_URL_PATTERN.test(url), "Invalid URL format"),
	};
}

export type CitationSchemas = {
	[K in CitationKind]: z.ZodType<CitationByKind[K], z.ZodTypeDef, unknown>;
};

/**
 * Strict object schema per kind. Unknown keys surface as `unrecognized_keys`;
 * every field is checked in the same pass.
 */
export function createCitationSchemas(options: ValidationOptions = {}): CitationSchemas {
	const field = createFieldSchemas(options);
	const core = { title: field.title, authors: field.authors, year: field.year };

	return {
		book: z
			.object({
				kind: z.literal("book"),
				...core,
				publisher: field.publisher,
				place: field.place,
				edition: field.edition,
			})
			.strict(),
		article: z
			.object({
				kind: z.literal("article"),
				...core,
				journal: field.journal,
				volume: field.volume,
				issue: field.issue,
				pages: field.pages,
				doi: field.doi,
			})
			.strict(),
		website: z
			.object({
				kind: z.literal("website"),
				...core,
				publisher: field.publisher,
				url: field.url,
				accessDate: field.accessDate,
			})
			.strict(),
		report: z
			.object({
				kind: z.literal("report"),
				...core,
				publisher: field.publisher,
				url: field.url,
				place: field.place,
			})
			.strict(),
	};
}
