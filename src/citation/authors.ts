export const MAX_AUTHOR_NAME_LENGTH = 150;

// Letters from any script, whitespace, hyphens, apostrophes and periods.
const AUTHOR_NAME_PATTERN = /^[\p{L}\p{M}\s'’.-]+$/u;

export interface AuthorListError {
	code: "AUTHORS_INVALID";
	message: string;
	/** 1-based position of the offending entry, when one entry is to blame. */
	position?: number;
}

export type AuthorListResult =
	| { ok: true; authors: string[] }
	| { ok: false; error: AuthorListError };

function fail(message: string, position?: number): AuthorListResult {
	const error: AuthorListError = { code: "AUTHORS_INVALID", message };
	if (position !== undefined) error.position = position;
	return { ok: false, error };
}

/**
 * Clean an author list into byline order.
 *
 * Entries are trimmed. Blank entries at the end of the list are dropped (a
 * form's spare input slot); a blank entry followed by a filled one is
 * reported instead, so the caller can point the user at the gap.
 */
export function normalizeAuthors(raw: unknown): AuthorListResult {
	if (!Array.isArray(raw)) {
		return fail("Authors must be a list");
	}

	const trimmed: string[] = [];
	for (const entry of raw) {
		if (typeof entry !== "string") {
			return fail("All authors must be non-empty strings", trimmed.length + 1);
		}
		trimmed.push(entry.trim());
	}

	let lastFilled = -1;
	trimmed.forEach((name, index) => {
		if (name !== "") lastFilled = index;
	});
	const authors = trimmed.slice(0, lastFilled + 1);

	const gap = authors.indexOf("");
	if (gap !== -1) {
		return fail(`Please fill in author ${gap + 1} before adding more authors`, gap + 1);
	}
	if (authors.length === 0) {
		return fail("Authors list cannot be empty");
	}

	for (const [index, name] of authors.entries()) {
		if (name.length > MAX_AUTHOR_NAME_LENGTH) {
			return fail(
				`Author name exceeds maximum length of ${MAX_AUTHOR_NAME_LENGTH} characters`,
				index + 1,
			);
		}
		if (!AUTHOR_NAME_PATTERN.test(name)) {
			return fail(
				"Author names can only contain letters, spaces, hyphens, apostrophes, and periods",
				index + 1,
			);
		}
	}

	return { ok: true, authors };
}
