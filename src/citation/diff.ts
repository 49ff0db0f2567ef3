import { CITATION_FIELDS, type CitationField } from "./kinds.js";
import type { CitationChanges, NormalizedCitation, PublicationYear } from "./types.js";

type FieldValue = string | number | string[] | PublicationYear | undefined;

function fieldValue(citation: NormalizedCitation, field: CitationField): FieldValue {
	const values: Partial<Record<CitationField, FieldValue>> = citation;
	return values[field];
}

function sameValue(a: FieldValue, b: FieldValue): boolean {
	if (Array.isArray(a) || Array.isArray(b)) {
		return (
			Array.isArray(a) &&
			Array.isArray(b) &&
			a.length === b.length &&
			a.every((entry, index) => entry === b[index])
		);
	}
	if (typeof a === "object" && typeof b === "object") {
		if (a.kind === "unknown" || b.kind === "unknown") return a.kind === b.kind;
		return a.value === b.value;
	}
	return a === b;
}

/**
 * Compare two normalized records field by field. `changed` holds fields whose
 * value is new or different in `next`; `removed` holds fields `prior` had
 * that `next` no longer carries (a kind change dropping them).
 */
export function diffCitations(prior: NormalizedCitation, next: NormalizedCitation): CitationChanges {
	const changed: CitationField[] = [];
	const removed: CitationField[] = [];

	for (const field of CITATION_FIELDS) {
		const before = fieldValue(prior, field);
		const after = fieldValue(next, field);
		if (after === undefined) {
			if (before !== undefined) removed.push(field);
		} else if (before === undefined || !sameValue(before, after)) {
			changed.push(field);
		}
	}

	return { kindChanged: prior.kind !== next.kind, changed, removed };
}
