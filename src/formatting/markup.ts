/**
 * Rendered citations are HTML fragments: entity-escaped text plus `<i>`
 * elements for emphasis, nothing else. Consumers still sanitize before display.
 */

const ENTITIES: Record<string, string> = {
	"&": "&amp;",
	"<": "&lt;",
	">": "&gt;",
};

export function escapeMarkup(text: string): string {
	return text.replace(/[&<>]/g, (char) => ENTITIES[char] ?? char);
}

export function italic(text: string): string {
	return `<i>${escapeMarkup(text)}</i>`;
}

const TERMINAL_PUNCTUATION = /[.?!]$/;

/** Append `mark` unless the visible text already ends a sentence. */
export function punctuate(markup: string, mark = "."): string {
	const visible = markup.replace(/<\/?i>/g, "");
	return TERMINAL_PUNCTUATION.test(visible) ? markup : `${markup}${mark}`;
}
