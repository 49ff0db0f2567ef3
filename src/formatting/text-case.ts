// Restored to upper case by sentence case when written with any capital ("Json").
const ACRONYMS = new Set([
	"AI",
	"API",
	"CEO",
	"CSS",
	"CTO",
	"HTML",
	"HTTP",
	"HTTPS",
	"JS",
	"JSON",
	"ML",
	"PDF",
	"SQL",
	"UI",
	"URL",
	"UX",
	"XML",
]);

// Lower-case in title case unless first or last in their part of the title.
const MINOR_WORDS = new Set([
	"a",
	"an",
	"and",
	"as",
	"at",
	"but",
	"by",
	"for",
	"from",
	"if",
	"in",
	"into",
	"nor",
	"of",
	"on",
	"onto",
	"or",
	"over",
	"per",
	"so",
	"than",
	"the",
	"to",
	"up",
	"upon",
	"via",
	"vs",
	"with",
	"yet",
]);

const TRAILING_PUNCTUATION = /[.,;:!?"'()[\]{}]+$/;
const LEADING_PUNCTUATION = /^[.,;:!?"'()[\]{}]+/;

function bareWord(word: string): string {
	return word.replace(TRAILING_PUNCTUATION, "").replace(LEADING_PUNCTUATION, "");
}

function capitalizeFirstLetter(word: string): string {
	return word.replace(/\p{L}/u, (letter) => letter.toUpperCase());
}

function isShortAllCaps(word: string): boolean {
	return word.length >= 2 && word.length <= 5 && /\p{Lu}/u.test(word) && word === word.toUpperCase();
}

/** Split on colons so each subtitle is cased as its own part. */
function mapParts(title: string, mapWords: (words: string[]) => string[]): string {
	return title
		.split(":")
		.map((part) => mapWords(part.trim().split(/\s+/).filter(Boolean)).join(" "))
		.join(": ");
}

/**
 * APA sentence case: only the first word of the title and of each subtitle is
 * capitalized; acronyms and the pronoun "I" keep their capitals.
 */
export function sentenceCase(title: string): string {
	return mapParts(title, (words) =>
		words.map((word, index) => {
			const bare = bareWord(word);
			const upper = bare.toUpperCase();
			if (ACRONYMS.has(upper) && bare !== bare.toLowerCase()) return word.replace(bare, upper);
			if (isShortAllCaps(bare) || bare === "I") return word;
			if (index === 0) return capitalizeFirstLetter(word.toLowerCase());
			return word.toLowerCase();
		}),
	);
}

/**
 * MLA title case: every word capitalized except minor words, which are
 * lower-cased unless they open or close a part of the title.
 */
export function titleCase(title: string): string {
	return mapParts(title, (words) =>
		words.map((word, index) => {
			const edge = index === 0 || index === words.length - 1;
			if (!edge && MINOR_WORDS.has(bareWord(word).toLowerCase())) return word.toLowerCase();
			return capitalizeFirstLetter(word);
		}),
	);
}
