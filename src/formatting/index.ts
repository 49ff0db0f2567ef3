export { apaAuthors, apaName, apaRenderers } from "./apa.js";
export {
	type AssembleOptions,
	type Bibliography,
	assembleBibliography,
	compareByAuthor,
} from "./bibliography.js";
export { UnknownStyleOrKindError, renderCitation, resolveRenderer } from "./dispatcher.js";
export { escapeMarkup, italic } from "./markup.js";
export { mlaAuthors, mlaInvertedName, mlaRenderers } from "./mla.js";
export { NO_DATE } from "./shared.js";
export { sentenceCase, titleCase } from "./text-case.js";
export {
	BIBLIOGRAPHY_ORDERS,
	CITATION_STYLES,
	type BibliographyOrder,
	type CitationStyle,
	type RenderFunction,
	type StyleRenderers,
} from "./types.js";
