import type { CitationKind } from "../citation/kinds.js";
import type { CitationByKind } from "../citation/types.js";

export const CITATION_STYLES = ["apa", "mla"] as const;
export type CitationStyle = (typeof CITATION_STYLES)[number];

export const BIBLIOGRAPHY_ORDERS = ["input", "author"] as const;
export type BibliographyOrder = (typeof BIBLIOGRAPHY_ORDERS)[number];

export type RenderFunction<K extends CitationKind = CitationKind> = (
	citation: CitationByKind[K],
) => string;

/** One render function per kind; a style missing a kind does not compile. */
export type StyleRenderers = { [K in CitationKind]: RenderFunction<K> };
