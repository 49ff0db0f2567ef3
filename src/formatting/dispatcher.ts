import type { CitationKind } from "../citation/kinds.js";
import type { NormalizedCitation } from "../citation/types.js";
import { apaRenderers } from "./apa.js";
import { mlaRenderers } from "./mla.js";
import type { CitationStyle, RenderFunction, StyleRenderers } from "./types.js";

/** A (style, kind) pair with no renderer: a configuration defect, not bad input. */
export class UnknownStyleOrKindError extends Error {
	constructor(
		public readonly style: string,
		public readonly kind: string,
	) {
		super(`No renderer registered for style "${style}" and kind "${kind}"`);
		this.name = "UnknownStyleOrKindError";
	}
}

const RENDERERS: Record<CitationStyle, StyleRenderers> = {
	apa: apaRenderers,
	mla: mlaRenderers,
};

export function resolveRenderer<K extends CitationKind>(
	style: CitationStyle,
	kind: K,
): RenderFunction<K> {
	// Callers outside the type system can still pass strings that miss the table.
	const renderers: StyleRenderers | undefined = RENDERERS[style];
	if (renderers === undefined) {
		throw new UnknownStyleOrKindError(style, kind);
	}
	const render: RenderFunction<K> | undefined = renderers[kind];
	if (render === undefined) {
		throw new UnknownStyleOrKindError(style, kind);
	}
	return render;
}

export function renderCitation(style: CitationStyle, citation: NormalizedCitation): string {
	return resolveRenderer(style, citation.kind)(citation);
}
