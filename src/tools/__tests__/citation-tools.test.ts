import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { describe, expect, it, vi } from "vitest";
import { expectedMla, rawBook, rawWebsite } from "../../__tests__/fixtures.js";
import type { EngineSettings } from "../../operations.js";
import { registerFormatCitationTool } from "../format-citation.js";
import { registerGenerateBibliographyTool } from "../generate-bibliography.js";
import { registerListCitationKindsTool } from "../list-citation-kinds.js";
import { registerUpdateCitationTool } from "../update-citation.js";
import { registerValidateCitationTool } from "../validate-citation.js";

type Handler = (args: Record<string, unknown>) => Promise<unknown>;

const settings: EngineSettings = {
	validation: { currentYear: 2024 },
	defaultStyle: "mla",
	bibliographyOrder: "input",
};

/**
 * Capture the handlers registered on a mocked McpServer so the tool logic can
 * be called directly.
 */
function captureHandlers() {
	const handlers = new Map<string, Handler>();
	const registerTool = vi.fn((name: string, _config: unknown, handler: Handler) => {
		handlers.set(name, handler);
	});
	const mockServer = { registerTool } as unknown as McpServer;

	registerValidateCitationTool(mockServer, settings);
	registerUpdateCitationTool(mockServer, settings);
	registerFormatCitationTool(mockServer, settings);
	registerGenerateBibliographyTool(mockServer, settings);
	registerListCitationKindsTool(mockServer);

	return {
		registerTool,
		call: async (name: string, args: Record<string, unknown> = {}) => {
			const handler = handlers.get(name);
			if (!handler) throw new Error(`tool ${name} was not registered`);
			return parseEnvelope(await handler(args));
		},
	};
}

function parseEnvelope(result: unknown) {
	const content = (result as { content: Array<{ text: string }> }).content;
	return JSON.parse(content[0].text);
}

describe("citation tools", () => {
	it("registers all five tools", () => {
		const { registerTool } = captureHandlers();
		expect(registerTool.mock.calls.map(([name]) => name)).toEqual([
			"validate_citation",
			"update_citation",
			"format_citation",
			"generate_bibliography",
			"list_citation_kinds",
		]);
	});

	it("validate_citation returns VALIDATION_FAILED with details", async () => {
		const { call } = captureHandlers();
		const envelope = await call("validate_citation", { kind: "website", fields: { title: "Ferns" } });
		expect(envelope.valid).toBe(false);
		expect(envelope.error.code).toBe("VALIDATION_FAILED");
		expect(envelope.error.details.errors).toEqual([
			{
				code: "MISSING_REQUIRED_FIELDS",
				kind: "website",
				fields: ["authors", "year", "publisher", "url", "accessDate"],
				message: "Missing required website fields: authors, year, publisher, url, accessDate",
			},
		]);
	});

	it("update_citation reports changes", async () => {
		const { call } = captureHandlers();
		const envelope = await call("update_citation", {
			original: { kind: "book", fields: rawBook },
			fields: { edition: 4 },
		});
		expect(envelope.valid).toBe(true);
		expect(envelope.metadata.citation.edition).toBe(4);
		expect(envelope.metadata.changes.changed).toEqual(["edition"]);
	});

	it("format_citation falls back to the configured style", async () => {
		const { call } = captureHandlers();
		const envelope = await call("format_citation", { kind: "book", fields: rawBook });
		expect(envelope.metadata).toEqual({ style: "mla", formatted: expectedMla.book });
	});

	it("generate_bibliography renders entries", async () => {
		const { call } = captureHandlers();
		const envelope = await call("generate_bibliography", {
			citations: [
				{ kind: "website", fields: rawWebsite },
				{ kind: "book", fields: rawBook },
			],
		});
		expect(envelope.metadata.entries).toEqual([expectedMla.website, expectedMla.book]);
	});

	it("list_citation_kinds describes every kind", async () => {
		const { call } = captureHandlers();
		const envelope = await call("list_citation_kinds");
		expect(Object.keys(envelope.metadata.kinds)).toEqual(["book", "article", "website", "report"]);
	});
});
