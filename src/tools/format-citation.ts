import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { logger } from "../logger.js";
import { type EngineSettings, formatOperation, formatRequestShape } from "../operations.js";
import { createToolResponse } from "../types.js";

export function registerFormatCitationTool(server: McpServer, settings: EngineSettings): void {
	server.registerTool(
		"format_citation",
		{
			description:
				"Validate a citation and render it as a single reference entry in APA or MLA style. Italics are marked with <i> tags and text is HTML-escaped.",
			inputSchema: formatRequestShape,
		},
		async (request) => {
			const envelope = formatOperation(request, settings);
			logger.debug("format_citation", request.style ?? settings.defaultStyle, request.kind);
			return createToolResponse(envelope);
		},
	);
}
