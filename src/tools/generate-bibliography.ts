import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { logger } from "../logger.js";
import {
	type EngineSettings,
	bibliographyOperation,
	bibliographyRequestShape,
} from "../operations.js";
import { createToolResponse } from "../types.js";

export function registerGenerateBibliographyTool(
	server: McpServer,
	settings: EngineSettings,
): void {
	server.registerTool(
		"generate_bibliography",
		{
			description:
				"Render a list of citations in one style. Every citation is validated first; if any fail, nothing is rendered and each failing index is reported.",
			inputSchema: bibliographyRequestShape,
		},
		async (request) => {
			const envelope = bibliographyOperation(request, settings);
			logger.debug("generate_bibliography", request.citations.length, "citations");
			return createToolResponse(envelope);
		},
	);
}
