import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { logger } from "../logger.js";
import { type EngineSettings, validateOperation, validateRequestShape } from "../operations.js";
import { createToolResponse } from "../types.js";

export function registerValidateCitationTool(server: McpServer, settings: EngineSettings): void {
	server.registerTool(
		"validate_citation",
		{
			description:
				"Validate a citation of a given kind (book, article, website, report). Reports every missing required field, every field the kind does not accept, and every malformed value in one pass. Returns the normalized citation on success.",
			inputSchema: validateRequestShape,
		},
		async (request) => {
			const envelope = validateOperation(request, settings);
			logger.debug("validate_citation", request.kind, envelope.valid ? "ok" : envelope.error?.code);
			return createToolResponse(envelope);
		},
	);
}
