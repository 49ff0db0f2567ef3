import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { logger } from "../logger.js";
import { type EngineSettings, updateOperation, updateRequestShape } from "../operations.js";
import { createToolResponse } from "../types.js";

export function registerUpdateCitationTool(server: McpServer, settings: EngineSettings): void {
	server.registerTool(
		"update_citation",
		{
			description:
				"Apply field changes (and optionally a new kind) to a previously stored citation. Fields not supplied are inherited from the original when the target kind accepts them. Returns the updated citation and which fields changed or were dropped.",
			inputSchema: updateRequestShape,
		},
		async (request) => {
			const envelope = updateOperation(request, settings);
			logger.debug(
				"update_citation",
				request.original.kind,
				"->",
				request.kind ?? request.original.kind,
				envelope.valid ? "ok" : envelope.error?.code,
			);
			return createToolResponse(envelope);
		},
	);
}
