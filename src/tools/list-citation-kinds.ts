import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { describeKindsOperation } from "../operations.js";
import { createToolResponse } from "../types.js";

export function registerListCitationKindsTool(server: McpServer): void {
	server.registerTool(
		"list_citation_kinds",
		{
			description: "List the citation kinds, the fields each one requires, and the supported styles.",
			inputSchema: {},
		},
		async () => createToolResponse(describeKindsOperation()),
	);
}
