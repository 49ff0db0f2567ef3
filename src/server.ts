import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { Config } from "./config.js";
import { logger } from "./logger.js";
import { engineSettings } from "./operations.js";
import { registerFormatCitationTool } from "./tools/format-citation.js";
import { registerGenerateBibliographyTool } from "./tools/generate-bibliography.js";
import { registerListCitationKindsTool } from "./tools/list-citation-kinds.js";
import { registerUpdateCitationTool } from "./tools/update-citation.js";
import { registerValidateCitationTool } from "./tools/validate-citation.js";

/**
 * Register all citation tools on the given MCP server.
 * The engine is stateless, so every request gets a fresh server with the same settings.
 */
export function registerTools(server: McpServer, config: Config): void {
	const settings = engineSettings(config);

	registerValidateCitationTool(server, settings);
	registerUpdateCitationTool(server, settings);
	registerFormatCitationTool(server, settings);
	registerGenerateBibliographyTool(server, settings);
	registerListCitationKindsTool(server);
	logger.debug(
		"Registered tools: validate_citation, update_citation, format_citation, generate_bibliography, list_citation_kinds",
	);
}

export function createServer(config: Config): McpServer {
	const server = new McpServer(
		{ name: "citeform", version: "0.1.0" },
		{ capabilities: { logging: {} } },
	);

	registerTools(server, config);

	return server;
}
