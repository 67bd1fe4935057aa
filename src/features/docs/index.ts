import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { SearchRepository } from "../../domain/index.js";
import {
	registerDocsIndexResource,
	registerDocsKeywordResource,
	registerDocsPageResource,
	registerDocsSectionResource,
} from "../../mcp/resources/docs.js";
import { registerDocsSearchTool } from "../../mcp/tools/search.js";
import { registerPingTool } from "../../mcp/tools/ping.js";
import { registerFindDocsPrompt } from "../../mcp/prompts/findDocs.js";

/**
 * Registers all documentation features (search, index resources, prompts).
 */
export function registerDocsFeatures(server: McpServer, repository: SearchRepository): void {
	// Resources
	registerDocsIndexResource(server, repository);
	registerDocsPageResource(server, repository);
	registerDocsSectionResource(server, repository);
	registerDocsKeywordResource(server, repository);

	// Tools
	registerDocsSearchTool(server, repository);
	registerPingTool(server, repository);

	// Prompts
	registerFindDocsPrompt(server);
}
