import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { SearchRepository } from "../../domain/index.js";

const PingInputSchema = {
	message: z.string().default("pong"),
};

const PingOutputSchema = {
	message: z.string(),
	index: z.object({
		loaded: z.boolean(),
		pages: z.number(),
		sections: z.number(),
		keywords: z.number(),
	}),
};

export function registerPingTool(server: McpServer, repository: SearchRepository): void {
	server.registerTool(
		"ping",
		{
			title: "Ping docs search server",
			description: "Sanity check: verifies the MCP server is responding. Also reports search index status.",
			inputSchema: PingInputSchema,
			outputSchema: PingOutputSchema,
			annotations: {
				readOnlyHint: true,
				idempotentHint: true,
				openWorldHint: false,
			},
		},
		async ({ message }) => {
			const { loaded, pages, sections, keywords } = repository.getStats();

			const output = {
				message,
				index: { loaded, pages, sections, keywords },
			};

			let text = `Docs search server is alive: ${message}`;
			text += loaded
				? `\n\nIndex: ${pages} pages, ${sections} sections, ${keywords} keywords`
				: "\n\nIndex: not loaded";

			return {
				content: [
					{
						type: "text",
						text,
					},
				],
				structuredContent: output,
			};
		},
	);
}
