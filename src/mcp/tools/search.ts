import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { SearchRepository, SearchResult } from "../../domain/index.js";
import { INDEX_NOT_LOADED_MESSAGE } from "../shared/consts.js";
import { URIS } from "../uris.js";

const DocsSearchInputSchema = {
	query: z.string().describe("Search query (at least 2 characters)"),
	limit: z.number().int().min(1).max(10).optional().describe("Maximum number of results (1-10)"),
};

const DocsSearchOutputSchema = {
	query: z.string(),
	results: z.array(
		z.object({
			type: z.enum(["page", "section"]),
			id: z.string(),
			title: z.string(),
			url: z.string(),
			description: z.string(),
			score: z.number(),
			matchedTerms: z.array(z.string()),
			category: z.string().optional(),
			parentPageId: z.string().optional(),
			parentPageTitle: z.string().optional(),
		}),
	),
};

function toOutputResult(result: SearchResult): z.infer<typeof DocsSearchOutputSchema.results.element> {
	const base = {
		type: result.type,
		id: result.id,
		title: result.title,
		url: result.url,
		description: result.description,
		score: result.score,
		matchedTerms: result.matchedTerms,
	};

	if (result.type === "page") {
		return { ...base, category: result.category };
	}

	return {
		...base,
		parentPageId: result.pageId,
		parentPageTitle: result.parentPage?.title,
	};
}

/**
 * Tool: docs_search
 * Keyword search over the documentation pages and sections
 */
export function registerDocsSearchTool(server: McpServer, repository: SearchRepository): void {
	server.registerTool(
		"docs_search",
		{
			title: "Search documentation",
			description:
				"Keyword search over documentation pages and sections. Results are ranked by title, description and keyword matches plus page priority.",
			inputSchema: DocsSearchInputSchema,
			outputSchema: DocsSearchOutputSchema,
			annotations: {
				readOnlyHint: true,
				idempotentHint: true,
				openWorldHint: false,
			},
		},
		async ({ query, limit }) => {
			const { minQueryLength } = repository.getLimits();
			const trimmed = query.trim();

			if (trimmed.length < minQueryLength) {
				return {
					content: [
						{
							type: "text",
							text: `Query must be at least ${minQueryLength} characters long.`,
						},
					],
					structuredContent: { query, results: [] },
				};
			}

			const hits = repository.search(trimmed);

			if (!repository.isLoaded()) {
				return {
					content: [{ type: "text", text: INDEX_NOT_LOADED_MESSAGE }],
					structuredContent: { query, results: [] },
				};
			}

			const results = hits.slice(0, limit ?? hits.length).map(toOutputResult);

			let summary = `Found ${results.length} results for "${trimmed}"\n\n`;

			if (results.length === 0) {
				summary += "No results. Try different keywords, or read docs://index for the list of pages.\n";
			}

			for (const [i, res] of results.entries()) {
				summary += `${i + 1}. ${res.title} (${res.type}, score ${res.score})`;
				if (res.parentPageTitle) summary += ` in ${res.parentPageTitle}`;
				summary += `\n   ${res.description}\n`;
				summary += `   [Read more: ${res.type === "page" ? URIS.page(res.id) : URIS.section(res.id)}]\n\n`;
			}

			return {
				content: [
					{
						type: "text",
						text: summary,
					},
				],
				structuredContent: { query, results },
			};
		},
	);
}
