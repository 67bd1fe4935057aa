import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { URIS } from "../uris.js";

/**
 * Prompt: find-docs
 * Answer a question from the documentation corpus
 */
export function registerFindDocsPrompt(server: McpServer): void {
	server.registerPrompt(
		"find-docs",
		{
			title: "Find documentation on a topic",
			description: "Locate the documentation pages and sections that cover a topic and summarize them.",
			argsSchema: {
				topic: z
					.string()
					.describe("What you are looking for (for example: 'docker setup', 'claude integration')."),
			},
		},
		({ topic }) => {
			const text = [
				"<TASK>",
				`Find the documentation that covers: "${topic}".`,
				"</TASK>",
				"",
				"<TOOLS>",
				"- `docs_search` — keyword search over pages and sections (queries need at least 2 characters).",
				`- ${URIS.pageTemplate} — a page with its keywords and sections.`,
				`- ${URIS.sectionTemplate} — a single section and its parent page.`,
				`- ${URIS.keywordTemplate} — every record indexed under an exact keyword.`,
				"</TOOLS>",
				"",
				"<STEPS>",
				"1. Call `docs_search` with the topic, then with shorter or alternative keywords if nothing relevant comes back.",
				"2. Read the page or section resources for the best two or three hits.",
				"3. Answer with the relevant pages (title and url) and one sentence on what each covers.",
				"",
				"Only cite pages the tools returned. If nothing matches, say so.",
				"</STEPS>",
			].join("\n");

			return {
				messages: [
					{
						role: "user",
						content: {
							type: "text",
							text,
						},
					},
				],
			};
		},
	);
}
