import { ResourceTemplate, type McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { PageRecord, SearchRepository, SectionRecord } from "../../domain/index.js";
import { INDEX_NOT_LOADED_MESSAGE } from "../shared/consts.js";
import { readTemplateVariable } from "../shared/variables.js";
import { URIS } from "../uris.js";

function textContent(uri: URL, text: string) {
	return { uri: uri.href, mimeType: "text/plain", text };
}

function jsonContent(uri: URL, value: unknown) {
	return { uri: uri.href, mimeType: "application/json", text: JSON.stringify(value, null, 2) };
}

function describePage(page: PageRecord, sections: SectionRecord[]): string {
	const lines = [`# ${page.title}`, "", page.description, "", `URL: ${page.url}`];
	if (page.category) lines.push(`Category: ${page.category}`);
	if (page.priority) lines.push(`Priority: ${page.priority}`);
	lines.push(`Keywords: ${page.keywords.join(", ")}`);

	if (sections.length > 0) {
		lines.push("", "Sections:");
		for (const section of sections) {
			lines.push(`- ${section.title} (${URIS.section(section.id)})`);
		}
	}

	return lines.join("\n");
}

/**
 * Register docs://index - pages, sections and index stats
 */
export function registerDocsIndexResource(server: McpServer, repository: SearchRepository): void {
	server.registerResource(
		"docs-index",
		URIS.docsIndex,
		{
			title: "Documentation index",
			description: "All documentation pages and sections with index statistics.",
			mimeType: "text/plain",
		},
		async uri => {
			if (!repository.isLoaded()) {
				return { contents: [textContent(uri, INDEX_NOT_LOADED_MESSAGE)] };
			}

			const index = repository.getIndex();
			const stats = repository.getStats();

			const summary = `Documentation Index

Pages: ${stats.pages}
Sections: ${stats.sections}
Keywords: ${stats.keywords}
Last built: ${new Date(stats.builtAt).toISOString()}

Pages:
${index.pages.map(p => `- ${p.title} (${URIS.page(p.id)})`).join("\n")}
`;

			return {
				contents: [
					textContent(uri, summary),
					jsonContent(uri, {
						stats,
						pages: index.pages.map(p => ({ id: p.id, title: p.title, url: p.url, category: p.category })),
						sections: index.sections.map(s => ({ id: s.id, title: s.title, pageId: s.pageId })),
					}),
				],
			};
		},
	);
}

/**
 * Register docs://page/{id} - a page with its sections
 */
export function registerDocsPageResource(server: McpServer, repository: SearchRepository): void {
	server.registerResource(
		"docs-page",
		new ResourceTemplate(URIS.pageTemplate, {
			list: async () => ({
				resources: repository.getIndex().pages.map(page => ({
					uri: URIS.page(page.id),
					name: page.title,
					description: page.description,
					mimeType: "text/plain",
				})),
			}),
		}),
		{
			title: "Documentation page",
			description: "Metadata, keywords and sections of a documentation page.",
		},
		async (uri, { id }) => {
			const pageId = readTemplateVariable(id);
			const page = repository.getPage(pageId);

			if (!page) {
				return {
					contents: [
						textContent(uri, `Page not found: ${pageId}\n\nUse ${URIS.docsIndex} to see available pages.`),
					],
				};
			}

			const sections = repository.getSectionsForPage(page.id);

			return {
				contents: [textContent(uri, describePage(page, sections)), jsonContent(uri, { page, sections })],
			};
		},
	);
}

/**
 * Register docs://section/{id} - a section with its parent page
 */
export function registerDocsSectionResource(server: McpServer, repository: SearchRepository): void {
	server.registerResource(
		"docs-section",
		new ResourceTemplate(URIS.sectionTemplate, {
			list: undefined,
		}),
		{
			title: "Documentation section",
			description: "A documentation section and the page it belongs to.",
		},
		async (uri, { id }) => {
			const sectionId = readTemplateVariable(id);
			const section = repository.getSection(sectionId);

			if (!section) {
				return {
					contents: [
						textContent(uri, `Section not found: ${sectionId}\n\nUse ${URIS.docsIndex} to see available sections.`),
					],
				};
			}

			const parent = repository.getPage(section.pageId);
			const lines = [`# ${section.title}`, "", section.description, "", `URL: ${section.url}`];
			lines.push(parent ? `Page: ${parent.title} (${URIS.page(parent.id)})` : "Page: (none)");
			lines.push(`Keywords: ${section.keywords.join(", ")}`);

			return {
				contents: [textContent(uri, lines.join("\n")), jsonContent(uri, { section, parentPage: parent ?? null })],
			};
		},
	);
}

/**
 * Register docs://keyword/{keyword} - records indexed under a keyword
 */
export function registerDocsKeywordResource(server: McpServer, repository: SearchRepository): void {
	server.registerResource(
		"docs-keyword",
		new ResourceTemplate(URIS.keywordTemplate, {
			list: undefined,
		}),
		{
			title: "Documentation keyword",
			description: "Pages and sections indexed under an exact keyword (case-insensitive).",
		},
		async (uri, { keyword }) => {
			const term = readTemplateVariable(keyword);
			const matches = repository.lookupKeyword(term);

			if (matches.length === 0) {
				return { contents: [textContent(uri, `No records indexed under keyword: ${term}`)] };
			}

			const lines = matches.map(
				({ entry, record }) =>
					`- ${record.title} (${entry.type}, priority ${entry.priority}) ${entry.type === "page" ? URIS.page(record.id) : URIS.section(record.id)}`,
			);

			return {
				contents: [
					textContent(uri, `Keyword "${term}":\n\n${lines.join("\n")}`),
					jsonContent(
						uri,
						matches.map(({ entry }) => entry),
					),
				],
			};
		},
	);
}
