/**
 * Centralized MCP resource URIs
 * Single source of truth for all docs:// URIs
 */
export const URIS = {
	docsIndex: "docs://index",

	pageTemplate: "docs://page/{id}",
	page: (id: string): string => `docs://page/${encodeURIComponent(id)}`,

	sectionTemplate: "docs://section/{id}",
	section: (id: string): string => `docs://section/${encodeURIComponent(id)}`,

	keywordTemplate: "docs://keyword/{keyword}",
	keyword: (keyword: string): string => `docs://keyword/${encodeURIComponent(keyword)}`,
} as const;
