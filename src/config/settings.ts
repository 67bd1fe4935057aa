/**
 * Search behaviour shared by the core, the widget and the MCP surface.
 */
export const SEARCH_CONFIG = {
	minQueryLength: 2,
	maxResults: 10,
	debounceDelay: 300,
	highlightClass: "search-highlight",
	resultClass: "search-result-item",
	selectedClass: "selected",
	/** Keyword-index priority hint for sections (pages carry their own). */
	sectionPriorityHint: 5,
} as const;

/**
 * Where the "no results" affordance points users to.
 */
export const NO_RESULTS_FALLBACK = {
	label: "FAQ",
	url: "./pages/faq.html",
} as const;

export interface SearchLimits {
	minQueryLength: number;
	maxResults: number;
}

export function resolveSearchLimits(overrides: Partial<SearchLimits> = {}): SearchLimits {
	return {
		minQueryLength: overrides.minQueryLength ?? SEARCH_CONFIG.minQueryLength,
		maxResults: overrides.maxResults ?? SEARCH_CONFIG.maxResults,
	};
}
