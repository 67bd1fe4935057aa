import { NO_RESULTS_FALLBACK, SEARCH_CONFIG } from "../config/settings.js";
import type { SearchResult } from "../domain/search/types.js";
import { escapeHtml, highlightMatches } from "./highlight.js";
import { getResultIcon } from "./icons.js";

export interface RenderOptions {
	highlightClass?: string;
	resultClass?: string;
	/** Prefix for result element ids (aria-activedescendant targets) */
	idPrefix?: string;
}

export interface NoResultsFallback {
	label: string;
	url: string;
}

export function resultElementId(idPrefix: string, index: number): string {
	return `${idPrefix}-result-${index}`;
}

function renderResultItem(result: SearchResult, index: number, options: Required<RenderOptions>): string {
	const icon = getResultIcon(result.type, result.type === "page" ? result.category : undefined);
	const title = highlightMatches(result.title, result.matchedTerms, options.highlightClass);
	const description = highlightMatches(result.description, result.matchedTerms, options.highlightClass);

	const categoryBadge =
		result.type === "page" && result.category
			? `<span class="result-category">${escapeHtml(result.category)}</span>`
			: "";
	const parentInfo =
		result.type === "section" && result.parentPage
			? `<span class="result-parent">in ${escapeHtml(result.parentPage.title)}</span>`
			: "";

	return `<div class="${escapeHtml(options.resultClass)}" id="${escapeHtml(resultElementId(options.idPrefix, index))}" role="option" data-index="${index}">
<a href="${escapeHtml(result.url)}" class="result-link">
<div class="result-header"><span class="result-icon">${icon}</span><div class="result-meta">${categoryBadge}${parentInfo}</div></div>
<h4 class="result-title">${title}</h4>
<p class="result-description">${description}</p>
<div class="result-footer"><span class="result-type">${result.type}</span><span class="result-score">Score: ${result.score}</span></div>
</a>
</div>`;
}

/**
 * Render a ranked result list (non-empty) as markup
 */
export function renderResults(
	results: readonly SearchResult[],
	query: string,
	options: RenderOptions = {},
): string {
	const resolved: Required<RenderOptions> = {
		highlightClass: options.highlightClass ?? SEARCH_CONFIG.highlightClass,
		resultClass: options.resultClass ?? SEARCH_CONFIG.resultClass,
		idPrefix: options.idPrefix ?? "search",
	};

	const count = `${results.length} result${results.length !== 1 ? "s" : ""} for "${escapeHtml(query)}"`;
	const items = results.map((result, index) => renderResultItem(result, index, resolved)).join("\n");

	return `<div class="search-results-header"><span class="results-count">${count}</span></div>\n${items}`;
}

/**
 * Render the empty-result affordance with a fallback link
 */
export function renderNoResults(fallback: NoResultsFallback = NO_RESULTS_FALLBACK): string {
	return `<div class="search-no-results">
<div class="no-results-icon">🔍</div>
<h4>No results found</h4>
<p>Try different keywords or check our <a href="${escapeHtml(fallback.url)}">${escapeHtml(fallback.label)}</a> for help</p>
</div>`;
}
