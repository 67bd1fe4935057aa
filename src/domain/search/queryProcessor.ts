import { resolveSearchLimits, type SearchLimits } from "../../config/settings.js";
import { findMatchedTerms, scoreRecord } from "./scorer.js";
import type { NormalizedQuery, PageRecord, SearchIndex, SearchResult } from "./types.js";

/**
 * Trim, lowercase and split a raw query on whitespace runs
 */
export function normalizeQuery(rawQuery: string): NormalizedQuery {
	const query = rawQuery.trim().toLowerCase();
	const tokens = query.split(/\s+/).filter(token => token.length > 0);
	return { query, tokens };
}

/**
 * True when a raw query is long enough to be searched
 */
export function isSearchableQuery(rawQuery: string, minQueryLength: number): boolean {
	return rawQuery.trim().length >= minQueryLength;
}

/**
 * Run a query against the index.
 *
 * Returns an empty list when the index is not loaded or the query is too
 * short. Pages are scored before sections; the sort is stable, so equal
 * scores keep dataset order. Pure: same index and query, same output.
 */
export function executeSearch(
	index: SearchIndex,
	rawQuery: string,
	limits: Partial<SearchLimits> = {},
): SearchResult[] {
	const { minQueryLength, maxResults } = resolveSearchLimits(limits);

	if (!index.loaded) return [];
	if (!isSearchableQuery(rawQuery, minQueryLength)) return [];

	const { query, tokens } = normalizeQuery(rawQuery);
	const results: SearchResult[] = [];

	for (const page of index.pages) {
		const score = scoreRecord(page, tokens, query);
		if (score > 0) {
			results.push({
				...page,
				score,
				matchedTerms: findMatchedTerms(page, tokens),
			});
		}
	}

	let pagesById: Map<string, PageRecord> | null = null;

	for (const section of index.sections) {
		const score = scoreRecord(section, tokens, query);
		if (score > 0) {
			pagesById ??= new Map(index.pages.map(page => [page.id, page]));
			results.push({
				...section,
				score,
				matchedTerms: findMatchedTerms(section, tokens),
				parentPage: pagesById.get(section.pageId),
			});
		}
	}

	results.sort((a, b) => b.score - a.score);

	return results.slice(0, maxResults);
}
