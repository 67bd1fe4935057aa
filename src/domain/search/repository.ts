import { resolveSearchLimits, type SearchLimits } from "../../config/settings.js";
import { silentLogger, type Logger } from "../../logger/logger.js";
import { buildSearchIndex, EMPTY_SEARCH_INDEX, normalizeKeyword } from "./indexBuilder.js";
import { executeSearch } from "./queryProcessor.js";
import type {
	DocsDataset,
	KeywordEntry,
	PageRecord,
	SearchIndex,
	SearchRecord,
	SearchResult,
	SectionRecord,
} from "./types.js";

export interface SearchRepositoryOptions extends Partial<SearchLimits> {
	/** Build the index on the first search instead of waiting for load() */
	loadOnFirstSearch?: boolean;
	logger?: Logger;
}

export interface KeywordMatch {
	entry: KeywordEntry;
	record: SearchRecord;
}

export interface SearchIndexStats {
	loaded: boolean;
	pages: number;
	sections: number;
	keywords: number;
	builtAt: number;
}

/**
 * Repository interface for the docs search index
 */
export interface SearchRepository {
	load(): SearchIndex;
	isLoaded(): boolean;
	getIndex(): SearchIndex;
	getLimits(): SearchLimits;
	search(query: string): SearchResult[];
	getPage(id: string): PageRecord | undefined;
	getSection(id: string): SectionRecord | undefined;
	getSectionsForPage(pageId: string): SectionRecord[];
	lookupKeyword(keyword: string): KeywordMatch[];
	getStats(): SearchIndexStats;
}

/**
 * Internal state for search repository
 */
interface SearchRepositoryState {
	dataset: DocsDataset;
	limits: SearchLimits;
	loadOnFirstSearch: boolean;
	logger: Logger;
	index: SearchIndex;
}

function findRecord(index: SearchIndex, entry: KeywordEntry): SearchRecord | undefined {
	return entry.type === "page"
		? index.pages.find(page => page.id === entry.id)
		: index.sections.find(section => section.id === entry.id);
}

/**
 * Create a search repository over a dataset.
 *
 * The index is built once, either by an explicit load() or, with
 * `loadOnFirstSearch`, by the first search. Until then searches return
 * nothing and a warning is logged.
 */
export function createSearchRepository(
	dataset: DocsDataset,
	options: SearchRepositoryOptions = {},
): SearchRepository {
	const state: SearchRepositoryState = {
		dataset,
		limits: resolveSearchLimits(options),
		loadOnFirstSearch: options.loadOnFirstSearch ?? false,
		logger: options.logger ?? silentLogger,
		index: EMPTY_SEARCH_INDEX,
	};

	return {
		load(): SearchIndex {
			if (state.index.loaded) return state.index;

			state.index = buildSearchIndex(state.dataset);
			state.logger.info(
				`Search index built with ${state.index.pages.length} pages and ${state.index.sections.length} sections`,
			);
			return state.index;
		},

		isLoaded(): boolean {
			return state.index.loaded;
		},

		getIndex(): SearchIndex {
			return state.index;
		},

		getLimits(): SearchLimits {
			return { ...state.limits };
		},

		search(query: string): SearchResult[] {
			if (!state.index.loaded) {
				if (!state.loadOnFirstSearch) {
					state.logger.warn("Search index not loaded");
					return [];
				}
				this.load();
			}

			const results = executeSearch(state.index, query, state.limits);
			state.logger.debug(`"${query}" -> ${results.length} results`);
			return results;
		},

		getPage(id: string): PageRecord | undefined {
			return state.index.pages.find(page => page.id === id);
		},

		getSection(id: string): SectionRecord | undefined {
			return state.index.sections.find(section => section.id === id);
		},

		getSectionsForPage(pageId: string): SectionRecord[] {
			return state.index.sections.filter(section => section.pageId === pageId);
		},

		lookupKeyword(keyword: string): KeywordMatch[] {
			const entries = state.index.keywords.get(normalizeKeyword(keyword)) ?? [];
			const matches: KeywordMatch[] = [];

			for (const entry of entries) {
				const record = findRecord(state.index, entry);
				if (record) matches.push({ entry, record });
			}

			return matches;
		},

		getStats(): SearchIndexStats {
			return {
				loaded: state.index.loaded,
				pages: state.index.pages.length,
				sections: state.index.sections.length,
				keywords: state.index.keywords.size,
				builtAt: state.index.builtAt,
			};
		},
	};
}
