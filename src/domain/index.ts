/**
 * Domain layer public API
 */

// ============================================================================
// Search core
// ============================================================================

export { buildSearchIndex, EMPTY_SEARCH_INDEX, normalizeKeyword } from "./search/indexBuilder.js";
export { findMatchedTerms, scoreRecord, SCORE_WEIGHTS } from "./search/scorer.js";
export { executeSearch, isSearchableQuery, normalizeQuery } from "./search/queryProcessor.js";

// ============================================================================
// Repository and dataset
// ============================================================================

export type {
	KeywordMatch,
	SearchIndexStats,
	SearchRepository,
	SearchRepositoryOptions,
} from "./search/repository.js";
export { createSearchRepository } from "./search/repository.js";
export { DatasetError, loadDatasetFile, loadDefaultDataset, parseDataset } from "./search/dataset.js";

// Re-export commonly used types
export type {
	DocsDataset,
	KeywordEntry,
	NormalizedQuery,
	PageCategory,
	PageInput,
	PageRecord,
	PageSearchResult,
	RecordType,
	SearchIndex,
	SearchRecord,
	SearchResult,
	SectionInput,
	SectionRecord,
	SectionSearchResult,
} from "./search/types.js";
export { PAGE_CATEGORIES } from "./search/types.js";
