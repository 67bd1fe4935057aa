/**
 * Types for the docs search core
 */

export const PAGE_CATEGORIES = [
	"overview",
	"getting-started",
	"setup",
	"features",
	"integration",
	"ai",
	"reference",
	"support",
	"examples",
	"development",
] as const;

export type PageCategory = (typeof PAGE_CATEGORIES)[number];

export type RecordType = "page" | "section";

/**
 * Page as authored in the dataset
 */
export interface PageInput {
	id: string;
	title: string;
	url: string; // opaque locator, passed through on navigation
	description: string;
	keywords: string[];
	category?: PageCategory;
	priority?: number; // higher = more important, added to the score
}

/**
 * Section as authored in the dataset
 */
export interface SectionInput {
	id: string;
	title: string;
	url?: string; // defaults to the parent page url + "#<id>"
	pageId: string; // relation only, may dangle
	description: string;
	keywords: string[];
}

export interface DocsDataset {
	pages: PageInput[];
	sections: SectionInput[];
}

export interface PageRecord extends Readonly<Omit<PageInput, "keywords">> {
	readonly type: "page";
	readonly keywords: readonly string[];
}

export interface SectionRecord extends Readonly<Omit<SectionInput, "keywords" | "url">> {
	readonly type: "section";
	readonly url: string;
	readonly keywords: readonly string[];
}

export type SearchRecord = PageRecord | SectionRecord;

export interface KeywordEntry {
	type: RecordType;
	id: string;
	priority: number;
}

export interface SearchIndex {
	readonly pages: readonly PageRecord[];
	readonly sections: readonly SectionRecord[];
	readonly keywords: ReadonlyMap<string, readonly KeywordEntry[]>;
	readonly loaded: boolean;
	readonly builtAt: number;
}

interface SearchHitFields {
	score: number;
	matchedTerms: string[];
}

export type PageSearchResult = PageRecord & SearchHitFields;

export type SectionSearchResult = SectionRecord &
	SearchHitFields & {
		parentPage?: PageRecord;
	};

export type SearchResult = PageSearchResult | SectionSearchResult;

export interface NormalizedQuery {
	/** Trimmed, lowercased query */
	query: string;
	/** Whitespace-delimited non-empty tokens of `query` */
	tokens: string[];
}
