import { SEARCH_CONFIG } from "../../config/settings.js";
import type {
	DocsDataset,
	KeywordEntry,
	PageInput,
	PageRecord,
	SearchIndex,
	SectionInput,
	SectionRecord,
} from "./types.js";

/**
 * Read-only view over a private copy of `source`. The view has no
 * mutating methods and is frozen.
 */
function toReadonlyMap<K, V>(source: Map<K, V>): ReadonlyMap<K, V> {
	const entries = new Map(source);
	const view: ReadonlyMap<K, V> = {
		get size() {
			return entries.size;
		},
		get: key => entries.get(key),
		has: key => entries.has(key),
		forEach: (callback, thisArg) => {
			entries.forEach((value, key) => callback.call(thisArg, value, key, view));
		},
		keys: () => entries.keys(),
		values: () => entries.values(),
		entries: () => entries.entries(),
		[Symbol.iterator]: () => entries[Symbol.iterator](),
	};
	return Object.freeze(view);
}

/**
 * Index value used before the dataset has been built
 */
export const EMPTY_SEARCH_INDEX: SearchIndex = Object.freeze({
	pages: Object.freeze([]),
	sections: Object.freeze([]),
	keywords: toReadonlyMap(new Map<string, readonly KeywordEntry[]>()),
	loaded: false,
	builtAt: 0,
});

export function normalizeKeyword(keyword: string): string {
	return keyword.trim().toLowerCase();
}

function toPageRecord(page: PageInput): PageRecord {
	return Object.freeze({
		...page,
		type: "page" as const,
		keywords: Object.freeze([...page.keywords]),
	});
}

/**
 * Sections without their own url point at the parent page anchor.
 */
function resolveSectionUrl(section: SectionInput, pagesById: Map<string, PageRecord>): string {
	if (section.url) return section.url;

	const parent = pagesById.get(section.pageId);
	const base = parent ? parent.url.replace(/#.*$/, "") : "";
	return `${base}#${section.id}`;
}

function toSectionRecord(section: SectionInput, pagesById: Map<string, PageRecord>): SectionRecord {
	return Object.freeze({
		...section,
		type: "section" as const,
		url: resolveSectionUrl(section, pagesById),
		keywords: Object.freeze([...section.keywords]),
	});
}

function addKeywordEntry(keywords: Map<string, KeywordEntry[]>, keyword: string, entry: KeywordEntry): void {
	const key = normalizeKeyword(keyword);
	if (!key) return;

	const entries = keywords.get(key) || [];
	entries.push(entry);
	keywords.set(key, entries);
}

/**
 * Build the immutable search index from a dataset.
 *
 * Pages and sections keep dataset order, which is also the tie-break
 * order of search results. Every keyword of every record gets an entry in
 * the keyword map; pages carry their own priority, sections a fixed hint.
 * `loaded` is set last.
 */
export function buildSearchIndex(dataset: DocsDataset): SearchIndex {
	const pages = dataset.pages.map(toPageRecord);
	const pagesById = new Map(pages.map(page => [page.id, page]));
	const sections = dataset.sections.map(section => toSectionRecord(section, pagesById));

	const keywords = new Map<string, KeywordEntry[]>();

	for (const page of pages) {
		for (const keyword of page.keywords) {
			addKeywordEntry(keywords, keyword, {
				type: "page",
				id: page.id,
				priority: page.priority ?? 0,
			});
		}
	}

	for (const section of sections) {
		for (const keyword of section.keywords) {
			addKeywordEntry(keywords, keyword, {
				type: "section",
				id: section.id,
				priority: SEARCH_CONFIG.sectionPriorityHint,
			});
		}
	}

	const frozenKeywords = new Map<string, readonly KeywordEntry[]>();
	for (const [key, entries] of keywords) {
		frozenKeywords.set(key, Object.freeze(entries.map(entry => Object.freeze(entry))));
	}

	const index: Omit<SearchIndex, "loaded"> = {
		pages: Object.freeze(pages),
		sections: Object.freeze(sections),
		keywords: toReadonlyMap(frozenKeywords),
		builtAt: Date.now(),
	};

	return Object.freeze({ ...index, loaded: true });
}
