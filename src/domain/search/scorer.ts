import type { SearchRecord } from "./types.js";

/**
 * Score weights. Rules are additive and all of them apply.
 */
export const SCORE_WEIGHTS = {
	/** Whole query is a substring of the title */
	fullQueryInTitle: 100,
	/** Per token found in the title */
	tokenInTitle: 50,
	/** Per token found in the description */
	tokenInDescription: 20,
	/** Per (token, keyword) pair where the keyword contains the token */
	tokenInKeyword: 30,
	/** Per token (length >= 3) whose 3-char prefix is in the title */
	prefixInTitle: 10,
} as const;

const PREFIX_LENGTH = 3;

/**
 * Compute the relevance score of a record.
 *
 * `tokens` must be non-empty lowercase tokens and `fullQuery` the
 * lowercased query they were split from. Duplicate tokens each count.
 * Page priority is added only when some text rule matched.
 * The prefix rule is a crude typo fallback: it only looks at the first
 * three characters of a token.
 */
export function scoreRecord(record: SearchRecord, tokens: readonly string[], fullQuery: string): number {
	let score = 0;
	const titleLower = record.title.toLowerCase();
	const descLower = record.description.toLowerCase();
	const keywordsLower = record.keywords.map(keyword => keyword.toLowerCase());

	if (titleLower.includes(fullQuery)) {
		score += SCORE_WEIGHTS.fullQueryInTitle;
	}

	for (const token of tokens) {
		if (titleLower.includes(token)) score += SCORE_WEIGHTS.tokenInTitle;
	}

	for (const token of tokens) {
		if (descLower.includes(token)) score += SCORE_WEIGHTS.tokenInDescription;
	}

	for (const token of tokens) {
		for (const keyword of keywordsLower) {
			if (keyword.includes(token)) score += SCORE_WEIGHTS.tokenInKeyword;
		}
	}

	for (const token of tokens) {
		if (token.length >= PREFIX_LENGTH && titleLower.includes(token.slice(0, PREFIX_LENGTH))) {
			score += SCORE_WEIGHTS.prefixInTitle;
		}
	}

	// Priority boosts matches; on its own it does not make a record relevant
	if (score > 0 && record.type === "page" && record.priority) {
		score += record.priority;
	}

	return score;
}

/**
 * Distinct tokens (in query order) found anywhere in title, description
 * or keywords. Used for highlighting.
 */
export function findMatchedTerms(record: SearchRecord, tokens: readonly string[]): string[] {
	const searchText = `${record.title} ${record.description} ${record.keywords.join(" ")}`.toLowerCase();
	const matched: string[] = [];

	for (const token of tokens) {
		if (searchText.includes(token) && !matched.includes(token)) {
			matched.push(token);
		}
	}

	return matched;
}
