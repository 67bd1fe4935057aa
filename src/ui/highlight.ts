const HTML_ESCAPES: Record<string, string> = {
	"&": "&amp;",
	"<": "&lt;",
	">": "&gt;",
	'"': "&quot;",
	"'": "&#39;",
};

/**
 * Neutralize HTML-significant characters
 */
export function escapeHtml(text: string): string {
	return text.replace(/[&<>"']/g, char => HTML_ESCAPES[char] ?? char);
}

/**
 * Escape special regex characters
 */
export function escapeRegExp(text: string): string {
	return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Wrap every case-insensitive occurrence of `terms` in `<mark>`.
 *
 * Matches are located on the raw text; each segment is HTML-escaped on its
 * own before the wrapper is added, so neither the text nor the terms can
 * inject markup and a term never matches inside an entity or a wrapper
 * emitted for another term.
 */
export function highlightMatches(text: string, terms: readonly string[], className: string): string {
	const usable = terms.filter(term => term.length > 0);
	if (usable.length === 0) return escapeHtml(text);

	// Longest first so "installation" wins over "install" at the same offset
	const alternatives = [...new Set(usable)].sort((a, b) => b.length - a.length).map(escapeRegExp);
	const pattern = new RegExp(alternatives.join("|"), "gi");
	const openTag = `<mark class="${escapeHtml(className)}">`;

	let html = "";
	let cursor = 0;

	for (const match of text.matchAll(pattern)) {
		const start = match.index ?? 0;
		html += escapeHtml(text.slice(cursor, start));
		html += `${openTag}${escapeHtml(match[0])}</mark>`;
		cursor = start + match[0].length;
	}

	return html + escapeHtml(text.slice(cursor));
}
