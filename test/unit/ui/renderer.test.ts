import { describe, expect, it } from "vitest";
import { buildSearchIndex } from "../../../src/domain/search/indexBuilder.js";
import { executeSearch } from "../../../src/domain/search/queryProcessor.js";
import { renderNoResults, renderResults, resultElementId } from "../../../src/ui/renderer.js";
import { createFixtureDataset } from "../../helpers/fixtures.js";

const index = buildSearchIndex(createFixtureDataset());

describe("result renderer", () => {
	const results = executeSearch(index, "docker");
	const html = renderResults(results, "docker");

	it("renders a header with the count and query", () => {
		expect(html.split("\n")[0]).toBe(
			'<div class="search-results-header"><span class="results-count">2 results for "docker"</span></div>',
		);
		expect(renderResults(results.slice(0, 1), "docker")).toContain('1 result for "docker"');
	});

	it("renders one option per result with index and id", () => {
		expect(html.match(/role="option"/g)).toHaveLength(2);
		expect(html).toContain('<div class="search-result-item" id="search-result-0" role="option" data-index="0">');
		expect(html).toContain('<div class="search-result-item" id="search-result-1" role="option" data-index="1">');
		expect(renderResults(results, "docker", { idPrefix: "docs" })).toContain('id="docs-result-1"');
		expect(resultElementId("docs", 3)).toBe("docs-result-3");
	});

	it("renders section results with their parent page", () => {
		expect(html).toContain('<a href="./pages/installation.html#docker-setup" class="result-link">');
		expect(html).toContain('<span class="result-icon">📝</span><div class="result-meta"><span class="result-parent">in Installation &amp; Setup</span></div>');
		expect(html).toContain('<h4 class="result-title"><mark class="search-highlight">Docker</mark> Installation</h4>');
		expect(html).toContain('<span class="result-type">section</span><span class="result-score">Score: 190</span>');
	});

	it("renders page results with their category", () => {
		expect(html).toContain('<span class="result-icon">⚙️</span><div class="result-meta"><span class="result-category">setup</span></div>');
		expect(html).toContain('<h4 class="result-title">Installation &amp; Setup</h4>');
		expect(html).toContain(
			'<p class="result-description">Install on Linux, macOS and <mark class="search-highlight">Docker</mark>.</p>',
		);
	});

	it("omits parent info for a dangling section", () => {
		const orphanHtml = renderResults(executeSearch(index, "legacy"), "legacy");

		expect(orphanHtml).toContain('<div class="result-meta"></div>');
		expect(orphanHtml).toContain('<a href="#orphan" class="result-link">');
	});

	it("escapes the query", () => {
		expect(renderResults(results, `<b>"x"</b>`)).toContain('2 results for "&lt;b&gt;&quot;x&quot;&lt;/b&gt;"');
	});

	it("neutralizes markup in titles and still highlights them", () => {
		const hostile = buildSearchIndex({
			pages: [
				{
					id: "hostile",
					title: "<img src=x onerror=alert(1)>",
					url: "./hostile.html",
					description: "",
					keywords: [],
				},
			],
			sections: [],
		});

		const markup = renderResults(executeSearch(hostile, "img"), "img");

		expect(markup).toContain(
			'<h4 class="result-title">&lt;<mark class="search-highlight">img</mark> src=x onerror=alert(1)&gt;</h4>',
		);
		expect(markup).not.toContain("<img");
	});

	it("uses custom class names", () => {
		const custom = renderResults(results, "docker", { highlightClass: "hit", resultClass: "row" });

		expect(custom).toContain('<div class="row" id="search-result-0"');
		expect(custom).toContain('<mark class="hit">Docker</mark>');
	});
});

describe("no results", () => {
	it("links to the FAQ by default", () => {
		const html = renderNoResults();

		expect(html).toContain("<h4>No results found</h4>");
		expect(html).toContain('<p>Try different keywords or check our <a href="./pages/faq.html">FAQ</a> for help</p>');
	});

	it("accepts another fallback", () => {
		expect(renderNoResults({ label: "Support & Help", url: "/help" })).toContain(
			'<a href="/help">Support &amp; Help</a>',
		);
	});
});
