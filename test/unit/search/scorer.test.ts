import { describe, expect, it } from "vitest";
import { buildSearchIndex } from "../../../src/domain/search/indexBuilder.js";
import { findMatchedTerms, SCORE_WEIGHTS, scoreRecord } from "../../../src/domain/search/scorer.js";
import type { PageRecord, SectionRecord } from "../../../src/domain/search/types.js";
import { createFixtureDataset } from "../../helpers/fixtures.js";

const index = buildSearchIndex(createFixtureDataset());
const [quickStart, faq, installation] = index.pages;
const [dockerSection] = index.sections;

function page(overrides: Partial<PageRecord>): PageRecord {
	return {
		type: "page",
		id: "page",
		title: "Untitled",
		url: "./page.html",
		description: "",
		keywords: [],
		...overrides,
	};
}

describe("relevance scorer", () => {
	it("adds every rule for the quick start page", () => {
		// 100 full query + 50 title token + 30 keyword + 10 prefix + 9 priority
		expect(scoreRecord(quickStart, ["start"], "start")).toBe(199);
	});

	it("does not score pages on priority alone", () => {
		expect(scoreRecord(faq, ["start"], "start")).toBe(0);
		expect(scoreRecord(faq, ["xyznomatch"], "xyznomatch")).toBe(0);
	});

	it("applies the three character prefix fallback", () => {
		// only "qui" occurs in the title, then priority is added
		expect(scoreRecord(quickStart, ["quiz"], "quiz")).toBe(SCORE_WEIGHTS.prefixInTitle + 9);
	});

	it("skips the prefix rule for short tokens", () => {
		const record = page({ title: "Docs" });
		expect(scoreRecord(record, ["zz"], "zz")).toBe(0);
		expect(scoreRecord(record, ["docx"], "docx")).toBe(SCORE_WEIGHTS.prefixInTitle);
	});

	it("counts every keyword containing a token", () => {
		const record = page({ keywords: ["multi-browser", "browser", "browsers", "tabs"] });
		expect(scoreRecord(record, ["browser"], "browser")).toBe(3 * SCORE_WEIGHTS.tokenInKeyword);
	});

	it("scores duplicate tokens twice", () => {
		const record = page({ description: "Container-based deployment" });
		expect(scoreRecord(record, ["container", "container"], "container container")).toBe(
			2 * SCORE_WEIGHTS.tokenInDescription,
		);
	});

	it("scores the full query only when it appears as a whole", () => {
		// "guide start" is not a substring of "quick start guide"
		expect(scoreRecord(quickStart, ["guide", "start"], "guide start")).toBe(
			2 * SCORE_WEIGHTS.tokenInTitle + SCORE_WEIGHTS.tokenInKeyword + 2 * SCORE_WEIGHTS.prefixInTitle + 9,
		);
	});

	it("lets a title match outrank keyword matches", () => {
		const inTitle = page({ title: "Docker images" });
		const inKeywords = page({ keywords: ["docker", "docker-compose"], description: "Run it" });

		expect(scoreRecord(inTitle, ["docker"], "docker")).toBeGreaterThan(
			scoreRecord(inKeywords, ["docker"], "docker"),
		);
	});

	it("gives sections no priority", () => {
		const section: SectionRecord = { ...dockerSection, title: "Containers" };
		expect(scoreRecord(section, ["docker"], "docker")).toBe(SCORE_WEIGHTS.tokenInKeyword);
	});

	it("scores installation for a multi-field match", () => {
		// 100 + 50 title, 20 description, 30 keyword, 10 prefix, 8 priority
		expect(scoreRecord(installation, ["install"], "install")).toBe(218);
	});
});

describe("matched terms", () => {
	it("lists distinct tokens found in any field, in query order", () => {
		expect(findMatchedTerms(installation, ["setup", "linux", "setup", "windows"])).toEqual(["setup", "linux"]);
	});

	it("matches case-insensitively", () => {
		expect(findMatchedTerms(dockerSection, ["docker", "container"])).toEqual(["docker", "container"]);
	});
});
