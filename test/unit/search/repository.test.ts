import { describe, expect, it, vi } from "vitest";
import { createSearchRepository } from "../../../src/domain/index.js";
import { createLogger } from "../../../src/logger/logger.js";
import { createFixtureDataset } from "../../helpers/fixtures.js";

function createRecordingLogger() {
	const write = vi.fn();
	const logger = createLogger("index", { level: "debug", write });
	return { logger, write };
}

describe("search repository", () => {
	it("returns nothing and warns before load", () => {
		const { logger, write } = createRecordingLogger();
		const repository = createSearchRepository(createFixtureDataset(), { logger });

		expect(repository.isLoaded()).toBe(false);
		expect(repository.search("docker")).toEqual([]);
		expect(write).toHaveBeenCalledWith("[docs-search:index] WARN Search index not loaded");
		expect(repository.getPage("faq")).toBeUndefined();
	});

	it("builds the index once and logs it", () => {
		const { logger, write } = createRecordingLogger();
		const repository = createSearchRepository(createFixtureDataset(), { logger });

		const first = repository.load();
		const second = repository.load();

		expect(second).toBe(first);
		expect(repository.isLoaded()).toBe(true);
		expect(write).toHaveBeenCalledTimes(1);
		expect(write).toHaveBeenCalledWith("[docs-search:index] Search index built with 3 pages and 2 sections");
	});

	it("builds on the first search when configured", () => {
		const { logger, write } = createRecordingLogger();
		const repository = createSearchRepository(createFixtureDataset(), { logger, loadOnFirstSearch: true });

		const results = repository.search("docker");

		expect(repository.isLoaded()).toBe(true);
		expect(results.map(result => result.id)).toEqual(["docker-setup", "installation"]);
		expect(write.mock.calls.map(call => call[0])).toEqual([
			"[docs-search:index] Search index built with 3 pages and 2 sections",
			'[docs-search:index] DEBUG "docker" -> 2 results',
		]);
	});

	it("applies configured limits", () => {
		const repository = createSearchRepository(createFixtureDataset(), { minQueryLength: 3, maxResults: 1 });
		repository.load();

		expect(repository.getLimits()).toEqual({ minQueryLength: 3, maxResults: 1 });
		expect(repository.search("qu")).toEqual([]);
		expect(repository.search("install")).toHaveLength(1);
	});

	it("looks up records by id", () => {
		const repository = createSearchRepository(createFixtureDataset());
		repository.load();

		expect(repository.getPage("faq")?.title).toBe("FAQ & Community");
		expect(repository.getSection("docker-setup")?.url).toBe("./pages/installation.html#docker-setup");
		expect(repository.getSectionsForPage("installation").map(section => section.id)).toEqual(["docker-setup"]);
		expect(repository.getSectionsForPage("faq")).toEqual([]);
		expect(repository.getPage("missing")).toBeUndefined();
	});

	it("resolves keyword entries to records", () => {
		const repository = createSearchRepository(createFixtureDataset());
		repository.load();

		const matches = repository.lookupKeyword("  Docker ");
		expect(matches.map(match => [match.entry.type, match.record.id, match.entry.priority])).toEqual([
			["page", "installation", 8],
			["section", "docker-setup", 5],
		]);
		expect(repository.lookupKeyword("dock")).toEqual([]);
	});

	it("reports index stats", () => {
		const repository = createSearchRepository(createFixtureDataset());
		expect(repository.getStats()).toEqual({ loaded: false, pages: 0, sections: 0, keywords: 0, builtAt: 0 });

		repository.load();
		expect(repository.getStats()).toMatchObject({ loaded: true, pages: 3, sections: 2, keywords: 10 });
	});
});
