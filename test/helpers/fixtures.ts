import type { DocsDataset, PageInput, SectionInput } from "../../src/domain/search/types.js";

export const quickStartPage: PageInput = {
	id: "quick-start",
	title: "Quick Start Guide",
	url: "./pages/quick-start.html",
	description: "Get up and running in minutes.",
	keywords: ["quick", "start", "installation"],
	category: "getting-started",
	priority: 9,
};

export const faqPage: PageInput = {
	id: "faq",
	title: "FAQ & Community",
	url: "./pages/faq.html",
	description: "Frequently asked questions and support channels.",
	keywords: ["faq", "questions"],
	category: "support",
	priority: 3,
};

export const installationPage: PageInput = {
	id: "installation",
	title: "Installation & Setup",
	url: "./pages/installation.html",
	description: "Install on Linux, macOS and Docker.",
	keywords: ["install", "setup", "docker"],
	category: "setup",
	priority: 8,
};

export const dockerSection: SectionInput = {
	id: "docker-setup",
	title: "Docker Installation",
	pageId: "installation",
	description: "Container-based deployment",
	keywords: ["docker", "container"],
};

/** Its parent page is not part of the dataset */
export const orphanSection: SectionInput = {
	id: "orphan",
	title: "Legacy Notes",
	pageId: "removed-page",
	description: "Notes kept from an older release",
	keywords: ["legacy"],
};

export function createFixtureDataset(): DocsDataset {
	return structuredClone({
		pages: [quickStartPage, faqPage, installationPage],
		sections: [dockerSection, orphanSection],
	});
}
