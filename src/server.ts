import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { envConfig } from "./config/envConfig.js";
import {
	createSearchRepository,
	loadDatasetFile,
	loadDefaultDataset,
	type DocsDataset,
	type SearchRepository,
} from "./domain/index.js";
import { registerDocsFeatures } from "./features/docs/index.js";
import { createLogger, type Logger } from "./logger/logger.js";

import packageJson from "../package.json" with { type: "json" };

const SERVER_NAME = "docs-search-mcp";
const SERVER_VERSION = packageJson.version;

/**
 * Build the search repository from configuration: the dataset named by
 * DOCS_SEARCH_DATASET, or the bundled one. The index is built eagerly
 * unless DOCS_SEARCH_LOAD_ON_FIRST_SEARCH is set.
 */
export async function createConfiguredRepository(logger: Logger): Promise<SearchRepository> {
	let dataset: DocsDataset;
	if (envConfig.DOCS_SEARCH_DATASET) {
		logger.info(`Loading dataset from ${envConfig.DOCS_SEARCH_DATASET}`);
		dataset = await loadDatasetFile(envConfig.DOCS_SEARCH_DATASET);
	} else {
		dataset = loadDefaultDataset();
	}

	const repository = createSearchRepository(dataset, {
		loadOnFirstSearch: envConfig.DOCS_SEARCH_LOAD_ON_FIRST_SEARCH,
		logger: logger.child("index"),
	});

	if (!envConfig.DOCS_SEARCH_LOAD_ON_FIRST_SEARCH) {
		repository.load();
	}

	return repository;
}

export function createServerLogger(): Logger {
	return createLogger(undefined, { level: envConfig.DOCS_SEARCH_LOG_LEVEL });
}

export function buildDocsSearchServer(repository: SearchRepository): McpServer {
	const server = new McpServer(
		{
			name: SERVER_NAME,
			version: SERVER_VERSION,
		},
		{
			capabilities: {
				tools: {},
				resources: {},
				prompts: {},
			},
		},
	);

	registerDocsFeatures(server, repository);

	return server;
}
