import { pathToFileURL } from "node:url";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { buildDocsSearchServer, createConfiguredRepository, createServerLogger } from "./server.js";

// Re-export for programmatic usage
export { buildDocsSearchServer, createConfiguredRepository } from "./server.js";
export * from "./domain/index.js";
export { createLogger, silentLogger } from "./logger/logger.js";
export type { Logger, LoggerOptions, LogLevel } from "./logger/logger.js";
export { SEARCH_CONFIG, NO_RESULTS_FALLBACK } from "./config/settings.js";

/**
 * Main entry point: builds the MCP server and connects it to stdio transport.
 * Can be called from CLI or imported programmatically.
 */
export async function main(): Promise<void> {
	const logger = createServerLogger();
	const repository = await createConfiguredRepository(logger);
	const server = buildDocsSearchServer(repository);

	const transport = new StdioServerTransport();
	await server.connect(transport);
	logger.info("Listening on stdio");

	const shutdown = (): void => {
		void server.close().then(() => process.exit(0));
	};
	process.on("SIGINT", shutdown);
	process.on("SIGTERM", shutdown);
}

// Auto-start when run directly (not imported)
const isMainModule = process.argv[1] !== undefined && pathToFileURL(process.argv[1]).href === import.meta.url;

if (isMainModule) {
	main().catch(error => {
		// eslint-disable-next-line no-console
		console.error("[docs-search] Fatal error:", error instanceof Error ? error.message : error);
		process.exit(1);
	});
}
