#!/usr/bin/env node

import { main } from "./index.js";

main().catch(error => {
	// eslint-disable-next-line no-console
	console.error("[docs-search] Fatal error:", error instanceof Error ? error.message : error);
	process.exit(1);
});
