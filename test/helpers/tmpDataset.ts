import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

export async function createTempDataset(
	contents: string,
	prefix: string = "docs-search-test-",
): Promise<{ filePath: string; cleanup: () => Promise<void> }> {
	const rootDir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
	const filePath = path.join(rootDir, "dataset.json");
	await fs.writeFile(filePath, contents, "utf8");

	return {
		filePath,
		cleanup: async () => {
			await fs.rm(rootDir, { recursive: true, force: true });
		},
	};
}
