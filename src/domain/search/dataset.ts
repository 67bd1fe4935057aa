import fs from "node:fs/promises";
import { z } from "zod";
import bundledDataset from "../../../data/docs-dataset.json" with { type: "json" };
import { PAGE_CATEGORIES, type DocsDataset } from "./types.js";

/**
 * Raised when a dataset cannot be read or does not match the schema
 */
export class DatasetError extends Error {
	readonly source: string;
	readonly issues: string[];

	constructor(message: string, source: string, issues: string[] = []) {
		super(issues.length > 0 ? `${message}\n${issues.map(issue => `  - ${issue}`).join("\n")}` : message);
		this.name = "DatasetError";
		this.source = source;
		this.issues = issues;
	}
}

const KeywordsSchema = z.array(z.string().trim().min(1));

const PageSchema = z.object({
	id: z.string().min(1),
	title: z.string(),
	url: z.string(),
	description: z.string(),
	keywords: KeywordsSchema,
	category: z.enum(PAGE_CATEGORIES).optional(),
	priority: z.number().int().positive().optional(),
});

const SectionSchema = z.object({
	id: z.string().min(1),
	title: z.string(),
	url: z.string().optional(),
	pageId: z.string().min(1),
	description: z.string(),
	keywords: KeywordsSchema,
});

function checkUniqueIds(
	items: { id: string }[],
	path: "pages" | "sections",
	ctx: z.RefinementCtx,
): void {
	const seen = new Set<string>();
	items.forEach((item, i) => {
		if (seen.has(item.id)) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: `Duplicate id "${item.id}"`,
				path: [path, i, "id"],
			});
		}
		seen.add(item.id);
	});
}

const DatasetSchema = z
	.object({
		pages: z.array(PageSchema),
		sections: z.array(SectionSchema).default([]),
	})
	.superRefine((dataset, ctx) => {
		checkUniqueIds(dataset.pages, "pages", ctx);
		checkUniqueIds(dataset.sections, "sections", ctx);
	});

function formatIssues(error: z.ZodError): string[] {
	return error.issues.map(issue => {
		const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
		return `${path}: ${issue.message}`;
	});
}

/**
 * Validate an already-parsed dataset value
 */
export function parseDataset(input: unknown, source: string = "<inline>"): DocsDataset {
	const result = DatasetSchema.safeParse(input);
	if (!result.success) {
		throw new DatasetError(`Invalid docs dataset (${source})`, source, formatIssues(result.error));
	}
	return result.data;
}

/**
 * Read and validate a JSON dataset file
 */
export async function loadDatasetFile(filePath: string): Promise<DocsDataset> {
	let raw: string;
	try {
		raw = await fs.readFile(filePath, "utf8");
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		throw new DatasetError(`Cannot read docs dataset at ${filePath}: ${reason}`, filePath);
	}

	let json: unknown;
	try {
		json = JSON.parse(raw);
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		throw new DatasetError(`Docs dataset at ${filePath} is not valid JSON: ${reason}`, filePath);
	}

	return parseDataset(json, filePath);
}

/**
 * The corpus shipped with the package
 */
export function loadDefaultDataset(): DocsDataset {
	return parseDataset(bundledDataset, "bundled");
}
