import type { PageCategory, RecordType } from "../domain/search/types.js";

export const DEFAULT_RESULT_ICON = "📄";

/**
 * Icon lookup: category first, then record type
 */
export const RESULT_ICONS: Readonly<Record<PageCategory | RecordType, string>> = {
	page: "📄",
	section: "📝",
	overview: "🏠",
	"getting-started": "🚀",
	setup: "⚙️",
	features: "⭐",
	integration: "🔌",
	ai: "🤖",
	reference: "📚",
	support: "❓",
	examples: "💡",
	development: "👨‍💻",
};

export function getResultIcon(type?: RecordType, category?: PageCategory): string {
	return (category && RESULT_ICONS[category]) || (type && RESULT_ICONS[type]) || DEFAULT_RESULT_ICON;
}
