/**
 * URI template variables may arrive as a list; take the first value and
 * undo percent-encoding.
 */
export function readTemplateVariable(value: string | string[] | undefined): string {
	const raw = Array.isArray(value) ? (value[0] ?? "") : (value ?? "");
	try {
		return decodeURIComponent(raw);
	} catch {
		return raw;
	}
}
