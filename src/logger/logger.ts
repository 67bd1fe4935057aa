export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_WEIGHT: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
	silent: 100,
};

export interface Logger {
	debug(message: string, ...details: unknown[]): void;
	info(message: string, ...details: unknown[]): void;
	warn(message: string, ...details: unknown[]): void;
	error(message: string, ...details: unknown[]): void;
	child(scope: string): Logger;
	isEnabled(level: Exclude<LogLevel, "silent">): boolean;
}

export interface LoggerOptions {
	level?: LogLevel;
	/**
	 * Line sink. Defaults to console.error: stdout is reserved for the
	 * MCP stdio transport.
	 */
	write?: (line: string, ...details: unknown[]) => void;
}

const ROOT_SCOPE = "docs-search";

/**
 * Create a scoped, leveled logger.
 *
 * @example
 * ```ts
 * const logger = createLogger("index", { level: "debug" });
 * logger.info("Search index built"); // [docs-search:index] Search index built
 * ```
 */
export function createLogger(scope?: string, options: LoggerOptions = {}): Logger {
	const level = options.level ?? "info";
	// eslint-disable-next-line no-console
	const write = options.write ?? ((line: string, ...details: unknown[]) => console.error(line, ...details));
	const prefix = scope ? `[${ROOT_SCOPE}:${scope}]` : `[${ROOT_SCOPE}]`;

	const isEnabled = (target: Exclude<LogLevel, "silent">): boolean =>
		LEVEL_WEIGHT[target] >= LEVEL_WEIGHT[level];

	const emit = (target: Exclude<LogLevel, "silent">, message: string, details: unknown[]): void => {
		if (!isEnabled(target)) return;
		const tag = target === "info" ? "" : ` ${target.toUpperCase()}`;
		write(`${prefix}${tag} ${message}`, ...details);
	};

	return {
		debug: (message, ...details) => emit("debug", message, details),
		info: (message, ...details) => emit("info", message, details),
		warn: (message, ...details) => emit("warn", message, details),
		error: (message, ...details) => emit("error", message, details),
		child: childScope => createLogger(scope ? `${scope}:${childScope}` : childScope, options),
		isEnabled,
	};
}

/**
 * Logger that drops everything. Default for library entry points.
 */
export const silentLogger: Logger = createLogger(undefined, { level: "silent" });
