import { buildLogger } from "@nanostores/logger";
import type { AnyStore } from "nanostores";
import type { Logger } from "./logger.js";

// Pure function for formatting value to string
const formatValue = (value: unknown): string => {
	try {
		const str = JSON.stringify(value);
		return str.length > 200 ? str.slice(0, 200) + "…" : str;
	} catch {
		return String(value);
	}
};

/**
 * Report store lifecycle and changes at debug level.
 * Does nothing unless the logger has debug enabled.
 *
 * @returns detach function
 */
export function attachStoreLogger(store: AnyStore, storeName: string, logger: Logger): () => void {
	if (!logger.isEnabled("debug")) return (): void => {};

	return buildLogger(store, storeName, {
		mount: ({ storeName: name }) => {
			logger.debug(`${name} mounted`);
		},
		unmount: ({ storeName: name }) => {
			logger.debug(`${name} unmounted`);
		},
		change: ({ storeName: name, newValue }) => {
			logger.debug(`${name} changed: ${formatValue(newValue)}`);
		},
	});
}
