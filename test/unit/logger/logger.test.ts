import { describe, expect, it, vi } from "vitest";
import { atom } from "nanostores";
import { createLogger, silentLogger } from "../../../src/logger/logger.js";
import { attachStoreLogger } from "../../../src/logger/storeLogger.js";

describe("logger", () => {
	it("prefixes lines with the scope and tags non-info levels", () => {
		const write = vi.fn();
		const logger = createLogger("index", { level: "debug", write });

		logger.debug("building");
		logger.info("built");
		logger.warn("slow");
		logger.error("failed", { code: 1 });

		expect(write.mock.calls).toEqual([
			["[docs-search:index] DEBUG building"],
			["[docs-search:index] built"],
			["[docs-search:index] WARN slow"],
			["[docs-search:index] ERROR failed", { code: 1 }],
		]);
	});

	it("drops lines below the configured level", () => {
		const write = vi.fn();
		const logger = createLogger(undefined, { level: "warn", write });

		logger.info("hidden");
		logger.warn("shown");

		expect(write).toHaveBeenCalledTimes(1);
		expect(write).toHaveBeenCalledWith("[docs-search] WARN shown");
		expect(logger.isEnabled("debug")).toBe(false);
		expect(logger.isEnabled("error")).toBe(true);
	});

	it("nests child scopes and keeps options", () => {
		const write = vi.fn();
		const logger = createLogger("mcp", { write }).child("tools");

		logger.info("registered");
		logger.debug("hidden");

		expect(write.mock.calls).toEqual([["[docs-search:mcp:tools] registered"]]);
	});

	it("writes to stderr by default", () => {
		const spy = vi.spyOn(console, "error").mockImplementation(() => {});

		createLogger("server").info("ready");

		expect(spy).toHaveBeenCalledWith("[docs-search:server] ready");
		spy.mockRestore();
	});

	it("silent logger reports nothing as enabled", () => {
		expect(silentLogger.isEnabled("error")).toBe(false);
	});
});

describe("store logger", () => {
	it("does nothing unless debug is enabled", () => {
		const write = vi.fn();
		const $value = atom(0);

		const detach = attachStoreLogger($value, "$value", createLogger("ui", { write }));
		const unbind = $value.listen(() => {});
		$value.set(1);
		unbind();
		detach();

		expect(write).not.toHaveBeenCalled();
	});

	it("reports changes at debug level", () => {
		const write = vi.fn();
		const $value = atom<{ status: string }>({ status: "closed" });

		const detach = attachStoreLogger($value, "$selection", createLogger("ui", { level: "debug", write }));
		const unbind = $value.listen(() => {});
		$value.set({ status: "open" });
		unbind();
		detach();

		expect(write).toHaveBeenCalledWith('[docs-search:ui] DEBUG $selection changed: {"status":"open"}');
	});
});
