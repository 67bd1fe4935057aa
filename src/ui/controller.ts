import type { ReadableAtom } from "nanostores";
import { NO_RESULTS_FALLBACK, SEARCH_CONFIG } from "../config/settings.js";
import { isSearchableQuery } from "../domain/search/queryProcessor.js";
import type { SearchRepository } from "../domain/search/repository.js";
import type { SearchResult } from "../domain/search/types.js";
import { silentLogger, type Logger } from "../logger/logger.js";
import { attachStoreLogger } from "../logger/storeLogger.js";
import { renderNoResults, renderResults, type NoResultsFallback } from "./renderer.js";
import { createSelectionStore, type SelectionState } from "./selection.js";

/**
 * What the controller needs from the page. The DOM adapter implements it;
 * tests use a plain object.
 */
export interface SearchView {
	getQuery(): string;
	isInputFocused(): boolean;
	/** Focus the input and select its content */
	focusInput(): void;
	blurInput(): void;
	setResultsHtml(html: string): void;
	showResults(): void;
	hideResults(): void;
	markSelected(index: number | null): void;
	navigate(url: string): void;
}

export interface SearchControllerOptions {
	debounceDelay?: number;
	fallback?: NoResultsFallback;
	idPrefix?: string;
	logger?: Logger;
}

export interface KeyChord {
	key: string;
	ctrlKey?: boolean;
	metaKey?: boolean;
}

export interface SearchController {
	$selection: ReadableAtom<SelectionState>;
	getResults(): readonly SearchResult[];
	handleInput(): void;
	handleFocus(): void;
	/** Keys pressed inside the input. Returns true when default should be prevented. */
	handleKeyDown(key: string): boolean;
	/** Keys pressed anywhere. Returns true when default should be prevented. */
	handleGlobalKeyDown(chord: KeyChord): boolean;
	handleDocumentClick(insideWidget: boolean): void;
	handleResultClick(index: number): void;
	dispose(): void;
}

/**
 * Internal state for search controller
 */
interface SearchControllerState {
	timer: ReturnType<typeof setTimeout> | null;
	results: readonly SearchResult[];
	/** Query the current markup was rendered for, null when nothing is rendered */
	renderedQuery: string | null;
}

/**
 * Create the interaction controller: debounced search on input, keyboard
 * driven selection and global shortcuts, on top of a {@link SearchView}.
 */
export function createSearchController(
	view: SearchView,
	repository: SearchRepository,
	options: SearchControllerOptions = {},
): SearchController {
	const debounceDelay = options.debounceDelay ?? SEARCH_CONFIG.debounceDelay;
	const fallback = options.fallback ?? NO_RESULTS_FALLBACK;
	const logger = options.logger ?? silentLogger;
	const { minQueryLength } = repository.getLimits();

	const selection = createSelectionStore();
	const state: SearchControllerState = {
		timer: null,
		results: [],
		renderedQuery: null,
	};

	const detachStoreLogger = attachStoreLogger(selection.$selection, "search-selection", logger);
	const unbindSelection = selection.$selectedIndex.subscribe(index => {
		view.markSelected(index);
	});

	const cancelPending = (): void => {
		if (state.timer) {
			clearTimeout(state.timer);
			state.timer = null;
		}
	};

	const close = (): void => {
		selection.dispatch({ type: "dismiss" });
		view.hideResults();
	};

	const open = (): void => {
		selection.dispatch({ type: "open", resultCount: state.results.length });
		view.showResults();
	};

	const navigateTo = (index: number): void => {
		const result = state.results[index];
		if (!result) return;

		view.hideResults();
		logger.debug(`navigate -> ${result.url}`);
		view.navigate(result.url);
	};

	const runSearch = (query: string): void => {
		const results = repository.search(query);
		// Not loaded yet: the repository already logged it, keep what is shown
		if (!repository.isLoaded()) return;

		state.results = results;
		state.renderedQuery = query;
		view.setResultsHtml(
			state.results.length > 0
				? renderResults(state.results, query, { idPrefix: options.idPrefix })
				: renderNoResults(fallback),
		);

		if (view.isInputFocused()) {
			open();
		} else {
			close();
		}
	};

	return {
		$selection: selection.$selection,

		getResults(): readonly SearchResult[] {
			return state.results;
		},

		handleInput(): void {
			cancelPending();
			const query = view.getQuery().trim();

			if (!isSearchableQuery(query, minQueryLength)) {
				state.renderedQuery = null;
				close();
				return;
			}

			// Typing invalidates the cursor
			if (selection.$selection.get().status === "open") {
				selection.dispatch({ type: "open", resultCount: state.results.length });
			}

			state.timer = setTimeout(() => {
				state.timer = null;
				if (view.getQuery().trim() === query) {
					runSearch(query);
				}
			}, debounceDelay);
		},

		handleFocus(): void {
			const query = view.getQuery().trim();
			if (!isSearchableQuery(query, minQueryLength) || state.renderedQuery !== query) return;
			if (selection.$selection.get().status === "open") return;
			open();
		},

		handleKeyDown(key: string): boolean {
			switch (key) {
				case "ArrowDown":
					selection.dispatch({ type: "down" });
					return true;
				case "ArrowUp":
					selection.dispatch({ type: "up" });
					return true;
				case "Enter": {
					const effect = selection.dispatch({ type: "activate" });
					if (effect) navigateTo(effect.index);
					return true;
				}
				case "Escape":
					close();
					view.blurInput();
					return false;
				default:
					return false;
			}
		},

		handleGlobalKeyDown({ key, ctrlKey = false, metaKey = false }: KeyChord): boolean {
			if ((ctrlKey || metaKey) && key.toLowerCase() === "k") {
				if (!view.isInputFocused()) view.focusInput();
				return true;
			}

			if (key === "Escape") close();
			return false;
		},

		handleDocumentClick(insideWidget: boolean): void {
			if (!insideWidget) close();
		},

		handleResultClick(index: number): void {
			const effect = selection.dispatch({ type: "select", index });
			if (effect) navigateTo(effect.index);
		},

		dispose(): void {
			cancelPending();
			unbindSelection();
			detachStoreLogger();
		},
	};
}
