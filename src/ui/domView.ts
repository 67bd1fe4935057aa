import { nanoid } from "nanoid";
import { SEARCH_CONFIG } from "../config/settings.js";
import type { SearchRepository } from "../domain/search/repository.js";
import type { Logger } from "../logger/logger.js";
import { createSearchController, type SearchController, type SearchView } from "./controller.js";
import type { NoResultsFallback } from "./renderer.js";
import { resultElementId } from "./renderer.js";

export interface SearchWidgetOptions {
	input: HTMLInputElement;
	results: HTMLElement;
	repository: SearchRepository;
	/** Defaults to assigning the window location */
	navigate?: (url: string) => void;
	debounceDelay?: number;
	fallback?: NoResultsFallback;
	idPrefix?: string;
	logger?: Logger;
}

export interface SearchWidget {
	controller: SearchController;
	destroy(): void;
}

/**
 * DOM implementation of {@link SearchView}
 */
export function createDomSearchView(
	input: HTMLInputElement,
	results: HTMLElement,
	idPrefix: string,
	navigate: (url: string) => void,
): SearchView {
	const doc = input.ownerDocument;

	return {
		getQuery: () => input.value,
		isInputFocused: () => doc.activeElement === input,
		focusInput: () => {
			input.focus();
			input.select();
		},
		blurInput: () => {
			input.blur();
		},
		setResultsHtml: html => {
			results.innerHTML = html;
		},
		showResults: () => {
			results.style.display = "block";
			results.classList.add("visible");
			input.setAttribute("aria-expanded", "true");
		},
		hideResults: () => {
			results.style.display = "none";
			results.classList.remove("visible");
			input.setAttribute("aria-expanded", "false");
		},
		markSelected: index => {
			const items = results.querySelectorAll<HTMLElement>(`.${SEARCH_CONFIG.resultClass}`);
			items.forEach((item, i) => {
				item.classList.toggle(SEARCH_CONFIG.selectedClass, i === index);
				item.setAttribute("aria-selected", String(i === index));
			});

			if (index === null) {
				input.removeAttribute("aria-activedescendant");
			} else {
				input.setAttribute("aria-activedescendant", resultElementId(idPrefix, index));
			}
		},
		navigate,
	};
}

/**
 * Bind a search input and results container to a repository.
 *
 * @example
 * ```ts
 * const input = document.querySelector<HTMLInputElement>("#search-input");
 * const results = document.querySelector<HTMLElement>("#search-results");
 * if (input && results) {
 *   const widget = mountSearchWidget({ input, results, repository });
 *   // later
 *   widget.destroy();
 * }
 * ```
 */
export function mountSearchWidget(options: SearchWidgetOptions): SearchWidget {
	const { input, results, repository } = options;
	const doc = input.ownerDocument;
	const idPrefix = options.idPrefix ?? `docs-search-${nanoid(8)}`;
	const navigate =
		options.navigate ??
		((url: string): void => {
			doc.defaultView?.location.assign(url);
		});

	results.id ||= `${idPrefix}-listbox`;
	results.setAttribute("role", "listbox");
	input.setAttribute("role", "combobox");
	input.setAttribute("aria-controls", results.id);
	input.setAttribute("aria-expanded", "false");

	const view = createDomSearchView(input, results, idPrefix, navigate);
	const controller = createSearchController(view, repository, {
		debounceDelay: options.debounceDelay,
		fallback: options.fallback,
		idPrefix,
		logger: options.logger,
	});

	const onInput = (): void => controller.handleInput();
	const onFocus = (): void => controller.handleFocus();

	const onKeyDown = (event: KeyboardEvent): void => {
		if (controller.handleKeyDown(event.key)) event.preventDefault();
	};

	const onDocumentKeyDown = (event: KeyboardEvent): void => {
		if (controller.handleGlobalKeyDown(event)) event.preventDefault();
	};

	const onDocumentClick = (event: MouseEvent): void => {
		const target = event.target;
		const inside = target instanceof Node && (input.contains(target) || results.contains(target));
		controller.handleDocumentClick(inside);
	};

	const onResultsClick = (event: MouseEvent): void => {
		const target = event.target;
		if (!(target instanceof Element)) return;

		const item = target.closest<HTMLElement>("[data-index]");
		if (!item || !results.contains(item)) return;

		const index = Number.parseInt(item.dataset.index ?? "", 10);
		if (Number.isNaN(index)) return;

		event.preventDefault();
		controller.handleResultClick(index);
	};

	input.addEventListener("input", onInput);
	input.addEventListener("focus", onFocus);
	input.addEventListener("keydown", onKeyDown);
	results.addEventListener("click", onResultsClick);
	doc.addEventListener("keydown", onDocumentKeyDown);
	doc.addEventListener("click", onDocumentClick);

	view.hideResults();

	return {
		controller,
		destroy(): void {
			input.removeEventListener("input", onInput);
			input.removeEventListener("focus", onFocus);
			input.removeEventListener("keydown", onKeyDown);
			results.removeEventListener("click", onResultsClick);
			doc.removeEventListener("keydown", onDocumentKeyDown);
			doc.removeEventListener("click", onDocumentClick);
			controller.dispose();
		},
	};
}
