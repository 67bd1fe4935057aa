export { createSearchController } from "./controller.js";
export type { KeyChord, SearchController, SearchControllerOptions, SearchView } from "./controller.js";
export { createDomSearchView, mountSearchWidget } from "./domView.js";
export type { SearchWidget, SearchWidgetOptions } from "./domView.js";
export { escapeHtml, escapeRegExp, highlightMatches } from "./highlight.js";
export { DEFAULT_RESULT_ICON, getResultIcon, RESULT_ICONS } from "./icons.js";
export { renderNoResults, renderResults, resultElementId } from "./renderer.js";
export type { NoResultsFallback, RenderOptions } from "./renderer.js";
export { CLOSED, createSelectionStore, transition } from "./selection.js";
export type { SelectionEffect, SelectionEvent, SelectionState, SelectionStore } from "./selection.js";
