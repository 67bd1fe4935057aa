export const INDEX_NOT_LOADED_MESSAGE = `Docs search index is not loaded yet.
Set DOCS_SEARCH_LOAD_ON_FIRST_SEARCH=1 to build it on the first search, or restart the server.`;
