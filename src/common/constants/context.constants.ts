// Returned by RetrievalService.formatContext when nothing was retrieved
export const NO_CONTEXT_SENTINEL = 'No relevant context found.';
