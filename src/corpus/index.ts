export { DocumentStore } from './document-store.js';
export type { SourceDocument, RandomSource } from './document-store.js';
