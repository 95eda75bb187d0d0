/**
 * @studyhall/tutor-retrieval
 * Vector stores and the fail-soft Retrieval Service
 */

export type {
  PassageFilters,
  StoredPassage,
  VectorSearchMatch,
  VectorStore,
} from './vector-store/vector-store.js';
export { LocalVectorStore, type LocalVectorStoreOptions } from './vector-store/local.js';
export { QdrantVectorStore, stringToUUID, type QdrantVectorStoreOptions } from './vector-store/qdrant.js';
export {
  RetrievalService,
  type PassageInput,
  type RetrievalOutcome,
  type RetrievalScope,
  type RetrievalServiceOptions,
  type RetrievalStats,
  type RetrieveOptions,
} from './retrieval-service.js';
