export { RemediationClient, type RemediationClientOptions } from './client.js';
export { InMemoryRemediationStore, type LocalStoreOptions } from './memory_store.js';
export { SqliteRemediationStore } from './sqlite_store.js';
export { HttpRemediationStore, type HttpRemediationStoreOptions } from './http_store.js';
export { findBestMatch, type ScoredEntry } from './matching.js';
export {
  DEFAULT_SIMILARITY_THRESHOLD,
  type EscalationRecord,
  type LookupOptions,
  type RemediationEntry,
  type RemediationListFilter,
  type RemediationMatch,
  type RemediationStatus,
  type RemediationStore,
} from './types.js';
