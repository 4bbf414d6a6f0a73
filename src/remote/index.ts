export type { RemoteCollectionStore, StoreOperation } from './store.js';
export { MUTATING_OPERATIONS } from './store.js';
export { InMemoryCollectionStore } from './memory.js';
export type { FaultRule, StoreCall } from './memory.js';
export {
  PostmanCollectionStore,
  DEFAULT_POSTMAN_API_URL,
  BASE_URL_VARIABLE,
  DEFAULT_API_KEY_VALUE,
  descriptorOfItem,
  itemOfDescriptor,
  parseRetryAfter,
  pathOfUrl,
} from './postman.js';
export type { FetchLike, HttpRequest, HttpResponse, CollectionItem, EnvironmentInput, ConnectionInfo } from './postman.js';
